/**
 * Topology file: networks, proxies, wallets and server groups
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import type { Topology } from './types.js';

const httpUrl = z.string().url().refine((val) => /^https?:\/\//.test(val), {
  message: 'Expected an http(s) URL',
});

const NetworkSchema = z.object({
  name: z.string().min(1),
  chain: z.string().min(1),
  program_id: z.string().min(1).optional(),
  url: httpUrl,
});

const ProxySchema = z.object({
  name: z.string().min(1),
  chain: z.string().min(1),
  url: httpUrl,
});

const WalletSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  chain: z.string().min(1),
});

const ServerGroupSchema = z.object({
  name: z.string().min(1),
  servers: z.array(httpUrl).min(1),
});

const duplicates = (names: string[]) => names.filter((name, i) => names.indexOf(name) !== i);

export const TopologySchema = z
  .object({
    networks: z.array(NetworkSchema).default([]),
    proxies: z.array(ProxySchema).default([]),
    wallets: z.array(WalletSchema).default([]),
    server_groups: z.array(ServerGroupSchema).default([]),
    // flat list from the first deployments; becomes the "default" group
    solana_servers: z.array(httpUrl).optional(),
  })
  .superRefine((raw, ctx) => {
    for (const [field, names] of [
      ['networks', raw.networks.map((n) => n.name)],
      ['proxies', raw.proxies.map((p) => p.name)],
      ['server_groups', raw.server_groups.map((g) => g.name)],
    ] as const) {
      for (const name of duplicates(names)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `Duplicate name "${name}"` });
      }
    }

    const chains = new Set(raw.networks.map((n) => n.chain));
    raw.wallets.forEach((wallet, i) => {
      if (!chains.has(wallet.chain)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['wallets', i, 'chain'],
          message: `No network configured for chain "${wallet.chain}"`,
        });
      }
    });
  })
  .transform(
    (raw): Topology => ({
      networks: raw.networks.map((n) => ({ name: n.name, chain: n.chain, programId: n.program_id, url: n.url })),
      proxies: raw.proxies,
      wallets: raw.wallets,
      serverGroups: [
        ...raw.server_groups,
        ...(raw.solana_servers && raw.solana_servers.length > 0
          ? [{ name: 'default', servers: raw.solana_servers }]
          : []),
      ],
    })
  );

export function parseTopology(source: string): Topology {
  return TopologySchema.parse(parse(source) ?? {});
}

export async function loadTopology(path: string): Promise<Topology> {
  const source = await readFile(path, 'utf8');
  return parseTopology(source);
}
