/**
 * Signature listing toward a checkpoint
 *
 * getSignaturesForAddress only pages backwards from the newest signature, so
 * everything after the checkpoint is listed before the oldest of it can be
 * classified. A walk lists at most maxPages pages per call and continues from
 * where it stopped on the next call, until a short page reaches the
 * checkpoint.
 */

import type { SignaturePaging, SignatureSource } from './types.js';

/** A complete walk returns every signature after `until`, oldest first */
export type WalkResult = { complete: true; signatures: string[] } | { complete: false; listed: number };

export class SignatureWalk {
  private source: SignatureSource;
  private address: string;
  private paging: SignaturePaging;

  private until: string | undefined;
  private before: string | undefined;
  private listed: string[] = [];
  private active = false;

  constructor(source: SignatureSource, address: string, paging: SignaturePaging) {
    this.source = source;
    this.address = address;
    this.paging = paging;
  }

  /** Signatures listed by the walk in progress */
  get pending(): number {
    return this.listed.length;
  }

  /**
   * List more pages toward `until`. Without `until` only the newest
   * initialLimit signatures are listed. A failed page leaves the walk where
   * it was.
   */
  async advance(until: string | undefined, signal?: AbortSignal): Promise<WalkResult> {
    if (this.active && this.until !== until) {
      this.reset();
    }
    this.active = true;
    this.until = until;

    if (until === undefined) {
      const page = await this.source.getSignaturesForAddress(this.address, { limit: this.paging.initialLimit }, signal);
      this.listed.push(...page.map((entry) => entry.signature));
      return this.finish();
    }

    for (let pageIndex = 0; pageIndex < this.paging.maxPages; pageIndex++) {
      const page = await this.source.getSignaturesForAddress(
        this.address,
        { until, before: this.before, limit: this.paging.pageLimit },
        signal
      );
      this.listed.push(...page.map((entry) => entry.signature));

      if (page.length < this.paging.pageLimit) {
        return this.finish();
      }
      this.before = page[page.length - 1].signature;
    }

    return { complete: false, listed: this.listed.length };
  }

  private finish(): WalkResult {
    const signatures = this.listed.reverse();
    this.reset();
    return { complete: true, signatures };
  }

  private reset(): void {
    this.listed = [];
    this.before = undefined;
    this.until = undefined;
    this.active = false;
  }
}
