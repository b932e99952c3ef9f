/**
 * Hand-off queue between remote requests and the frame loop
 *
 * Responses arrive whenever the network settles; callbacks only run when
 * the frame loop drains the queue, in arrival order.
 */

import type { ResponseCode } from './codes.js';

/**
 * A settled remote response waiting for the frame loop
 */
export interface ResponseReceipt {
  code: ResponseCode;
  text: string;
  /** Value returned by remote_get, when any */
  value: string | null;
  callback: (receipt: ResponseReceipt) => void;
  /** Whether the request held the main reader paused */
  blocking: boolean;
}

export class ResponseQueue {
  private receipts: ResponseReceipt[] = [];
  private inFlight = 0;

  /**
   * Number of blocking requests not yet handled
   */
  get pending(): number {
    return this.inFlight;
  }

  get size(): number {
    return this.receipts.length;
  }

  /**
   * Record a blocking request as started
   */
  track(): void {
    this.inFlight++;
  }

  /**
   * Record a blocking request as finished without a callback
   */
  release(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
  }

  push(receipt: ResponseReceipt): void {
    this.receipts.push(receipt);
  }

  /**
   * Run every queued callback, first in first out
   * @returns number of callbacks run
   */
  drain(): number {
    const batch = this.receipts;
    this.receipts = [];
    for (const receipt of batch) {
      if (receipt.blocking) this.release();
      receipt.callback(receipt);
    }
    return batch.length;
  }
}
