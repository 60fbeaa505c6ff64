/**
 * One-way cancellation signal shared by the dispatcher and the aggregator
 */

import type { TerminationReason } from './types.js';

export type CancellationReason = Exclude<TerminationReason, 'completed'>;

export class CancellationToken {
  private reasonValue: CancellationReason | undefined;
  private listeners: Array<(reason: CancellationReason) => void> = [];

  get cancelled(): boolean {
    return this.reasonValue !== undefined;
  }

  get reason(): CancellationReason | undefined {
    return this.reasonValue;
  }

  /**
   * Set the flag. Only the first call has an effect; returns whether it did.
   */
  cancel(reason: CancellationReason): boolean {
    if (this.reasonValue !== undefined) {
      return false;
    }
    this.reasonValue = reason;
    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  /**
   * Run `listener` once on cancellation (immediately if already cancelled)
   */
  onCancel(listener: (reason: CancellationReason) => void): void {
    if (this.reasonValue !== undefined) {
      listener(this.reasonValue);
      return;
    }
    this.listeners.push(listener);
  }
}
