/**
 * Audit Trail System
 * Tracks every generation attempt of a batch: accepted prompts, rejected
 * duplicates and items that ran out of attempts
 */

import { ParameterSet } from "./types";
import { hashText } from "./utils";

export type AttemptOutcome = "accepted" | "duplicate_rejected" | "item_exhausted";

export interface AuditEntry {
  timestamp: string;
  type: AttemptOutcome;
  itemId: number;
  attempt: number;
  params?: ParameterSet;
  textHash?: string;
}

export interface BatchAuditSummary {
  totalRequests: number;
  accepted: number;
  duplicatesRejected: number;
  exhaustedItems: number[];
  mostRetriedItem?: { itemId: number; attempts: number };
}

/**
 * One-line summary, e.g. "Requests: 3, duplicates rejected: 1, most retried: prompt 2 (2 attempts)"
 */
export function describeSummary(summary: BatchAuditSummary): string {
  const parts = [`Requests: ${summary.totalRequests}`, `duplicates rejected: ${summary.duplicatesRejected}`];
  if (summary.mostRetriedItem) {
    parts.push(`most retried: prompt ${summary.mostRetriedItem.itemId} (${summary.mostRetriedItem.attempts} attempts)`);
  }
  if (summary.exhaustedItems.length > 0) {
    parts.push(`exhausted: prompt ${summary.exhaustedItems.join(", ")}`);
  }
  return parts.join(", ");
}

export class BatchAudit {
  private entries: AuditEntry[] = [];
  private attemptsByItem: Map<number, number> = new Map();

  /**
   * Record an accepted prompt
   */
  recordAccepted(itemId: number, attempt: number, params: ParameterSet, text: string): void {
    this.attemptsByItem.set(itemId, attempt);
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "accepted",
      itemId,
      attempt,
      params,
      textHash: hashText(text),
    });
  }

  /**
   * Record a response that repeated an accepted prompt
   */
  recordDuplicate(itemId: number, attempt: number, params: ParameterSet, text: string): void {
    this.attemptsByItem.set(itemId, attempt);
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "duplicate_rejected",
      itemId,
      attempt,
      params,
      textHash: hashText(text),
    });
  }

  recordExhausted(itemId: number, attempts: number): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "item_exhausted",
      itemId,
      attempt: attempts,
    });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesForItem(itemId: number): AuditEntry[] {
    return this.entries.filter(entry => entry.itemId === itemId);
  }

  getSummary(): BatchAuditSummary {
    let mostRetriedItem: BatchAuditSummary["mostRetriedItem"];
    for (const [itemId, attempts] of this.attemptsByItem) {
      if (attempts > 1 && (!mostRetriedItem || attempts > mostRetriedItem.attempts)) {
        mostRetriedItem = { itemId, attempts };
      }
    }

    const accepted = this.entries.filter(e => e.type === "accepted").length;
    const duplicatesRejected = this.entries.filter(e => e.type === "duplicate_rejected").length;

    return {
      totalRequests: accepted + duplicatesRejected,
      accepted,
      duplicatesRejected,
      exhaustedItems: this.entries.filter(e => e.type === "item_exhausted").map(e => e.itemId),
      mostRetriedItem,
    };
  }
}
