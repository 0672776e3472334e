import { BatchStatus } from "../../common/types/status.type";

export interface BatchCounters {
  totalMoves: number;
  processedMoves: number;
  rejectedMoves: number;
}

export function decidedMoves(batch: BatchCounters): number {
  return batch.processedMoves + batch.rejectedMoves;
}

/**
 * Share of decided moves, in percent, rounded to one decimal.
 *
 * @example
 * completionPercentage({ totalMoves: 3, processedMoves: 1, rejectedMoves: 1 }) // 66.7
 * completionPercentage({ totalMoves: 0, processedMoves: 0, rejectedMoves: 0 }) // 0
 */
export function completionPercentage(batch: BatchCounters): number {
  if (batch.totalMoves === 0) {
    return 0;
  }
  return Math.round((decidedMoves(batch) / batch.totalMoves) * 1000) / 10;
}

export function isBatchComplete(batch: BatchCounters): boolean {
  return decidedMoves(batch) >= batch.totalMoves;
}

/**
 * Status after a change of counters. A failed batch stays failed.
 */
export function deriveBatchStatus(batch: BatchCounters & { status: BatchStatus }): BatchStatus {
  if (batch.status === "failed") {
    return "failed";
  }
  if (isBatchComplete(batch)) {
    return "completed";
  }
  return decidedMoves(batch) > 0 ? "processing" : "pending";
}
