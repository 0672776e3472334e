/**
 * Lifecycle Status Types
 */

/**
 * Move Batch Status
 *
 * - pending: created, no move decided yet
 * - processing: some but not all moves decided
 * - completed: every move approved or rejected
 * - failed: analysis or assignment failed before any decision
 */
export type BatchStatus = "pending" | "processing" | "completed" | "failed";

export const BATCH_STATUSES: readonly BatchStatus[] = [
  "pending",
  "processing",
  "completed",
  "failed",
];

/**
 * Move Status
 *
 * "applied" is written by the reservation system once it has carried out an
 * approved move. The ledger only reads it: a decided move never changes
 * status here.
 */
export type MoveStatus = "pending" | "approved" | "rejected" | "applied";

export const MOVE_STATUSES: readonly MoveStatus[] = [
  "pending",
  "approved",
  "rejected",
  "applied",
];

export type MoveAction = "approve" | "reject";

export const MOVE_ACTIONS: readonly MoveAction[] = ["approve", "reject"];
