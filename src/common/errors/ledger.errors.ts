import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
} from "@nestjs/common";

/**
 * Ledger error taxonomy.
 *
 * Each class extends the matching NestJS HTTP exception so the global
 * HttpExceptionFilter renders it without extra mapping. Holiday upstream
 * failures are not ledger errors: the clients throw UpstreamUnavailableError
 * (see upstream.error.ts) and HolidayPeriodsService turns it into an empty
 * result.
 */

/** Malformed input to a batch or move operation. Raised before any write. */
export class LedgerValidationError extends BadRequestException {
  constructor(message: string | string[]) {
    super(message, "ValidationError");
  }
}

export type LedgerEntityKind = "property" | "batch" | "move";

export class LedgerNotFoundError extends NotFoundException {
  constructor(
    readonly entity: LedgerEntityKind,
    readonly reference: string,
  ) {
    super(`${capitalize(entity)} "${reference}" not found`, `${capitalize(entity)}NotFound`);
  }
}

/**
 * A transition on an already-finalized move, or the losing side of two
 * concurrent transitions. Nothing was written.
 */
export class StateConflictError extends ConflictException {
  constructor(message: string) {
    super(message, "StateConflict");
  }
}

/**
 * The store failed mid-operation. The enclosing transaction has already been
 * rolled back when this is thrown.
 */
export class PersistenceError extends ServiceUnavailableException {
  constructor(
    message: string,
    readonly originalError: unknown = null,
  ) {
    super(message, "PersistenceError");
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
