import { IsObject, IsOptional, Matches } from "class-validator";
import { isDateOnlyString } from "../../common/utils/date.util";
import { validatePlain } from "../../common/utils/validation.util";
import { LedgerValidationError } from "../../common/errors/ledger.errors";
import { DateRange } from "../../common/types/holiday-period.type";

/**
 * The move payload stored in DefragMove.moveData.
 *
 * The ledger reads only the date range. Everything the analysis wants to
 * show reviewers (reservation, units, scores) lives in details and is
 * stored untouched.
 */
export interface MoveDocument {
  startDate: string;
  /** Inclusive */
  endDate: string;
  details?: Record<string, unknown>;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

class MoveDocumentDto implements MoveDocument {
  @Matches(DATE_ONLY, { message: "startDate must be YYYY-MM-DD" })
  startDate!: string;

  @Matches(DATE_ONLY, { message: "endDate must be YYYY-MM-DD" })
  endDate!: string;

  @IsOptional()
  @IsObject()
  details?: Record<string, unknown>;
}

/**
 * Validates one candidate move.
 *
 * @returns The document, or the list of problems with it
 */
export function parseMoveDocument(raw: unknown): { document: MoveDocument } | { errors: string[] } {
  const outcome = validatePlain(MoveDocumentDto, raw, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (!outcome.ok) {
    return { errors: outcome.errors };
  }

  const { startDate, endDate, details } = outcome.value;
  const errors: string[] = [];
  if (!isDateOnlyString(startDate)) errors.push(`startDate ${startDate} is not a calendar date`);
  if (!isDateOnlyString(endDate)) errors.push(`endDate ${endDate} is not a calendar date`);
  if (errors.length === 0 && endDate < startDate) {
    errors.push(`endDate ${endDate} is before startDate ${startDate}`);
  }
  if (errors.length > 0) {
    return { errors };
  }

  return { document: details === undefined ? { startDate, endDate } : { startDate, endDate, details } };
}

/**
 * Validates every candidate of a batch before anything is written.
 *
 * @throws LedgerValidationError listing every problem, prefixed with the
 *   candidate's index (e.g. "moves[2]: endDate must be YYYY-MM-DD")
 */
export function parseMoveDocuments(rawMoves: unknown): MoveDocument[] {
  if (!Array.isArray(rawMoves)) {
    throw new LedgerValidationError("moves must be an array");
  }

  const documents: MoveDocument[] = [];
  const problems: string[] = [];
  rawMoves.forEach((raw: unknown, index) => {
    const parsed = parseMoveDocument(raw);
    if ("errors" in parsed) {
      problems.push(...parsed.errors.map((error) => `moves[${index}]: ${error}`));
    } else {
      documents.push(parsed.document);
    }
  });

  if (problems.length > 0) {
    throw new LedgerValidationError(problems);
  }
  return documents;
}

export function moveDateRange(document: MoveDocument): DateRange {
  return { startDate: document.startDate, endDate: document.endDate };
}
