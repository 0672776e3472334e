import { plainToInstance, ClassConstructor } from "class-transformer";
import { ValidationError, ValidatorOptions, validateSync } from "class-validator";

/**
 * Narrows an untrusted value (API response, file contents) to a key-value
 * object before its fields are checked one by one.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

/**
 * Validates a plain value against a class-validator DTO outside the HTTP
 * pipeline (ingest records, stored move documents).
 *
 * @example
 * const outcome = validatePlain(PropertyRecordDto, { code: "CALI" });
 * // { ok: false, errors: ["name must be a string", ...] }
 */
export function validatePlain<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
  options?: ValidatorOptions,
): ValidationOutcome<T> {
  if (typeof plain !== "object" || plain === null || Array.isArray(plain)) {
    return { ok: false, errors: ["value must be an object"] };
  }

  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance, options);
  if (errors.length > 0) {
    return { ok: false, errors: flattenValidationErrors(errors) };
  }
  return { ok: true, value: instance };
}

export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = "",
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      parentPath ? `${parentPath}.${message}` : message,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}
