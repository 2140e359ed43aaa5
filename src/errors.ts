import { CodeError } from "code-err";
import {
  DUPLICATE_FIELD,
  INVALID_ALGORITHM,
  INVALID_CODE,
  INVALID_ENCODING,
  INVALID_RECORD,
  MISSING_FIELD,
  TRUNCATED_INPUT,
  UNEXPECTED_FIELD,
  UNSUPPORTED_ALGORITHM,
} from "./error-codes.js";

const describeAlgorithm = (algorithm: number | string): string =>
  typeof algorithm === "number"
    ? `0x${algorithm.toString(16)}`
    : JSON.stringify(algorithm);

export const unsupportedAlgorithm = (algorithm: number | string) =>
  new CodeError(
    `Unsupported hash algorithm: ${describeAlgorithm(algorithm)}.`,
    { code: UNSUPPORTED_ALGORITHM },
  );

export const invalidAlgorithm = (algorithm: number | string) =>
  new CodeError(
    `Unknown multihash algorithm: ${describeAlgorithm(algorithm)}.`,
    { code: INVALID_ALGORITHM },
  );

export const invalidCode = (code: unknown) =>
  new CodeError(
    `Multihash code must be a non-negative safe integer. Received: ${String(code)}`,
    { code: INVALID_CODE },
  );

export const truncatedInput = (reason: string) =>
  new CodeError(reason, { code: TRUNCATED_INPUT });

export const invalidEncoding = (reason: string) =>
  new CodeError(reason, { code: INVALID_ENCODING });

export const missingField = (field: string) =>
  new CodeError(`Missing field "${field}".`, { code: MISSING_FIELD });

export const duplicateField = (field: string) =>
  new CodeError(`Duplicate field "${field}".`, { code: DUPLICATE_FIELD });

export const unexpectedField = (field: string) =>
  new CodeError(`Unexpected field "${field}".`, { code: UNEXPECTED_FIELD });

export const invalidRecord = (reason: string) =>
  new CodeError(reason, { code: INVALID_RECORD });

/**
 * Message of an error thrown by a collaborator (base decoder, varint, CBOR, JSON).
 */
export const reasonOf = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
