import type { BaseName } from "./interface.js";

/**
 * Code of the identity "hash", used by the null multihash.
 */
export const IDENTITY_CODE = 0x00;

/**
 * Base used when text is produced without naming one. Lowercase hex, prefix `f`.
 */
export const DEFAULT_BASE: BaseName = "base16";

/**
 * Field names of the readable record.
 */
export const ALGORITHM_FIELD = "algorithm";
export const DIGEST_FIELD = "digest";
export const RECORD_FIELDS = [ALGORITHM_FIELD, DIGEST_FIELD] as const;

export const NO_BYTES = new Uint8Array(0);
