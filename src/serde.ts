/**
 * Structured (de)serialization of multihashes.
 *
 * Two record shapes, picked by the caller:
 * - readable: { algorithm: "sha2-256", digest: "f20..." }
 *   The digest is base16 multibase text of the varint length-prefixed digest.
 * - compact: [code, digest]
 *
 * JSON carries the readable record, DAG-CBOR the compact one.
 */

import { decode as decodeCbor, encode as encodeCbor } from "@ipld/dag-cbor";
import { Type, type Token } from "cborg";
import { Tokenizer } from "cborg/json";
import { fromString as bytesFromString } from "uint8arrays";
import { algorithmCode, algorithmName, isKnownAlgorithm } from "./algorithms.js";
import { baseDecode, baseEncode } from "./bases.js";
import {
  decodeVarbytes,
  encodeVarbytes,
  isNonNegativeInteger,
} from "./codec.js";
import { ALGORITHM_FIELD, DIGEST_FIELD, RECORD_FIELDS } from "./constants.js";
import {
  duplicateField,
  invalidAlgorithm,
  invalidEncoding,
  invalidRecord,
  missingField,
  reasonOf,
  unexpectedField,
} from "./errors.js";
import { DefaultMultihash } from "./impls.js";
import type {
  CompactRecord,
  Multihash,
  ReadableRecord,
  SerializationMode,
} from "./interface.js";

type RecordField = (typeof RECORD_FIELDS)[number];

const isRecordField = (key: string): key is RecordField =>
  key === ALGORITHM_FIELD || key === DIGEST_FIELD;

export const isCompactRecord = (r: unknown): r is CompactRecord =>
  Array.isArray(r) &&
  r.length === 2 &&
  isNonNegativeInteger(r[0]) &&
  r[1] instanceof Uint8Array;

const isIterable = (value: object): value is Iterable<unknown> =>
  Symbol.iterator in value && typeof value[Symbol.iterator] === "function";

/**
 * Key/value pairs of a readable record given as an object, a Map or an array of entries.
 * Entries keep repeated keys so duplicates can be reported.
 */
const recordEntries = (record: unknown): Array<[string, unknown]> => {
  if (typeof record !== "object" || record === null) {
    throw invalidRecord("Readable multihash record must be an object.");
  }

  if (!isIterable(record)) {
    return Object.entries(record);
  }

  const entries: Array<[string, unknown]> = [];

  for (const entry of record) {
    if (
      !Array.isArray(entry) ||
      entry.length !== 2 ||
      typeof entry[0] !== "string"
    ) {
      throw invalidRecord("Readable multihash record entries must be [key, value] pairs.");
    }

    entries.push([entry[0], entry[1]]);
  }

  return entries;
};

export function toReadable(multihash: Multihash): ReadableRecord {
  const name = algorithmName(multihash.code);

  if (name == null) {
    throw invalidAlgorithm(multihash.code);
  }

  return {
    [ALGORITHM_FIELD]: name,
    [DIGEST_FIELD]: baseEncode("base16", encodeVarbytes(multihash.digest)),
  };
}

/**
 * Decodes a readable record. Field order does not matter, both fields are required.
 *
 * @param record
 * @returns
 */
export function fromReadable(record: unknown): Multihash {
  const fields = new Map<RecordField, unknown>();

  for (const [key, value] of recordEntries(record)) {
    if (!isRecordField(key)) {
      throw unexpectedField(key);
    }

    if (fields.has(key)) {
      throw duplicateField(key);
    }

    fields.set(key, value);
  }

  for (const field of RECORD_FIELDS) {
    if (!fields.has(field)) {
      throw missingField(field);
    }
  }

  const name = fields.get(ALGORITHM_FIELD);
  const text = fields.get(DIGEST_FIELD);

  if (typeof name !== "string" || typeof text !== "string") {
    throw invalidRecord("Readable multihash fields must be strings.");
  }

  const code = algorithmCode(name);

  if (code == null) {
    throw invalidAlgorithm(name);
  }

  const [digest, rest] = decodeVarbytes(baseDecode(text)[1]);

  if (rest.byteLength > 0) {
    throw invalidEncoding(
      `Found ${rest.byteLength} unexpected bytes after the digest.`,
    );
  }

  return new DefaultMultihash(code, digest);
}

export const toCompact = (multihash: Multihash): CompactRecord => [
  multihash.code,
  multihash.digest,
];

export function fromCompact(record: unknown): Multihash {
  if (!isCompactRecord(record)) {
    throw invalidRecord("Compact multihash record must be [code, digest].");
  }

  const [code, digest] = record;

  if (!isKnownAlgorithm(code)) {
    throw invalidAlgorithm(code);
  }

  return new DefaultMultihash(code, digest);
}

export function serialize(multihash: Multihash, mode: "readable"): ReadableRecord;
export function serialize(multihash: Multihash, mode: "compact"): CompactRecord;
export function serialize(
  multihash: Multihash,
  mode: SerializationMode,
): ReadableRecord | CompactRecord;
export function serialize(
  multihash: Multihash,
  mode: SerializationMode,
): ReadableRecord | CompactRecord {
  return mode === "readable" ? toReadable(multihash) : toCompact(multihash);
}

/**
 * Decodes a record produced by `serialize` with the same mode.
 *
 * @param record
 * @param mode
 * @returns
 */
export const deserialize = (
  record: unknown,
  mode: SerializationMode,
): Multihash => (mode === "readable" ? fromReadable(record) : fromCompact(record));

export const toJSON = (multihash: Multihash): string =>
  JSON.stringify(toReadable(multihash));

/**
 * Reads the members of a JSON object in document order, repeats included.
 * Member values must be strings, as they are in a readable record.
 */
function readJSONEntries(json: string): Array<[string, string]> {
  const tokenizer = new Tokenizer(bytesFromString(json.trim()));

  const next = (): Token => {
    try {
      return tokenizer.next();
    } catch (e) {
      throw invalidRecord(`Invalid multihash JSON: ${reasonOf(e)}`);
    }
  };

  if (next().type !== Type.map) {
    throw invalidRecord("Readable multihash record must be an object.");
  }

  const entries: Array<[string, string]> = [];

  for (let key = next(); key.type !== Type.break; key = next()) {
    const value = next();

    if (typeof key.value !== "string") {
      throw invalidRecord("Readable multihash record keys must be strings.");
    }

    if (value.type !== Type.string || typeof value.value !== "string") {
      throw invalidRecord("Readable multihash fields must be strings.");
    }

    entries.push([key.value, value.value]);
  }

  if (!tokenizer.done()) {
    throw invalidRecord("Invalid multihash JSON: unexpected data after the record.");
  }

  return entries;
}

export const fromJSON = (json: string): Multihash =>
  fromReadable(readJSONEntries(json));

/**
 * DAG-CBOR encodes the compact record.
 *
 * @param multihash
 * @returns
 */
export const encodeCompact = (multihash: Multihash): Uint8Array =>
  encodeCbor(toCompact(multihash));

export function decodeCompact(bytes: Uint8Array): Multihash {
  let record: unknown;
  try {
    record = decodeCbor(bytes);
  } catch (e) {
    throw invalidRecord(`Invalid multihash CBOR: ${reasonOf(e)}`);
  }

  return fromCompact(record);
}
