/**
 * Binary multihash encoding and decoding.
 *
 * Layout: <code:varint><length:varint><digest:length bytes>
 *
 * No sigil, header or checksum. Decoding reads one multihash from the front of
 * the input and hands back whatever follows it.
 */

import { varint } from "multiformats";
import { isKnownAlgorithm } from "./algorithms.js";
import {
  invalidAlgorithm,
  invalidEncoding,
  reasonOf,
  truncatedInput,
} from "./errors.js";
import { DefaultMultihash } from "./impls.js";
import type { Multihash } from "./interface.js";

export const isNonNegativeInteger = (n: unknown): n is number =>
  typeof n === "number" && n >= 0 && Number.isSafeInteger(n);

export const isMultihash = (m: unknown): m is Multihash =>
  typeof m === "object" &&
  m !== null &&
  "code" in m &&
  "digest" in m &&
  isNonNegativeInteger(m.code) &&
  m.digest instanceof Uint8Array;

/**
 * Reads a varint at offset, returning the value and the number of bytes read.
 *
 * @param bytes
 * @param offset
 * @param field - named in the error message
 */
const readVarint = (
  bytes: Uint8Array,
  offset: number,
  field: string,
): [number, number] => {
  let value: number;
  let read: number;
  try {
    [value, read] = varint.decode(bytes, offset);
  } catch (e) {
    throw truncatedInput(`Unable to read multihash ${field}: ${reasonOf(e)}`);
  }

  // only the shortest encoding of a value is accepted
  if (varint.encodingLength(value) !== read) {
    throw invalidEncoding(`Non-minimal varint for multihash ${field}.`);
  }

  return [value, read];
};

/**
 * Encodes a multihash to bytes.
 *
 * @param multihash
 * @returns
 */
export function encode(multihash: Multihash): Uint8Array {
  const { code, digest } = multihash;

  const codeLength = varint.encodingLength(code);
  const sizeLength = varint.encodingLength(digest.byteLength);
  const bytes = new Uint8Array(codeLength + sizeLength + digest.byteLength);

  varint.encodeTo(code, bytes, 0);
  varint.encodeTo(digest.byteLength, bytes, codeLength);
  bytes.set(digest, codeLength + sizeLength);

  return bytes;
}

/**
 * Decodes a multihash from the front of the bytes.
 * Throws if the code is unknown or the input ends before the declared digest length.
 *
 * @param bytes
 * @returns the multihash and the bytes after it
 */
export function decodeFrom(bytes: Uint8Array): [Multihash, Uint8Array] {
  const [code, codeLength] = readVarint(bytes, 0, "code");

  if (!isKnownAlgorithm(code)) {
    throw invalidAlgorithm(code);
  }

  const [size, sizeLength] = readVarint(bytes, codeLength, "digest length");

  const start = codeLength + sizeLength;
  const end = start + size;

  if (end > bytes.byteLength) {
    throw truncatedInput(
      `Digest length, ${size}, exceeds the ${bytes.byteLength - start} remaining bytes.`,
    );
  }

  return [
    new DefaultMultihash(code, bytes.subarray(start, end)),
    bytes.subarray(end),
  ];
}

/**
 * Decodes a multihash from the front of the bytes, ignoring anything after it.
 *
 * @param bytes
 * @returns
 */
export const decode = (bytes: Uint8Array): Multihash => decodeFrom(bytes)[0];

/**
 * Encodes bytes prefixed with their length as a varint.
 *
 * @param bytes
 * @returns
 */
export function encodeVarbytes(bytes: Uint8Array): Uint8Array {
  const sizeLength = varint.encodingLength(bytes.byteLength);
  const encoded = new Uint8Array(sizeLength + bytes.byteLength);

  varint.encodeTo(bytes.byteLength, encoded, 0);
  encoded.set(bytes, sizeLength);

  return encoded;
}

/**
 * Decodes varint length-prefixed bytes from the front of the input.
 *
 * @param bytes
 * @returns the bytes and the input after them
 */
export function decodeVarbytes(bytes: Uint8Array): [Uint8Array, Uint8Array] {
  const [size, sizeLength] = readVarint(bytes, 0, "length");
  const end = sizeLength + size;

  if (end > bytes.byteLength) {
    throw truncatedInput(
      `Length, ${size}, exceeds the ${bytes.byteLength - sizeLength} remaining bytes.`,
    );
  }

  return [bytes.subarray(sizeLength, end), bytes.subarray(end)];
}
