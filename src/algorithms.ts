/**
 * Multihash algorithm registry.
 *
 * Two tables:
 * - known algorithms: every multihash entry of the multicodec table, name <-> code.
 *   Decoding accepts any of these.
 * - hashers: the closed subset that can be computed locally.
 */

import { blake2b } from "@noble/hashes/blake2b";
import { blake2s } from "@noble/hashes/blake2s";
import { md5, ripemd160, sha1 } from "@noble/hashes/legacy";
import {
  sha224,
  sha256,
  sha384,
  sha512,
  sha512_224,
  sha512_256,
} from "@noble/hashes/sha2";
import { sha3_224, sha3_256, sha3_384, sha3_512 } from "@noble/hashes/sha3";
import { IDENTITY_CODE } from "./constants.js";
import { unsupportedAlgorithm } from "./errors.js";
import type {
  AlgorithmIdentifier,
  HashAlgorithm,
  Hasher,
} from "./interface.js";

const MULTIHASH_CODES: ReadonlyArray<readonly [string, number]> = [
  ["identity", IDENTITY_CODE],
  ["sha1", 0x11],
  ["sha2-256", 0x12],
  ["sha2-512", 0x13],
  ["sha3-512", 0x14],
  ["sha3-384", 0x15],
  ["sha3-256", 0x16],
  ["sha3-224", 0x17],
  ["shake-128", 0x18],
  ["shake-256", 0x19],
  ["keccak-224", 0x1a],
  ["keccak-256", 0x1b],
  ["keccak-384", 0x1c],
  ["keccak-512", 0x1d],
  ["blake3", 0x1e],
  ["sha2-384", 0x20],
  ["murmur3-x64-64", 0x22],
  ["murmur3-32", 0x23],
  ["dbl-sha2-256", 0x56],
  ["md4", 0xd4],
  ["md5", 0xd5],
  ["sha2-256-trunc254-padded", 0x1012],
  ["sha2-224", 0x1013],
  ["sha2-512-224", 0x1014],
  ["sha2-512-256", 0x1015],
  ["murmur3-x64-128", 0x1022],
  ["ripemd-128", 0x1052],
  ["ripemd-160", 0x1053],
  ["ripemd-256", 0x1054],
  ["ripemd-320", 0x1055],
  ["x11", 0x1100],
  ["kangarootwelve", 0x1d01],
  ["sm3-256", 0x534d],
];

/**
 * Families registered once per output width in bytes: name-{bits} = first + bytes - 1.
 */
const WIDTH_FAMILIES: ReadonlyArray<
  readonly [family: string, first: number, maxBytes: number]
> = [
  ["blake2b", 0xb201, 64],
  ["blake2s", 0xb241, 32],
  ["skein256", 0xb301, 32],
  ["skein512", 0xb321, 64],
  ["skein1024", 0xb361, 128],
];

const codesByName = new Map<string, number>();
const namesByCode = new Map<number, string>();

const register = (name: string, code: number): void => {
  codesByName.set(name, code);
  namesByCode.set(code, name);
};

for (const [name, code] of MULTIHASH_CODES) {
  register(name, code);
}

for (const [family, first, maxBytes] of WIDTH_FAMILIES) {
  for (let bytes = 1; bytes <= maxBytes; bytes++) {
    register(`${family}-${bytes * 8}`, first + bytes - 1);
  }
}

const hasher = (
  name: HashAlgorithm,
  size: number,
  digest: (data: Uint8Array) => Uint8Array,
): Hasher => {
  const code = codesByName.get(name);

  if (code == null) {
    throw new Error(`${name} is missing from the multihash code table.`);
  }

  return Object.freeze({ name, code, size, digest });
};

export const HASHERS: Readonly<Record<HashAlgorithm, Hasher>> = Object.freeze({
  sha1: hasher("sha1", 20, sha1),
  "sha2-224": hasher("sha2-224", 28, sha224),
  "sha2-256": hasher("sha2-256", 32, sha256),
  "sha2-384": hasher("sha2-384", 48, sha384),
  "sha2-512": hasher("sha2-512", 64, sha512),
  "sha2-512-224": hasher("sha2-512-224", 28, sha512_224),
  "sha2-512-256": hasher("sha2-512-256", 32, sha512_256),
  "sha3-224": hasher("sha3-224", 28, sha3_224),
  "sha3-256": hasher("sha3-256", 32, sha3_256),
  "sha3-384": hasher("sha3-384", 48, sha3_384),
  "sha3-512": hasher("sha3-512", 64, sha3_512),
  "blake2b-224": hasher("blake2b-224", 28, (d) => blake2b(d, { dkLen: 28 })),
  "blake2b-256": hasher("blake2b-256", 32, (d) => blake2b(d, { dkLen: 32 })),
  "blake2b-384": hasher("blake2b-384", 48, (d) => blake2b(d, { dkLen: 48 })),
  "blake2b-512": hasher("blake2b-512", 64, (d) => blake2b(d, { dkLen: 64 })),
  "blake2s-224": hasher("blake2s-224", 28, (d) => blake2s(d, { dkLen: 28 })),
  "blake2s-256": hasher("blake2s-256", 32, (d) => blake2s(d, { dkLen: 32 })),
  md5: hasher("md5", 16, md5),
  "ripemd-160": hasher("ripemd-160", 20, ripemd160),
});

const hashersByCode = new Map<number, Hasher>(
  Object.values(HASHERS).map((h) => [h.code, h]),
);

const isHashAlgorithm = (name: string): name is HashAlgorithm =>
  Object.prototype.hasOwnProperty.call(HASHERS, name);

/**
 * Returns the name registered for a code.
 */
export const algorithmName = (code: number): string | undefined =>
  namesByCode.get(code);

/**
 * Returns the code registered for a name.
 */
export const algorithmCode = (name: string): number | undefined =>
  codesByName.get(name);

export const isKnownAlgorithm = (code: number): boolean => namesByCode.has(code);

/**
 * Resolves an algorithm identifier to a hasher.
 * Throws if the algorithm is not one this library can compute.
 *
 * @param algorithm - multicodec code or name
 */
export function resolveHasher(algorithm: AlgorithmIdentifier): Hasher {
  const resolved =
    typeof algorithm === "number"
      ? hashersByCode.get(algorithm)
      : isHashAlgorithm(algorithm)
        ? HASHERS[algorithm]
        : undefined;

  if (resolved == null) {
    throw unsupportedAlgorithm(algorithm);
  }

  return resolved;
}

/**
 * Names of all computable algorithms, ordered by code.
 */
export const supportedAlgorithms = (): HashAlgorithm[] =>
  Object.values(HASHERS)
    .sort((a, b) => a.code - b.code)
    .map((h) => h.name);
