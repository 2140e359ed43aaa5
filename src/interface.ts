/**
 * Algorithm identifier as accepted by public functions: a multicodec code or its name.
 */
export type AlgorithmIdentifier = number | string;

/**
 * Names of the algorithms this library can compute.
 */
export type HashAlgorithm =
  | "sha1"
  | "sha2-224"
  | "sha2-256"
  | "sha2-384"
  | "sha2-512"
  | "sha2-512-224"
  | "sha2-512-256"
  | "sha3-224"
  | "sha3-256"
  | "sha3-384"
  | "sha3-512"
  | "blake2b-224"
  | "blake2b-256"
  | "blake2b-384"
  | "blake2b-512"
  | "blake2s-224"
  | "blake2s-256"
  | "md5"
  | "ripemd-160";

export type BaseName =
  | "base2"
  | "base8"
  | "base10"
  | "base16"
  | "base16upper"
  | "base32"
  | "base32upper"
  | "base32pad"
  | "base32padupper"
  | "base32hex"
  | "base32hexupper"
  | "base32hexpad"
  | "base32hexpadupper"
  | "base32z"
  | "base36"
  | "base36upper"
  | "base58btc"
  | "base58flickr"
  | "base64"
  | "base64pad"
  | "base64url"
  | "base64urlpad";

export interface Hasher {
  readonly name: HashAlgorithm;
  readonly code: number;

  /**
   * Native output size in bytes.
   */
  readonly size: number;

  digest(data: Uint8Array): Uint8Array;
}

export interface Multihash {
  /**
   * Multicodec code of the hash function.
   */
  readonly code: number;

  /**
   * Raw digest bytes. Must not be mutated.
   */
  readonly digest: Uint8Array;
}

export interface EncodedMultihash {
  readonly base: BaseName;
  readonly multihash: Multihash;

  toString(): string;
}

export type SerializationMode = "readable" | "compact";

export interface ReadableRecord {
  /**
   * Algorithm name, e.g. "sha2-256".
   */
  readonly algorithm: string;

  /**
   * Base16 multibase text of the length-prefixed digest.
   */
  readonly digest: string;
}

export type CompactRecord = readonly [code: number, digest: Uint8Array];

export interface SerializedRecords {
  readable: ReadableRecord;
  compact: CompactRecord;
}
