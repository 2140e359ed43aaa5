export {
  HASHERS,
  algorithmCode,
  algorithmName,
  isKnownAlgorithm,
  resolveHasher,
  supportedAlgorithms,
} from "./algorithms.js";
export { BASES, baseNames, isBaseName } from "./bases.js";
export { Builder, build, buildEncoded, createMultihash } from "./builder.js";
export type { BuilderOptions } from "./builder.js";
export { decode, decodeFrom, encode, isMultihash } from "./codec.js";
export { compareMultihashes, equals } from "./compare.js";
export { DEFAULT_BASE, IDENTITY_CODE } from "./constants.js";
export * as codes from "./error-codes.js";
export {
  DefaultEncodedMultihash,
  DefaultMultihash,
  NULL_MULTIHASH,
} from "./impls.js";
export type {
  AlgorithmIdentifier,
  BaseName,
  CompactRecord,
  EncodedMultihash,
  HashAlgorithm,
  Hasher,
  Multihash,
  ReadableRecord,
  SerializationMode,
} from "./interface.js";
export {
  decodeCompact,
  deserialize,
  encodeCompact,
  fromJSON,
  serialize,
  toJSON,
} from "./serde.js";
export { fromString, isNull, parse, toString, withBase } from "./utils.js";
