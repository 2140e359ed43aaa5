/**
 * Multihash construction.
 *
 * `build` is the only way to get a multihash that claims to be the hash of some data.
 * `createMultihash` wraps a digest computed elsewhere and accepts any code.
 */

import { algorithmCode, resolveHasher } from "./algorithms.js";
import { isNonNegativeInteger } from "./codec.js";
import { DEFAULT_BASE } from "./constants.js";
import { invalidAlgorithm, invalidCode } from "./errors.js";
import { DefaultEncodedMultihash, DefaultMultihash } from "./impls.js";
import type {
  AlgorithmIdentifier,
  BaseName,
  EncodedMultihash,
  Multihash,
} from "./interface.js";

/**
 * Returns the code for an identifier without requiring it to be computable.
 * Names must be registered, codes only need to be non-negative integers.
 *
 * @param algorithm
 * @returns
 */
export function toCode(algorithm: AlgorithmIdentifier): number {
  if (typeof algorithm === "string") {
    const code = algorithmCode(algorithm);

    if (code == null) {
      throw invalidAlgorithm(algorithm);
    }

    return code;
  }

  if (!isNonNegativeInteger(algorithm)) {
    throw invalidCode(algorithm);
  }

  return algorithm;
}

/**
 * Hashes the data and wraps the digest.
 * Fails before reading data if the algorithm cannot be computed.
 *
 * @param algorithm - multicodec code or name
 * @param data
 * @returns
 */
export function build(
  algorithm: AlgorithmIdentifier,
  data: Uint8Array,
): Multihash {
  const hasher = resolveHasher(algorithm);

  return new DefaultMultihash(hasher.code, hasher.digest(data));
}

export const buildEncoded = (
  algorithm: AlgorithmIdentifier,
  data: Uint8Array,
  base: BaseName = DEFAULT_BASE,
): EncodedMultihash => new DefaultEncodedMultihash(base, build(algorithm, data));

/**
 * Wraps an existing digest. The digest length is not checked against the algorithm.
 *
 * @param algorithm - any code, or a registered name
 * @param digest
 * @returns
 */
export const createMultihash = (
  algorithm: AlgorithmIdentifier,
  digest: Uint8Array,
): Multihash => new DefaultMultihash(toCode(algorithm), digest);

export interface BuilderOptions {
  /**
   * Base for encoded output. Defaults to base16.
   */
  base?: BaseName;
}

/**
 * Reusable algorithm and base selection.
 * Holds no per-call state, each method call is independent.
 *
 * @example
 * ```ts
 * const builder = new Builder("sha2-256", { base: "base58btc" });
 *
 * builder.encode(data).toString(); // "zQm..."
 * builder.digest(other); // Multihash
 * ```
 */
export class Builder {
  readonly code: number;
  readonly base: BaseName;

  constructor(algorithm: AlgorithmIdentifier, options: BuilderOptions = {}) {
    this.code = toCode(algorithm);
    this.base = options.base ?? DEFAULT_BASE;
    Object.freeze(this);
  }

  /**
   * Hashes the data with the configured algorithm.
   */
  digest(data: Uint8Array): Multihash {
    return build(this.code, data);
  }

  encode(data: Uint8Array): EncodedMultihash {
    return new DefaultEncodedMultihash(this.base, this.digest(data));
  }

  /**
   * Wraps a digest computed elsewhere with the configured algorithm.
   */
  wrap(digest: Uint8Array): Multihash {
    return new DefaultMultihash(this.code, digest);
  }

  withBase(base: BaseName): Builder {
    return new Builder(this.code, { base });
  }
}
