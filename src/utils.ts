import { baseDecode, baseEncode } from "./bases.js";
import { decode, encode } from "./codec.js";
import { equals } from "./compare.js";
import { DEFAULT_BASE } from "./constants.js";
import { DefaultEncodedMultihash, NULL_MULTIHASH } from "./impls.js";
import type { BaseName, EncodedMultihash, Multihash } from "./interface.js";

/**
 * Returns true if the multihash equals the null multihash.
 *
 * @param multihash
 * @returns
 */
export const isNull = (multihash: Multihash): boolean =>
  equals(multihash, NULL_MULTIHASH);

/**
 * Multibase text of the binary multihash.
 *
 * @param multihash
 * @param base - defaults to base16
 * @returns
 */
export const toString = (
  multihash: Multihash,
  base: BaseName = DEFAULT_BASE,
): string => baseEncode(base, encode(multihash));

/**
 * Parses multibase text into a multihash, keeping the base it was written in.
 *
 * @param text
 * @returns
 */
export function parse(text: string): EncodedMultihash {
  const [base, bytes] = baseDecode(text);

  return new DefaultEncodedMultihash(base, decode(bytes));
}

export const fromString = (text: string): Multihash => parse(text).multihash;

/**
 * Pairs a multihash with the base its text should use.
 *
 * @param multihash
 * @param base
 * @returns
 */
export const withBase = (
  multihash: Multihash,
  base: BaseName = DEFAULT_BASE,
): EncodedMultihash => new DefaultEncodedMultihash(base, multihash);
