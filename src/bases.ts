/**
 * Supported multibase encodings, looked up by name or by prefix character.
 */

import { base10 } from "multiformats/bases/base10";
import { base16, base16upper } from "multiformats/bases/base16";
import { base2 } from "multiformats/bases/base2";
import {
  base32,
  base32hex,
  base32hexpad,
  base32hexpadupper,
  base32hexupper,
  base32pad,
  base32padupper,
  base32upper,
  base32z,
} from "multiformats/bases/base32";
import { base36, base36upper } from "multiformats/bases/base36";
import { base58btc, base58flickr } from "multiformats/bases/base58";
import { base64, base64pad, base64url, base64urlpad } from "multiformats/bases/base64";
import { base8 } from "multiformats/bases/base8";
import { invalidEncoding, reasonOf } from "./errors.js";
import type { BaseName } from "./interface.js";

/**
 * The part of a multiformats base codec used here.
 * `encode` includes the prefix, `decode` expects it.
 */
export interface BaseCodec {
  readonly prefix: string;
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array;
}

export const BASES: Readonly<Record<BaseName, BaseCodec>> = Object.freeze({
  base2,
  base8,
  base10,
  base16,
  base16upper,
  base32,
  base32upper,
  base32pad,
  base32padupper,
  base32hex,
  base32hexupper,
  base32hexpad,
  base32hexpadupper,
  base32z,
  base36,
  base36upper,
  base58btc,
  base58flickr,
  base64,
  base64pad,
  base64url,
  base64urlpad,
});

export const isBaseName = (name: unknown): name is BaseName =>
  typeof name === "string" && Object.prototype.hasOwnProperty.call(BASES, name);

const basesByPrefix = new Map<string, BaseName>();

for (const [name, codec] of Object.entries(BASES)) {
  if (isBaseName(name)) basesByPrefix.set(codec.prefix, name);
}

export const baseNames = (): BaseName[] => [...basesByPrefix.values()];

/**
 * Returns the base identified by the first character of multibase text.
 */
export function baseOf(text: string): BaseName {
  const prefix = text.charAt(0);

  if (prefix === "") {
    throw invalidEncoding("Multibase text is empty.");
  }

  const name = basesByPrefix.get(prefix);

  if (name == null) {
    throw invalidEncoding(`Unrecognized multibase prefix: ${JSON.stringify(prefix)}.`);
  }

  return name;
}

export const baseEncode = (base: BaseName, bytes: Uint8Array): string =>
  BASES[base].encode(bytes);

/**
 * Decodes multibase text, returning the base it used and the decoded bytes.
 */
export function baseDecode(text: string): [BaseName, Uint8Array] {
  const base = baseOf(text);

  let bytes: Uint8Array;
  try {
    bytes = BASES[base].decode(text);
  } catch (e) {
    throw invalidEncoding(`Malformed ${base} payload: ${reasonOf(e)}`);
  }

  return [base, bytes];
}
