import { toString as bytesToString } from "uint8arrays";
import { algorithmName } from "./algorithms.js";
import { encode } from "./codec.js";
import { equals } from "./compare.js";
import { DEFAULT_BASE, IDENTITY_CODE, NO_BYTES } from "./constants.js";
import type {
  BaseName,
  EncodedMultihash,
  Multihash,
  ReadableRecord,
} from "./interface.js";
import { serialize } from "./serde.js";
import { toString } from "./utils.js";

export class DefaultMultihash implements Multihash {
  readonly code: number;
  readonly digest: Uint8Array;

  constructor(code: number, digest: Uint8Array) {
    this.code = code;
    this.digest = digest.slice();
    Object.freeze(this);
  }

  /**
   * Registered algorithm name, undefined for codes outside the table.
   */
  get name(): string | undefined {
    return algorithmName(this.code);
  }

  /**
   * Binary form: varint code, varint length, digest. Encoded on each read.
   */
  get bytes(): Uint8Array {
    return encode(this);
  }

  isNull(): boolean {
    return this.code === IDENTITY_CODE && this.digest.byteLength === 0;
  }

  equals(other: Multihash): boolean {
    return equals(this, other);
  }

  toString(base: BaseName = DEFAULT_BASE): string {
    return toString(this, base);
  }

  toJSON(): ReadableRecord {
    return serialize(this, "readable");
  }

  /**
   * Debug form, e.g. `sha2-256 - 9cbc07c3...`.
   */
  inspect(): string {
    return `${this.name ?? `0x${this.code.toString(16)}`} - ${bytesToString(this.digest, "base16")}`;
  }
}

export class DefaultEncodedMultihash implements EncodedMultihash {
  constructor(
    readonly base: BaseName,
    readonly multihash: Multihash,
  ) {
    Object.freeze(this);
  }

  /**
   * Compares the wrapped multihashes, the base is ignored.
   */
  equals(other: EncodedMultihash | Multihash): boolean {
    return equals(
      this.multihash,
      "multihash" in other ? other.multihash : other,
    );
  }

  toString(): string {
    return toString(this.multihash, this.base);
  }
}

/**
 * Identity code with an empty digest. Default and sentinel value.
 */
export const NULL_MULTIHASH = new DefaultMultihash(IDENTITY_CODE, NO_BYTES);
