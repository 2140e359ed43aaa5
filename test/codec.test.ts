import { describe, expect, it } from "vitest";
import { HASHERS } from "../src/algorithms.js";
import { build } from "../src/builder.js";
import {
  decode,
  decodeFrom,
  decodeVarbytes,
  encode,
  encodeVarbytes,
  isMultihash,
} from "../src/codec.js";
import {
  INVALID_ALGORITHM,
  INVALID_ENCODING,
  TRUNCATED_INPUT,
} from "../src/error-codes.js";
import { DefaultMultihash, NULL_MULTIHASH } from "../src/impls.js";
import {
  blake2sBytes,
  blake2sMultihash,
  data,
  hexToBytes,
  noBytes,
  sha1Bytes,
  sha1Multihash,
  unknownCode,
} from "./helpers/constants.js";
import { thrown } from "./helpers/utils.js";

describe("codec", () => {
  describe("isMultihash", () => {
    it("returns true for a valid multihash", () => {
      expect(isMultihash(sha1Multihash)).toBe(true);
      expect(isMultihash({ code: 0x12, digest: noBytes })).toBe(true);
    });

    it("returns false for invalid multihash", () => {
      expect(isMultihash(null)).toBe(false);
      expect(isMultihash({})).toBe(false);
      expect(isMultihash({ code: -1, digest: noBytes })).toBe(false);
      expect(isMultihash({ code: 1.5, digest: noBytes })).toBe(false);
      expect(isMultihash({ code: 0x12, digest: [] })).toBe(false);
    });
  });

  describe("encode", () => {
    it("writes code, length and digest", () => {
      expect(encode(sha1Multihash)).toEqual(sha1Bytes);
    });

    it("writes multi-byte varint codes", () => {
      expect(encode(blake2sMultihash)).toEqual(blake2sBytes);
    });

    it("encodes the null multihash as two zero bytes", () => {
      expect(encode(NULL_MULTIHASH)).toEqual(new Uint8Array([0x00, 0x00]));
    });

    it("writes lengths above 127 as multi-byte varints", () => {
      const digest = new Uint8Array(200).fill(7);
      const bytes = encode(new DefaultMultihash(0x12, digest));

      expect(bytes.subarray(0, 3)).toEqual(new Uint8Array([0x12, 0xc8, 0x01]));
      expect(bytes.byteLength).toBe(203);
    });
  });

  describe("decodeFrom", () => {
    it("decodes a multihash and returns an empty remainder", () => {
      const [multihash, remainder] = decodeFrom(sha1Bytes);

      expect(multihash.code).toBe(0x11);
      expect(multihash.digest).toEqual(sha1Multihash.digest);
      expect(remainder.byteLength).toBe(0);
    });

    it("returns the bytes following the multihash", () => {
      const bytes = new Uint8Array([...sha1Bytes, 1, 2, 3]);
      const [multihash, remainder] = decodeFrom(bytes);

      expect(multihash).toEqual(sha1Multihash);
      expect(remainder).toEqual(new Uint8Array([1, 2, 3]));
    });

    it("decodes an empty digest", () => {
      const [multihash] = decodeFrom(new Uint8Array([0x00, 0x00]));
      expect(multihash).toEqual(NULL_MULTIHASH);
    });

    it("does not alias the input bytes", () => {
      const bytes = sha1Bytes.slice();
      const [multihash] = decodeFrom(bytes);
      bytes.fill(0);

      expect(multihash.digest).toEqual(sha1Multihash.digest);
    });

    it("round trips every computable algorithm", () => {
      for (const name of Object.keys(HASHERS)) {
        const multihash = build(name, data);
        const [decoded, remainder] = decodeFrom(encode(multihash));

        expect(decoded).toEqual(multihash);
        expect(remainder.byteLength).toBe(0);
      }
    });

    it("throws on empty input", () => {
      expect(thrown(() => decodeFrom(noBytes))).toHaveProperty(
        "code",
        TRUNCATED_INPUT,
      );
    });

    it("throws when the input ends inside the code varint", () => {
      expect(thrown(() => decodeFrom(new Uint8Array([0xe0, 0xe4])))).toHaveProperty(
        "code",
        TRUNCATED_INPUT,
      );
    });

    it("throws when the length is missing", () => {
      expect(thrown(() => decodeFrom(new Uint8Array([0x12])))).toHaveProperty(
        "code",
        TRUNCATED_INPUT,
      );
    });

    it("throws when fewer bytes remain than the declared length", () => {
      const error = thrown(() => decodeFrom(sha1Bytes.subarray(0, 10)));

      expect(error).toHaveProperty("code", TRUNCATED_INPUT);
      expect(error).toHaveProperty(
        "message",
        "Digest length, 20, exceeds the 8 remaining bytes.",
      );
    });

    it("throws on an overlong code varint", () => {
      const error = thrown(() =>
        decodeFrom(new Uint8Array([0x91, 0x00, 0x80, 0x00])),
      );

      expect(error).toHaveProperty("code", INVALID_ENCODING);
      expect(error).toHaveProperty(
        "message",
        "Non-minimal varint for multihash code.",
      );
    });

    it("throws on an overlong length varint", () => {
      const error = thrown(() => decodeFrom(new Uint8Array([0x11, 0x80, 0x00])));

      expect(error).toHaveProperty("code", INVALID_ENCODING);
      expect(error).toHaveProperty(
        "message",
        "Non-minimal varint for multihash digest length.",
      );
    });

    it("throws on an unknown code", () => {
      const error = thrown(() => decodeFrom(new Uint8Array([unknownCode, 0x00])));

      expect(error).toHaveProperty("code", INVALID_ALGORITHM);
      expect(error).toHaveProperty("message", "Unknown multihash algorithm: 0x70.");
    });
  });

  describe("decode", () => {
    it("ignores bytes after the multihash", () => {
      expect(decode(new Uint8Array([...sha1Bytes, 0xff]))).toEqual(sha1Multihash);
    });
  });

  describe("varbytes", () => {
    it("prefixes bytes with their length", () => {
      expect(encodeVarbytes(hexToBytes("aabb"))).toEqual(hexToBytes("02aabb"));
      expect(encodeVarbytes(noBytes)).toEqual(hexToBytes("00"));
    });

    it("decodes length-prefixed bytes and returns the rest", () => {
      const [bytes, rest] = decodeVarbytes(hexToBytes("02aabbcc"));

      expect(bytes).toEqual(hexToBytes("aabb"));
      expect(rest).toEqual(hexToBytes("cc"));
    });

    it("throws when the declared length exceeds the input", () => {
      expect(thrown(() => decodeVarbytes(hexToBytes("05aa")))).toHaveProperty(
        "code",
        TRUNCATED_INPUT,
      );
    });

    it("throws on an overlong length varint", () => {
      expect(thrown(() => decodeVarbytes(hexToBytes("8000")))).toHaveProperty(
        "code",
        INVALID_ENCODING,
      );
    });
  });
});
