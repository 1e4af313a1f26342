import { describe, it, expect } from "vitest";
import {
  DecodeError,
  decodeNestedAddress,
  decodeNestedBigUint,
  decodeNestedBool,
  decodeNestedBuffer,
  decodeNestedBytes,
  decodeNestedU64,
  decodeNestedU8,
  decodeTopLevelAddress,
  decodeTopLevelBigUint,
  decodeTopLevelBool,
  decodeTopLevelU64,
  hexAddressRenderer,
  isDecodeError,
  readBytes,
} from "../../src";
import {
  ADDRESSES,
  bigEndian,
  bigUint,
  concat,
  lengthPrefixed,
  pubkey,
  text,
  u64,
} from "./helpers";

function captureDecodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DecodeError");
}

describe("scalar codec", () => {
  describe("readBytes", () => {
    it("should return a view over the same buffer", () => {
      const data = new Uint8Array([1, 2, 3, 4]);
      const view = readBytes(data, 1, 2);
      expect(view).toEqual(new Uint8Array([2, 3]));
      expect(view.buffer).toBe(data.buffer);
    });

    it("should throw Truncated when the range passes the end", () => {
      const error = captureDecodeError(() => readBytes(new Uint8Array(4), 3, 2));
      expect(error.kind).toBe("Truncated");
      expect(error.offset).toBe(3);
    });

    it("should reject a cursor that is not an integer", () => {
      for (const offset of [NaN, 1.5, Infinity]) {
        const error = captureDecodeError(() => readBytes(new Uint8Array(16), offset, 8));
        expect(error.kind).toBe("InvalidOffset");
      }
      expect(captureDecodeError(() => readBytes(new Uint8Array(16), 0, 0.5)).kind).toBe("InvalidOffset");
    });
  });

  describe("top-level", () => {
    it("should decode a u64 spanning the whole buffer", () => {
      expect(decodeTopLevelU64(new Uint8Array([0x01, 0x00]))).toBe(256n);
      expect(decodeTopLevelU64(u64(0xffffffffffffffffn))).toBe(0xffffffffffffffffn);
    });

    it("should decode an empty u64 slot as zero", () => {
      expect(decodeTopLevelU64(new Uint8Array())).toBe(0n);
    });

    it("should reject a u64 wider than 8 bytes", () => {
      const error = captureDecodeError(() => decodeTopLevelU64(new Uint8Array(9)));
      expect(error.kind).toBe("Overflow");
    });

    it("should decode a big integer of any width", () => {
      const value = 10n ** 30n;
      expect(decodeTopLevelBigUint(bigEndian(value))).toBe(value);
      expect(decodeTopLevelBigUint(new Uint8Array())).toBe(0n);
    });

    it("should decode booleans", () => {
      expect(decodeTopLevelBool(new Uint8Array([1]))).toBe(true);
      expect(decodeTopLevelBool(new Uint8Array([0]))).toBe(false);
      expect(decodeTopLevelBool(new Uint8Array())).toBe(false);
    });

    it("should decode an address slot", () => {
      expect(decodeTopLevelAddress(pubkey(0x11))).toBe(ADDRESSES[0x11]);
    });
  });

  describe("nested u64", () => {
    it("should decode 8 big-endian bytes and advance the cursor", () => {
      for (const n of [0n, 1n, 0x0102030405060708n, 2n ** 53n + 1n, 2n ** 64n - 1n]) {
        expect(decodeNestedU64(u64(n), 0)).toEqual({ value: n, offset: 8 });
      }
    });

    it("should decode at a non-zero offset", () => {
      const data = concat(new Uint8Array([0xaa, 0xbb]), u64(42n));
      expect(decodeNestedU64(data, 2)).toEqual({ value: 42n, offset: 10 });
    });

    it("should throw Truncated instead of returning a short value", () => {
      const error = captureDecodeError(() => decodeNestedU64(new Uint8Array([1, 2, 3]), 0));
      expect(error.kind).toBe("Truncated");
      expect(error.offset).toBe(0);
    });

    it("should throw instead of returning a value for a NaN or fractional cursor", () => {
      expect(captureDecodeError(() => decodeNestedU64(new Uint8Array(8), NaN)).kind).toBe("InvalidOffset");
      expect(captureDecodeError(() => decodeNestedU64(new Uint8Array(16), 1.5)).kind).toBe("InvalidOffset");
    });
  });

  describe("nested big integer", () => {
    it("should decode a length-prefixed value", () => {
      const value = 123456789012345678901234567890n;
      const encoded = bigUint(value);
      expect(decodeNestedBigUint(encoded, 0)).toEqual({ value, offset: encoded.length });
    });

    it("should decode a zero-length prefix as zero", () => {
      expect(decodeNestedBigUint(new Uint8Array([0, 0, 0, 0]), 0)).toEqual({ value: 0n, offset: 4 });
    });

    it("should throw Truncated when the payload is shorter than the prefix says", () => {
      const data = new Uint8Array([0, 0, 0, 5, 0x01, 0x02]);
      const error = captureDecodeError(() => decodeNestedBigUint(data, 0));
      expect(error.kind).toBe("Truncated");
      expect(error.offset).toBe(4);
    });

    it("should throw Truncated when the prefix itself is cut", () => {
      const error = captureDecodeError(() => decodeNestedBigUint(new Uint8Array([0, 0]), 0));
      expect(error.kind).toBe("Truncated");
    });
  });

  describe("nested buffer", () => {
    it("should decode UTF-8 text", () => {
      const encoded = text("Fund the relay node — 2 épocas 🚀");
      expect(decodeNestedBuffer(encoded, 0)).toEqual({
        value: "Fund the relay node — 2 épocas 🚀",
        offset: encoded.length,
      });
    });

    it("should keep a leading byte order mark", () => {
      const encoded = text("\uFEFFhello");
      expect(decodeNestedBuffer(encoded, 0).value).toBe("\uFEFFhello");
    });

    it("should decode an empty buffer", () => {
      expect(decodeNestedBuffer(text(""), 0)).toEqual({ value: "", offset: 4 });
    });

    it("should throw InvalidUtf8 for malformed bytes", () => {
      const data = concat(new Uint8Array([0x09]), lengthPrefixed(new Uint8Array([0xff, 0xfe, 0x41])));
      const error = captureDecodeError(() => decodeNestedBuffer(data, 1));
      expect(error.kind).toBe("InvalidUtf8");
      expect(error.offset).toBe(1);
    });

    it("should expose the raw bytes without copying", () => {
      const data = lengthPrefixed(new Uint8Array([7, 8, 9]));
      const { value, offset } = decodeNestedBytes(data, 0);
      expect(value).toEqual(new Uint8Array([7, 8, 9]));
      expect(value.buffer).toBe(data.buffer);
      expect(offset).toBe(7);
    });
  });

  describe("nested bool and u8", () => {
    it("should treat any non-zero byte as true", () => {
      expect(decodeNestedBool(new Uint8Array([0]), 0)).toEqual({ value: false, offset: 1 });
      expect(decodeNestedBool(new Uint8Array([1]), 0)).toEqual({ value: true, offset: 1 });
      expect(decodeNestedBool(new Uint8Array([0x80]), 0)).toEqual({ value: true, offset: 1 });
    });

    it("should decode a single byte", () => {
      expect(decodeNestedU8(new Uint8Array([3, 250]), 1)).toEqual({ value: 250, offset: 2 });
    });

    it("should throw Truncated at the end of the buffer", () => {
      expect(() => decodeNestedBool(new Uint8Array([1]), 1)).toThrow(DecodeError);
    });
  });

  describe("nested address", () => {
    it("should render 32 bytes as bech32", () => {
      expect(decodeNestedAddress(pubkey(0x22), 0)).toEqual({ value: ADDRESSES[0x22], offset: 32 });
    });

    it("should use the given renderer", () => {
      expect(decodeNestedAddress(pubkey(0x11), 0, hexAddressRenderer).value).toBe(
        "0x" + "11".repeat(32),
      );
    });

    it("should throw Truncated for fewer than 32 bytes", () => {
      let caught: unknown;
      try {
        decodeNestedAddress(new Uint8Array(31), 0);
      } catch (error) {
        caught = error;
      }
      expect(isDecodeError(caught, "Truncated")).toBe(true);
    });
  });
});
