import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {bcdCodec, bcdDigitPairs, bitCodec, bitfieldCodec, charCodec, intCodec, intRange, joinBcdPairs, padString} from "../src/regmap/codecs";
import {EncodingError} from "../src/regmap/errors";
import {S} from "../src/regmap/schema";

const bytes = (...b: number[]) => Uint8Array.of(...b);

describe("intCodec", () => {
   it("reads big- and little-endian values", () => {
      assert.equal(intCodec(S.int.u16).decode(bytes(0x12, 0x34)), 0x1234);
      assert.equal(intCodec(S.int.ul16).decode(bytes(0x12, 0x34)), 0x3412);
      assert.equal(intCodec(S.int.u32).decode(bytes(0xFF, 0xFF, 0xFF, 0xFF)), 0xFFFFFFFF);
   });

   it("writes 24-bit values in both byte orders", () => {
      assert.deepEqual(intCodec(S.int.u24).encode(0x123456, new Uint8Array(3)), bytes(0x12, 0x34, 0x56));
      assert.deepEqual(intCodec(S.int.ul24).encode(0x123456, new Uint8Array(3)), bytes(0x56, 0x34, 0x12));
   });

   it("uses two's complement for signed types", () => {
      assert.equal(intCodec(S.int.i8).decode(bytes(0xFF)), -1);
      assert.equal(intCodec(S.int.i32).decode(bytes(0x80, 0, 0, 0)), -2147483648);
      assert.deepEqual(intCodec(S.int.il16).encode(-2, new Uint8Array(2)), bytes(0xFE, 0xFF));
   });

   it("rejects values it cannot hold", () => {
      const u8 = intCodec(S.int.u8);
      assert.throws(() => u8.encode(256, bytes(0)), {
         name: "EncodingError",
         message: "int8: value out of range: 256 (min 0, max 255)",
      });
      assert.throws(() => u8.encode(-1, bytes(0)), EncodingError);
      assert.throws(() => u8.encode(1.5, bytes(0)), EncodingError);
      assert.throws(() => intCodec(S.int.i16).encode(32768, bytes(0, 0)), EncodingError);
   });
});

describe("intCodec round trip", () => {
   for (const [keyword, spec] of Object.entries(S.int)) {
      it(`${keyword} keeps every boundary value and rejects the next one out`, () => {
         const codec = intCodec(spec);
         const {min, max} = intRange(spec);
         const samples = spec.signed ? [min, -1, 0, 1, max] : [0, 1, max - 1, max];
         for (const v of samples)
            assert.equal(codec.decode(codec.encode(v, new Uint8Array(codec.byteLength))), v);
         assert.throws(() => codec.encode(max + 1, new Uint8Array(codec.byteLength)), EncodingError);
         assert.throws(() => codec.encode(min - 1, new Uint8Array(codec.byteLength)), EncodingError);
      });
   }

   it("keeps 24-bit values in both byte orders", () => {
      assert.equal(intCodec(S.int.i24).decode(bytes(0x80, 0x00, 0x00)), -8388608);
      assert.deepEqual(intCodec(S.int.il24).encode(-2, new Uint8Array(3)), bytes(0xFE, 0xFF, 0xFF));
      assert.equal(intCodec(S.int.il24).decode(bytes(0xFE, 0xFF, 0xFF)), -2);
   });
});

describe("bcdCodec", () => {
   const codec = bcdCodec();

   it("reads the tens from the high nibble", () => {
      assert.equal(codec.decode(bytes(0x12)), 12);
      assert.equal(codec.decode(bytes(0x99)), 99);
   });

   it("round-trips every two-digit value", () => {
      for (let v = 0; v <= 99; v++)
         assert.equal(codec.decode(codec.encode(v, bytes(0))), v);
      assert.deepEqual(codec.encode(42, bytes(0x00)), bytes(0x42));
   });

   it("reads invalid nibbles positionally", () => {
      assert.equal(codec.decode(bytes(0xFF)), 165);
   });

   it("rejects values needing more digits, negatives and fractions", () => {
      assert.throws(() => codec.encode(100, bytes(0)), {message: "bcd: 100 does not fit in 2 decimal digits"});
      assert.throws(() => codec.encode(-1, bytes(0)), EncodingError);
      assert.throws(() => codec.encode(2.5, bytes(0)), EncodingError);
   });

   it("reads ignored bits as zero and keeps them on encode", () => {
      const flagged = bcdCodec(0x80);
      assert.equal(flagged.decode(bytes(0x93)), 13);
      assert.deepEqual(flagged.encode(25, bytes(0x80)), bytes(0xA5));
      assert.deepEqual(flagged.encode(25, bytes(0x00)), bytes(0x25));
   });
});

describe("bcdDigitPairs", () => {
   it("splits a number into pairs, most significant first", () => {
      assert.deepEqual(bcdDigitPairs(1234, 2), [12, 34]);
      assert.deepEqual(bcdDigitPairs(14652000, 4), [14, 65, 20, 0]);
      assert.deepEqual(bcdDigitPairs(7, 3), [0, 0, 7]);
   });

   it("rejects numbers needing more pairs", () => {
      assert.throws(() => bcdDigitPairs(123, 1), {name: "EncodingError", message: "bcd[1]: 123 does not fit in 2 decimal digits"});
   });

   it("rejects anything but a non-negative safe integer", () => {
      assert.throws(() => bcdDigitPairs(1e22, 16), {message: "bcd[16]: 1e+22 is not a non-negative safe integer"});
      assert.throws(() => bcdDigitPairs(Number.MAX_SAFE_INTEGER + 1, 9), EncodingError);
      assert.throws(() => bcdDigitPairs(-5, 2), EncodingError);
      assert.throws(() => bcdDigitPairs(1.5, 2), EncodingError);
   });
});

describe("joinBcdPairs", () => {
   it("weighs pairs positionally", () => {
      assert.equal(joinBcdPairs([12, 34]), 1234);
      assert.equal(joinBcdPairs([1, 165]), 265);
   });

   it("rejects a result past the safe integer range", () => {
      assert.throws(() => joinBcdPairs(new Array<number>(9).fill(99), "freq"), {
         name: "EncodingError",
         message: "freq: value exceeds the safe integer range",
      });
   });
});

describe("charCodec", () => {
   const codec = charCodec({kind: "char", length: 3});

   it("maps one byte per character", () => {
      assert.equal(codec.decode(bytes(0x46, 0x4F, 0x4F)), "FOO");
      assert.deepEqual(codec.encode("BAR", new Uint8Array(3)), bytes(0x42, 0x41, 0x52));
      assert.deepEqual(codec.encode("éab", new Uint8Array(3)), bytes(0xE9, 0x61, 0x62));
   });

   it("requires the exact length", () => {
      assert.throws(() => codec.encode("ab", new Uint8Array(3)), {
         message: "char[3]: expects exactly 3 characters, not 2",
      });
   });

   it("rejects characters outside one byte", () => {
      assert.throws(() => codec.encode("a€b", new Uint8Array(3)), EncodingError);
   });
});

describe("padString", () => {
   it("pads with a character or a byte value", () => {
      assert.equal(padString("AB", 4, " "), "AB  ");
      assert.equal(padString("AB", 4, 0x20), "AB  ");
      assert.equal(padString("ABCD", 4), "ABCD");
   });

   it("rejects long values, missing pads and wide pads", () => {
      assert.throws(() => padString("ABCDE", 4, " "), EncodingError);
      assert.throws(() => padString("AB", 4), EncodingError);
      assert.throws(() => padString("AB", 4, "xy"), EncodingError);
   });
});

describe("bitfieldCodec", () => {
   it("splits a byte most significant bits first", () => {
      assert.equal(bitfieldCodec(S.int.u8, 0, 4).decode(bytes(0x12)), 1);
      assert.equal(bitfieldCodec(S.int.u8, 4, 4).decode(bytes(0x12)), 2);
   });

   it("rewrites only its own bits", () => {
      const hi = bitfieldCodec(S.int.u8, 0, 4);
      const lo = bitfieldCodec(S.int.u8, 4, 4);
      const current = bytes(0x12);
      const afterHi = hi.encode(8, current);
      assert.deepEqual(afterHi, bytes(0x82));
      assert.deepEqual(current, bytes(0x12));
      assert.deepEqual(lo.encode(1, afterHi), bytes(0x81));
   });

   it("reads a 16-bit container in its own byte order", () => {
      for (const [container, raw] of [[S.int.u16, bytes(0x12, 0x34)], [S.int.ul16, bytes(0x34, 0x12)]] as const) {
         assert.equal(bitfieldCodec(container, 0, 4).decode(raw), 1);
         assert.equal(bitfieldCodec(container, 4, 8).decode(raw), 0x23);
         assert.equal(bitfieldCodec(container, 12, 4).decode(raw), 4);
      }
   });

   it("writes a 16-bit container in its own byte order", () => {
      let be = bytes(0x12, 0x34);
      be = bitfieldCodec(S.int.u16, 0, 4).encode(2, be);
      be = bitfieldCodec(S.int.u16, 4, 8).encode(0x11, be);
      be = bitfieldCodec(S.int.u16, 12, 4).encode(3, be);
      assert.deepEqual(be, bytes(0x21, 0x13));

      let le = bytes(0x34, 0x12);
      le = bitfieldCodec(S.int.ul16, 0, 4).encode(2, le);
      le = bitfieldCodec(S.int.ul16, 4, 8).encode(0x11, le);
      le = bitfieldCodec(S.int.ul16, 12, 4).encode(3, le);
      assert.deepEqual(le, bytes(0x13, 0x21));
   });

   it("handles a full 32-bit member", () => {
      const codec = bitfieldCodec(S.int.u32, 0, 32);
      assert.deepEqual(codec.encode(0xFFFFFFFE, new Uint8Array(4)), bytes(0xFF, 0xFF, 0xFF, 0xFE));
      assert.equal(codec.decode(bytes(0x80, 0, 0, 1)), 0x80000001);
   });

   it("round-trips every value of a member and keeps its neighbours", () => {
      const codec = bitfieldCodec(S.int.u8, 2, 3);
      for (let v = 0; v < 8; v++) {
         const out = codec.encode(v, bytes(0xFF));
         assert.equal(codec.decode(out), v);
         assert.equal(out[0] & 0b11000111, 0b11000111);
      }
   });

   it("rejects values wider than the member", () => {
      assert.throws(() => bitfieldCodec(S.int.u8, 0, 4).encode(16, bytes(0)), {
         message: "bitfield:4: value out of range: 16 (max 15)",
      });
   });
});

describe("bitCodec", () => {
   it("counts msb-first or lsb-first", () => {
      assert.equal(bitCodec("msb", 0).decode(bytes(0x80)), 1);
      assert.equal(bitCodec("msb", 7).decode(bytes(0x80)), 0);
      assert.equal(bitCodec("lsb", 0).decode(bytes(0x01)), 1);
      assert.deepEqual(bitCodec("lsb", 1).encode(1, bytes(0x00)), bytes(0x02));
      assert.deepEqual(bitCodec("msb", 1).encode(1, bytes(0x00)), bytes(0x40));
   });
});
