import {EncodingError} from "./errors";
import type {BitOrder, CharSpec, Endian, IntSpec} from "./schema";
import {maskLowBits} from "./utils";

/**
 * Maps the bytes of one field's region to a value and back.
 *
 * `encode` is pure: it returns the new bytes for the whole region and never
 * touches `current` (the region's present contents, needed by codecs that only
 * own some of the bits). Any value the field cannot hold is an EncodingError,
 * thrown before anything is written.
 */
export interface FieldCodec<T> {
   readonly byteLength: number;
   decode(bytes: Uint8Array): T;
   encode(value: T, current: Uint8Array): Uint8Array;
}

function checkLength(bytes: Uint8Array, byteLength: number, context: string) {
   if (bytes.length !== byteLength)
      throw new EncodingError(`${context}: expected ${byteLength} bytes, got ${bytes.length}`);
}

// Unsigned value of up to 4 bytes; arithmetic rather than shifts keeps 32-bit values positive.
export function readUint(bytes: Uint8Array, endian: Endian): number {
   let out = 0;
   for (let i = 0; i < bytes.length; i++) {
      const b = endian === "big" ? bytes[i] : bytes[bytes.length - 1 - i];
      out = out * 256 + b;
   }
   return out;
}

export function writeUint(value: number, byteLength: number, endian: Endian): Uint8Array {
   const out = new Uint8Array(byteLength);
   let v = value;
   for (let i = 0; i < byteLength; i++) {
      const b = v % 256;
      v = Math.floor(v / 256);
      out[endian === "big" ? byteLength - 1 - i : i] = b;
   }
   return out;
}

export function intRange(spec: IntSpec): {min: number; max: number} {
   if (spec.signed) {
      const half = Math.pow(2, spec.bits - 1);
      return {min: -half, max: half - 1};
   }
   return {min: 0, max: Math.pow(2, spec.bits) - 1};
}

export function intCodec(spec: IntSpec): FieldCodec<number> {
   const byteLength = spec.bits / 8;
   const {min, max} = intRange(spec);
   const modulus = Math.pow(2, spec.bits);
   return {
      byteLength,
      decode(bytes) {
         checkLength(bytes, byteLength, "int.decode");
         const u = readUint(bytes, spec.endian);
         return spec.signed && u > max ? u - modulus : u;
      },
      encode(value) {
         if (!Number.isInteger(value) || value < min || value > max) {
            throw new EncodingError(`int${spec.bits}: value out of range: ${value} (min ${min}, max ${max})`);
         }
         return writeUint(value < 0 ? value + modulus : value, byteLength, spec.endian);
      },
   };
}

/**
 * One byte of two decimal digits, tens in the high nibble. Decoding never
 * rejects: nibbles above 9 are multiplied out positionally, so a blank 0xFF
 * byte reads as 165.
 *
 * Bits set in `ignoreMask` are flag bits sharing the byte: they read as zero
 * and an encode keeps whatever `current` holds there.
 */
export function bcdCodec(ignoreMask = 0): FieldCodec<number> {
   const keep = ignoreMask & 0xFF;
   return {
      byteLength: 1,
      decode(bytes) {
         checkLength(bytes, 1, "bcd.decode");
         const b = bytes[0] & ~keep;
         return (b >>> 4) * 10 + (b & 0x0F);
      },
      encode(value, current) {
         if (!Number.isInteger(value) || value < 0 || value > 99)
            throw new EncodingError(`bcd: ${value} does not fit in 2 decimal digits`);
         checkLength(current, 1, "bcd.encode");
         const packed = (Math.floor(value / 10) << 4) | (value % 10);
         return Uint8Array.of((packed & ~keep) | (current[0] & keep));
      },
   };
}

/**
 * Splits `value` into `count` digit pairs, most significant pair first.
 * Only safe integers are accepted; past 2^53 the low digits are already lost.
 */
export function bcdDigitPairs(value: number, count: number, context = `bcd[${count}]`): number[] {
   if (!Number.isSafeInteger(value) || value < 0)
      throw new EncodingError(`${context}: ${value} is not a non-negative safe integer`);
   const pairs = new Array<number>(count);
   let rest = value;
   for (let i = count - 1; i >= 0; i--) {
      pairs[i] = rest % 100;
      rest = Math.floor(rest / 100);
   }
   if (rest !== 0)
      throw new EncodingError(`${context}: ${value} does not fit in ${count * 2} decimal digits`);
   return pairs;
}

/** Inverse of `bcdDigitPairs`; pairs above 99 (invalid nibbles) still weigh positionally. */
export function joinBcdPairs(pairs: readonly number[], context = `bcd[${pairs.length}]`): number {
   let out = 0;
   for (const p of pairs)
      out = out * 100 + p;
   if (!Number.isSafeInteger(out))
      throw new EncodingError(`${context}: value exceeds the safe integer range`);
   return out;
}

/** Byte-per-character (Latin-1) mapping of a fixed-length string. */
export function charCodec(spec: CharSpec): FieldCodec<string> {
   const byteLength = spec.length;
   return {
      byteLength,
      decode(bytes) {
         checkLength(bytes, byteLength, "char.decode");
         let out = "";
         for (const b of bytes)
            out += String.fromCharCode(b);
         return out;
      },
      encode(value) {
         if (value.length !== byteLength) {
            throw new EncodingError(`char[${byteLength}]: expects exactly ${byteLength} characters, not ${value.length}`);
         }
         const out = new Uint8Array(byteLength);
         for (let i = 0; i < byteLength; i++) {
            const code = value.charCodeAt(i);
            if (code > 0xFF)
               throw new EncodingError(`char[${byteLength}]: character ${JSON.stringify(value[i])} is not a single byte`);
            out[i] = code;
         }
         return out;
      },
   };
}

/**
 * Pads `value` to `length` characters with `pad` (a one-character string or a byte value).
 * Without a pad only an exact-length value is accepted.
 */
export function padString(value: string, length: number, pad?: string|number): string {
   if (value.length > length)
      throw new EncodingError(`char[${length}]: ${JSON.stringify(value)} is longer than ${length} characters`);
   if (value.length === length)
      return value;
   if (pad === undefined)
      throw new EncodingError(`char[${length}]: expects exactly ${length} characters, not ${value.length}`);
   const padChar = typeof pad === "number" ? String.fromCharCode(pad) : pad;
   if (padChar.length !== 1 || padChar.charCodeAt(0) > 0xFF)
      throw new EncodingError(`char[${length}]: pad must be a single byte, got ${JSON.stringify(pad)}`);
   return value.padEnd(length, padChar);
}

/**
 * `width` bits of an integer container, `bitOffset` bits down from the
 * container's most significant bit. Encoding rewrites only those bits.
 */
export function bitfieldCodec(container: IntSpec, bitOffset: number, width: number): FieldCodec<number> {
   const byteLength = container.bits / 8;
   const shift = container.bits - bitOffset - width;
   if (width <= 0 || shift < 0)
      throw new EncodingError(`bitfield of ${width} bits at ${bitOffset} does not fit a ${container.bits}-bit container`);
   const mask = maskLowBits(width);
   const max = Math.pow(2, width) - 1;
   return {
      byteLength,
      decode(bytes) {
         checkLength(bytes, byteLength, "bitfield.decode");
         return ((readUint(bytes, container.endian) >>> shift) & mask) >>> 0;
      },
      encode(value, current) {
         if (!Number.isInteger(value) || value < 0 || value > max)
            throw new EncodingError(`bitfield:${width}: value out of range: ${value} (max ${max})`);
         checkLength(current, byteLength, "bitfield.encode");
         const clearMask = ~(mask << shift);
         const next = ((readUint(current, container.endian) & clearMask) | (value << shift)) >>> 0;
         return writeUint(next, byteLength, container.endian);
      },
   };
}

/** One bit of a byte; `bitIndex` counts in declaration order (0..7). */
export function bitCodec(order: BitOrder, bitIndex: number): FieldCodec<number> {
   const physical = order === "msb" ? 7 - bitIndex : bitIndex;
   return bitfieldCodec({kind: "int", bits: 8, signed: false, endian: "big"}, 7 - physical, 1);
}
