import type {BitOrder, Endian, IntSpec} from "./schema";
import {S} from "./schema";

// Schema type keywords. `uNN`/`iNN` are big-endian, `ulNN`/`ilNN` little-endian.
export const INT_TYPES: Readonly<Record<string, IntSpec>> = S.int;

// BCD byte order: `bbcd` stores the most significant digit pair first.
export const BCD_TYPES: Readonly<Record<string, Endian>> = {
   bbcd: "big",
   lbcd: "little",
};

// Bit arrays: `bit foo[8]` puts foo[0] in 0x80, `lbit foo[8]` puts foo[0] in 0x01.
export const BIT_TYPES: Readonly<Record<string, BitOrder>> = {
   bit: "msb",
   lbit: "lsb",
};

export const CHAR_TYPE = "char";

export const STRUCT_KEYWORD = "struct";
export const UNION_KEYWORD = "union";

export const DIRECTIVES = ["seekto", "seek", "printoffset"] as const;
export type DirectiveName = (typeof DIRECTIVES)[number];

export function isTypeKeyword(word: string): boolean {
   return Object.hasOwn(INT_TYPES, word) || Object.hasOwn(BCD_TYPES, word) || Object.hasOwn(BIT_TYPES, word) ||
      word === CHAR_TYPE;
}

// Largest image the resolver will place fields in when no image size is given (16 MiB).
export const MAX_IMAGE_BYTES = 0x1000000;

export const DEFAULT_FILL_BYTE = 0x00;
export const DEFAULT_SCHEMA_CACHE_CAPACITY = 32;
