// Field tree produced by the schema compiler (or by the `S` builder below) and
// consumed by the layout resolver. Every node is immutable once built.

export type Endian = "big"|"little";
export type BitOrder = "msb"|"lsb";
export type IntBits = 8|16|24|32;

// clang-format off
export type IntSpec = { kind: "int"; bits: IntBits; signed: boolean; endian: Endian };
export type BcdSpec = { kind: "bcd"; order: Endian };
export type CharSpec = { kind: "char"; length: number };
export type BitSpec = { kind: "bit"; order: BitOrder };
export type PrimitiveSpec = IntSpec | BcdSpec | CharSpec | BitSpec;
// clang-format on

export interface PrimitiveField {
   readonly kind: "primitive";
   readonly name: string;
   readonly spec: PrimitiveSpec;
   readonly line: number;
}

export interface BitfieldMember {
   readonly name: string;
   readonly width: number;
   readonly line: number;
}

/** Named sub-byte fields that share one integer container, first member in the most significant bits. */
export interface BitfieldGroup {
   readonly kind: "bitfield";
   readonly container: IntSpec;
   readonly members: readonly BitfieldMember[];
   readonly line: number;
}

export interface RecordNode {
   readonly kind: "record";
   readonly name: string;
   // union members all start at the record's own offset
   readonly variant: "struct"|"union";
   readonly typeName?: string;
   readonly children: readonly FieldNode[];
   readonly line: number;
}

export interface ArrayNode {
   readonly kind: "array";
   readonly name: string;
   readonly count: number;
   readonly element: PrimitiveField|RecordNode;
   readonly line: number;
}

// clang-format off
export type PositionDirective =
   | { readonly kind: "directive"; readonly op: "seekto"; readonly address: number; readonly line: number }
   | { readonly kind: "directive"; readonly op: "seek"; readonly delta: number; readonly line: number }
   | { readonly kind: "directive"; readonly op: "printoffset"; readonly label: string; readonly line: number };
// clang-format on

export type FieldNode = PrimitiveField|BitfieldGroup|RecordNode|ArrayNode|PositionDirective;

export interface CompiledSchema {
   /** Exact schema text; empty for builder-made schemas. */
   readonly source: string;
   readonly root: RecordNode;
   /** Named struct types declared with `struct name { ... };`. */
   readonly types: ReadonlyMap<string, RecordNode>;
}

export function primitiveBitWidth(spec: PrimitiveSpec): number {
   switch (spec.kind) {
      case "int":
         return spec.bits;
      case "bcd":
         return 8;
      case "char":
         return spec.length * 8;
      case "bit":
         return 1;
   }
}

/** The schema keyword a primitive would be declared with, e.g. `ul16`, `lbcd`, `char[8]`. */
export function describeSpec(spec: PrimitiveSpec): string {
   switch (spec.kind) {
      case "int": {
         const little = spec.endian === "little" && spec.bits > 8 ? "l" : "";
         return `${spec.signed ? "i" : "u"}${little}${spec.bits}`;
      }
      case "bcd":
         return spec.order === "big" ? "bbcd" : "lbcd";
      case "char":
         return `char[${spec.length}]`;
      case "bit":
         return spec.order === "msb" ? "bit" : "lbit";
   }
}

const int = (bits: IntBits, signed: boolean, endian: Endian): IntSpec => ({kind: "int", bits, signed, endian});

/**
 * Builder for field trees without going through schema text.
 *
 * ```typescript
 * const schema = S.schema([
 *    S.u8("flags"),
 *    S.bitfield(S.int.u8, [["power", 2], ["mode", 6]]),
 *    S.seekto(0x10),
 *    S.array("channels", 4, S.struct("channels", [S.u16("freq"), S.char("name", 6)])),
 * ]);
 * ```
 *
 * The builder does not validate; `resolve()` reports trees it cannot place.
 */
export const S = {
   int: {
      u8: int(8, false, "big"),
      u16: int(16, false, "big"),
      ul16: int(16, false, "little"),
      u24: int(24, false, "big"),
      ul24: int(24, false, "little"),
      u32: int(32, false, "big"),
      ul32: int(32, false, "little"),
      i8: int(8, true, "big"),
      i16: int(16, true, "big"),
      il16: int(16, true, "little"),
      i24: int(24, true, "big"),
      il24: int(24, true, "little"),
      i32: int(32, true, "big"),
      il32: int(32, true, "little"),
   },
   primitive: (name: string, spec: PrimitiveSpec): PrimitiveField => ({kind: "primitive", name, spec, line: 0}),
   u8: (name: string) => S.primitive(name, S.int.u8),
   u16: (name: string) => S.primitive(name, S.int.u16),
   // one digit pair per byte; `digits` bytes make an array read as one number
   bcd: (name: string, order: Endian, bytes?: number): PrimitiveField|ArrayNode =>
      bytes === undefined ? S.primitive(name, {kind: "bcd", order}) :
                            S.array(name, bytes, S.primitive(name, {kind: "bcd", order})),
   char: (name: string, length: number) => S.primitive(name, {kind: "char", length}),
   bits: (name: string, order: BitOrder, count: number): ArrayNode =>
      S.array(name, count, S.primitive(name, {kind: "bit", order})),
   bitfield: (container: IntSpec, members: ReadonlyArray<readonly[string, number]>): BitfieldGroup => ({
      kind: "bitfield",
      container,
      members: members.map(([name, width]) => ({name, width, line: 0})),
      line: 0,
   }),
   struct: (name: string, children: readonly FieldNode[]): RecordNode =>
      ({kind: "record", name, variant: "struct", children, line: 0}),
   union: (name: string, children: readonly FieldNode[]): RecordNode =>
      ({kind: "record", name, variant: "union", children, line: 0}),
   array: (name: string, count: number, element: PrimitiveField|RecordNode): ArrayNode =>
      ({kind: "array", name, count, element, line: 0}),
   seekto: (address: number): PositionDirective => ({kind: "directive", op: "seekto", address, line: 0}),
   seek: (delta: number): PositionDirective => ({kind: "directive", op: "seek", delta, line: 0}),
   printoffset: (label: string): PositionDirective => ({kind: "directive", op: "printoffset", label, line: 0}),
   schema: (children: readonly FieldNode[]): CompiledSchema =>
      ({source: "", root: S.struct("", children), types: new Map()}),
};
