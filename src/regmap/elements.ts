import type {BackingStore, FillPattern} from "./BackingStore";
import {bcdCodec, bcdDigitPairs, bitCodec, bitfieldCodec, charCodec, intCodec, joinBcdPairs, padString} from "./codecs";
import type {FieldCodec} from "./codecs";
import {EncodingError, OutOfBoundsError, TypeMismatchError} from "./errors";
import {childPath, shiftSlot} from "./layout";
import type {ArrayLayout, LayoutNode, RecordLayout, ResolvedLayout, Slot} from "./layout";
import {MemoryRegion} from "./MemoryRegion";
import {describeSpec} from "./schema";
import type {BcdSpec, BitOrder, CharSpec, Endian, IntSpec} from "./schema";
import {assertByte} from "./utils";

export type ElementKind = "int"|"bcd"|"char"|"bits"|"record"|"array";
export type PrimitiveValue = number|string;

function typeName(value: unknown): string {
   if (value === null)
      return "null";
   return Array.isArray(value) ? "array" : typeof value;
}

/**
 * A view of one node of a resolved layout over a backing store. Holds no copy
 * of the data: every read goes to the store, so views created before a write
 * see it. Creating a view is cheap; they are made on every navigation.
 */
export abstract class ElementBase {
   abstract readonly kind: ElementKind;

   constructor(protected readonly store: BackingStore, readonly path: string, readonly slot: Slot) {}

   /** Byte address of the first byte the element touches. */
   get offset(): number {
      return this.slot.byteOffset;
   }

   /** Bytes covered; a bitfield member covers its whole container. */
   abstract get byteLength(): number;

   region(): MemoryRegion {
      return new MemoryRegion(this.path || "(root)", this.offset, this.byteLength);
   }

   getRaw(): Uint8Array {
      return this.store.getRaw(this.offset, this.byteLength);
   }

   setRaw(bytes: Uint8Array): void {
      if (bytes.length !== this.byteLength)
         throw new EncodingError(`${this.path}: expected ${this.byteLength} raw bytes, got ${bytes.length}`);
      this.store.setRaw(this.offset, bytes);
   }

   fill(pattern: FillPattern): void {
      this.store.fill(this.offset, this.byteLength, pattern);
   }
}

// `typeLabel` is the schema spelling of the field's type: `ul16`, `u8:4`, `lbcd`.
export abstract class ValueElement<T extends PrimitiveValue> extends ElementBase {
   constructor(store: BackingStore, path: string, slot: Slot, protected readonly codec: FieldCodec<T>,
               readonly typeLabel: string) {
      super(store, path, slot);
   }

   get byteLength(): number {
      return this.codec.byteLength;
   }

   value(): T {
      return this.codec.decode(this.getRaw());
   }

   assign(value: T): void {
      this.store.setRaw(this.offset, this.codec.encode(value, this.getRaw()));
   }

   /** Narrows an untyped value to what the field holds. */
   protected abstract accept(value: unknown): T;

   assignValue(value: unknown): void {
      this.assign(this.accept(value));
   }

   // encodes into `scratch`, a copy of the store starting at `scratchBase`
   encodeInto(value: unknown, scratch: Uint8Array, scratchBase: number): void {
      const at = this.offset - scratchBase;
      const current = scratch.slice(at, at + this.byteLength);
      scratch.set(this.codec.encode(this.accept(value), current), at);
   }

   protected mismatch(expected: string, value: unknown): TypeMismatchError {
      return new TypeMismatchError(`${this.path}: ${this.typeLabel} expects ${expected}, got ${typeName(value)}`);
   }
}

/** Integer fields and bitfield members. */
export class IntElement extends ValueElement<number> {
   readonly kind = "int";

   protected accept(value: unknown): number {
      if (typeof value !== "number")
         throw this.mismatch("a number", value);
      return value;
   }
}

// Flag bits that share a BCD byte, per store and byte offset. Views are made
// on every navigation, so the mask cannot live on the view itself.
const ignoredBcdBits = new WeakMap<BackingStore, Map<number, number>>();

function ignoredBits(store: BackingStore, offset: number): number {
   return ignoredBcdBits.get(store)?.get(offset) ?? 0;
}

// reads the mask at every call, so a later ignoreBits() on another view applies
function maskedBcdCodec(store: BackingStore, offset: number): FieldCodec<number> {
   return {
      byteLength: 1,
      decode: (bytes) => bcdCodec(ignoredBits(store, offset)).decode(bytes),
      encode: (value, current) => bcdCodec(ignoredBits(store, offset)).encode(value, current),
   };
}

/** One byte of two BCD digits (0..99), possibly sharing the byte with flag bits. */
export class BcdElement extends ValueElement<number> {
   readonly kind = "bcd";

   protected accept(value: unknown): number {
      if (typeof value !== "number")
         throw this.mismatch("a number", value);
      return value;
   }

   /**
    * Marks bits of this byte as flags: they read as zero in `value()` and keep
    * their state through `assign()`. Applies to every view of the same byte.
    */
   ignoreBits(mask: number): void {
      assertByte(mask, `${this.path}: ignoreBits`);
      let masks = ignoredBcdBits.get(this.store);
      if (!masks) {
         masks = new Map<number, number>();
         ignoredBcdBits.set(this.store, masks);
      }
      if (mask === 0)
         masks.delete(this.offset);
      else
         masks.set(this.offset, mask);
   }

   getBits(mask: number): number {
      assertByte(mask, `${this.path}: getBits`);
      return this.store.getByte(this.offset) & mask;
   }

   setBits(mask: number): void {
      assertByte(mask, `${this.path}: setBits`);
      this.store.setRaw(this.offset, Uint8Array.of(this.store.getByte(this.offset) | mask));
   }

   clrBits(mask: number): void {
      assertByte(mask, `${this.path}: clrBits`);
      this.store.setRaw(this.offset, Uint8Array.of(this.store.getByte(this.offset) & ~mask & 0xFF));
   }
}

export class CharElement extends ValueElement<string> {
   readonly kind = "char";

   get length(): number {
      return this.codec.byteLength;
   }

   /** Without `pad`, `value` must be exactly `length` characters long. */
   assign(value: string, pad?: string|number): void {
      super.assign(padString(value, this.length, pad));
   }

   protected accept(value: unknown): string {
      if (typeof value !== "string")
         throw this.mismatch("a string", value);
      return value;
   }
}

/** A single bit of a `bit` or `lbit` array, read as 0 or 1. Assignment also takes a boolean. */
export class BitsElement extends ValueElement<number> {
   readonly kind = "bits";

   assign(value: number|boolean): void {
      super.assign(this.accept(value));
   }

   protected accept(value: unknown): number {
      if (typeof value === "boolean")
         return value ? 1 : 0;
      if (typeof value !== "number")
         throw this.mismatch("0, 1 or a boolean", value);
      if (value !== 0 && value !== 1)
         throw new EncodingError(`${this.path}: bit value must be 0 or 1, got ${value}`);
      return value;
   }
}

export class RecordElement extends ElementBase {
   readonly kind = "record";

   constructor(readonly layout: RecordLayout, store: BackingStore, path: string, private readonly shiftBits: number) {
      super(store, path, shiftSlot(layout.slot, shiftBits, false));
   }

   get byteLength(): number {
      return this.slot.bitWidth / 8;
   }

   has(name: string): boolean {
      return this.layout.fields.has(name);
   }

   names(): string[] {
      return [...this.layout.fields.keys()];
   }

   field(name: string): BoundElement {
      const node = this.layout.fields.get(name);
      if (!node)
         throw new TypeMismatchError(`${this.path || "(root)"} has no field '${name}'`);
      return makeElement(node, this.store, childPath(this.path, name), this.shiftBits);
   }

   entries(): Array<[string, BoundElement]> {
      return this.names().map((name): [string, BoundElement] => [name, this.field(name)]);
   }

   // typed accessors
   int(name: string): IntElement {
      const el = this.field(name);
      if (el.kind !== "int")
         throw kindMismatch(el, "int");
      return el;
   }

   bcd(name: string): BcdElement {
      const el = this.field(name);
      if (el.kind !== "bcd")
         throw kindMismatch(el, "bcd");
      return el;
   }

   char(name: string): CharElement {
      const el = this.field(name);
      if (el.kind !== "char")
         throw kindMismatch(el, "char");
      return el;
   }

   bits(name: string): BitsElement {
      const el = this.field(name);
      if (el.kind !== "bits")
         throw kindMismatch(el, "bits");
      return el;
   }

   record(name: string): RecordElement {
      const el = this.field(name);
      if (el.kind !== "record")
         throw kindMismatch(el, "record");
      return el;
   }

   array(name: string): ArrayElement {
      const el = this.field(name);
      if (el.kind !== "array")
         throw kindMismatch(el, "array");
      return el;
   }
}

export type PrimitiveElement = IntElement|BcdElement|CharElement|BitsElement;

export class ArrayElement extends ElementBase {
   readonly kind = "array";

   constructor(readonly layout: ArrayLayout, store: BackingStore, path: string, private readonly shiftBits: number) {
      super(store, path, shiftSlot(layout.slot, shiftBits, false));
   }

   get length(): number {
      return this.layout.count;
   }

   get byteLength(): number {
      return Math.ceil((this.slot.bitOffset + this.slot.bitWidth) / 8);
   }

   at(index: number): BoundElement {
      if (!Number.isInteger(index) || index < 0 || index >= this.layout.count)
         throw new OutOfBoundsError(`${this.path}: index ${index} out of range (length ${this.layout.count})`);
      return makeElement(
         this.layout.element, this.store, `${this.path}[${index}]`, this.shiftBits + index * this.layout.strideBits);
   }

   * [Symbol.iterator](): IterableIterator<BoundElement> {
      for (let i = 0; i < this.layout.count; i++)
         yield this.at(i);
   }

   private primitiveElements(): PrimitiveElement[] {
      const out: PrimitiveElement[] = [];
      for (const el of this) {
         if (el.kind === "record" || el.kind === "array")
            throw new TypeMismatchError(`${this.path}: array of records has no plain values`);
         out.push(el);
      }
      return out;
   }

   values(): PrimitiveValue[] {
      return this.primitiveElements().map((el) => el.value());
   }

   /** Byte order of an array of BCD digit pairs, null for any other array. */
   get bcdOrder(): Endian|null {
      const element = this.layout.element;
      if (element.kind !== "primitive")
         return null;
      const spec = element.spec;
      return spec.kind === "bcd" ? spec.order : null;
   }

   private bcdDigits(): {digits: BcdElement[]; order: Endian} {
      const order = this.bcdOrder;
      if (order === null)
         throw new TypeMismatchError(`${this.path}: only an array of bcd digit pairs holds a single number`);
      const digits: BcdElement[] = [];
      for (const el of this) {
         if (el.kind === "bcd")
            digits.push(el);
      }
      return {digits, order};
   }

   /** The decimal number held by an array of BCD digit pairs, in its declared byte order. */
   value(): number {
      const {digits, order} = this.bcdDigits();
      const pairs = digits.map((el) => el.value());
      return joinBcdPairs(order === "big" ? pairs : pairs.reverse(), this.path);
   }

   /**
    * Writes every element, or for an array of BCD digit pairs, one number
    * spread over them. Everything is encoded before anything reaches the
    * store, so a bad value leaves the whole array untouched.
    */
   assign(values: number|readonly unknown[]): void {
      if (typeof values === "number") {
         const {digits, order} = this.bcdDigits();
         const pairs = bcdDigitPairs(values, digits.length, this.path);
         this.commit(digits, order === "big" ? pairs : pairs.reverse());
         return;
      }
      const elements = this.primitiveElements();
      if (values.length !== elements.length)
         throw new EncodingError(`${this.path}: expected ${elements.length} values, got ${values.length}`);
      this.commit(elements, values);
   }

   private commit(elements: readonly PrimitiveElement[], values: readonly unknown[]) {
      const scratch = this.getRaw();
      elements.forEach((el, i) => el.encodeInto(values[i], scratch, this.offset));
      this.store.setRaw(this.offset, scratch);
   }

   /** Index of the first element holding `value`, or -1. */
   indexOf(value: PrimitiveValue): number {
      return this.values().indexOf(value);
   }
}

export type BoundElement = PrimitiveElement|RecordElement|ArrayElement;

function kindMismatch(el: BoundElement, expected: ElementKind): TypeMismatchError {
   return new TypeMismatchError(`${el.path}: expected ${expected}, found ${el.kind}`);
}

function intLabel(spec: IntSpec, bitfieldWidth?: number): string {
   return bitfieldWidth === undefined ? describeSpec(spec) : `${describeSpec(spec)}:${bitfieldWidth}`;
}

function bitElement(order: BitOrder, store: BackingStore, path: string, slot: Slot): BitsElement {
   return new BitsElement(store, path, slot, bitCodec(order, slot.bitOffset), describeSpec({kind: "bit", order}));
}

function bcdElement(spec: BcdSpec, store: BackingStore, path: string, slot: Slot): BcdElement {
   return new BcdElement(store, path, slot, maskedBcdCodec(store, slot.byteOffset), describeSpec(spec));
}

function charElement(spec: CharSpec, store: BackingStore, path: string, slot: Slot): CharElement {
   return new CharElement(store, path, slot, charCodec(spec), describeSpec(spec));
}

export function makeElement(node: LayoutNode, store: BackingStore, path: string, shiftBits: number): BoundElement {
   switch (node.kind) {
      case "record":
         return new RecordElement(node, store, path, shiftBits);
      case "array":
         return new ArrayElement(node, store, path, shiftBits);
      case "bitfield": {
         const slot = shiftSlot(node.slot, shiftBits, false);
         const codec = bitfieldCodec(node.container, slot.bitOffset, slot.bitWidth);
         return new IntElement(store, path, slot, codec, intLabel(node.container, slot.bitWidth));
      }
      case "primitive": {
         const spec = node.spec;
         switch (spec.kind) {
            case "int":
               return new IntElement(store, path, shiftSlot(node.slot, shiftBits, false), intCodec(spec), intLabel(spec));
            case "bcd":
               return bcdElement(spec, store, path, shiftSlot(node.slot, shiftBits, false));
            case "char":
               return charElement(spec, store, path, shiftSlot(node.slot, shiftBits, false));
            case "bit":
               return bitElement(spec.order, store, path, shiftSlot(node.slot, shiftBits, true));
         }
      }
   }
}

/**
 * Binds a resolved layout to a store and returns the root record.
 * @throws OutOfBoundsError when the store is too small for the layout.
 */
export function bind(layout: ResolvedLayout, store: BackingStore): RecordElement {
   if (store.length < layout.byteLength) {
      throw new OutOfBoundsError(`image is ${store.length} bytes but the layout needs ${layout.byteLength}`);
   }
   return new RecordElement(layout.root, store, "", 0);
}

/**
 * Current value of a primitive element, the number held by a BCD digit-pair
 * array, or the values of any other array of primitives.
 */
export function valueOf(el: BoundElement): PrimitiveValue|PrimitiveValue[] {
   switch (el.kind) {
      case "record":
         throw new TypeMismatchError(`${el.path || "(root)"}: a record has no single value`);
      case "array":
         return el.bcdOrder === null ? el.values() : el.value();
      default:
         return el.value();
   }
}

export function assign(el: BoundElement, value: unknown): void {
   switch (el.kind) {
      case "record":
         throw new TypeMismatchError(`${el.path || "(root)"}: cannot assign ${typeName(value)} to a record`);
      case "array":
         if (typeof value === "number" && el.bcdOrder !== null) {
            el.assign(value);
            return;
         }
         if (!Array.isArray(value))
            throw new TypeMismatchError(`${el.path}: expected an array of values, got ${typeName(value)}`);
         el.assign(value);
         return;
      default:
         el.assignValue(value);
   }
}
