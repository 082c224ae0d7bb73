import {hexdump} from "../utils/utils";
import {DEFAULT_FILL_BYTE} from "./defs";
import {EncodingError, OutOfBoundsError} from "./errors";
import {MemoryRegion} from "./MemoryRegion";
import {assertByte, assertRangeInRegion} from "./utils";

export type FillPattern = number|Uint8Array;

/**
 * Fixed-length byte image of a device's memory. It is the only mutable state in
 * the engine: every bound element reads and writes through it, so a write made
 * through one view is visible through every other view of the same bytes.
 *
 * The length never changes after construction.
 */
export class BackingStore {
   private readonly data: Uint8Array;
   readonly region: MemoryRegion;

   constructor(length: number, fillByte = DEFAULT_FILL_BYTE) {
      this.region = new MemoryRegion("image", 0, length);
      assertByte(fillByte, "BackingStore");
      this.data = new Uint8Array(length);
      this.data.fill(fillByte);
   }

   /** Creates a store holding a copy of `bytes`. */
   static load(bytes: ArrayLike<number>): BackingStore {
      const store = new BackingStore(bytes.length);
      for (let i = 0; i < bytes.length; i++) {
         assertByte(bytes[i], `BackingStore.load[${i}]`);
         store.data[i] = bytes[i];
      }
      return store;
   }

   get length(): number {
      return this.data.length;
   }

   getByte(offset: number): number {
      if (!Number.isInteger(offset) || !this.region.containsAddress(offset))
         throw new OutOfBoundsError(`BackingStore.getByte: offset ${offset} is outside ${this.region}`);
      return this.data[offset];
   }

   /** Copy of `length` bytes starting at `offset`. */
   getRaw(offset: number, length: number): Uint8Array {
      assertRangeInRegion(this.region, offset, length, "BackingStore.getRaw");
      return this.data.slice(offset, offset + length);
   }

   setRaw(offset: number, bytes: Uint8Array): void {
      assertRangeInRegion(this.region, offset, bytes.length, "BackingStore.setRaw");
      this.data.set(bytes, offset);
   }

   /** Repeats `pattern` (a byte, or a byte sequence) over [offset, offset + length). */
   fill(offset: number, length: number, pattern: FillPattern): void {
      assertRangeInRegion(this.region, offset, length, "BackingStore.fill");
      if (typeof pattern === "number") {
         assertByte(pattern, "BackingStore.fill");
         this.data.fill(pattern, offset, offset + length);
         return;
      }
      if (pattern.length === 0)
         throw new EncodingError("BackingStore.fill: empty pattern");
      for (let i = 0; i < length; i++)
         this.data[offset + i] = pattern[i % pattern.length];
   }

   /** Copy of the whole image, e.g. for upload to the device. */
   dump(): Uint8Array {
      return this.data.slice();
   }

   printable(start = 0, end = this.length): string {
      return hexdump(this.getRaw(start, end - start), start);
   }
}
