import {EncodingError, OutOfBoundsError} from "./errors";
import {MemoryRegion} from "./MemoryRegion";

/**
 * Returns a bitmask with the low N bits set to 1.
 * For example: maskLowBits(3) returns 0b111 (7)
 */
export function maskLowBits(bitCount: number): number {
   if (bitCount <= 0)
      return 0;
   if (bitCount >= 32)
      return 0xFFFFFFFF >>> 0;
   return (Math.pow(2, bitCount) - 1) >>> 0;
}

/**
 * Throws OutOfBoundsError unless [offset, offset + length) lies inside the region.
 * `context` names the operation for the message.
 */
export function assertRangeInRegion(region: MemoryRegion, offset: number, length: number, context: string): void {
   if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 ||
       !region.containsRegion(new MemoryRegion(context, offset, length))) {
      throw new OutOfBoundsError(`${context}: out of bounds (need ${length} bytes at offset ${offset}, ${region})`);
   }
}

export function assertByte(value: number, context: string): void {
   if (!Number.isInteger(value) || value < 0 || value > 0xFF) {
      throw new EncodingError(`${context}: ${value} is not a byte value`);
   }
}
