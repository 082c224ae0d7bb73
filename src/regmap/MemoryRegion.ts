import {OutOfBoundsError} from "./errors";

export interface MemoryRegionDto {
   name: string;
   address: number;
   size: number;
}

export class MemoryRegion {
   readonly name: string;
   readonly address: number;
   readonly size: number;

   constructor(data: MemoryRegionDto);
   constructor(name: string, address: number, size: number);
   constructor(dataOrName: MemoryRegionDto|string, address = 0, size = 0) {
      const data: MemoryRegionDto = typeof dataOrName === "string" ? {name: dataOrName, address, size} : dataOrName;

      if (!Number.isInteger(data.address) || data.address < 0) {
         throw new OutOfBoundsError(`MemoryRegion ${data.name} address must be a non-negative integer (${data.address})`);
      }
      if (!Number.isInteger(data.size) || data.size < 0) {
         throw new OutOfBoundsError(`MemoryRegion ${data.name} size must be a non-negative integer (${data.size})`);
      }

      this.name = data.name;
      this.address = data.address;
      this.size = data.size;
   }
   endAddress() {
      return this.address + this.size;
   }
   containsAddress(addr: number) {
      return addr >= this.address && addr < this.endAddress();
   }
   containsRegion(other: MemoryRegion) {
      return this.address <= other.address && this.endAddress() >= other.endAddress();
   }
   toString() {
      return `${this.name} [0x${this.address.toString(16)}..0x${this.endAddress().toString(16)}] (${this.size} bytes)`;
   }
}

/**
 * A cursor that tracks a bit-level position from the start of an image.
 * The layout resolver walks the field tree with one of these.
 */
export class BitCursor {
   bitOffset: number;
   constructor(bitOffset = 0) {
      this.bitOffset = bitOffset;
   }
   tellBits() {
      return this.bitOffset;
   }
   currentByteIndex() {
      return Math.floor(this.bitOffset / 8);
   }
   bitIndexInByte() {
      return this.bitOffset & 7;
   }
   isByteAligned() {
      return (this.bitOffset & 7) === 0;
   }
   seekBits(deltaBits: number) {
      this.bitOffset += deltaBits;
      return this;
   }
   seekToBits(bitOffset: number) {
      this.bitOffset = bitOffset;
      return this;
   }
}
