import {gLog} from "../utils/logger";
import type {Logger} from "../utils/logger";
import {toHex} from "../utils/utils";
import {MAX_IMAGE_BYTES} from "./defs";
import {LayoutError} from "./errors";
import {BitCursor} from "./MemoryRegion";
import type {ArrayNode, BitfieldGroup, CompiledSchema, FieldNode, IntSpec, PositionDirective, PrimitiveField, PrimitiveSpec, RecordNode} from "./schema";
import {primitiveBitWidth} from "./schema";

/**
 * Where a node lives in the image.
 * - primitives: `bitOffset` is 0, except for single bits, where it is the bit's
 *   index within its byte in declaration order.
 * - bitfield members: `byteOffset` is the container's, `bitOffset` counts from
 *   the container value's most significant bit.
 */
export interface Slot {
   readonly byteOffset: number;
   readonly bitOffset: number;
   readonly bitWidth: number;
}

export interface PrimitiveLayout {
   readonly kind: "primitive";
   readonly name: string;
   readonly spec: PrimitiveSpec;
   readonly slot: Slot;
}

export interface BitfieldLayout {
   readonly kind: "bitfield";
   readonly name: string;
   readonly container: IntSpec;
   readonly slot: Slot;
}

export interface RecordLayout {
   readonly kind: "record";
   readonly name: string;
   readonly variant: "struct"|"union";
   readonly typeName?: string;
   readonly slot: Slot;
   readonly fields: ReadonlyMap<string, LayoutNode>;
}

/** `element` is element 0; element i is element 0 moved `i * strideBits` further. */
export interface ArrayLayout {
   readonly kind: "array";
   readonly name: string;
   readonly count: number;
   readonly strideBits: number;
   readonly element: PrimitiveLayout|RecordLayout;
   readonly slot: Slot;
}

export type LayoutNode = PrimitiveLayout|BitfieldLayout|RecordLayout|ArrayLayout;

export interface ResolvedLayout {
   readonly schema: CompiledSchema;
   readonly root: RecordLayout;
   /** Bytes an image needs to hold every field. */
   readonly byteLength: number;
}

export interface ResolveOptions {
   /** Byte address the first field is placed at. */
   baseOffset?: number;
   /** Stated image size; a field reaching past it is a LayoutError. */
   imageSize?: number;
   log?: Logger;
}

export function childPath(parent: string, name: string): string {
   return parent ? `${parent}.${name}` : name;
}

/**
 * Moves a slot `shiftBits` further into the image. Single bits move bit by bit
 * (bit array elements); every other slot only ever moves by whole bytes.
 */
export function shiftSlot(slot: Slot, shiftBits: number, bitAddressed: boolean): Slot {
   if (shiftBits === 0)
      return slot;
   if (bitAddressed) {
      const abs = slot.byteOffset * 8 + slot.bitOffset + shiftBits;
      return {byteOffset: abs >>> 3, bitOffset: abs & 7, bitWidth: slot.bitWidth};
   }
   return {byteOffset: slot.byteOffset + shiftBits / 8, bitOffset: slot.bitOffset, bitWidth: slot.bitWidth};
}

export function isBitLayout(node: LayoutNode): boolean {
   return node.kind === "primitive" && node.spec.kind === "bit";
}

class Resolver {
   private readonly cursor: BitCursor;
   private highWaterBits: number;
   private readonly limitBits: number;

   constructor(baseOffset: number, imageSize: number|undefined, private readonly log: Logger) {
      this.cursor = new BitCursor(baseOffset * 8);
      this.highWaterBits = baseOffset * 8;
      this.limitBits = (imageSize ?? MAX_IMAGE_BYTES) * 8;
   }

   get byteLength(): number {
      return Math.ceil(this.highWaterBits / 8);
   }

   // marks [start, end) as occupied
   private claim(path: string, startBits: number, endBits: number) {
      if (endBits > this.limitBits) {
         throw new LayoutError(
            path, `ends at byte 0x${toHex(Math.ceil(endBits / 8), 4)}, past the image size 0x${toHex(this.limitBits / 8, 4)}`);
      }
      if (startBits < 0)
         throw new LayoutError(path, "starts before the image");
      this.highWaterBits = Math.max(this.highWaterBits, endBits);
   }

   private requireAligned(path: string, what: string) {
      if (!this.cursor.isByteAligned()) {
         throw new LayoutError(
            path, `${what} at byte ${this.cursor.currentByteIndex()} bit ${this.cursor.bitIndexInByte()} is not byte-aligned`);
      }
   }

   /**
    * A record's size is the sum of its fields' sizes. Directives inside it
    * move the cursor (backwards too) without changing that size.
    */
   resolveRecord(node: RecordNode, path: string, inArrayElement: boolean): RecordLayout {
      this.requireAligned(path, "record");
      const start = this.cursor.tellBits();
      const fields = new Map<string, LayoutNode>();
      const lines = new Map<string, number>();
      const add = (name: string, layout: LayoutNode, line: number) => {
         let key = name;
         if (fields.has(name)) {
            key = `${name}_${toHex(layout.slot.byteOffset, 6).toLowerCase()}`;
            if (fields.has(key))
               throw new LayoutError(childPath(path, name), "duplicate field name");
            this.log.error(`${childPath(path, name)}: duplicate definition on line ${line}, renamed to '${key}' ` +
                           `(previous definition on line ${lines.get(name) ?? "unknown"})`);
         }
         fields.set(key, key === name ? layout : {...layout, name: key});
         lines.set(key, line);
      };

      let sizeBits = 0;
      if (node.variant === "union") {
         let sizeFrom = "";
         let first = true;
         if (node.children.length === 0)
            throw new LayoutError(path, "union has no members");
         for (const child of node.children) {
            if (child.kind === "directive")
               throw new LayoutError(path, `#${child.op} is not allowed inside a union`);
            this.cursor.seekToBits(start);
            const extent = this.resolveChild(child, path, inArrayElement, add);
            const memberName = child.kind === "bitfield" ? child.members.map((m) => m.name).join(",") : child.name;
            if (first) {
               sizeBits = extent;
               sizeFrom = memberName;
               first = false;
            } else if (extent !== sizeBits) {
               throw new LayoutError(
                  childPath(path, memberName),
                  `union member is ${extent / 8} bytes but '${sizeFrom}' is ${sizeBits / 8} bytes`);
            }
         }
         this.cursor.seekToBits(start + sizeBits);
      } else {
         for (const child of node.children)
            sizeBits += this.resolveChild(child, path, inArrayElement, add);
      }

      if (!this.cursor.isByteAligned())
         throw new LayoutError(path, `record ends mid-byte (bit ${this.cursor.bitIndexInByte()})`);

      return {
         kind: "record",
         name: node.name,
         variant: node.variant,
         typeName: node.typeName,
         slot: {byteOffset: start / 8, bitOffset: 0, bitWidth: sizeBits},
         fields,
      };
   }

   // returns the bits the child occupies
   private resolveChild(
      child: FieldNode, parentPath: string, inArrayElement: boolean,
      add: (name: string, layout: LayoutNode, line: number) => void): number {
      switch (child.kind) {
         case "directive":
            this.applyDirective(child, parentPath, inArrayElement);
            return 0;
         case "bitfield":
            for (const member of this.resolveBitfield(child, parentPath))
               add(member.layout.name, member.layout, member.line);
            return child.container.bits;
         case "primitive": {
            const layout = this.resolvePrimitive(child, childPath(parentPath, child.name));
            add(child.name, layout, child.line);
            return layout.slot.bitWidth;
         }
         case "record": {
            const layout = this.resolveRecord(child, childPath(parentPath, child.name), inArrayElement);
            add(child.name, layout, child.line);
            return layout.slot.bitWidth;
         }
         case "array": {
            const layout = this.resolveArray(child, childPath(parentPath, child.name));
            add(child.name, layout, child.line);
            return layout.slot.bitWidth;
         }
      }
   }

   private resolvePrimitive(node: PrimitiveField, path: string): PrimitiveLayout {
      const isBit = node.spec.kind === "bit";
      if (!isBit)
         this.requireAligned(path, "field");
      const width = primitiveBitWidth(node.spec);
      if (width <= 0)
         throw new LayoutError(path, "field has no width");
      const start = this.cursor.tellBits();
      this.claim(path, start, start + width);
      const slot: Slot = {
         byteOffset: this.cursor.currentByteIndex(),
         bitOffset: isBit ? this.cursor.bitIndexInByte() : 0,
         bitWidth: width,
      };
      this.cursor.seekBits(width);
      return {kind: "primitive", name: node.name, spec: node.spec, slot};
   }

   private resolveBitfield(node: BitfieldGroup, parentPath: string): Array<{layout: BitfieldLayout; line: number}> {
      const firstPath = childPath(parentPath, node.members[0]?.name ?? "");
      this.requireAligned(firstPath, "bitfield");
      let total = 0;
      for (const m of node.members) {
         if (!Number.isInteger(m.width) || m.width <= 0)
            throw new LayoutError(childPath(parentPath, m.name), `invalid bitfield width ${m.width}`);
         total += m.width;
      }
      if (total !== node.container.bits)
         throw new LayoutError(firstPath, `bitfield widths sum to ${total} bits, container holds ${node.container.bits}`);

      const start = this.cursor.tellBits();
      this.claim(firstPath, start, start + node.container.bits);
      const byteOffset = this.cursor.currentByteIndex();
      let bitOffset = 0;
      const out = node.members.map((m) => {
         const slot: Slot = {byteOffset, bitOffset, bitWidth: m.width};
         bitOffset += m.width;
         const layout: BitfieldLayout = {kind: "bitfield", name: m.name, container: node.container, slot};
         return {layout, line: m.line};
      });
      this.cursor.seekBits(node.container.bits);
      return out;
   }

   private resolveArray(node: ArrayNode, path: string): ArrayLayout {
      if (!Number.isInteger(node.count) || node.count <= 0)
         throw new LayoutError(path, `invalid array count ${node.count}`);
      const start = this.cursor.tellBits();
      const elementPath = `${path}[0]`;
      const element = node.element.kind === "record" ? this.resolveRecord(node.element, elementPath, true) :
                                                       this.resolvePrimitive(node.element, elementPath);
      const strideBits = this.cursor.tellBits() - start;
      if (strideBits <= 0)
         throw new LayoutError(path, "array element has no size");
      const end = start + strideBits * node.count;
      this.claim(path, start, end);
      this.cursor.seekToBits(end);
      return {
         kind: "array",
         name: node.name,
         count: node.count,
         strideBits,
         element,
         slot: {byteOffset: Math.floor(start / 8), bitOffset: start & 7, bitWidth: end - start},
      };
   }

   private applyDirective(d: PositionDirective, path: string, inArrayElement: boolean) {
      const where = path || "(root)";
      if (d.op === "printoffset") {
         const at = this.cursor.currentByteIndex();
         this.log.debug(`${d.label}: ${at} (0x${toHex(at, 8)})`);
         return;
      }
      this.requireAligned(path, `#${d.op}`);
      const here = this.cursor.currentByteIndex();
      if (d.op === "seek") {
         if (!Number.isInteger(d.delta) || d.delta < 0)
            throw new LayoutError(path, `invalid #seek distance ${d.delta}`);
         this.cursor.seekBits(d.delta * 8);
         return;
      }
      if (inArrayElement)
         throw new LayoutError(path, "#seekto inside an array element");
      if (!Number.isInteger(d.address) || d.address < 0)
         throw new LayoutError(path, `invalid #seekto address ${d.address}`);
      if (d.address <= here) {
         this.log.warn(`${where}: #seekto 0x${toHex(d.address, 4)} does not move forward from 0x${toHex(here, 4)}`);
      }
      this.cursor.seekToBits(d.address * 8);
   }
}

/**
 * Assigns every node of the schema its place in the image. Pure apart from
 * logging: resolving the same schema twice gives deep-equal layouts.
 */
export function resolve(schema: CompiledSchema, options: ResolveOptions = {}): ResolvedLayout {
   const baseOffset = options.baseOffset ?? 0;
   if (!Number.isInteger(baseOffset) || baseOffset < 0)
      throw new LayoutError("", `invalid base offset ${baseOffset}`);
   const resolver = new Resolver(baseOffset, options.imageSize, options.log ?? gLog);
   const root = resolver.resolveRecord(schema.root, "", false);
   return {schema, root, byteLength: resolver.byteLength};
}

export interface LayoutRow {
   path: string;
   byteOffset: number;
   bitOffset: number;
   bitWidth: number;
}

/** Address table of every leaf field, with every array index expanded. */
export function flattenLayout(layout: ResolvedLayout): LayoutRow[] {
   const rows: LayoutRow[] = [];
   const visit = (node: LayoutNode, path: string, shiftBits: number) => {
      switch (node.kind) {
         case "primitive":
         case "bitfield": {
            const slot = shiftSlot(node.slot, shiftBits, isBitLayout(node));
            rows.push({path, ...slot});
            return;
         }
         case "record":
            for (const [name, child] of node.fields)
               visit(child, childPath(path, name), shiftBits);
            return;
         case "array":
            for (let i = 0; i < node.count; i++)
               visit(node.element, `${path}[${i}]`, shiftBits + i * node.strideBits);
            return;
      }
   };
   visit(layout.root, "", 0);
   return rows;
}
