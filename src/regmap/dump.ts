import {toHex} from "../utils/utils";
import type {BoundElement, PrimitiveValue} from "./elements";
import {flattenLayout} from "./layout";
import type {ResolvedLayout} from "./layout";
import {describeSpec} from "./schema";

export type PlainValue = PrimitiveValue|PlainValue[]|{[name: string]: PlainValue};

const address = (offset: number) => `0x${toHex(offset, 4)}`;

function formatValue(value: PrimitiveValue): string {
   return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/**
 * One line per element:
 *
 *    u16 freq = 4660 @ 0x0010
 *    lbcd[4] rxfreq = 14652000 @ 0x0012
 *    bit flags[3] = 1 @ 0x0005 bit 3
 *    struct memobj memory[2] (16 bytes) @ 0x0020
 */
export function describe(el: BoundElement): string {
   const path = el.path || "(root)";
   switch (el.kind) {
      case "record": {
         const type = el.layout.typeName ? `${el.layout.variant} ${el.layout.typeName}` : el.layout.variant;
         return `${type} ${path} (${el.byteLength} bytes) @ ${address(el.offset)}`;
      }
      case "array": {
         const order = el.bcdOrder;
         if (order !== null)
            return `${describeSpec({kind: "bcd", order})}[${el.length}] ${path} = ${el.value()} @ ${address(el.offset)}`;
         return `array ${path} [${el.length}] @ ${address(el.offset)}`;
      }
      case "bits":
         return `${el.typeLabel} ${path} = ${el.value()} @ ${address(el.offset)} bit ${el.slot.bitOffset}`;
      default:
         return `${el.typeLabel} ${path} = ${formatValue(el.value())} @ ${address(el.offset)}`;
   }
}

/**
 * `describe()` of the element and everything under it, two spaces per level.
 * BCD digit-pair arrays are one line, like any other number.
 */
export function formatTree(el: BoundElement): string {
   const lines: string[] = [];
   const visit = (node: BoundElement, depth: number) => {
      lines.push(`${"  ".repeat(depth)}${describe(node)}`);
      if (node.kind === "record") {
         for (const [, child] of node.entries())
            visit(child, depth + 1);
      } else if (node.kind === "array" && node.bcdOrder === null) {
         for (const child of node)
            visit(child, depth + 1);
      }
   };
   visit(el, 0);
   return lines.join("\n");
}

/** Snapshot of the element's current values as JSON-compatible data. */
export function toPlain(el: BoundElement): PlainValue {
   switch (el.kind) {
      case "record": {
         const out: {[name: string]: PlainValue} = {};
         for (const [name, child] of el.entries())
            out[name] = toPlain(child);
         return out;
      }
      case "array":
         return el.bcdOrder === null ? Array.from(el, toPlain) : el.value();
      default:
         return el.value();
   }
}

/** Address table, one leaf per line: `0x0010.0  16  settings.freq`. */
export function formatLayout(layout: ResolvedLayout): string {
   return flattenLayout(layout)
      .map((row) => `${address(row.byteOffset)}.${row.bitOffset}  ${String(row.bitWidth).padStart(3)}  ${row.path}`)
      .join("\n");
}
