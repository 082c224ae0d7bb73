export function toHex(value: number, width = 2): string {
   return value.toString(16).toUpperCase().padStart(width, "0");
}

export function bytesToHex(bytes: Uint8Array): string {
   return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

const HEXDUMP_ROW_BYTES = 8;

// Printable range for the character column; everything else shows as '.'.
function isPrintable(byte: number): boolean {
   return byte > 0x20 && byte < 0x7E;
}

/**
 * Hexdump-style rendering, 8 bytes per row:
 *
 *    0010: 46 4f 4f 00 ff ff ff ff   FOO.....
 *
 * `baseAddress` is the address printed for the first byte.
 */
export function hexdump(bytes: Uint8Array, baseAddress = 0): string {
   let out = "";
   for (let row = 0; row < bytes.length; row += HEXDUMP_ROW_BYTES) {
      let hex = "";
      let text = "";
      for (let j = 0; j < HEXDUMP_ROW_BYTES; j++) {
         const i = row + j;
         if (i < bytes.length) {
            hex += `${bytes[i].toString(16).padStart(2, "0")} `;
            text += isPrintable(bytes[i]) ? String.fromCharCode(bytes[i]) : ".";
         } else {
            hex += "   ";
         }
      }
      out += `${toHex(baseAddress + row, 4)}: ${hex}  ${text}\n`;
   }
   return out;
}
