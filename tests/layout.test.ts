import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {compile} from "../src/regmap/compiler";
import {LayoutError} from "../src/regmap/errors";
import {flattenLayout, resolve, shiftSlot} from "../src/regmap/layout";
import {S} from "../src/regmap/schema";
import {Logger} from "../src/utils/logger";
import type {LogLevel} from "../src/utils/logger";

const RADIO = `
u8 flags;
u16 a:4, b:12;
#seekto 0x10;
struct {
   ul32 freq;
   char name[3];
   u8 pad;
} mem[2];
bit bits[8];
#seek 2;
lbcd tail[2];
`;

function capture(level: LogLevel = "debug") {
   const lines: string[] = [];
   const log = new Logger({level, sink: (lvl, line) => lines.push(`${lvl} ${line.replace(/^\[[^\]]*\] /, "")}`)});
   return {log, lines};
}

function layoutErrorWith(message: string) {
   return (err: unknown) => {
      assert.ok(err instanceof LayoutError);
      assert.equal(err.message, message);
      return true;
   };
}

describe("resolve", () => {
   const layout = resolve(compile(RADIO), {log: capture().log});

   it("places fields in declaration order and honors directives", () => {
      const rows = flattenLayout(layout).map((r) => `${r.path}@${r.byteOffset}.${r.bitOffset}/${r.bitWidth}`);
      assert.deepEqual(rows, [
         "flags@0.0/8",
         "a@1.0/4",
         "b@1.4/12",
         "mem[0].freq@16.0/32",
         "mem[0].name@20.0/24",
         "mem[0].pad@23.0/8",
         "mem[1].freq@24.0/32",
         "mem[1].name@28.0/24",
         "mem[1].pad@31.0/8",
         "bits[0]@32.0/1",
         "bits[1]@32.1/1",
         "bits[2]@32.2/1",
         "bits[3]@32.3/1",
         "bits[4]@32.4/1",
         "bits[5]@32.5/1",
         "bits[6]@32.6/1",
         "bits[7]@32.7/1",
         "tail[0]@35.0/8",
         "tail[1]@36.0/8",
      ]);
   });

   it("reports the bytes an image needs", () => {
      assert.equal(layout.byteLength, 37);
   });

   it("sizes a record by its fields, not by the gaps directives leave", () => {
      assert.equal(layout.root.slot.bitWidth, 22 * 8);
   });

   it("lets a directive move back inside a record", () => {
      const {log, lines} = capture("warn");
      const l = resolve(compile("#seekto 0x40;\nstruct {\n   char a[8];\n   #seekto 0x0a;\n   u8 locked;\n} oem_info;"), {log});
      assert.deepEqual(flattenLayout(l).map((r) => `${r.path}@${r.byteOffset}`), ["oem_info.a@64", "oem_info.locked@10"]);
      assert.deepEqual(l.root.fields.get("oem_info")?.slot, {byteOffset: 0x40, bitOffset: 0, bitWidth: 72});
      assert.equal(l.byteLength, 0x48);
      assert.deepEqual(lines, ["warn oem_info: #seekto 0x000A does not move forward from 0x0048"]);
   });

   it("gives arrays a fixed stride", () => {
      const mem = layout.root.fields.get("mem");
      assert.ok(mem?.kind === "array");
      assert.equal(mem.strideBits, 64);
      assert.equal(mem.count, 2);
      assert.deepEqual(mem.slot, {byteOffset: 16, bitOffset: 0, bitWidth: 128});
   });

   it("is deterministic", () => {
      const schema = compile(RADIO);
      const {log} = capture();
      assert.deepEqual(resolve(schema, {log}), resolve(schema, {log}));
   });

   it("starts at the base offset", () => {
      const rows = flattenLayout(resolve(compile("u8 a;\nu8 b;"), {baseOffset: 4}));
      assert.deepEqual(rows.map((r) => r.byteOffset), [4, 5]);
   });

   it("overlays union members", () => {
      const l = resolve(compile("union {\n   u16 w;\n   u8 b[2];\n} v;\nu8 after;"));
      assert.deepEqual(flattenLayout(l).map((r) => `${r.path}@${r.byteOffset}`), ["v.w@0", "v.b[0]@0", "v.b[1]@1", "after@2"]);
      assert.equal(l.byteLength, 3);
   });
});

describe("resolve errors", () => {
   it("rejects union members of different sizes", () => {
      assert.throws(() => resolve(compile("union {\n   u16 w;\n   u8 b;\n} v;")),
                    layoutErrorWith("v.b: union member is 1 bytes but 'w' is 2 bytes"));
   });

   it("rejects a directive in the middle of a byte", () => {
      const schema = S.schema([S.bits("f", "msb", 4), S.seek(1)]);
      assert.throws(() => resolve(schema), layoutErrorWith("(root): #seek at byte 0 bit 4 is not byte-aligned"));
   });

   it("rejects a record that ends in the middle of a byte", () => {
      const schema = S.schema([S.struct("s", [S.bits("f", "lsb", 4)]), S.u8("x")]);
      assert.throws(() => resolve(schema), layoutErrorWith("s: record ends mid-byte (bit 4)"));
   });

   it("rejects an absolute seek inside an array element", () => {
      const schema = compile("struct {\n   u8 a;\n   #seekto 0x10;\n   u8 b;\n} arr[2];");
      assert.throws(() => resolve(schema), layoutErrorWith("arr[0]: #seekto inside an array element"));
   });

   it("rejects fields past the stated image size", () => {
      const schema = compile("u8 a;\n#seekto 0x10;\nu16 b;");
      assert.throws(() => resolve(schema, {imageSize: 0x11}),
                    layoutErrorWith("b: ends at byte 0x0012, past the image size 0x0011"));
      assert.equal(resolve(schema, {imageSize: 0x12}).byteLength, 0x12);
   });

   it("rejects builder bitfields that do not fill the container", () => {
      const schema = S.schema([S.bitfield(S.int.u8, [["a", 3]])]);
      assert.throws(() => resolve(schema), layoutErrorWith("a: bitfield widths sum to 3 bits, container holds 8"));
   });
});

describe("repeated field names", () => {
   it("renames a repeated bitfield member after its offset", () => {
      const {log, lines} = capture("warn");
      const l = resolve(compile("struct { u8 unknown1:4, unknown1:4; } s;"), {log});
      assert.deepEqual(flattenLayout(l).map((r) => `${r.path}@${r.byteOffset}.${r.bitOffset}`),
                       ["s.unknown1@0.0", "s.unknown1_000000@0.4"]);
      assert.deepEqual(lines, [
         "error s.unknown1: duplicate definition on line 1, renamed to 'unknown1_000000' (previous definition on line 1)",
      ]);
   });

   it("renames a repeated field and keeps both", () => {
      const {log, lines} = capture("warn");
      const l = resolve(compile("u8 a;\nu8 a;"), {log});
      assert.deepEqual([...l.root.fields.keys()], ["a", "a_000001"]);
      assert.equal(l.root.fields.get("a_000001")?.name, "a_000001");
      assert.deepEqual(lines, ["error a: duplicate definition on line 2, renamed to 'a_000001' (previous definition on line 1)"]);
   });
});

describe("resolve logging", () => {
   it("warns about a seekto that does not move forward", () => {
      const {log, lines} = capture("warn");
      const l = resolve(compile("u8 a;\n#seekto 0x10;\nu8 b;\n#seekto 0x4;\nu8 c;"), {log});
      assert.deepEqual(lines, ["warn (root): #seekto 0x0004 does not move forward from 0x0011"]);
      assert.deepEqual(flattenLayout(l).map((r) => r.byteOffset), [0, 0x10, 4]);
      assert.equal(l.byteLength, 0x11);
   });

   it("prints offsets at debug level", () => {
      const {log, lines} = capture();
      resolve(compile(`u16 a;\n#printoffset "here";\nu8 b;`), {log});
      assert.deepEqual(lines, ["debug here: 2 (0x00000002)"]);
   });
});

describe("shiftSlot", () => {
   it("moves bits across byte boundaries and other slots by whole bytes", () => {
      assert.deepEqual(shiftSlot({byteOffset: 2, bitOffset: 6, bitWidth: 1}, 3, true), {byteOffset: 3, bitOffset: 1, bitWidth: 1});
      assert.deepEqual(shiftSlot({byteOffset: 2, bitOffset: 4, bitWidth: 4}, 16, false), {byteOffset: 4, bitOffset: 4, bitWidth: 4});
   });
});
