// Prints a memory image through a schema.
//    tsx scripts/dump-image.ts <schema-file> <image-file> [--path .settings] [--hex] [--layout] [--json] [--verbose]
import fs from "node:fs";
import {parseArgs} from "node:util";

import {BackingStore} from "../src/regmap/BackingStore";
import {formatLayout, formatTree, toPlain} from "../src/regmap/dump";
import {bind} from "../src/regmap/elements";
import {RegmapError} from "../src/regmap/errors";
import {getPath} from "../src/regmap/paths";
import {SchemaCache} from "../src/regmap/SchemaCache";
import {gLog} from "../src/utils/logger";

const USAGE = "usage: dump-image <schema-file> <image-file> [--path P] [--hex] [--layout] [--json] [--verbose]";

function main(argv: string[]): number {
   const {values, positionals} = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
         path: {type: "string", short: "p"},
         hex: {type: "boolean", default: false},
         layout: {type: "boolean", default: false},
         json: {type: "boolean", default: false},
         verbose: {type: "boolean", short: "v", default: false},
      },
   });
   if (positionals.length !== 2) {
      console.error(USAGE);
      return 2;
   }
   if (values.verbose)
      gLog.setLevel("debug");

   const [schemaFile, imageFile] = positionals;
   const run = gLog.begin(`dump ${imageFile}`);
   try {
      const text = fs.readFileSync(schemaFile, "utf8");
      const store = BackingStore.load(fs.readFileSync(imageFile));
      const layout = new SchemaCache({resolve: {imageSize: store.length}}).layout(text);
      gLog.info(`layout needs ${layout.byteLength} bytes, image has ${store.length}`);

      if (values.layout)
         console.log(formatLayout(layout));

      const root = bind(layout, store);
      const el = values.path ? getPath(root, values.path) : root;
      console.log(values.json ? JSON.stringify(toPlain(el), null, 3) : formatTree(el));
      if (values.hex)
         console.log(store.printable(el.offset, el.offset + el.byteLength));
      run.end();
      return 0;
   } catch (e) {
      run.end("FAILED");
      if (e instanceof RegmapError) {
         gLog.error(`${e.name}: ${e.message}`);
         return 1;
      }
      throw e;
   }
}

process.exit(main(process.argv.slice(2)));
