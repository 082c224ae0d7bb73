// Runs tests/**/*.test.ts under node:test with tsx as the loader.
//    tsx scripts/run-tests.ts              all tests
//    tsx scripts/run-tests.ts codecs paths only files whose name contains a filter
import {spawn} from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

async function listTestFiles(rootDir: string): Promise<string[]> {
   const out: string[] = [];

   async function walk(dir: string): Promise<void> {
      const entries = await fs.readdir(dir, {withFileTypes: true});
      for (const ent of entries) {
         const fullPath = path.join(dir, ent.name);
         if (ent.isDirectory())
            await walk(fullPath);
         else if (ent.isFile() && ent.name.endsWith(".test.ts"))
            out.push(fullPath);
      }
   }

   await walk(rootDir);
   out.sort((a, b) => a.localeCompare(b));
   return out;
}

function isMissingDir(err: unknown): boolean {
   return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function runNodeTest(files: string[]): Promise<number> {
   // node 20 --test neither expands globs nor picks up .ts files, so every file is named
   const args = ["--import", "tsx", "--test", ...files];
   return new Promise<number>((resolve, reject) => {
      const child = spawn(process.execPath, args, {stdio: "inherit", shell: false});
      child.on("error", reject);
      child.on("exit", (code, signal) => resolve(typeof code === "number" ? code : signal ? 1 : 0));
   });
}

async function main(): Promise<number> {
   const testsDir = path.join(process.cwd(), "tests");
   const filters = process.argv.slice(2);

   let files: string[];
   try {
      files = await listTestFiles(testsDir);
   } catch (err) {
      if (!isMissingDir(err))
         throw err;
      files = [];
   }
   if (filters.length > 0)
      files = files.filter((f) => filters.some((needle) => path.basename(f).includes(needle)));

   if (files.length === 0) {
      console.log("no test files found");
      return filters.length > 0 ? 1 : 0;
   }
   return await runNodeTest(files);
}

main().then((code) => process.exit(code)).catch((err) => {
   console.error(err);
   process.exit(1);
});
