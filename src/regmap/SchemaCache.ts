import {gLog} from "../utils/logger";
import type {Logger} from "../utils/logger";
import {compile} from "./compiler";
import {DEFAULT_SCHEMA_CACHE_CAPACITY} from "./defs";
import {resolve} from "./layout";
import type {ResolvedLayout, ResolveOptions} from "./layout";
import type {CompiledSchema} from "./schema";

export interface SchemaCacheOptions {
   capacity?: number;
   log?: Logger;
   /** Passed to `resolve()` for every layout the cache builds. */
   resolve?: Omit<ResolveOptions, "log">;
}

type Entry = {
   schema: CompiledSchema; layout?: ResolvedLayout;
};

/**
 * Compiled schemas and their layouts keyed by exact schema text, least
 * recently used first out. A failed compile caches nothing; a failed resolve
 * keeps the compiled schema but caches no layout, so the next `layout()` call
 * resolves again.
 *
 *    const cache = new SchemaCache({capacity: 8});
 *    const root = bind(cache.layout(MEM_FORMAT), store);
 */
export class SchemaCache {
   private readonly entries = new Map<string, Entry>();
   readonly capacity: number;
   private readonly log: Logger;
   private readonly resolveOptions: Omit<ResolveOptions, "log">;

   constructor(options: SchemaCacheOptions = {}) {
      const capacity = options.capacity ?? DEFAULT_SCHEMA_CACHE_CAPACITY;
      if (!Number.isInteger(capacity) || capacity < 1)
         throw new RangeError(`SchemaCache capacity must be a positive integer (${capacity})`);
      this.capacity = capacity;
      this.log = options.log ?? gLog;
      this.resolveOptions = options.resolve ?? {};
   }

   get size(): number {
      return this.entries.size;
   }

   has(text: string): boolean {
      return this.entries.has(text);
   }

   compile(text: string): CompiledSchema {
      return this.entry(text).schema;
   }

   layout(text: string): ResolvedLayout {
      const entry = this.entry(text);
      if (!entry.layout) {
         const schema = entry.schema;
         entry.layout = this.log.scope("resolve layout", () => resolve(schema, {...this.resolveOptions, log: this.log}));
      }
      return entry.layout;
   }

   evict(text: string): boolean {
      return this.entries.delete(text);
   }

   clear(): void {
      this.entries.clear();
   }

   private entry(text: string): Entry {
      const hit = this.entries.get(text);
      if (hit) {
         // move to the most recently used end
         this.entries.delete(text);
         this.entries.set(text, hit);
         return hit;
      }
      const schema = this.log.scope("compile schema", () => compile(text));
      const entry: Entry = {schema};
      this.entries.set(text, entry);
      for (const key of this.entries.keys()) {
         if (this.entries.size <= this.capacity)
            break;
         this.log.debug(`schema cache full (${this.capacity}), dropping least recently used entry`);
         this.entries.delete(key);
      }
      return entry;
   }
}
