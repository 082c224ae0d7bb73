// Error taxonomy for the layout engine. Nothing here is ever recovered from
// internally: every failure surfaces to the caller as one of these.

export class RegmapError extends Error {
   constructor(message: string) {
      super(message);
      this.name = new.target.name;
   }
}

/** Malformed schema text. Compilation never returns a partial schema. */
export class SchemaSyntaxError extends RegmapError {
   readonly line: number;
   readonly detail: string;
   constructor(line: number, detail: string) {
      super(`line ${line}: ${detail}`);
      this.line = line;
      this.detail = detail;
   }
}

/** Structurally valid field tree that cannot be placed in memory. */
export class LayoutError extends RegmapError {
   readonly nodePath: string;
   constructor(nodePath: string, detail: string) {
      super(`${nodePath || "(root)"}: ${detail}`);
      this.nodePath = nodePath;
   }
}

export class OutOfBoundsError extends RegmapError {}

export class TypeMismatchError extends RegmapError {}

/** A value that cannot be represented by the target field. The store is left untouched. */
export class EncodingError extends RegmapError {}
