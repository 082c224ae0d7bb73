import {SchemaSyntaxError} from "./errors";

export type TokenType = "ident"|"number"|"string"|"punct";

export interface Token {
   type: TokenType;
   text: string;
   line: number;
}

// words, "strings", and single-character punctuation
const TOKEN_RE = /\s*(?:(\w+)|("[^"]*")|([{}[\];:,#]))/y;

// a word that is entirely a decimal or 0x-hex literal
const NUMBER_RE = /^(?:0[xX][0-9a-fA-F]+|\d+)$/;

/** Drops `//` comments to end of line. */
export function stripComments(line: string): string {
   const at = line.indexOf("//");
   return at < 0 ? line : line.slice(0, at);
}

/** Splits schema text into tokens carrying their 1-based line numbers. */
export function tokenize(text: string): Token[] {
   const tokens: Token[] = [];
   const lines = text.split(/\r?\n/);
   for (let i = 0; i < lines.length; i++) {
      const line = stripComments(lines[i]);
      const lineNo = i + 1;
      TOKEN_RE.lastIndex = 0;
      while (TOKEN_RE.lastIndex < line.length) {
         const start = TOKEN_RE.lastIndex;
         const m = TOKEN_RE.exec(line);
         if (!m) {
            const rest = line.slice(start).trimStart();
            if (rest.length === 0)
               break;
            throw new SchemaSyntaxError(lineNo, `unexpected character '${rest[0]}'`);
         }
         if (m[1] !== undefined)
            tokens.push({type: NUMBER_RE.test(m[1]) ? "number" : "ident", text: m[1], line: lineNo});
         else if (m[2] !== undefined)
            tokens.push({type: "string", text: m[2].slice(1, -1), line: lineNo});
         else if (m[3] !== undefined)
            tokens.push({type: "punct", text: m[3], line: lineNo});
         else
            break;
      }
   }
   return tokens;
}

export function parseNumber(text: string): number {
   return /^0[xX]/.test(text) ? parseInt(text.slice(2), 16) : parseInt(text, 10);
}
