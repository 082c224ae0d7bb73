import {BCD_TYPES, BIT_TYPES, CHAR_TYPE, DIRECTIVES, INT_TYPES, STRUCT_KEYWORD, UNION_KEYWORD, isTypeKeyword} from "./defs";
import type {DirectiveName} from "./defs";
import {SchemaSyntaxError} from "./errors";
import type {ArrayNode, BitfieldGroup, BitfieldMember, CompiledSchema, FieldNode, PositionDirective, PrimitiveField, PrimitiveSpec, RecordNode} from "./schema";
import {parseNumber, tokenize} from "./tokenizer";
import type {Token} from "./tokenizer";

// `name;` or `name[count];` after a type or struct block.
type Declarator = {
   name: string; count: number|null; line: number;
};

function isDirectiveName(word: string): word is DirectiveName {
   return DIRECTIVES.some((d) => d === word);
}

/**
 * Single-pass recursive descent over the token stream. Any error aborts the
 * whole compilation; there is no partial result. Repeated field names are
 * left for the resolver, which renames them once their offset is known.
 */
class Parser {
   private pos = 0;
   private readonly types = new Map<string, RecordNode>();

   constructor(private readonly tokens: Token[], private readonly lastLine: number) {}

   parseSchema(): CompiledSchema {
      const children = this.parseItems(null);
      if (children.length === 0)
         throw new SchemaSyntaxError(1, "schema declares no fields");
      const root: RecordNode = {kind: "record", name: "", variant: "struct", children, line: 1};
      return {source: "", root, types: this.types};
   }

   // ---- token helpers

   private peek(): Token|undefined {
      return this.tokens[this.pos];
   }

   private next(what: string): Token {
      const tok = this.tokens[this.pos];
      if (!tok)
         throw new SchemaSyntaxError(this.lastLine, `unexpected end of schema, expected ${what}`);
      this.pos++;
      return tok;
   }

   private isPunct(text: string): boolean {
      const tok = this.peek();
      return tok !== undefined && tok.type === "punct" && tok.text === text;
   }

   private expectPunct(text: string): Token {
      const tok = this.next(`'${text}'`);
      if (tok.type !== "punct" || tok.text !== text)
         throw new SchemaSyntaxError(tok.line, `expected '${text}' but found '${tok.text}'`);
      return tok;
   }

   private expectIdent(what: string): Token {
      const tok = this.next(what);
      if (tok.type !== "ident")
         throw new SchemaSyntaxError(tok.line, `expected ${what} but found '${tok.text}'`);
      return tok;
   }

   // Field names are any run of word characters, so `u8 120[16];` declares a field "120".
   private expectName(what: string): Token {
      const tok = this.next(what);
      if (tok.type !== "ident" && tok.type !== "number")
         throw new SchemaSyntaxError(tok.line, `expected ${what} but found '${tok.text}'`);
      return tok;
   }

   private expectNumber(what: string): {value: number; line: number} {
      const tok = this.next(what);
      if (tok.type !== "number")
         throw new SchemaSyntaxError(tok.line, `expected ${what} but found '${tok.text}'`);
      return {value: parseNumber(tok.text), line: tok.line};
   }

   private expectPositive(what: string): number {
      const {value, line} = this.expectNumber(what);
      if (value <= 0)
         throw new SchemaSyntaxError(line, `${what} must be positive, got ${value}`);
      return value;
   }

   // ---- grammar

   // Items until '}' (when `opener` is a block's '{') or end of input.
   private parseItems(opener: Token|null): FieldNode[] {
      const children: FieldNode[] = [];

      for (;;) {
         const tok = this.peek();
         if (!tok) {
            if (opener)
               throw new SchemaSyntaxError(this.lastLine, `unterminated block opened on line ${opener.line}`);
            return children;
         }
         if (opener && tok.type === "punct" && tok.text === "}") {
            if (children.length === 0)
               throw new SchemaSyntaxError(tok.line, "empty block");
            return children;
         }

         const node = this.parseItem();
         if (node)
            children.push(node);
      }
   }

   // null for a struct type definition, which declares no field.
   private parseItem(): FieldNode|null {
      const tok = this.next("a declaration");
      if (tok.type === "punct" && tok.text === "#")
         return this.parseDirective(tok);
      if (tok.type !== "ident")
         throw new SchemaSyntaxError(tok.line, `unexpected '${tok.text}'`);
      if (tok.text === STRUCT_KEYWORD)
         return this.parseStruct(tok);
      if (tok.text === UNION_KEYWORD)
         return this.parseUnion(tok);
      if (!isTypeKeyword(tok.text))
         throw new SchemaSyntaxError(tok.line, `unknown type '${tok.text}'`);
      return this.parseDefinition(tok);
   }

   private parseDeclarator(): Declarator {
      const nameTok = this.expectName("a field name");
      let count: number|null = null;
      if (this.isPunct("[")) {
         this.pos++;
         count = this.expectPositive("array count");
         this.expectPunct("]");
      }
      this.expectPunct(";");
      return {name: nameTok.text, count, line: nameTok.line};
   }

   private parseDefinition(typeTok: Token): FieldNode {
      const keyword = typeTok.text;
      const nameTok = this.expectName("a field name");
      if (this.isPunct(":"))
         return this.parseBitfield(typeTok, nameTok);

      let count: number|null = null;
      if (this.isPunct("[")) {
         this.pos++;
         count = this.expectPositive("array count");
         this.expectPunct("]");
      }
      this.expectPunct(";");

      const name = nameTok.text;
      const line = typeTok.line;
      if (keyword === CHAR_TYPE)
         return {kind: "primitive", name, spec: {kind: "char", length: count ?? 1}, line};
      if (Object.hasOwn(BIT_TYPES, keyword)) {
         if (count === null || count % 8 !== 0)
            throw new SchemaSyntaxError(line, `${keyword} array '${name}' must have a multiple of 8 elements`);
         const element: PrimitiveField = {kind: "primitive", name, spec: {kind: "bit", order: BIT_TYPES[keyword]}, line};
         return {kind: "array", name, count, element, line};
      }

      const spec: PrimitiveSpec =
         Object.hasOwn(BCD_TYPES, keyword) ? {kind: "bcd", order: BCD_TYPES[keyword]} : INT_TYPES[keyword];
      const element: PrimitiveField = {kind: "primitive", name, spec, line};
      if (count === null)
         return element;
      return {kind: "array", name, count, element, line} satisfies ArrayNode;
   }

   private parseBitfield(typeTok: Token, firstName: Token): BitfieldGroup {
      if (!Object.hasOwn(INT_TYPES, typeTok.text))
         throw new SchemaSyntaxError(typeTok.line, `bitfield container must be an integer type, not '${typeTok.text}'`);
      const container = INT_TYPES[typeTok.text];
      const members: BitfieldMember[] = [];
      let nameTok = firstName;
      for (;;) {
         this.expectPunct(":");
         const width = this.expectPositive(`width of bitfield '${nameTok.text}'`);
         members.push({name: nameTok.text, width, line: nameTok.line});
         if (!this.isPunct(","))
            break;
         this.pos++;
         nameTok = this.expectName("a bitfield name");
      }
      this.expectPunct(";");

      const total = members.reduce((sum, m) => sum + m.width, 0);
      if (total !== container.bits) {
         throw new SchemaSyntaxError(
            typeTok.line, `bitfield widths sum to ${total} bits but ${typeTok.text} holds ${container.bits}`);
      }
      return {kind: "bitfield", container, members, line: typeTok.line};
   }

   private parseBlock(): FieldNode[] {
      const opener = this.expectPunct("{");
      const children = this.parseItems(opener);
      this.expectPunct("}");
      return children;
   }

   private parseStruct(keywordTok: Token): RecordNode|ArrayNode|null {
      let children: readonly FieldNode[];
      let typeName: string|undefined;

      if (this.isPunct("{")) {
         children = this.parseBlock();
      } else {
         const nameTok = this.expectIdent("a struct name or '{'");
         if (this.isPunct("{")) {
            // struct name { ... };  -- type definition only
            if (this.types.has(nameTok.text))
               throw new SchemaSyntaxError(nameTok.line, `struct '${nameTok.text}' is already defined`);
            const body = this.parseBlock();
            this.expectPunct(";");
            this.types.set(
               nameTok.text,
               {kind: "record", name: nameTok.text, variant: "struct", typeName: nameTok.text, children: body,
                line: keywordTok.line});
            return null;
         }
         const defined = this.types.get(nameTok.text);
         if (!defined)
            throw new SchemaSyntaxError(nameTok.line, `unknown struct type '${nameTok.text}'`);
         children = defined.children;
         typeName = nameTok.text;
      }

      const decl = this.parseDeclarator();
      return this.makeRecord("struct", decl, children, keywordTok.line, typeName);
   }

   private parseUnion(keywordTok: Token): RecordNode|ArrayNode {
      const children = this.parseBlock();
      if (children.some((c) => c.kind === "directive"))
         throw new SchemaSyntaxError(keywordTok.line, "directives are not allowed inside a union");
      const decl = this.parseDeclarator();
      return this.makeRecord("union", decl, children, keywordTok.line);
   }

   private makeRecord(
      variant: RecordNode["variant"],
      decl: Declarator,
      children: readonly FieldNode[],
      line: number,
      typeName?: string,
      ): RecordNode|ArrayNode {
      const record: RecordNode = {kind: "record", name: decl.name, variant, typeName, children, line};
      if (decl.count === null)
         return record;
      return {kind: "array", name: decl.name, count: decl.count, element: record, line};
   }

   private parseDirective(hashTok: Token): PositionDirective {
      const nameTok = this.expectIdent("a directive name");
      if (!isDirectiveName(nameTok.text))
         throw new SchemaSyntaxError(nameTok.line, `unknown directive '#${nameTok.text}'`);
      const directive = this.parseDirectiveBody(nameTok.text, hashTok.line);
      this.expectPunct(";");
      return directive;
   }

   private parseDirectiveBody(op: DirectiveName, line: number): PositionDirective {
      switch (op) {
         case "seekto":
            return {kind: "directive", op, address: this.expectNumber("a seek address").value, line};
         case "seek":
            return {kind: "directive", op, delta: this.expectPositive("seek distance"), line};
         case "printoffset": {
            const tok = this.next("a quoted label");
            if (tok.type !== "string")
               throw new SchemaSyntaxError(tok.line, `expected a quoted label but found '${tok.text}'`);
            return {kind: "directive", op, label: tok.text, line};
         }
      }
   }
}

/**
 * Compiles schema text into a field tree.
 *
 * ```
 * u8 flags;
 * u8 power:2, mode:6;
 * #seekto 0x0010;
 * struct {
 *    ul32 freq;
 *    char name[6];
 * } channels[4];
 * ```
 *
 * @throws SchemaSyntaxError with the offending line.
 */
export function compile(text: string): CompiledSchema {
   const tokens = tokenize(text);
   const lastLine = text.split(/\r?\n/).length;
   const parsed = new Parser(tokens, lastLine).parseSchema();
   return {...parsed, source: text};
}
