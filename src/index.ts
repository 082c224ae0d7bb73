// Public surface of the layout engine.
export {BackingStore} from "./regmap/BackingStore";
export type {FillPattern} from "./regmap/BackingStore";
export {bcdCodec, bcdDigitPairs, bitCodec, bitfieldCodec, charCodec, intCodec, joinBcdPairs, padString} from "./regmap/codecs";
export type {FieldCodec} from "./regmap/codecs";
export {compile} from "./regmap/compiler";
export {describe, formatLayout, formatTree, toPlain} from "./regmap/dump";
export type {PlainValue} from "./regmap/dump";
export {
   ArrayElement,
   assign,
   BcdElement,
   bind,
   BitsElement,
   CharElement,
   IntElement,
   RecordElement,
   valueOf,
} from "./regmap/elements";
export type {BoundElement, ElementKind, PrimitiveElement, PrimitiveValue} from "./regmap/elements";
export {EncodingError, LayoutError, OutOfBoundsError, RegmapError, SchemaSyntaxError, TypeMismatchError} from "./regmap/errors";
export {flattenLayout, resolve} from "./regmap/layout";
export type {LayoutNode, LayoutRow, ResolvedLayout, ResolveOptions, Slot} from "./regmap/layout";
export {MemoryRegion} from "./regmap/MemoryRegion";
export {getPath} from "./regmap/paths";
export {SchemaCache} from "./regmap/SchemaCache";
export type {SchemaCacheOptions} from "./regmap/SchemaCache";
export {S} from "./regmap/schema";
export type {CompiledSchema, FieldNode, PrimitiveSpec} from "./regmap/schema";
export {gLog, Logger} from "./utils/logger";
export type {LoggerOptions, LogLevel, LogSink} from "./utils/logger";
export {hexdump} from "./utils/utils";
