// Core marshalling functionality
export {
  clearRoutineCache,
  compile,
  dump,
  load,
  validate,
  validateSchema,
} from "./marshal.ts";

// Record declarations
export {
  defineRecord,
  type FieldValues,
  RecordField,
  type RecordFieldParams,
  RecordType,
  type RecordTypeParams,
} from "./schemas/complex/record_type.ts";
export { isValidName, RecordRegistry } from "./schemas/complex/resolve_names.ts";
export type {
  AnnotatedDecl,
  BuiltinName,
  Constructor,
  DictDecl,
  EnumDecl,
  EnumLike,
  FieldAnnotations,
  ListDecl,
  LiteralDecl,
  LiteralValue,
  MapDecl,
  NamedTupleDecl,
  OptionalDecl,
  PrimitiveName,
  RefDecl,
  SetDecl,
  TemporalName,
  TupleDecl,
  TypeDecl,
  TypeNode,
  UnionDecl,
  VariadicTupleDecl,
} from "./schemas/declared.ts";

// Configuration
export type {
  AliasSpec,
  DateTimeOutputForm,
  EffectiveConfig,
  FieldAliasConfig,
  RecordMeta,
  UnknownKeyPolicy,
} from "./config/meta.ts";
export { DEFAULT_TAG_KEY } from "./config/meta.ts";
export { resolveConfig } from "./config/resolve_config.ts";
export {
  type ComparisonOp,
  type Condition,
  eq,
  evaluateCondition,
  falsy,
  ge,
  gt,
  is,
  isNot,
  le,
  lt,
  ne,
  truthy,
} from "./config/conditions.ts";

// Descriptors and compiler
export type {
  DescriptorKind,
  TypeDescriptor,
} from "./descriptors/descriptor.ts";
export { describeDescriptor } from "./descriptors/descriptor.ts";
export { resolveDescriptor } from "./descriptors/resolve_descriptor.ts";
export type {
  CompileContext,
  CompiledRoutine,
  DumpFragment,
  Guard,
  LoadFragment,
} from "./compiler/context.ts";

// Extension registry
export {
  type CompileHook,
  globalTypeRegistry,
  registerType,
  TypeRegistry,
  type TypeHooks,
} from "./extensions/type_registry.ts";

// Errors
export {
  AggregateMarshalError,
  ConfigError,
  DescriptorResolutionError,
  MarshalError,
  MissingFieldError,
  PatternParseError,
  type PathSegment,
  TagDispatchError,
  TypeMismatchError,
  UnknownKeyError,
  UnsupportedTypeError,
} from "./schemas/error.ts";
export type { DynamicMap, DynamicScalar, DynamicValue } from "./schemas/json.ts";

// Utilities
export {
  type KeyCasing,
  type LoadKeyCasing,
  toCamelCase,
  toKebabCase,
  toPascalCase,
  toSnakeCase,
} from "./utils/casing.ts";
export { parseObjectPath } from "./utils/object_path.ts";
export { asBool, asFloat, asInt, asStr, TRUTHY_VALUES } from "./utils/coercion.ts";
export { getLogger, type Logger, setLogger } from "./utils/log.ts";
