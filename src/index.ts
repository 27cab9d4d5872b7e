// ─── Definitions ─────────────────────────────────────────────────────
export type {
  ArgumentDefinition,
  BuiltinScalarName,
  CompositeKind,
  DirectiveDefinition,
  EnumDefinition,
  EnumValueDefinition,
  FieldDefinition,
  NamedDefinition,
  NamedTypeReference,
  ScalarDefinition,
  ScalarMarker,
  TypeDefinition,
  TypeOrigin,
  TypeReference,
  TypeReferenceKind,
  UnionDefinition,
  UnionTypeResolverFactory,
} from "./definitions/types";
export type { DefaultValue } from "./definitions/default-value";
export {
  NOT_PROVIDED,
  NULL_DEFAULT,
  valueDefault,
  toGraphQLDefaultValue,
  readDefaultValue,
} from "./definitions/default-value";
export type {
  ArgumentConfig,
  CompositeTypeConfig,
  DirectiveConfig,
  EnumConfig,
  FieldConfig,
  ThunkArray,
  UnionConfig,
} from "./definitions/factory";
export {
  ref,
  defineArgument,
  defineDirective,
  defineEnum,
  defineField,
  defineInputType,
  defineInterface,
  defineObjectType,
  defineScalar,
  defineUnion,
} from "./definitions/factory";
export {
  isCompositeDefinition,
  namedReferenceOf,
  printTypeReference,
  referenceName,
  unwrapOptional,
} from "./definitions/utils";

// ─── Conversion ──────────────────────────────────────────────────────
export type { CacheEntry } from "./converter/type-cache";
export { TypeCache } from "./converter/type-cache";
export { TypeConverter } from "./converter/converter";
export type { TypeGraph } from "./converter/type-graph";
export { TypeGraphBuilder, buildTypeGraph } from "./converter/type-graph";
export type { TypeModifiers } from "./converter/modifiers";
export { composeModifiers } from "./converter/modifiers";
export { createUnionTypeResolver } from "./converter/union-resolver";
export type { FieldResolvers } from "./converter/resolvers";
export { fieldResolversOf, passThroughEvent } from "./converter/resolvers";

// ─── Scalars ─────────────────────────────────────────────────────────
export type { ScalarRegistry } from "./scalars/registry";
export {
  DefaultScalarRegistry,
  createScalarType,
  isBuiltinScalarName,
} from "./scalars/registry";
export { DateScalar, DateTimeScalar, TimeScalar, UUIDScalar } from "./scalars/custom";

// ─── Schema, options & errors ────────────────────────────────────────
export type { SchemaConfig } from "./schema";
export { createSchema } from "./schema";
export type { ConverterOptions } from "./options";
export type { Logger } from "./logger";
export { createSilentLogger } from "./logger";
export {
  SchemaConversionError,
  UnrecognizedTypeKindError,
  WrongKindForBuilderError,
  UnallowedReturnTypeForUnionError,
  WrongReturnTypeForUnionError,
  InternalConsistencyError,
  TypeNameConflictError,
  InvalidTypePositionError,
} from "./errors";
export type { SchemaConversionErrorCode } from "./errors";
