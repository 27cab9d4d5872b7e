/**
 * Helpers for assembling a type-definition graph by hand.
 *
 * Composite types accept `fields` and `interfaces` as thunks so two types can
 * reference each other before either exists:
 * ```ts
 * const author: TypeDefinition = defineObjectType({
 *   name: "Author",
 *   fields: () => [defineField({ name: "posts", type: ref.list(ref.object(post)) })],
 * });
 * const post: TypeDefinition = defineObjectType({
 *   name: "Post",
 *   fields: () => [defineField({ name: "author", type: ref.object(author) })],
 * });
 * ```
 */

import type { DirectiveLocation, GraphQLFieldResolver } from "graphql";
import { NOT_PROVIDED, type DefaultValue } from "./default-value";
import type {
  ArgumentDefinition,
  CompositeKind,
  DirectiveDefinition,
  EnumDefinition,
  EnumValueDefinition,
  FieldDefinition,
  ScalarDefinition,
  ScalarMarker,
  TypeDefinition,
  TypeOrigin,
  TypeReference,
  UnionDefinition,
  UnionTypeResolverFactory,
} from "./types";

export type ThunkArray<T> = readonly T[] | (() => readonly T[]);

function resolveThunk<T>(thunk: ThunkArray<T>): readonly T[] {
  return typeof thunk === "function" ? thunk() : thunk;
}

// ─── References ──────────────────────────────────────────────────────

export const ref = {
  object: (definition: TypeDefinition): TypeReference => ({ kind: "Object", definition }),
  input: (definition: TypeDefinition): TypeReference => ({ kind: "Input", definition }),
  interface: (definition: TypeDefinition): TypeReference => ({ kind: "Interface", definition }),
  enum: (definition: EnumDefinition): TypeReference => ({ kind: "Enum", definition }),
  scalar: (scalar: ScalarMarker): TypeReference => ({ kind: "Scalar", scalar }),
  union: (definition: UnionDefinition): TypeReference => ({ kind: "Union", definition }),
  list: (ofType: TypeReference): TypeReference => ({ kind: "List", ofType }),
  optional: (ofType: TypeReference): TypeReference => ({ kind: "Optional", ofType }),
} as const;

// ─── Composite types ─────────────────────────────────────────────────

export interface CompositeTypeConfig {
  readonly name: string;
  readonly description?: string;
  readonly origin?: TypeOrigin;
  readonly fields: ThunkArray<FieldDefinition>;
  readonly interfaces?: ThunkArray<TypeDefinition>;
}

function defineCompositeType(
  kind: CompositeKind,
  config: CompositeTypeConfig,
): TypeDefinition {
  let fields: readonly FieldDefinition[] | undefined;
  let interfaces: readonly TypeDefinition[] | undefined;

  return {
    kind,
    name: config.name,
    description: config.description,
    origin: config.origin,
    get fields(): readonly FieldDefinition[] {
      return (fields ??= resolveThunk(config.fields));
    },
    get interfaces(): readonly TypeDefinition[] {
      return (interfaces ??= resolveThunk(config.interfaces ?? []));
    },
  };
}

export function defineObjectType(config: CompositeTypeConfig): TypeDefinition {
  return defineCompositeType("Object", config);
}

export function defineInputType(
  config: Omit<CompositeTypeConfig, "interfaces" | "origin">,
): TypeDefinition {
  return defineCompositeType("Input", config);
}

export function defineInterface(config: CompositeTypeConfig): TypeDefinition {
  return defineCompositeType("Interface", config);
}

// ─── Fields & arguments ──────────────────────────────────────────────

export interface FieldConfig {
  readonly name: string;
  readonly type: TypeReference;
  readonly description?: string;
  readonly arguments?: readonly ArgumentDefinition[];
  readonly defaultValue?: DefaultValue;
  readonly deprecationReason?: string;
  readonly isSubscription?: boolean;
  readonly resolver?: GraphQLFieldResolver<unknown, unknown>;
  readonly propertyName?: string;
}

export function defineField(config: FieldConfig): FieldDefinition {
  return {
    ...config,
    arguments: config.arguments ?? [],
    defaultValue: config.defaultValue ?? NOT_PROVIDED,
    isSubscription: config.isSubscription ?? false,
  };
}

export interface ArgumentConfig {
  readonly name: string;
  readonly type: TypeReference;
  readonly description?: string;
  readonly defaultValue?: DefaultValue;
  readonly deprecationReason?: string;
}

export function defineArgument(config: ArgumentConfig): ArgumentDefinition {
  return { ...config, defaultValue: config.defaultValue ?? NOT_PROVIDED };
}

// ─── Leaf types ──────────────────────────────────────────────────────

export interface EnumConfig {
  readonly name: string;
  readonly description?: string;
  /** A bare string declares a value whose internal value is its own name. */
  readonly values: readonly (string | EnumValueDefinition)[];
}

export function defineEnum(config: EnumConfig): EnumDefinition {
  return {
    kind: "Enum",
    name: config.name,
    description: config.description,
    values: config.values.map((value) =>
      typeof value === "string" ? { name: value, value } : value,
    ),
  };
}

export function defineScalar(
  config: Omit<ScalarDefinition, "kind">,
): ScalarDefinition {
  return { kind: "Scalar", ...config };
}

// ─── Unions & directives ─────────────────────────────────────────────

export interface UnionConfig {
  readonly name: string;
  readonly description?: string;
  readonly types: ThunkArray<TypeReference>;
  readonly resolveTypeFactory?: UnionTypeResolverFactory;
}

export function defineUnion(config: UnionConfig): UnionDefinition {
  let types: readonly TypeReference[] | undefined;
  return {
    kind: "Union",
    name: config.name,
    description: config.description,
    resolveTypeFactory: config.resolveTypeFactory,
    get types(): readonly TypeReference[] {
      return (types ??= resolveThunk(config.types));
    },
  };
}

export interface DirectiveConfig {
  readonly name: string;
  readonly description?: string;
  readonly locations: readonly DirectiveLocation[];
  readonly arguments?: readonly ArgumentDefinition[];
  readonly isRepeatable?: boolean;
}

export function defineDirective(config: DirectiveConfig): DirectiveDefinition {
  return { ...config, arguments: config.arguments ?? [] };
}
