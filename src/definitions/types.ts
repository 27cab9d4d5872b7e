import type {
  DirectiveLocation,
  GraphQLFieldResolver,
  GraphQLScalarLiteralParser,
  GraphQLScalarSerializer,
  GraphQLScalarValueParser,
  GraphQLTypeResolver,
} from "graphql";
import type { TypeCache } from "../converter/type-cache";
import type { DefaultValue } from "./default-value";

// ─── Type references ─────────────────────────────────────────────────

/**
 * Closed variant describing where a field or argument points to.
 *
 * `List` and `Optional` wrap another reference; every other variant names a
 * definition (or a scalar marker) directly.
 */
export type TypeReference =
  | { readonly kind: "Object"; readonly definition: TypeDefinition }
  | { readonly kind: "Input"; readonly definition: TypeDefinition }
  | { readonly kind: "Interface"; readonly definition: TypeDefinition }
  | { readonly kind: "Enum"; readonly definition: EnumDefinition }
  | { readonly kind: "Scalar"; readonly scalar: ScalarMarker }
  | { readonly kind: "Union"; readonly definition: UnionDefinition }
  | { readonly kind: "List"; readonly ofType: TypeReference }
  | { readonly kind: "Optional"; readonly ofType: TypeReference };

export type TypeReferenceKind = TypeReference["kind"];

/** A reference that is neither `List` nor `Optional`. */
export type NamedTypeReference = Exclude<
  TypeReference,
  { readonly kind: "List" | "Optional" }
>;

// ─── Composite types ─────────────────────────────────────────────────

export type CompositeKind = "Object" | "Input" | "Interface";

/** Class whose instances represent values of an object type at run time. */
export type TypeOrigin = abstract new (...args: never[]) => unknown;

export interface TypeDefinition {
  readonly kind: CompositeKind;
  readonly name: string;
  readonly description?: string;
  readonly origin?: TypeOrigin;
  readonly fields: readonly FieldDefinition[];
  readonly interfaces: readonly TypeDefinition[];
}

export interface FieldDefinition {
  readonly name: string;
  readonly description?: string;
  readonly type: TypeReference;
  readonly arguments: readonly ArgumentDefinition[];
  /** Only meaningful for fields of input types. */
  readonly defaultValue: DefaultValue;
  readonly deprecationReason?: string;
  readonly isSubscription: boolean;
  readonly resolver?: GraphQLFieldResolver<unknown, unknown>;
  /** Property read from the source value when no resolver is given. */
  readonly propertyName?: string;
}

export interface ArgumentDefinition {
  readonly name: string;
  readonly description?: string;
  readonly type: TypeReference;
  readonly defaultValue: DefaultValue;
  readonly deprecationReason?: string;
}

// ─── Leaf types ──────────────────────────────────────────────────────

export interface EnumValueDefinition {
  readonly name: string;
  readonly value: unknown;
  readonly description?: string;
  readonly deprecationReason?: string;
}

export interface EnumDefinition {
  readonly kind: "Enum";
  readonly name: string;
  readonly description?: string;
  readonly values: readonly EnumValueDefinition[];
}

export type BuiltinScalarName = "String" | "Int" | "Float" | "Boolean" | "ID";

export interface ScalarDefinition {
  readonly kind: "Scalar";
  readonly name: string;
  readonly description?: string;
  readonly specifiedByURL?: string;
  readonly serialize?: GraphQLScalarSerializer<unknown>;
  readonly parseValue?: GraphQLScalarValueParser<unknown>;
  readonly parseLiteral?: GraphQLScalarLiteralParser<unknown>;
}

/** Either a built-in scalar name or a custom scalar definition. */
export type ScalarMarker = BuiltinScalarName | ScalarDefinition;

// ─── Unions & directives ─────────────────────────────────────────────

export type UnionTypeResolverFactory = (
  cache: TypeCache,
) => GraphQLTypeResolver<unknown, unknown>;

export interface UnionDefinition {
  readonly kind: "Union";
  readonly name: string;
  readonly description?: string;
  readonly types: readonly TypeReference[];
  /** Falls back to classification by `__typename` and member origins. */
  readonly resolveTypeFactory?: UnionTypeResolverFactory;
}

export interface DirectiveDefinition {
  readonly name: string;
  readonly description?: string;
  readonly locations: readonly DirectiveLocation[];
  readonly arguments: readonly ArgumentDefinition[];
  readonly isRepeatable?: boolean;
}

/** Every definition that owns a name in the type cache. */
export type NamedDefinition =
  | TypeDefinition
  | EnumDefinition
  | ScalarDefinition
  | UnionDefinition;
