import { GraphQLSchema, specifiedDirectives, type GraphQLObjectType } from "graphql";
import { TypeGraphBuilder } from "./converter/type-graph";
import type {
  DirectiveDefinition,
  TypeDefinition,
  TypeReference,
} from "./definitions/types";
import type { ConverterOptions } from "./options";

export interface SchemaConfig {
  readonly query: TypeDefinition;
  readonly mutation?: TypeDefinition;
  readonly subscription?: TypeDefinition;
  /** Types that no root reaches but the schema must still contain, e.g. interface implementations. */
  readonly types?: readonly TypeReference[];
  readonly directives?: readonly DirectiveDefinition[];
  readonly description?: string;
}

/**
 * Convert the definitions of a schema and hand them to graphql-js.
 *
 * All root types, extra types and directives go through one converter, so
 * every name maps to a single concrete type. Every type in the cache is
 * passed to the schema; the specified directives (`@skip`, `@include`, …)
 * are kept.
 */
export function createSchema(
  config: SchemaConfig,
  options: ConverterOptions = {},
): GraphQLSchema {
  const builder = new TypeGraphBuilder(options);
  const converter = builder.converter;

  const operationRoots = [config.query, config.mutation, config.subscription].filter(
    (root): root is TypeDefinition => root !== undefined,
  );
  const directives = config.directives ?? [];

  builder.build(
    [
      ...operationRoots.map((root): TypeReference => ({ kind: "Object", definition: root })),
      ...(config.types ?? []),
    ],
    directives,
  );

  const rootType = (root: TypeDefinition | undefined): GraphQLObjectType | undefined =>
    root === undefined ? undefined : converter.fromObjectType(root);

  return new GraphQLSchema({
    description: config.description,
    query: converter.fromObjectType(config.query),
    mutation: rootType(config.mutation),
    subscription: rootType(config.subscription),
    types: builder.cache.implementations(),
    directives: [
      ...specifiedDirectives,
      ...directives.map((directive) => converter.fromDirective(directive)),
    ],
  });
}
