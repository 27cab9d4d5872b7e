import {
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLID,
  GraphQLInt,
  GraphQLScalarType,
  GraphQLString,
  isScalarType,
} from "graphql";
import type { TypeCache } from "../converter/type-cache";
import type { ScalarDefinition, ScalarMarker } from "../definitions/types";
import { UnrecognizedTypeKindError } from "../errors";
import { createSilentLogger, type Logger } from "../logger";

/** Turns a scalar marker into a concrete scalar type. */
export interface ScalarRegistry {
  resolve(marker: ScalarMarker, cache: TypeCache): GraphQLScalarType;
}

const BUILTIN_SCALARS: ReadonlyMap<string, GraphQLScalarType> = new Map<string, GraphQLScalarType>([
  ["String", GraphQLString],
  ["Int", GraphQLInt],
  ["Float", GraphQLFloat],
  ["Boolean", GraphQLBoolean],
  ["ID", GraphQLID],
]);

export function isBuiltinScalarName(name: string): boolean {
  return BUILTIN_SCALARS.has(name);
}

/**
 * Built-in markers map to the graphql-js primitives, which are never put in
 * the cache. Custom scalars are built once per name and cached.
 */
export class DefaultScalarRegistry implements ScalarRegistry {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger();
  }

  resolve(marker: ScalarMarker, cache: TypeCache): GraphQLScalarType {
    if (typeof marker === "string") {
      const builtin = BUILTIN_SCALARS.get(marker);
      if (!builtin) {
        throw new UnrecognizedTypeKindError(`Scalar(${marker})`);
      }
      return builtin;
    }

    const cached = cache.lookup(marker.name, isScalarType, "GraphQLScalarType");
    if (cached) {
      this.logger.trace({ type: marker.name }, "custom scalar cache hit");
      return cached;
    }

    const scalar = createScalarType(marker);
    cache.put(marker.name, marker, scalar);
    this.logger.debug({ type: marker.name, kind: "Scalar" }, "registered type");
    return scalar;
  }
}

export function createScalarType(definition: ScalarDefinition): GraphQLScalarType {
  return new GraphQLScalarType({
    name: definition.name,
    description: definition.description,
    specifiedByURL: definition.specifiedByURL,
    serialize: definition.serialize,
    parseValue: definition.parseValue,
    parseLiteral: definition.parseLiteral,
  });
}
