import type { GraphQLTypeResolver } from "graphql";
import type {
  UnionDefinition,
  UnionTypeResolverFactory,
} from "../definitions/types";
import { unwrapOptional } from "../definitions/utils";
import { WrongReturnTypeForUnionError } from "../errors";
import type { TypeCache } from "./type-cache";

function typenameOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("__typename" in value)) {
    return undefined;
  }
  return typeof value.__typename === "string" ? value.__typename : undefined;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

function memberNamesOf(union: UnionDefinition): string[] {
  const names: string[] = [];
  for (const member of union.types) {
    const unwrapped = unwrapOptional(member);
    if (unwrapped.kind === "Object") names.push(unwrapped.definition.name);
  }
  return names;
}

/**
 * Default runtime classification for a union.
 *
 * A value is matched by its `__typename` first, then by `instanceof` against
 * the origin recorded with each member's cache entry.
 */
export function createUnionTypeResolver(
  union: UnionDefinition,
): UnionTypeResolverFactory {
  return (cache: TypeCache): GraphQLTypeResolver<unknown, unknown> => {
    const memberNames = memberNamesOf(union);

    return (value, _context, info) => {
      const typename = typenameOf(value);
      if (typename !== undefined && memberNames.includes(typename)) {
        return typename;
      }

      for (const name of memberNames) {
        const definition = cache.get(name)?.definition;
        if (
          definition?.kind === "Object" &&
          definition.origin !== undefined &&
          value instanceof definition.origin
        ) {
          return name;
        }
      }

      throw new WrongReturnTypeForUnionError(
        info.fieldName,
        union.name,
        describeValue(value),
      );
    };
  };
}
