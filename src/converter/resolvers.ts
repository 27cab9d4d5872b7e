import { defaultFieldResolver, type GraphQLFieldResolver } from "graphql";
import type { FieldDefinition } from "../definitions/types";

export interface FieldResolvers {
  readonly resolve?: GraphQLFieldResolver<unknown, unknown>;
  readonly subscribe?: GraphQLFieldResolver<unknown, unknown>;
}

/** Hands every event of a subscription through unchanged. */
export const passThroughEvent: GraphQLFieldResolver<unknown, unknown> = (event) =>
  event;

/** Read `propertyName` from the source value, the way graphql-js reads a field by its own name. */
export function propertyResolver(
  propertyName: string,
): GraphQLFieldResolver<unknown, unknown> {
  return (source, args, context, info) =>
    defaultFieldResolver(source, args, context, { ...info, fieldName: propertyName });
}

/** The resolver a field runs when it does not subscribe. `undefined` leaves graphql-js's default in place. */
export function resolverOf(
  field: FieldDefinition,
): GraphQLFieldResolver<unknown, unknown> | undefined {
  if (field.resolver) return field.resolver;
  if (field.propertyName !== undefined && field.propertyName !== field.name) {
    return propertyResolver(field.propertyName);
  }
  return undefined;
}

/**
 * Subscription fields subscribe with the field's own resolver and resolve
 * each produced event to itself.
 */
export function fieldResolversOf(field: FieldDefinition): FieldResolvers {
  const resolver = resolverOf(field);
  if (field.isSubscription) {
    return { resolve: passThroughEvent, subscribe: resolver };
  }
  return { resolve: resolver };
}
