import {
  GraphQLList,
  GraphQLNonNull,
  isNullableType,
  type GraphQLType,
} from "graphql";

export interface TypeModifiers {
  /** Wrap the inner type in a list. */
  readonly list: boolean;
  /** Leave the (possibly list-wrapped) type nullable. */
  readonly optional: boolean;
}

/**
 * Apply list then non-null wrapping to an already resolved inner type.
 *
 * | list  | optional | result        |
 * |-------|----------|---------------|
 * | false | false    | `T!`          |
 * | false | true     | `T`           |
 * | true  | false    | `[T]!`        |
 * | true  | true     | `[T]`         |
 */
export function composeModifiers(
  inner: GraphQLType,
  modifiers: TypeModifiers,
): GraphQLType {
  const type = modifiers.list ? new GraphQLList(inner) : inner;
  if (modifiers.optional || !isNullableType(type)) {
    return type;
  }
  return new GraphQLNonNull(type);
}
