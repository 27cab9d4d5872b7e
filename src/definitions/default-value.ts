/**
 * Default values of arguments and input fields.
 *
 * "No default" and "the default is null" are different things in GraphQL:
 * graphql-js models the former as `undefined` and the latter as `null`.
 */
export type DefaultValue =
  | { readonly kind: "NotProvided" }
  | { readonly kind: "Null" }
  | { readonly kind: "Value"; readonly value: unknown };

export const NOT_PROVIDED: DefaultValue = Object.freeze({ kind: "NotProvided" });

export const NULL_DEFAULT: DefaultValue = Object.freeze({ kind: "Null" });

export function valueDefault(value: unknown): DefaultValue {
  return { kind: "Value", value };
}

/** Translate into the `defaultValue` graphql-js expects on argument and input field configs. */
export function toGraphQLDefaultValue(defaultValue: DefaultValue): unknown {
  switch (defaultValue.kind) {
    case "NotProvided":
      return undefined;
    case "Null":
      return null;
    case "Value":
      return defaultValue.value;
  }
}

/** Inverse of {@link toGraphQLDefaultValue}, for reading back a built argument or input field. */
export function readDefaultValue(graphqlDefaultValue: unknown): DefaultValue {
  if (graphqlDefaultValue === undefined) return NOT_PROVIDED;
  if (graphqlDefaultValue === null) return NULL_DEFAULT;
  return valueDefault(graphqlDefaultValue);
}
