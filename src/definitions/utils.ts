import type {
  NamedDefinition,
  NamedTypeReference,
  TypeDefinition,
  TypeReference,
} from "./types";

/**
 * Strip `List` and `Optional` wrappers and return the innermost reference.
 * e.g. `[Post!]` → `Post`
 */
export function namedReferenceOf(ref: TypeReference): NamedTypeReference {
  if (ref.kind === "List" || ref.kind === "Optional") {
    return namedReferenceOf(ref.ofType);
  }
  return ref;
}

/** Peel every `Optional` wrapper off the outside of a reference. */
export function unwrapOptional(ref: TypeReference): TypeReference {
  return ref.kind === "Optional" ? unwrapOptional(ref.ofType) : ref;
}

/** Name of the type a named reference points to. */
export function referenceName(ref: NamedTypeReference): string {
  if (ref.kind === "Scalar") {
    return typeof ref.scalar === "string" ? ref.scalar : ref.scalar.name;
  }
  return ref.definition.name;
}

/**
 * Render a reference in SDL notation, e.g. `[Int]!` for a required list of
 * optional integers.
 */
export function printTypeReference(ref: TypeReference): string {
  if (ref.kind === "Optional") {
    const inner = printTypeReference(ref.ofType);
    return inner.endsWith("!") ? inner.slice(0, -1) : inner;
  }
  if (ref.kind === "List") {
    return `[${printTypeReference(ref.ofType)}]!`;
  }
  return `${referenceName(ref)}!`;
}

export function isCompositeDefinition(
  definition: NamedDefinition,
): definition is TypeDefinition {
  return (
    definition.kind === "Object" ||
    definition.kind === "Input" ||
    definition.kind === "Interface"
  );
}
