import type { GraphQLNamedType } from "graphql";
import type { NamedDefinition } from "../definitions/types";
import { TypeNameConflictError } from "../errors";
import { isBuiltinScalarName } from "../scalars/registry";

const BUILTIN_SCALAR_KIND = "built-in scalar";

export interface CacheEntry<T extends GraphQLNamedType = GraphQLNamedType> {
  readonly definition: NamedDefinition;
  readonly implementation: T;
}

/** Human-readable kind of a concrete type, used in conflict messages. */
export function concreteKindOf(type: GraphQLNamedType): string {
  return type.constructor.name;
}

/**
 * Name-indexed registry of concrete types.
 *
 * Holds at most one implementation per name, whatever its kind; a name is
 * registered as soon as its type is constructed, before its fields exist.
 * The built-in scalar names are always taken, though never stored.
 */
export class TypeCache {
  private readonly entryMap = new Map<string, CacheEntry>();

  get size(): number {
    return this.entryMap.size;
  }

  get(name: string): CacheEntry | undefined {
    return this.entryMap.get(name);
  }

  has(name: string): boolean {
    return this.entryMap.has(name);
  }

  /**
   * Look up `name` and return its implementation when it passes `guard`.
   * A name registered under another kind is a conflict.
   */
  lookup<T extends GraphQLNamedType>(
    name: string,
    guard: (type: GraphQLNamedType) => type is T,
    requestedKind: string,
  ): T | undefined {
    if (isBuiltinScalarName(name)) {
      throw new TypeNameConflictError(name, BUILTIN_SCALAR_KIND, requestedKind);
    }
    const entry = this.entryMap.get(name);
    if (!entry) return undefined;
    if (!guard(entry.implementation)) {
      throw new TypeNameConflictError(
        name,
        concreteKindOf(entry.implementation),
        requestedKind,
      );
    }
    return entry.implementation;
  }

  put<T extends GraphQLNamedType>(
    name: string,
    definition: NamedDefinition,
    implementation: T,
  ): CacheEntry<T> {
    if (isBuiltinScalarName(name)) {
      throw new TypeNameConflictError(name, BUILTIN_SCALAR_KIND, concreteKindOf(implementation));
    }
    const existing = this.entryMap.get(name);
    if (existing && existing.implementation !== implementation) {
      throw new TypeNameConflictError(
        name,
        concreteKindOf(existing.implementation),
        concreteKindOf(implementation),
      );
    }
    const entry: CacheEntry<T> = { definition, implementation };
    this.entryMap.set(name, entry);
    return entry;
  }

  /** Forget `name`. Used to roll back a failed build. */
  delete(name: string): boolean {
    return this.entryMap.delete(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.entryMap.keys()];
  }

  entries(): Iterable<[string, CacheEntry]> {
    return this.entryMap.entries();
  }

  implementations(): GraphQLNamedType[] {
    return [...this.entryMap.values()].map((entry) => entry.implementation);
  }
}
