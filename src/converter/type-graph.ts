import {
  isInputObjectType,
  isInterfaceType,
  isObjectType,
  isUnionType,
  type GraphQLNamedType,
  type GraphQLType,
} from "graphql";
import type {
  DirectiveDefinition,
  NamedDefinition,
  TypeReference,
} from "../definitions/types";
import {
  isCompositeDefinition,
  namedReferenceOf,
  referenceName,
} from "../definitions/utils";
import { childLogger, createSilentLogger, type Logger } from "../logger";
import type { ConverterOptions } from "../options";
import { TypeConverter } from "./converter";
import type { TypeCache } from "./type-cache";

export interface TypeGraph {
  readonly cache: TypeCache;
  /** Concrete types of the requested roots, in the order given. */
  readonly roots: readonly GraphQLType[];
}

/** Force the deferred parts of a concrete type. */
function populateType(type: GraphQLNamedType): void {
  if (isObjectType(type) || isInterfaceType(type)) {
    type.getInterfaces();
    type.getFields();
  } else if (isInputObjectType(type)) {
    type.getFields();
  } else if (isUnionType(type)) {
    type.getTypes();
  }
}

/**
 * Builds a whole type graph in two explicit phases.
 *
 * 1. `register` walks the definition graph from the roots and creates a
 *    skeleton (a cached type whose fields are still deferred) for every
 *    named type it reaches.
 * 2. `populate` materializes fields, interfaces and union members of every
 *    skeleton. Every name is already in the cache, so each lookup made here
 *    is a cache hit.
 *
 * A failure in either phase aborts `build`: no graph is returned and every
 * name the build added to the cache is removed again.
 */
export class TypeGraphBuilder {
  readonly converter: TypeConverter;
  private readonly logger: Logger;
  private readonly visited = new Set<string>();
  private readonly populated = new Set<string>();

  constructor(options: ConverterOptions = {}) {
    this.converter = new TypeConverter(options);
    this.logger = childLogger(options.logger ?? createSilentLogger(), "type-graph");
  }

  get cache(): TypeCache {
    return this.converter.cache;
  }

  build(
    roots: readonly TypeReference[],
    directives: readonly DirectiveDefinition[] = [],
  ): TypeGraph {
    const cachedBefore = new Set(this.cache.names());
    const visitedBefore = new Set(this.visited);
    try {
      for (const root of roots) {
        this.register(root);
      }
      for (const directive of directives) {
        for (const argument of directive.arguments) {
          this.register(argument.type);
        }
      }
      this.logger.debug({ types: this.cache.size }, "registered skeletons");

      const populatedCount = this.populate();
      this.logger.debug({ types: populatedCount }, "populated types");

      return {
        cache: this.cache,
        roots: roots.map((root) => this.converter.fromTypeReference(root)),
      };
    } catch (error) {
      this.rollback(cachedBefore, visitedBefore);
      throw error;
    }
  }

  /** Drop every name a failed build added, so no skeleton of it stays behind. */
  private rollback(cachedBefore: ReadonlySet<string>, visitedBefore: ReadonlySet<string>): void {
    const added = this.cache.names().filter((name) => !cachedBefore.has(name));
    for (const name of added) {
      this.cache.delete(name);
      this.populated.delete(name);
    }
    for (const name of [...this.visited]) {
      if (!visitedBefore.has(name)) this.visited.delete(name);
    }
    this.logger.debug({ types: added }, "rolled back failed build");
  }

  // ─── Phase 1 ────────────────────────────────────────────────────────

  /** Register a skeleton for `ref` and every named type reachable from it. */
  register(ref: TypeReference): void {
    const named = namedReferenceOf(ref);
    const name = referenceName(named);
    if (this.visited.has(name)) return;
    this.visited.add(name);

    this.converter.fromNamedReference(named);

    if (named.kind === "Scalar" || named.kind === "Enum") return;
    this.registerReachable(named.definition);
  }

  private registerReachable(definition: NamedDefinition): void {
    if (isCompositeDefinition(definition)) {
      for (const iface of definition.interfaces) {
        this.register({ kind: "Interface", definition: iface });
      }
      for (const field of definition.fields) {
        this.register(field.type);
        for (const argument of field.arguments) {
          this.register(argument.type);
        }
      }
    } else if (definition.kind === "Union") {
      for (const member of definition.types) {
        this.register(member);
      }
    }
  }

  // ─── Phase 2 ────────────────────────────────────────────────────────

  /**
   * Populate every registered type that is not populated yet. Returns the
   * number of types populated by this call.
   */
  populate(): number {
    let count = 0;
    let pending = this.pendingNames();
    while (pending.length !== 0) {
      for (const name of pending) {
        const entry = this.cache.get(name);
        if (entry) populateType(entry.implementation);
        this.populated.add(name);
        count++;
      }
      // Populating can only reach names phase 1 missed when definitions
      // changed between the phases; pick those up until nothing is left.
      pending = this.pendingNames();
    }
    return count;
  }

  private pendingNames(): string[] {
    return this.cache.names().filter((name) => !this.populated.has(name));
  }
}

/** Register and populate every type reachable from `roots`. */
export function buildTypeGraph(
  roots: readonly TypeReference[],
  options: ConverterOptions = {},
): TypeGraph {
  return new TypeGraphBuilder(options).build(roots);
}
