import {
  GraphQLDirective,
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLList,
  GraphQLObjectType,
  GraphQLUnionType,
  isEnumType,
  isInputObjectType,
  isInputType,
  isInterfaceType,
  isObjectType,
  isOutputType,
  isUnionType,
  type GraphQLArgumentConfig,
  type GraphQLEnumValueConfigMap,
  type GraphQLFieldConfig,
  type GraphQLFieldConfigArgumentMap,
  type GraphQLFieldConfigMap,
  type GraphQLInputFieldConfig,
  type GraphQLInputFieldConfigMap,
  type GraphQLInputType,
  type GraphQLNullableType,
  type GraphQLOutputType,
  type GraphQLScalarType,
  type GraphQLType,
} from "graphql";
import { toGraphQLDefaultValue } from "../definitions/default-value";
import type {
  ArgumentDefinition,
  CompositeKind,
  DirectiveDefinition,
  EnumDefinition,
  FieldDefinition,
  ScalarMarker,
  TypeDefinition,
  TypeReference,
  UnionDefinition,
} from "../definitions/types";
import { printTypeReference, unwrapOptional } from "../definitions/utils";
import {
  InternalConsistencyError,
  InvalidTypePositionError,
  UnallowedReturnTypeForUnionError,
  UnrecognizedTypeKindError,
  WrongKindForBuilderError,
} from "../errors";
import { childLogger, createSilentLogger, type Logger } from "../logger";
import type { ConverterOptions } from "../options";
import { DefaultScalarRegistry, type ScalarRegistry } from "../scalars/registry";
import { composeModifiers } from "./modifiers";
import { fieldResolversOf } from "./resolvers";
import { TypeCache } from "./type-cache";
import { createUnionTypeResolver } from "./union-resolver";

// ─── Helpers ─────────────────────────────────────────────────────────

function requireName(name: string | undefined, owner: string): string {
  if (name === undefined || name.length === 0) {
    throw new InternalConsistencyError(`Missing name for ${owner}.`);
  }
  return name;
}

function assertKind(definition: TypeDefinition, expected: CompositeKind): void {
  if (definition.kind !== expected) {
    throw new WrongKindForBuilderError(definition.name, expected, definition.kind);
  }
}

function kindTagOf(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return String(value);
}

// ─── TypeConverter ───────────────────────────────────────────────────

/**
 * Converts definitions into graphql-js types.
 *
 * Every named type goes through the {@link TypeCache}: a type is put in the
 * cache right after construction, and its fields and interfaces are thunks
 * that graphql-js evaluates on the first `getFields()` / `getInterfaces()`.
 * That order lets types reference each other in any direction.
 */
export class TypeConverter {
  readonly cache: TypeCache;
  private readonly scalarRegistry: ScalarRegistry;
  private readonly logger: Logger;

  constructor(options: ConverterOptions = {}) {
    const logger = options.logger ?? createSilentLogger();
    this.cache = options.cache ?? new TypeCache();
    this.logger = childLogger(logger, "type-converter");
    this.scalarRegistry =
      options.scalarRegistry ??
      new DefaultScalarRegistry(childLogger(logger, "scalar-registry"));
  }

  // ─── Dispatcher ─────────────────────────────────────────────────────

  /** Resolve a reference, then wrap it in List and NonNull as the reference asks. */
  fromTypeReference(ref: TypeReference): GraphQLType {
    const optional = ref.kind === "Optional";
    const base = unwrapOptional(ref);
    if (base.kind === "List") {
      return composeModifiers(this.fromTypeReference(base.ofType), {
        list: true,
        optional,
      });
    }
    return composeModifiers(this.fromNamedReference(base), {
      list: false,
      optional,
    });
  }

  /** Field types: object, interface, union, enum, scalar or lists of those. */
  fromOutputTypeReference(ref: TypeReference, location: string): GraphQLOutputType {
    const type = this.fromTypeReference(ref);
    if (!isOutputType(type)) {
      throw new InvalidTypePositionError(String(type), "output", location);
    }
    return type;
  }

  /** Argument and input field types: input object, enum, scalar or lists of those. */
  fromInputTypeReference(ref: TypeReference, location: string): GraphQLInputType {
    const type = this.fromTypeReference(ref);
    if (!isInputType(type)) {
      throw new InvalidTypePositionError(String(type), "input", location);
    }
    return type;
  }

  /** Resolve a reference without adding the outer NonNull. */
  fromNamedReference(ref: TypeReference): GraphQLNullableType {
    switch (ref.kind) {
      case "Object":
        return this.fromObjectType(ref.definition);
      case "Input":
        return this.fromInputObjectType(ref.definition);
      case "Interface":
        return this.fromInterface(ref.definition);
      case "Enum":
        return this.fromEnum(ref.definition);
      case "Scalar":
        return this.fromScalar(ref.scalar);
      case "Union":
        return this.fromUnion(ref.definition);
      case "List":
        return new GraphQLList(this.fromTypeReference(ref.ofType));
      case "Optional":
        return this.fromNamedReference(ref.ofType);
      default: {
        const unknownRef: never = ref;
        throw new UnrecognizedTypeKindError(kindTagOf(unknownRef));
      }
    }
  }

  // ─── Composite builders ─────────────────────────────────────────────

  fromObjectType(definition: TypeDefinition): GraphQLObjectType {
    assertKind(definition, "Object");
    const name = requireName(definition.name, "object type definition");

    const cached = this.cache.lookup(name, isObjectType, "GraphQLObjectType");
    if (cached) {
      this.logger.trace({ type: name }, "type cache hit");
      return cached;
    }

    const origin = definition.origin;
    const objectType = new GraphQLObjectType<unknown, unknown>({
      name,
      description: definition.description,
      fields: () => this.fromFields(definition),
      interfaces: () => definition.interfaces.map((i) => this.fromInterface(i)),
      isTypeOf: origin ? (value) => value instanceof origin : undefined,
    });

    this.cache.put(name, definition, objectType);
    this.logger.debug({ type: name, kind: "Object" }, "registered type");
    return objectType;
  }

  /**
   * Input fields are deferred like object fields, so input types may refer to
   * each other through nullable fields.
   */
  fromInputObjectType(definition: TypeDefinition): GraphQLInputObjectType {
    assertKind(definition, "Input");
    const name = requireName(definition.name, "input type definition");

    const cached = this.cache.lookup(name, isInputObjectType, "GraphQLInputObjectType");
    if (cached) {
      this.logger.trace({ type: name }, "type cache hit");
      return cached;
    }

    const inputType = new GraphQLInputObjectType({
      name,
      description: definition.description,
      fields: () => this.fromInputFields(definition),
    });

    this.cache.put(name, definition, inputType);
    this.logger.debug({ type: name, kind: "Input" }, "registered type");
    return inputType;
  }

  fromInterface(definition: TypeDefinition): GraphQLInterfaceType {
    assertKind(definition, "Interface");
    const name = requireName(definition.name, "interface definition");

    const cached = this.cache.lookup(name, isInterfaceType, "GraphQLInterfaceType");
    if (cached) {
      this.logger.trace({ type: name }, "type cache hit");
      return cached;
    }

    const interfaceType = new GraphQLInterfaceType({
      name,
      description: definition.description,
      fields: () => this.fromFields(definition),
      interfaces: () => definition.interfaces.map((i) => this.fromInterface(i)),
    });

    this.cache.put(name, definition, interfaceType);
    this.logger.debug({ type: name, kind: "Interface" }, "registered type");
    return interfaceType;
  }

  // ─── Leaf builders ──────────────────────────────────────────────────

  fromEnum(definition: EnumDefinition): GraphQLEnumType {
    const name = requireName(definition.name, "enum definition");

    const cached = this.cache.lookup(name, isEnumType, "GraphQLEnumType");
    if (cached) {
      this.logger.trace({ type: name }, "type cache hit");
      return cached;
    }

    const values: GraphQLEnumValueConfigMap = {};
    for (const value of definition.values) {
      values[requireName(value.name, `a value of enum "${name}"`)] = {
        value: value.value,
        description: value.description,
        deprecationReason: value.deprecationReason,
      };
    }

    const enumType = new GraphQLEnumType({
      name,
      description: definition.description,
      values,
    });

    this.cache.put(name, definition, enumType);
    this.logger.debug({ type: name, kind: "Enum" }, "registered type");
    return enumType;
  }

  fromScalar(marker: ScalarMarker): GraphQLScalarType {
    return this.scalarRegistry.resolve(marker, this.cache);
  }

  // ─── Union builder ──────────────────────────────────────────────────

  /** Members are resolved right away; only object types are accepted. */
  fromUnion(definition: UnionDefinition): GraphQLUnionType {
    const name = requireName(definition.name, "union definition");

    const cached = this.cache.lookup(name, isUnionType, "GraphQLUnionType");
    if (cached) {
      this.logger.trace({ type: name }, "type cache hit");
      return cached;
    }

    const types = definition.types.map((member) => this.fromUnionMember(name, member));
    const resolveTypeFactory =
      definition.resolveTypeFactory ?? createUnionTypeResolver(definition);

    const unionType = new GraphQLUnionType({
      name,
      description: definition.description,
      types,
      resolveType: resolveTypeFactory(this.cache),
    });

    this.cache.put(name, definition, unionType);
    this.logger.debug(
      { type: name, kind: "Union", members: types.map((t) => t.name) },
      "registered type",
    );
    return unionType;
  }

  private fromUnionMember(unionName: string, member: TypeReference): GraphQLObjectType {
    // Anything but an object reference is rejected before it is resolved, so a
    // union listing itself cannot recurse.
    const unwrapped = unwrapOptional(member);
    if (unwrapped.kind !== "Object" || unwrapped.definition.kind !== "Object") {
      throw new UnallowedReturnTypeForUnionError(unionName, printTypeReference(member));
    }
    return this.fromObjectType(unwrapped.definition);
  }

  // ─── Fields & arguments ─────────────────────────────────────────────

  fromFields(definition: TypeDefinition): GraphQLFieldConfigMap<unknown, unknown> {
    const fields: GraphQLFieldConfigMap<unknown, unknown> = {};
    for (const field of definition.fields) {
      const name = requireName(field.name, `a field of type "${definition.name}"`);
      fields[name] = this.fromField(field, `${definition.name}.${name}`);
    }
    return fields;
  }

  fromField(
    field: FieldDefinition,
    location: string = field.name,
  ): GraphQLFieldConfig<unknown, unknown> {
    const { resolve, subscribe } = fieldResolversOf(field);
    return {
      type: this.fromOutputTypeReference(field.type, `Field "${location}"`),
      args: this.fromArguments(field.arguments, `field "${location}"`),
      resolve,
      subscribe,
      description: field.description,
      deprecationReason: field.deprecationReason,
    };
  }

  fromArguments(
    args: readonly ArgumentDefinition[],
    owner: string,
  ): GraphQLFieldConfigArgumentMap {
    const result: GraphQLFieldConfigArgumentMap = {};
    for (const argument of args) {
      const name = requireName(argument.name, `an argument of ${owner}`);
      result[name] = this.fromArgument(argument, `Argument "${name}" of ${owner}`);
    }
    return result;
  }

  fromArgument(
    argument: ArgumentDefinition,
    location: string = `Argument "${argument.name}"`,
  ): GraphQLArgumentConfig {
    return {
      type: this.fromInputTypeReference(argument.type, location),
      defaultValue: toGraphQLDefaultValue(argument.defaultValue),
      description: argument.description,
      deprecationReason: argument.deprecationReason,
    };
  }

  fromInputFields(definition: TypeDefinition): GraphQLInputFieldConfigMap {
    const fields: GraphQLInputFieldConfigMap = {};
    for (const field of definition.fields) {
      const name = requireName(field.name, `a field of input type "${definition.name}"`);
      fields[name] = this.fromInputField(field, `${definition.name}.${name}`);
    }
    return fields;
  }

  fromInputField(
    field: FieldDefinition,
    location: string = field.name,
  ): GraphQLInputFieldConfig {
    return {
      type: this.fromInputTypeReference(field.type, `Input field "${location}"`),
      defaultValue: toGraphQLDefaultValue(field.defaultValue),
      description: field.description,
      deprecationReason: field.deprecationReason,
    };
  }

  // ─── Directives ─────────────────────────────────────────────────────

  /** Directives are not cached; each call builds a new descriptor. */
  fromDirective(directive: DirectiveDefinition): GraphQLDirective {
    const name = requireName(directive.name, "directive definition");
    return new GraphQLDirective({
      name,
      description: directive.description,
      locations: directive.locations,
      args: this.fromArguments(directive.arguments, `directive "@${name}"`),
      isRepeatable: directive.isRepeatable ?? false,
    });
  }
}
