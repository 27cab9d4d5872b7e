import { describe, it, expect } from "vitest";
import pino from "pino";
import {
  DirectiveLocation,
  GraphQLInt,
  GraphQLString,
  getNullableType,
  isNonNullType,
} from "graphql";
import { readDefaultValue, NULL_DEFAULT, valueDefault } from "../../definitions/default-value";
import {
  defineArgument,
  defineDirective,
  defineEnum,
  defineField,
  defineInputType,
  defineInterface,
  defineObjectType,
  defineUnion,
  ref,
} from "../../definitions/factory";
import type { TypeDefinition, TypeReference } from "../../definitions/types";
import {
  InternalConsistencyError,
  InvalidTypePositionError,
  SchemaConversionError,
  TypeNameConflictError,
  UnrecognizedTypeKindError,
  WrongKindForBuilderError,
} from "../../errors";
import { DateScalar } from "../../scalars/custom";
import { TypeConverter } from "../converter";
import { TypeCache } from "../type-cache";

// ─── Fixtures ────────────────────────────────────────────────────────

const point = defineObjectType({
  name: "Point",
  description: "A point on a plane",
  fields: [
    defineField({ name: "x", type: ref.scalar("Int") }),
    defineField({ name: "y", type: ref.scalar("Int") }),
  ],
});

const color = defineEnum({
  name: "Color",
  values: ["RED", { name: "GREEN", value: 2, deprecationReason: "Use RED" }],
});

const filter: TypeDefinition = defineInputType({
  name: "Filter",
  fields: () => [
    defineField({ name: "limit", type: ref.optional(ref.scalar("Int")), defaultValue: valueDefault(10) }),
    defineField({ name: "cursor", type: ref.optional(ref.scalar("String")), defaultValue: NULL_DEFAULT }),
    defineField({ name: "term", type: ref.optional(ref.scalar("String")) }),
    defineField({ name: "and", type: ref.optional(ref.input(filter)) }),
  ],
});

const node = defineInterface({
  name: "Node",
  fields: [defineField({ name: "id", type: ref.scalar("ID") })],
});

const resource = defineInterface({
  name: "Resource",
  interfaces: [node],
  fields: [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "url", type: ref.scalar("String") }),
  ],
});

const file = defineObjectType({
  name: "File",
  interfaces: [resource, node],
  fields: [
    defineField({ name: "id", type: ref.scalar("ID") }),
    defineField({ name: "url", type: ref.scalar("String") }),
  ],
});

// ─── Tests ───────────────────────────────────────────────────────────

describe("TypeConverter object types", () => {
  it("builds Point with two non-null Int fields and one cache entry", () => {
    const converter = new TypeConverter();
    const pointType = converter.fromObjectType(point);
    const fields = pointType.getFields();

    expect(pointType.name).toBe("Point");
    expect(pointType.description).toBe("A point on a plane");
    expect(Object.keys(fields)).toEqual(["x", "y"]);
    for (const field of Object.values(fields)) {
      expect(isNonNullType(field.type)).toBe(true);
      expect(getNullableType(field.type)).toBe(GraphQLInt);
    }
    expect(converter.cache.names()).toEqual(["Point"]);
    expect(converter.cache.get("Point")?.implementation).toBe(pointType);
  });

  it("defers field construction until fields are requested", () => {
    const broken = defineObjectType({
      name: "Broken",
      fields: [defineField({ name: "", type: ref.scalar("Int") })],
    });
    const converter = new TypeConverter();

    const brokenType = converter.fromObjectType(broken);
    expect(converter.cache.get("Broken")?.implementation).toBe(brokenType);
    expect(() => brokenType.getFields()).toThrow(InternalConsistencyError);
  });

  it("builds mutually referencing types", () => {
    const a: TypeDefinition = defineObjectType({
      name: "A",
      fields: () => [defineField({ name: "b", type: ref.object(b) })],
    });
    const b: TypeDefinition = defineObjectType({
      name: "B",
      fields: () => [defineField({ name: "a", type: ref.optional(ref.object(a)) })],
    });

    const converter = new TypeConverter();
    const aType = converter.fromObjectType(a);
    expect(converter.cache.names()).toEqual(["A"]);

    const bType = getNullableType(aType.getFields().b.type);
    expect(bType).toBe(converter.fromObjectType(b));
    expect(converter.fromObjectType(b).getFields().a.type).toBe(aType);
  });

  it("builds a type whose field refers to itself", () => {
    const category: TypeDefinition = defineObjectType({
      name: "Category",
      fields: () => [
        defineField({ name: "parent", type: ref.optional(ref.object(category)) }),
        defineField({ name: "children", type: ref.list(ref.object(category)) }),
      ],
    });
    const converter = new TypeConverter();
    const categoryType = converter.fromObjectType(category);

    expect(categoryType.getFields().parent.type).toBe(categoryType);
    expect(String(categoryType.getFields().children.type)).toBe("[Category!]!");
  });

  it("wires implemented interfaces, including interfaces of interfaces", () => {
    const converter = new TypeConverter();
    const fileType = converter.fromObjectType(file);
    const [resourceType, nodeType] = fileType.getInterfaces();

    expect(resourceType).toBe(converter.fromInterface(resource));
    expect(nodeType).toBe(converter.fromInterface(node));
    expect(converter.fromInterface(resource).getInterfaces()).toEqual([nodeType]);
    expect(Object.keys(converter.fromInterface(resource).getFields())).toEqual(["id", "url"]);
  });

  it("passes field arguments with their defaults", () => {
    const query = defineObjectType({
      name: "Query",
      fields: [
        defineField({
          name: "points",
          type: ref.list(ref.object(point)),
          description: "All points",
          deprecationReason: "Use shapes",
          arguments: [
            defineArgument({ name: "first", type: ref.optional(ref.scalar("Int")), defaultValue: valueDefault(10) }),
            defineArgument({ name: "after", type: ref.optional(ref.scalar("String")), defaultValue: NULL_DEFAULT }),
            defineArgument({ name: "color", type: ref.optional(ref.enum(color)), description: "Filter by color" }),
          ],
        }),
      ],
    });
    const converter = new TypeConverter();
    const field = converter.fromObjectType(query).getFields().points;
    const [first, after, colorArg] = field.args;

    expect(field.description).toBe("All points");
    expect(field.deprecationReason).toBe("Use shapes");
    expect(field.args.map((arg) => arg.name)).toEqual(["first", "after", "color"]);
    expect(first.type).toBe(GraphQLInt);
    expect(readDefaultValue(first.defaultValue)).toEqual({ kind: "Value", value: 10 });
    expect(readDefaultValue(after.defaultValue)).toEqual({ kind: "Null" });
    expect(readDefaultValue(colorArg.defaultValue)).toEqual({ kind: "NotProvided" });
    expect(colorArg.description).toBe("Filter by color");
    expect(colorArg.type).toBe(converter.fromEnum(color));
  });
});

describe("TypeConverter input types", () => {
  it("keeps the three default states apart on input fields", () => {
    const converter = new TypeConverter();
    const fields = converter.fromInputObjectType(filter).getFields();

    expect(fields.limit.defaultValue).toBe(10);
    expect(fields.cursor.defaultValue).toBeNull();
    expect(fields.term.defaultValue).toBeUndefined();
    expect(readDefaultValue(fields.cursor.defaultValue)).not.toEqual(
      readDefaultValue(fields.term.defaultValue),
    );
  });

  it("supports an input type referring to itself through a nullable field", () => {
    const converter = new TypeConverter();
    const filterType = converter.fromInputObjectType(filter);
    expect(filterType.getFields().and.type).toBe(filterType);
  });
});

describe("TypeConverter enums and scalars", () => {
  it("builds ordered enum values", () => {
    const converter = new TypeConverter();
    const colorType = converter.fromEnum(color);

    expect(colorType.getValues().map((v) => v.name)).toEqual(["RED", "GREEN"]);
    expect(colorType.getValue("RED")?.value).toBe("RED");
    expect(colorType.getValue("GREEN")?.value).toBe(2);
    expect(colorType.getValue("GREEN")?.deprecationReason).toBe("Use RED");
  });

  it("maps built-in markers to graphql-js scalars without caching them", () => {
    const converter = new TypeConverter();
    expect(converter.fromScalar("String")).toBe(GraphQLString);
    expect(converter.cache.size).toBe(0);
  });
});

describe("TypeConverter identity", () => {
  const shape = defineUnion({ name: "Shape", types: [ref.object(point)] });
  const references: Array<[string, TypeReference]> = [
    ["object", ref.object(point)],
    ["input", ref.input(filter)],
    ["interface", ref.interface(node)],
    ["enum", ref.enum(color)],
    ["scalar", ref.scalar(DateScalar)],
    ["union", ref.union(shape)],
  ];

  for (const [kind, reference] of references) {
    it(`returns the same ${kind} instance through different reference paths`, () => {
      const converter = new TypeConverter();
      const direct = converter.fromNamedReference(reference);
      const viaOptional = converter.fromTypeReference(ref.optional(reference));
      const viaList = converter.fromTypeReference(
        ref.optional(ref.list(ref.optional(reference))),
      );

      expect(viaOptional).toBe(direct);
      expect(viaList).not.toBe(direct);
      expect(String(viaList)).toBe(`[${String(direct)}]`);
      expect(converter.cache.get(String(direct))?.implementation).toBe(direct);
    });
  }

  it("shares instances between converters that share a cache", () => {
    const cache = new TypeCache();
    const first = new TypeConverter({ cache });
    const second = new TypeConverter({ cache });
    expect(second.fromEnum(color)).toBe(first.fromEnum(color));
  });

  it("keeps independent converters independent", () => {
    expect(new TypeConverter().fromEnum(color)).not.toBe(new TypeConverter().fromEnum(color));
  });

  it("refuses a second kind under a taken name", () => {
    const converter = new TypeConverter();
    converter.fromEnum(defineEnum({ name: "Point", values: ["A"] }));
    expect(() => converter.fromObjectType(point)).toThrow(TypeNameConflictError);
  });
});

describe("TypeConverter errors", () => {
  it("rejects a definition of the wrong kind", () => {
    const converter = new TypeConverter();
    expect(() => converter.fromInputObjectType(point)).toThrow(WrongKindForBuilderError);
    expect(() => converter.fromTypeReference({ kind: "Object", definition: filter })).toThrow(
      'The type "Filter" is defined as "Input" but was passed where "Object" is expected.',
    );
    expect(() => converter.fromInterface(file)).toThrow(WrongKindForBuilderError);
  });

  it("rejects an unknown reference tag", () => {
    const converter = new TypeConverter();
    const reference: TypeReference = JSON.parse('{ "kind": "Tuple" }');

    expect(() => converter.fromTypeReference(reference)).toThrow(UnrecognizedTypeKindError);
    expect(() => converter.fromTypeReference(reference)).toThrow('Unexpected type reference kind "Tuple".');
  });

  it("rejects a missing argument name", () => {
    const query = defineObjectType({
      name: "Query",
      fields: [
        defineField({
          name: "points",
          type: ref.scalar("Int"),
          arguments: [defineArgument({ name: "", type: ref.scalar("Int") })],
        }),
      ],
    });
    const converter = new TypeConverter();
    expect(() => converter.fromObjectType(query).getFields()).toThrow(
      'Missing name for an argument of field "Query.points".',
    );
  });

  it("rejects an input type in an output position and vice versa", () => {
    const converter = new TypeConverter();
    const wrongField = defineObjectType({
      name: "Query",
      fields: [defineField({ name: "filter", type: ref.input(filter) })],
    });
    const wrongArgument = defineObjectType({
      name: "Mutation",
      fields: [
        defineField({
          name: "move",
          type: ref.scalar("Boolean"),
          arguments: [defineArgument({ name: "to", type: ref.object(point) })],
        }),
      ],
    });

    expect(() => converter.fromObjectType(wrongField).getFields()).toThrow(
      'Field "Query.filter" expects an output type, but "Filter!" is not one.',
    );
    expect(() => converter.fromObjectType(wrongArgument).getFields()).toThrow(
      InvalidTypePositionError,
    );
  });

  it("every error carries its code", () => {
    const converter = new TypeConverter();
    try {
      converter.fromInputObjectType(point);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaConversionError);
      expect(error instanceof SchemaConversionError && error.code).toBe("WRONG_KIND_FOR_BUILDER");
    }
  });
});

describe("TypeConverter directives", () => {
  it("builds a directive descriptor with arguments", () => {
    const converter = new TypeConverter();
    const cached = defineDirective({
      name: "cached",
      description: "Cache the field",
      locations: [DirectiveLocation.FIELD_DEFINITION, DirectiveLocation.OBJECT],
      arguments: [
        defineArgument({ name: "ttl", type: ref.optional(ref.scalar("Int")), defaultValue: valueDefault(60) }),
      ],
      isRepeatable: true,
    });

    const directive = converter.fromDirective(cached);
    expect(directive.name).toBe("cached");
    expect(directive.description).toBe("Cache the field");
    expect(directive.locations).toEqual(["FIELD_DEFINITION", "OBJECT"]);
    expect(directive.isRepeatable).toBe(true);
    expect(directive.args.map((arg) => [arg.name, arg.defaultValue])).toEqual([["ttl", 60]]);
    expect(converter.fromDirective(cached)).not.toBe(directive);
    expect(converter.cache.size).toBe(0);
  });
});

describe("TypeConverter logging", () => {
  it("records registrations on the supplied pino logger", () => {
    const lines: string[] = [];
    const destination = {
      write(line: string) {
        lines.push(line);
      },
    };
    const logger = pino({ level: "debug" }, destination);

    new TypeConverter({ logger }).fromObjectType(point);

    const records = lines.map((line) => JSON.parse(line));
    expect(records).toContainEqual(
      expect.objectContaining({
        name: "type-converter",
        msg: "registered type",
        type: "Point",
        kind: "Object",
      }),
    );
  });
});
