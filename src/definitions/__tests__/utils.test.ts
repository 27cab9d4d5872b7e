import { describe, it, expect } from "vitest";
import { DateScalar } from "../../scalars/custom";
import { defineEnum, defineField, defineObjectType, defineUnion, ref } from "../factory";
import {
  isCompositeDefinition,
  namedReferenceOf,
  printTypeReference,
  referenceName,
  unwrapOptional,
} from "../utils";

const point = defineObjectType({ name: "Point", fields: [] });

describe("printTypeReference", () => {
  it("prints required references with a bang", () => {
    expect(printTypeReference(ref.object(point))).toBe("Point!");
    expect(printTypeReference(ref.scalar("Int"))).toBe("Int!");
  });

  it("drops the bang for optional references", () => {
    expect(printTypeReference(ref.optional(ref.object(point)))).toBe("Point");
  });

  it("prints the four list compositions", () => {
    const int = ref.scalar("Int");
    expect(printTypeReference(ref.list(int))).toBe("[Int!]!");
    expect(printTypeReference(ref.list(ref.optional(int)))).toBe("[Int]!");
    expect(printTypeReference(ref.optional(ref.list(int)))).toBe("[Int!]");
    expect(printTypeReference(ref.optional(ref.list(ref.optional(int))))).toBe("[Int]");
  });

  it("uses the name of custom scalars", () => {
    expect(printTypeReference(ref.scalar(DateScalar))).toBe("Date!");
  });
});

describe("reference helpers", () => {
  it("namedReferenceOf strips every wrapper", () => {
    const inner = ref.object(point);
    expect(namedReferenceOf(ref.optional(ref.list(ref.optional(inner))))).toBe(inner);
  });

  it("unwrapOptional stops at the first list", () => {
    const list = ref.list(ref.optional(ref.object(point)));
    expect(unwrapOptional(ref.optional(ref.optional(list)))).toBe(list);
  });

  it("referenceName reads enum and union names", () => {
    const color = defineEnum({ name: "Color", values: ["RED"] });
    const shape = defineUnion({ name: "Shape", types: [ref.object(point)] });
    expect(referenceName({ kind: "Enum", definition: color })).toBe("Color");
    expect(referenceName({ kind: "Union", definition: shape })).toBe("Shape");
  });

  it("isCompositeDefinition separates composite from leaf definitions", () => {
    expect(isCompositeDefinition(point)).toBe(true);
    expect(isCompositeDefinition(defineEnum({ name: "Color", values: [] }))).toBe(false);
  });
});

describe("definition factory", () => {
  it("evaluates field thunks once, on first access", () => {
    let calls = 0;
    const lazy = defineObjectType({
      name: "Lazy",
      fields: () => {
        calls++;
        return [defineField({ name: "id", type: ref.scalar("ID") })];
      },
    });
    expect(calls).toBe(0);
    expect(lazy.fields.map((f) => f.name)).toEqual(["id"]);
    expect(lazy.fields).toBe(lazy.fields);
    expect(calls).toBe(1);
  });

  it("fills field defaults", () => {
    const field = defineField({ name: "x", type: ref.scalar("Int") });
    expect(field.arguments).toEqual([]);
    expect(field.defaultValue).toEqual({ kind: "NotProvided" });
    expect(field.isSubscription).toBe(false);
  });

  it("turns bare enum value names into name/value pairs", () => {
    const color = defineEnum({
      name: "Color",
      values: ["RED", { name: "GREEN", value: 2 }],
    });
    expect(color.values).toEqual([
      { name: "RED", value: "RED" },
      { name: "GREEN", value: 2 },
    ]);
  });
});
