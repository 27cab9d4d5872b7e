import { GraphQLError, Kind, print, type ValueNode } from "graphql";
import { defineScalar } from "../definitions/factory";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d{1,9})?)?$/;
const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function stringLiteral(scalarName: string, node: ValueNode): string {
  if (node.kind !== Kind.STRING) {
    throw new GraphQLError(
      `${scalarName} cannot represent a non-string value: ${print(node)}`,
      { nodes: node },
    );
  }
  return node.value;
}

function expectString(scalarName: string, value: unknown): string {
  if (typeof value !== "string") {
    throw new GraphQLError(
      `${scalarName} cannot represent a non-string value: ${String(value)}`,
    );
  }
  return value;
}

// ─── Date ────────────────────────────────────────────────────────────

function parseDate(value: unknown): Date {
  const text = expectString("Date", value);
  const date = new Date(`${text}T00:00:00.000Z`);
  if (!DATE_PATTERN.test(text) || Number.isNaN(date.getTime())) {
    throw new GraphQLError(`Date cannot represent an invalid date string: ${text}`);
  }
  return date;
}

/** Calendar date, `YYYY-MM-DD`, parsed to a `Date` at UTC midnight. */
export const DateScalar = defineScalar({
  name: "Date",
  description: "Date (isoformat)",
  serialize(value) {
    if (value instanceof Date) return value.toISOString().slice(0, 10);
    return parseDate(value).toISOString().slice(0, 10);
  },
  parseValue: parseDate,
  parseLiteral: (node) => parseDate(stringLiteral("Date", node)),
});

// ─── DateTime ────────────────────────────────────────────────────────

function parseDateTime(value: unknown): Date {
  const text = expectString("DateTime", value);
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new GraphQLError(
      `DateTime cannot represent an invalid date-time string: ${text}`,
    );
  }
  return date;
}

/** ISO-8601 timestamp, parsed to a `Date`. */
export const DateTimeScalar = defineScalar({
  name: "DateTime",
  description: "Date with time (isoformat)",
  serialize(value) {
    if (value instanceof Date) return value.toISOString();
    return parseDateTime(value).toISOString();
  },
  parseValue: parseDateTime,
  parseLiteral: (node) => parseDateTime(stringLiteral("DateTime", node)),
});

// ─── Time ────────────────────────────────────────────────────────────

function parseTime(value: unknown): string {
  const text = expectString("Time", value);
  if (!TIME_PATTERN.test(text)) {
    throw new GraphQLError(`Time cannot represent an invalid time string: ${text}`);
  }
  return text;
}

/** Time of day, `HH:MM[:SS[.fff]]`, kept as a string. */
export const TimeScalar = defineScalar({
  name: "Time",
  description: "Time (isoformat)",
  serialize: parseTime,
  parseValue: parseTime,
  parseLiteral: (node) => parseTime(stringLiteral("Time", node)),
});

// ─── UUID ────────────────────────────────────────────────────────────

function parseUUID(value: unknown): string {
  const text = expectString("UUID", value);
  if (!UUID_PATTERN.test(text)) {
    throw new GraphQLError(`UUID cannot represent an invalid UUID string: ${text}`);
  }
  return text.toLowerCase();
}

export const UUIDScalar = defineScalar({
  name: "UUID",
  serialize: parseUUID,
  parseValue: parseUUID,
  parseLiteral: (node) => parseUUID(stringLiteral("UUID", node)),
});
