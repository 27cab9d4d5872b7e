export type SchemaConversionErrorCode =
  | "UNRECOGNIZED_TYPE_KIND"
  | "WRONG_KIND_FOR_BUILDER"
  | "UNALLOWED_RETURN_TYPE_FOR_UNION"
  | "WRONG_RETURN_TYPE_FOR_UNION"
  | "INTERNAL_CONSISTENCY"
  | "TYPE_NAME_CONFLICT"
  | "INVALID_TYPE_POSITION";

/** Base class of every error raised while converting definitions. */
export class SchemaConversionError extends Error {
  constructor(
    readonly code: SchemaConversionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A type reference carries a variant tag the dispatcher does not know. */
export class UnrecognizedTypeKindError extends SchemaConversionError {
  constructor(readonly kindTag: string) {
    super("UNRECOGNIZED_TYPE_KIND", `Unexpected type reference kind "${kindTag}".`);
  }
}

export class WrongKindForBuilderError extends SchemaConversionError {
  constructor(
    readonly typeName: string,
    readonly expectedKind: string,
    readonly actualKind: string,
  ) {
    super(
      "WRONG_KIND_FOR_BUILDER",
      `The type "${typeName}" is defined as "${actualKind}" but was passed where "${expectedKind}" is expected.`,
    );
  }
}

export class UnallowedReturnTypeForUnionError extends SchemaConversionError {
  constructor(
    readonly unionName: string,
    readonly memberType: string,
  ) {
    super(
      "UNALLOWED_RETURN_TYPE_FOR_UNION",
      `The union "${unionName}" can only contain object types, but "${memberType}" was given.`,
    );
  }
}

/** Raised at execution time; graphql-js reports it in the errors of the response. */
export class WrongReturnTypeForUnionError extends SchemaConversionError {
  constructor(
    readonly fieldName: string,
    readonly unionName: string,
    readonly returnType: string,
  ) {
    super(
      "WRONG_RETURN_TYPE_FOR_UNION",
      `The value of type "${returnType}" returned by field "${fieldName}" is not a member of union "${unionName}".`,
    );
  }
}

export class InternalConsistencyError extends SchemaConversionError {
  constructor(message: string) {
    super("INTERNAL_CONSISTENCY", message);
  }
}

export class TypeNameConflictError extends SchemaConversionError {
  constructor(
    readonly typeName: string,
    readonly registeredType: string,
    readonly requestedType: string,
  ) {
    super(
      "TYPE_NAME_CONFLICT",
      `The named type "${typeName}" is registered as "${registeredType}" and cannot also be "${requestedType}".` +
        `\nHowever, there must be only one type named "${typeName}".`,
    );
  }
}

export class InvalidTypePositionError extends SchemaConversionError {
  constructor(
    readonly typeString: string,
    readonly position: "input" | "output",
    readonly location: string,
  ) {
    super(
      "INVALID_TYPE_POSITION",
      `${location} expects an ${position} type, but "${typeString}" is not one.`,
    );
  }
}
