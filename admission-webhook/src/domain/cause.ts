export type CauseType = "FieldValueNotFound" | "FieldValueInvalid";

export interface Cause {
  readonly type: CauseType;
  readonly message: string;
  readonly field: string;
}

export function notFoundCause(message: string, field: string): Cause {
  return { type: "FieldValueNotFound", message, field };
}

export function invalidCause(message: string, field: string): Cause {
  return { type: "FieldValueInvalid", message, field };
}

export function fieldPath(...segments: readonly string[]): string {
  return segments.join(".");
}
