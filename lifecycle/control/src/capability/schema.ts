// capability/schema.ts - TypeBox schemas for capability and requirement declarations
// Declarations arrive from platform templates, platforms.toml sections and test
// registrations. They are checked here (Value.Check) before the model builds
// its normalized dimension maps.

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "@testyard/contracts";

// =============================================================================
// Capability Declarations
// =============================================================================

// number -> point range, {min,max} -> interval, string[] -> set,
// boolean -> flag, string -> enum
export const CapabilityValueSchema = Type.Union([
  Type.Number(),
  Type.Object(
    { min: Type.Number(), max: Type.Number() },
    { additionalProperties: false }
  ),
  Type.Array(Type.String()),
  Type.Boolean(),
  Type.String(),
]);

export const CapabilityDeclarationSchema = Type.Record(Type.String(), CapabilityValueSchema);
export type CapabilityDeclaration = Static<typeof CapabilityDeclarationSchema>;

// =============================================================================
// Requirement Declarations
// =============================================================================

// number -> minimum bound, {min?,max?} -> bounds, string[] -> required subset,
// boolean -> required flag, string -> single allowed enum value,
// {oneOf} -> allowed enum values
export const RequirementValueSchema = Type.Union([
  Type.Number(),
  Type.Object(
    { min: Type.Optional(Type.Number()), max: Type.Optional(Type.Number()) },
    { additionalProperties: false }
  ),
  Type.Array(Type.String()),
  Type.Boolean(),
  Type.String(),
  Type.Object(
    { oneOf: Type.Array(Type.String(), { minItems: 1 }) },
    { additionalProperties: false }
  ),
]);

export const RequirementDeclarationSchema = Type.Record(Type.String(), RequirementValueSchema);
export type RequirementDeclaration = Static<typeof RequirementDeclarationSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface SchemaValidationError {
  path: string;
  message: string;
  value: unknown;
}

export function checkDeclaration(schema: TSchema, input: unknown): SchemaValidationError[] | null {
  if (Value.Check(schema, input)) return null;
  return [...Value.Errors(schema, input)].map((e) => ({
    path: e.path,
    message: e.message,
    value: e.value,
  }));
}

/** Return the input typed by the schema, or throw a ValidationError naming the first offending path. */
export function assertDeclaration<T extends TSchema>(schema: T, input: unknown, what: string): Static<T> {
  if (Value.Check(schema, input)) return input;
  const errors = checkDeclaration(schema, input) ?? [];
  const first = errors[0];
  throw new ValidationError(
    `Invalid ${what}: ${first ? `${first.path || "/"} ${first.message}` : "schema mismatch"}`,
    { details: { errors } }
  );
}
