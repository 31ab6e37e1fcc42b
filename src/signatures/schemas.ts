/**
 * Zod schemas for signing options and field placement.
 *
 * Digest algorithm names are not validated here: an unknown one is an
 * `UnsupportedAlgorithmError`, not an invalid argument.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Scalars
// ─────────────────────────────────────────────────────────────────────────────

export const UnitSchema = z.enum(["pt", "mm", "cm", "in"]);

/**
 * Reserved container size in bytes.
 */
export const EstimatedLengthSchema = z.number().int().positive();

/**
 * DocMDP permission level (`/P` of the transform parameters).
 */
export const CertificationLevelSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

// ─────────────────────────────────────────────────────────────────────────────
// Manager Settings
// ─────────────────────────────────────────────────────────────────────────────

export const ManagerSettingsSchema = z.object({
  unit: UnitSchema.default("pt"),
  estimatedLength: EstimatedLengthSchema.default(8192),
});
export type ManagerSettings = z.infer<typeof ManagerSettingsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Field Placement
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Arguments of `addSignatureField`, in the configured unit.
 */
export const FieldPlacementSchema = z.object({
  name: z.string().min(1, "Field name must not be empty"),
  page: z.number().int(),
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite().nonnegative(),
  height: z.number().finite().nonnegative(),
});
export type FieldPlacement = z.infer<typeof FieldPlacementSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Signature Metadata
// ─────────────────────────────────────────────────────────────────────────────

export const PrepareOptionsSchema = z.object({
  name: z.string().optional(),
  reason: z.string().optional(),
  location: z.string().optional(),
  contactInfo: z.string().optional(),
  certificationLevel: CertificationLevelSchema.optional(),
  signingTime: z.date().optional(),
});
export type ParsedPrepareOptions = z.infer<typeof PrepareOptionsSchema>;

/**
 * Parse `value`, turning zod's failure into an `InvalidArgumentError`
 * whose issues read `path: message`.
 */
export function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );

    throw new InvalidArgumentError(`Invalid ${what}: ${issues.join("; ")}`, issues);
  }

  return result.data;
}
