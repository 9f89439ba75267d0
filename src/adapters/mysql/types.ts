/**
 * MySQL Adapter - Zod Schemas
 *
 * Row schemas for the SHOW statements the adapter issues. Servers differ in
 * column names and value types across releases; preprocessing folds those
 * differences into one shape per statement.
 */

import { z } from "zod";

// =============================================================================
// Preprocess Utilities
// =============================================================================

/**
 * Preprocess SHOW TABLE STATUS rows:
 * - Alias: Type → Engine (servers before 4.1)
 */
function preprocessTableStatusRow(input: unknown): unknown {
  if (typeof input !== "object" || input === null) return input;
  const result: Record<string, unknown> = { ...input };
  if (result["Engine"] === undefined && result["Type"] !== undefined) {
    result["Engine"] = result["Type"];
  }
  return result;
}

const RawValue = z.union([z.string(), z.number(), z.bigint(), z.null()]);

/**
 * Raw value as text; NULL becomes the empty string
 */
const TextValue = RawValue.transform((value) =>
  value === null ? "" : String(value),
);

// =============================================================================
// Row Schemas
// =============================================================================

/**
 * SHOW GLOBAL VARIABLES / SHOW GLOBAL STATUS
 */
export const NameValueRowSchema = z.object({
  Variable_name: z.string(),
  Value: TextValue,
});

/**
 * SHOW ENGINES
 */
export const EngineRowSchema = z.object({
  Engine: z.string(),
  Support: z.string(),
});

/**
 * SHOW DATABASES
 */
export const DatabaseRowSchema = z.object({
  Database: z.string(),
});

/**
 * SHOW TABLE STATUS; views carry a NULL engine and data length
 */
export const TableStatusRowSchema = z.preprocess(
  preprocessTableStatusRow,
  z.object({
    Name: z.string(),
    Engine: z.string().nullish(),
    Data_length: z
      .union([z.string(), z.number(), z.bigint(), z.null()])
      .optional(),
  }),
);

export type NameValueRow = z.infer<typeof NameValueRowSchema>;
export type TableStatusRow = z.infer<typeof TableStatusRowSchema>;
