import * as z from "zod";

import { DEFAULT_COMPRESSION_LEVEL, DEFAULT_INDENT } from "./constants.js";

const IndentSchema = z
  .string()
  .regex(/^[ \t]*$/, "indent may only contain spaces and tabs")
  .default(DEFAULT_INDENT);

export const PrettifyOptionsSchema = z.object({
  indent: IndentSchema,
});

export const UnpackOptionsSchema = z.object({
  /** Rewrite .xml and .rels members with indented layout */
  pretty: z.boolean().default(false),
  /** Remove a previous tree at the output location before extracting */
  clean: z.boolean().default(false),
  indent: IndentSchema,
});

const DEFLATE_LEVELS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

/**
 * Deflate level; 0 (store only) is not accepted
 */
export type DeflateLevel = (typeof DEFLATE_LEVELS)[number];

export const DeflateLevelSchema = z.custom<DeflateLevel>(
  (value) => DEFLATE_LEVELS.some((level) => level === value),
  { message: "level must be an integer from 1 to 9" },
);

export const PackOptionsSchema = z.object({
  level: DeflateLevelSchema.default(DEFAULT_COMPRESSION_LEVEL),
});

/**
 * Indentation string for a `--indent <n>` style count of spaces
 */
export const IndentWidthSchema = z.coerce
  .number()
  .int()
  .min(0)
  .max(8)
  .transform((width) => " ".repeat(width));

export const CompressionLevelSchema = z.coerce.number().pipe(DeflateLevelSchema);

/**
 * Render zod issues as a single diagnostic line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
