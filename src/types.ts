import type * as z from "zod";

import type {
  PackOptionsSchema,
  PrettifyOptionsSchema,
  UnpackOptionsSchema,
} from "./shared/config.js";

export interface Logger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

/**
 * Options accepted by unpackPackage, before defaults are applied
 */
export type UnpackOptions = z.input<typeof UnpackOptionsSchema> & {
  logger?: Logger;
};

export type ResolvedUnpackOptions = z.output<typeof UnpackOptionsSchema>;

/**
 * Options accepted by packTree, before defaults are applied
 */
export type PackOptions = z.input<typeof PackOptionsSchema> & {
  logger?: Logger;
};

export type ResolvedPackOptions = z.output<typeof PackOptionsSchema>;

export type PrettifyOptions = z.input<typeof PrettifyOptionsSchema> & {
  /** Path reported in parse errors */
  source?: string;
};

export interface UnpackResult {
  /** Directory the package was exploded into */
  outputDir: string;
  /** Member paths written, in archive order */
  members: string[];
  /** Tree-relative paths of the files rewritten by the pretty-print pass */
  prettified: string[];
}

export interface PackResult {
  /** Package file that was written */
  outputPath: string;
  /** Member paths stored, in archive order */
  members: string[];
}
