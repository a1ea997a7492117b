import { Command } from "commander";
import { readFileSync } from "fs";
import { join } from "path";
import * as z from "zod";

import {
  CompressionLevelSchema,
  formatIssues,
  IndentWidthSchema,
} from "../shared/config.js";
import { getLogger } from "../shared/log.js";
import type { Logger } from "../types.js";
import { runDopptx } from "./dopptx.js";
import { runUnpptx } from "./unpptx.js";

export interface ProgramOptions {
  logger?: Logger;
  /** Called with 1 when a command fails */
  exit?: (code: number) => void;
}

interface UnpptxCommandOptions {
  pretty: boolean;
  clean: boolean;
  indent: string;
  continueOnError: boolean;
}

interface DopptxCommandOptions {
  deleteOriginal: boolean;
  level: string;
  continueOnError: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(__dirname, "..", "..", "package.json");
  return PackageJsonSchema.parse(
    JSON.parse(readFileSync(packageJsonPath, "utf-8")),
  ).version;
}

export function createProgram({
  logger = getLogger(),
  exit = (code) => process.exit(code),
}: ProgramOptions = {}): Command {
  const program = new Command();

  const parseOption = <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    name: string,
    value: string,
  ): T | undefined => {
    const result = schema.safeParse(value);
    if (!result.success) {
      logger.error(
        `ERROR: InvalidOptions: ${name}: ${formatIssues(result.error)}`,
      );
      exit(1);
      return undefined;
    }
    return result.data;
  };

  program
    .name("pptx-tree")
    .description(
      "Explode .pptx presentations into plain file trees and rebuild them",
    )
    .version(getVersion());

  program
    .command("unpptx")
    .description(
      "Unpack a .pptx file, or every .pptx file in a directory, into <name>_pptx/",
    )
    .argument("<path>", "package file or directory of packages")
    .option("--pretty", "reformat .xml and .rels files with indentation", false)
    .option("--clean", "remove an existing <name>_pptx/ tree first", false)
    .option("--indent <n>", "spaces per indentation level for --pretty", "2")
    .option(
      "--continue-on-error",
      "keep going when a package in a directory fails",
      false,
    )
    .action((path: string, options: UnpptxCommandOptions) => {
      const indent = parseOption(IndentWidthSchema, "--indent", options.indent);
      if (indent === undefined) return;

      const ok = runUnpptx({
        path,
        pretty: options.pretty,
        clean: options.clean,
        indent,
        continueOnError: options.continueOnError,
        logger,
      });
      if (!ok) exit(1);
    });

  program
    .command("dopptx")
    .description(
      "Pack a <name>_pptx/ tree, or every *_pptx/ tree in a directory, into <name>.pptx",
    )
    .argument("<tree-path>", "exploded tree or directory of exploded trees")
    .option(
      "--delete-original",
      "delete each tree after its package is written",
      false,
    )
    .option("--level <n>", "deflate compression level (1-9)", "6")
    .option(
      "--continue-on-error",
      "keep going when a tree in a directory fails",
      false,
    )
    .action((treePath: string, options: DopptxCommandOptions) => {
      const level = parseOption(CompressionLevelSchema, "--level", options.level);
      if (level === undefined) return;

      const ok = runDopptx({
        path: treePath,
        deleteOriginal: options.deleteOriginal,
        level,
        continueOnError: options.continueOnError,
        logger,
      });
      if (!ok) exit(1);
    });

  return program;
}
