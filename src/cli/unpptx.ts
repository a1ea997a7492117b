import { existsSync, readdirSync, statSync } from "fs";
import { dirname, join, resolve } from "path";

import {
  PACKAGE_EXTENSION,
  TEMP_FILE_PREFIX,
} from "../shared/constants.js";
import {
  describeError,
  PackageReadError,
  PathNotFoundError,
} from "../shared/errors.js";
import { getLogger } from "../shared/log.js";
import type { Logger } from "../types.js";
import { formatFailure, runBatch } from "./batch.js";
import { unpackPackage } from "./unpack.js";

export interface UnpptxOptions {
  /** A package, or a directory holding packages */
  path: string;
  pretty?: boolean;
  clean?: boolean;
  indent?: string;
  /** Keep going after a package fails instead of stopping the batch */
  continueOnError?: boolean;
  logger?: Logger;
}

/**
 * Packages a directory batch covers: its `*.pptx` files, minus editor lock
 * files, in name order
 */
export function findPackages(directory: string): string[] {
  return readdirSync(directory, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.endsWith(PACKAGE_EXTENSION) &&
        !entry.name.startsWith(TEMP_FILE_PREFIX),
    )
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
}

interface UnpptxInputs {
  packages: string[];
  destination: string;
}

/**
 * Packages to explode for a path, and where their trees go
 *
 * @throws PackageReadError if the path is neither a file nor a directory, or
 * cannot be listed
 */
function findInputs(target: string): UnpptxInputs {
  try {
    const stats = statSync(target);
    if (stats.isFile()) {
      return { packages: [target], destination: dirname(target) };
    }
    if (stats.isDirectory()) {
      return { packages: findPackages(target), destination: target };
    }
  } catch (error) {
    throw new PackageReadError(target, describeError(error));
  }
  throw new PackageReadError(target, "not a file or directory");
}

/**
 * Explode a package next to itself, or every package in a directory
 */
export function runUnpptx(options: UnpptxOptions): boolean {
  const logger = options.logger ?? getLogger();
  const target = resolve(options.path);

  if (!existsSync(target)) {
    logger.error(`ERROR: ${formatFailure(new PathNotFoundError(target))}`);
    return false;
  }

  let inputs: UnpptxInputs;
  try {
    inputs = findInputs(target);
  } catch (error) {
    logger.error(`ERROR: ${formatFailure(error)}`);
    return false;
  }
  const { packages, destination } = inputs;

  if (packages.length === 0) {
    logger.warn(`No ${PACKAGE_EXTENSION} files found in ${target}`);
    return true;
  }

  return runBatch(
    packages,
    (packagePath) => {
      const { outputDir, members, prettified } = unpackPackage(
        destination,
        packagePath,
        {
          pretty: options.pretty,
          clean: options.clean,
          indent: options.indent,
          logger,
        },
      );
      const note = options.pretty ? `, ${prettified.length} prettified` : "";
      logger.log(
        `Unpacked ${packagePath} -> ${outputDir} (${members.length} files${note})`,
      );
    },
    { continueOnError: options.continueOnError, logger },
  );
}
