import { existsSync, readdirSync, rmSync, statSync } from "fs";
import { basename, dirname, join, resolve } from "path";

import type { DeflateLevel } from "../shared/config.js";
import { EXPLODED_TREE_SUFFIX } from "../shared/constants.js";
import {
  describeError,
  PathNotFoundError,
  TreeReadError,
} from "../shared/errors.js";
import { getLogger } from "../shared/log.js";
import type { Logger } from "../types.js";
import { formatFailure, runBatch } from "./batch.js";
import { packTree } from "./pack.js";

export interface DopptxOptions {
  /** An exploded tree, or a directory holding exploded trees */
  path: string;
  /** Remove each tree once its package has been written */
  deleteOriginal?: boolean;
  level?: DeflateLevel;
  /** Keep going after a tree fails instead of stopping the batch */
  continueOnError?: boolean;
  logger?: Logger;
}

export function isExplodedTree(path: string): boolean {
  return basename(resolve(path)).endsWith(EXPLODED_TREE_SUFFIX);
}

/**
 * Immediate subdirectories named `*_pptx`, in name order
 */
export function findExplodedTrees(directory: string): string[] {
  return readdirSync(directory, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isDirectory() && entry.name.endsWith(EXPLODED_TREE_SUFFIX),
    )
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
}

/**
 * The tree itself when its name ends in `_pptx`, otherwise the trees inside it
 *
 * @throws TreeReadError if the path is not a directory or cannot be listed
 */
function findTrees(target: string): string[] {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(target).isDirectory();
  } catch (error) {
    throw new TreeReadError(target, describeError(error));
  }
  if (!isDirectory) {
    throw new TreeReadError(target, "not a directory");
  }

  if (isExplodedTree(target)) {
    return [target];
  }
  try {
    return findExplodedTrees(target);
  } catch (error) {
    throw new TreeReadError(target, describeError(error));
  }
}

/**
 * Rebuild a package from an exploded tree, or from every exploded tree
 * directly inside a directory
 */
export function runDopptx(options: DopptxOptions): boolean {
  const logger = options.logger ?? getLogger();
  const target = resolve(options.path);

  if (!existsSync(target)) {
    logger.error(`ERROR: ${formatFailure(new PathNotFoundError(target))}`);
    return false;
  }

  let trees: string[];
  try {
    trees = findTrees(target);
  } catch (error) {
    logger.error(`ERROR: ${formatFailure(error)}`);
    return false;
  }

  if (trees.length === 0) {
    logger.warn(`No *${EXPLODED_TREE_SUFFIX} directories found in ${target}`);
    return true;
  }

  return runBatch(
    trees,
    (treePath) => {
      const { outputPath, members } = packTree(dirname(treePath), treePath, {
        level: options.level,
        logger,
      });
      logger.log(
        `Packed ${treePath} -> ${outputPath} (${members.length} files)`,
      );

      if (options.deleteOriginal) {
        try {
          rmSync(treePath, { recursive: true, force: true });
        } catch (error) {
          throw new TreeReadError(
            treePath,
            `package written but tree not deleted: ${describeError(error)}`,
          );
        }
        logger.log(`Deleted ${treePath}`);
      }
    },
    { continueOnError: options.continueOnError, logger },
  );
}
