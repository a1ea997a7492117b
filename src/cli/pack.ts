import { type Zippable, zipSync } from "fflate";
import { mkdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { basename, dirname, join, resolve } from "path";

import { walkFiles } from "../node/files.js";
import { PackOptionsSchema } from "../shared/config.js";
import {
  EXPLODED_TREE_SUFFIX,
  PACKAGE_EXTENSION,
} from "../shared/constants.js";
import {
  describeError,
  PackageWriteError,
  TreeReadError,
} from "../shared/errors.js";
import { getLogger } from "../shared/log.js";
import type { PackOptions, PackResult } from "../types.js";

// DOS timestamps in zip headers cover 1980 through 2099
const EARLIEST_ZIP_DATE = new Date(1980, 0, 1);
const LATEST_ZIP_DATE = new Date(2099, 11, 31, 23, 59, 58);

/**
 * Package a tree is rebuilt into: `<parent>/<name>.pptx` for `<name>_pptx`
 */
export function getPackagePath(parent: string, treePath: string): string {
  const treeName = basename(resolve(treePath));
  const deckName = treeName.endsWith(EXPLODED_TREE_SUFFIX)
    ? treeName.slice(0, -EXPLODED_TREE_SUFFIX.length)
    : treeName;

  return join(resolve(parent), `${deckName}${PACKAGE_EXTENSION}`);
}

/**
 * Rebuild a package from an exploded tree.
 *
 * Every regular file under the tree becomes a deflated member named by its
 * forward-slash path relative to the tree; directories are never stored.
 * Members follow walk order (see walkFiles). Any existing package at the
 * target path is replaced; a missing parent directory is created.
 *
 * @throws TreeReadError if the tree is missing or not a directory
 * @throws PackageWriteError if the package cannot be written
 */
export function packTree(
  parent: string,
  treePath: string,
  options: PackOptions = {},
): PackResult {
  const { logger = getLogger(), ...rest } = options;
  const { level } = PackOptionsSchema.parse(rest);

  const root = resolve(treePath);
  assertTree(root);

  let members: string[];
  const zippable: Zippable = {};
  try {
    members = walkFiles(root, logger);
    for (const member of members) {
      const filePath = join(root, member);
      zippable[member] = [
        readFileSync(filePath),
        { level, mtime: clampZipDate(statSync(filePath).mtime) },
      ];
    }
  } catch (error) {
    throw new TreeReadError(root, describeError(error));
  }

  const outputPath = getPackagePath(parent, root);
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, zipSync(zippable, { level }));
  } catch (error) {
    throw new PackageWriteError(outputPath, describeError(error));
  }

  return { outputPath, members };
}

function assertTree(root: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(root).isDirectory();
  } catch (error) {
    throw new TreeReadError(root, describeError(error));
  }

  if (!isDirectory) {
    throw new TreeReadError(root, "not a directory");
  }
}

export function clampZipDate(date: Date): Date {
  if (date < EARLIEST_ZIP_DATE) return EARLIEST_ZIP_DATE;
  if (date > LATEST_ZIP_DATE) return LATEST_ZIP_DATE;
  return date;
}
