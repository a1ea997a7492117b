import { type Unzipped, unzipSync } from "fflate";
import {
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "fs";
import { dirname, join, parse, resolve } from "path";

import { isMarkupFile, resolveInside, walkFiles } from "../node/files.js";
import { UnpackOptionsSchema } from "../shared/config.js";
import { EXPLODED_TREE_SUFFIX } from "../shared/constants.js";
import {
  describeError,
  PackageReadError,
  PackageWriteError,
} from "../shared/errors.js";
import { getLogger } from "../shared/log.js";
import { prettifyXml } from "../shared/pretty-xml.js";
import type { UnpackOptions, UnpackResult } from "../types.js";

/**
 * Directory a package is exploded into: `<destination>/<name>_pptx`
 */
export function getExplodedTreePath(
  destination: string,
  packagePath: string,
): string {
  return join(
    resolve(destination),
    `${parse(packagePath).name}${EXPLODED_TREE_SUFFIX}`,
  );
}

/**
 * Explode a package into `<destination>/<name>_pptx/`, one file per member.
 *
 * Existing files at colliding paths are overwritten; with `clean` the previous
 * tree is removed first. With `pretty`, every `.xml` and `.rels` file in the
 * resulting tree is then reformatted. A malformed one stops that pass, leaving
 * the files already rewritten in place.
 *
 * @throws PackageReadError if the package is unreadable, not a zip archive, or
 * has a member that would land outside the output directory
 * @throws MarkupParseError if a markup file cannot be parsed during `pretty`
 */
export function unpackPackage(
  destination: string,
  packagePath: string,
  options: UnpackOptions = {},
): UnpackResult {
  const { logger = getLogger(), ...rest } = options;
  const { pretty, clean, indent } = UnpackOptionsSchema.parse(rest);

  const outputDir = getExplodedTreePath(destination, packagePath);
  const entries = readPackage(packagePath);

  // Check every member before touching the disk
  const targets = Object.keys(entries).map((name) => {
    const target = resolveInside(outputDir, name);
    if (!target) {
      throw new PackageReadError(packagePath, `unsafe member path "${name}"`);
    }
    return { name, target };
  });

  try {
    if (clean) {
      rmSync(outputDir, { recursive: true, force: true });
    }
    mkdirSync(outputDir, { recursive: true });

    for (const { name, target } of targets) {
      if (name.endsWith("/")) {
        mkdirSync(target, { recursive: true });
        continue;
      }
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, entries[name]);
    }
  } catch (error) {
    throw new PackageWriteError(outputDir, describeError(error));
  }

  const members = targets
    .map(({ name }) => name)
    .filter((name) => !name.endsWith("/"));

  const prettified: string[] = [];
  if (pretty) {
    for (const file of walkFiles(outputDir, logger).filter(isMarkupFile)) {
      const filePath = join(outputDir, file);
      const formatted = prettifyXml(readFileSync(filePath, "utf-8"), {
        indent,
        source: filePath,
      });
      writeFileSync(filePath, formatted, "utf-8");
      prettified.push(file);
    }
  }

  return { outputDir, members, prettified };
}

function readPackage(packagePath: string): Unzipped {
  let data: Buffer;
  try {
    data = readFileSync(packagePath);
  } catch (error) {
    throw new PackageReadError(packagePath, describeError(error));
  }

  try {
    return unzipSync(data);
  } catch (error) {
    throw new PackageReadError(packagePath, describeError(error));
  }
}
