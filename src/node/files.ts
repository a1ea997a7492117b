import { readdirSync, statSync } from "fs";
import { isAbsolute, join, relative, resolve, sep } from "path";

import { MARKUP_EXTENSIONS } from "../shared/constants.js";
import { getLogger } from "../shared/log.js";
import type { Logger } from "../types.js";

/**
 * List the regular files under a directory as forward-slash paths relative to
 * it. The walk is depth-first and each directory's entries are visited in
 * code-unit order, so the result does not depend on the host's readdir order.
 */
export function walkFiles(root: string, logger: Logger = getLogger()): string[] {
  const files: string[] = [];

  const visit = (dir: string, prefix: string) => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relativePath = prefix + entry.name;

      if (entry.isDirectory()) {
        visit(fullPath, `${relativePath}/`);
      } else if (entry.isFile()) {
        files.push(relativePath);
      } else if (entry.isSymbolicLink() && isRegularFile(fullPath)) {
        files.push(relativePath);
      } else {
        logger.warn(`Skipping ${fullPath}: not a regular file`);
      }
    }
  };

  visit(root, "");
  return files;
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Whether a file is rewritten by the pretty-print pass
 */
export function isMarkupFile(relativePath: string): boolean {
  return MARKUP_EXTENSIONS.some((extension) =>
    relativePath.endsWith(extension),
  );
}

/**
 * Resolve an archive member path under a root directory, or return undefined
 * when it would land outside of it. A directory entry naming the root itself
 * (`./`) resolves to the root.
 */
export function resolveInside(
  root: string,
  memberPath: string,
): string | undefined {
  if (isAbsolute(memberPath) || /^[a-zA-Z]:/.test(memberPath)) {
    return undefined;
  }

  const target = resolve(root, memberPath);
  const rel = relative(root, target);

  if (rel === "") {
    return memberPath.endsWith("/") ? target : undefined;
  }
  if (
    rel === ".." ||
    rel.startsWith(`..${sep}`) ||
    isAbsolute(rel)
  ) {
    return undefined;
  }

  return target;
}
