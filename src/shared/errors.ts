/**
 * Error kinds raised while exploding or rebuilding a package.
 *
 * Every error carries a stable `code` and the path it concerns in `context`,
 * so the CLI can print `<ErrorKind>: <message>` without inspecting causes.
 */

export enum PptxTreeErrorCode {
  PATH_NOT_FOUND = "PATH_NOT_FOUND",
  PACKAGE_READ_FAILED = "PACKAGE_READ_FAILED",
  PACKAGE_WRITE_FAILED = "PACKAGE_WRITE_FAILED",
  MARKUP_PARSE_FAILED = "MARKUP_PARSE_FAILED",
  TREE_READ_FAILED = "TREE_READ_FAILED",
}

export class PptxTreeError extends Error {
  constructor(
    message: string,
    public readonly code: PptxTreeErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class PathNotFoundError extends PptxTreeError {
  constructor(path: string) {
    super(`Path not found: ${path}`, PptxTreeErrorCode.PATH_NOT_FOUND, {
      path,
    });
  }
}

export class PackageReadError extends PptxTreeError {
  constructor(packagePath: string, reason: string) {
    super(
      `Cannot read package ${packagePath}: ${reason}`,
      PptxTreeErrorCode.PACKAGE_READ_FAILED,
      { path: packagePath },
    );
  }
}

export class PackageWriteError extends PptxTreeError {
  constructor(path: string, reason: string) {
    super(
      `Cannot write ${path}: ${reason}`,
      PptxTreeErrorCode.PACKAGE_WRITE_FAILED,
      { path },
    );
  }
}

export class MarkupParseError extends PptxTreeError {
  constructor(source: string, reason: string) {
    super(
      `Malformed markup in ${source}: ${reason}`,
      PptxTreeErrorCode.MARKUP_PARSE_FAILED,
      { path: source },
    );
  }
}

export class TreeReadError extends PptxTreeError {
  constructor(treePath: string, reason: string) {
    super(
      `Cannot read exploded tree ${treePath}: ${reason}`,
      PptxTreeErrorCode.TREE_READ_FAILED,
      { path: treePath },
    );
  }
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
