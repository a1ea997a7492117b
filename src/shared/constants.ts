/**
 * File extension of a packaged presentation
 */
export const PACKAGE_EXTENSION = ".pptx" as const;

/**
 * Suffix marking a directory as the exploded form of a package,
 * e.g. `deck.pptx` <-> `deck_pptx/`
 */
export const EXPLODED_TREE_SUFFIX = "_pptx" as const;

/**
 * Prefix of the lock files presentation editors write next to an open deck
 */
export const TEMP_FILE_PREFIX = "~$" as const;

/**
 * Extensions of the members rewritten by the pretty-print pass
 */
export const MARKUP_EXTENSIONS = [".xml", ".rels"] as const;

export const DEFAULT_XML_DECLARATION =
  '<?xml version="1.0" encoding="UTF-8"?>' as const;

export const DEFAULT_INDENT = "  " as const;

export const DEFAULT_COMPRESSION_LEVEL = 6 as const;
