// Default export includes everything, CLI runners too
export * from "./cli/batch.js";
export * from "./cli/dopptx.js";
export * from "./cli/pack.js";
export * from "./cli/program.js";
export * from "./cli/unpack.js";
export * from "./cli/unpptx.js";
export * from "./node/files.js";
export * from "./shared/config.js";
export * from "./shared/constants.js";
export * from "./shared/errors.js";
export * from "./shared/log.js";
export * from "./shared/pretty-xml.js";
export * from "./shared/well-formed.js";
export * from "./types.js";
