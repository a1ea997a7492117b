import { strToU8, unzipSync, type Zippable, zipSync } from "fflate";
import {
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

import type { Logger } from "../src/types.js";

export const PRESENTATION_NS =
  "http://schemas.openxmlformats.org/presentationml/2006/main";
export const DRAWING_NS = "http://schemas.openxmlformats.org/drawingml/2006/main";

const DECLARATION =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

/**
 * Members of a minimal three-part deck
 */
export const SLIDES: Record<string, string> = {
  "[Content_Types].xml": `${DECLARATION}\n<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="xml" ContentType="application/xml"/><Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/></Types>`,
  "ppt/presentation.xml": `${DECLARATION}\n<p:presentation xmlns:p="${PRESENTATION_NS}"><p:sldIdLst><p:sldId id="256"/></p:sldIdLst></p:presentation>`,
  "ppt/slides/slide1.xml": `${DECLARATION}\n<p:sld xmlns:a="${DRAWING_NS}" xmlns:p="${PRESENTATION_NS}"><p:cSld><p:spTree><a:t>Hello &amp; welcome</a:t><a:t> </a:t></p:spTree></p:cSld></p:sld>`,
};

export const SLIDE1_PRETTY = [
  DECLARATION,
  `<p:sld xmlns:a="${DRAWING_NS}" xmlns:p="${PRESENTATION_NS}">`,
  "  <p:cSld>",
  "    <p:spTree>",
  "      <a:t>Hello &amp; welcome</a:t>",
  "      <a:t> </a:t>",
  "    </p:spTree>",
  "  </p:cSld>",
  "</p:sld>",
  "",
].join("\n");

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "pptx-tree-test-"));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === "string" ? strToU8(content) : content;
}

/**
 * Write a zip package with the given members, in the given order
 */
export function writePackage(
  path: string,
  members: Record<string, string | Uint8Array>,
): void {
  const zippable: Zippable = {};
  for (const [name, content] of Object.entries(members)) {
    zippable[name] = toBytes(content);
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, zipSync(zippable));
}

export function readPackage(path: string): Record<string, Uint8Array> {
  return unzipSync(readFileSync(path));
}

/**
 * Write each file of a tree, creating directories as needed
 */
export function writeTree(
  root: string,
  files: Record<string, string | Uint8Array>,
): void {
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(root, name);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, toBytes(content));
  }
}

/**
 * Relative paths of all files under a directory, sorted
 */
export function listTree(root: string): string[] {
  const files: string[] = [];
  const visit = (dir: string, prefix: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory()) {
        visit(join(dir, entry.name), `${prefix}${entry.name}/`);
      } else {
        files.push(`${prefix}${entry.name}`);
      }
    }
  };
  visit(root, "");
  return files.sort();
}

export function readText(path: string): string {
  return readFileSync(path, "utf-8");
}

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  };
}
