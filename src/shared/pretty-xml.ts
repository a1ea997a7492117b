/**
 * Markup pretty-printer used by the unpack `--pretty` pass.
 *
 * Only the whitespace between elements changes. Anything that carries text is
 * written back on one line exactly as parsed, so the rewritten part still
 * loads as the same document.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

import type { PrettifyOptions } from "../types.js";
import { PrettifyOptionsSchema } from "./config.js";
import { DEFAULT_XML_DECLARATION } from "./constants.js";
import { MarkupParseError } from "./errors.js";
import { findMalformation } from "./well-formed.js";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;
const PROCESSING_INSTRUCTION_NODE = 7;

const BYTE_ORDER_MARK = /^\uFEFF/;
const XML_DECLARATION_PATTERN = /^\uFEFF?(<\?xml\s[\s\S]*?\?>)/;

/**
 * Reformat an XML document with one element per line.
 *
 * The document's own declaration is kept; a document without one gets
 * `<?xml version="1.0" encoding="UTF-8"?>`. The result ends with a newline.
 *
 * @throws MarkupParseError if the document is not well-formed
 */
export function prettifyXml(xml: string, options: PrettifyOptions = {}): string {
  const { source = "<input>" } = options;
  const { indent } = PrettifyOptionsSchema.parse({ indent: options.indent });

  const document = parseMarkup(xml, source);
  const declaration =
    XML_DECLARATION_PATTERN.exec(xml)?.[1] ?? DEFAULT_XML_DECLARATION;

  const serializer = new XMLSerializer();
  const lines = [declaration];
  for (const node of childrenOf(document)) {
    if (isProcessingInstruction(node) && node.target === "xml") {
      continue;
    }
    if (isText(node) && isBlank(node.data)) {
      continue;
    }
    if (isElement(node)) {
      indentChildren(document, node, 1, indent);
    }
    lines.push(escapeCarriageReturns(serializer.serializeToString(node)));
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Parse a markup string, turning every well-formedness violation and parser
 * diagnostic into a MarkupParseError
 */
export function parseMarkup(xml: string, source: string): Document {
  const text = xml.replace(BYTE_ORDER_MARK, "");

  const malformation = findMalformation(text);
  if (malformation) {
    throw new MarkupParseError(source, malformation);
  }

  // The parser reports a rethrown handler error a second time; keep the first.
  let failure: string | undefined;
  const fail = (message: unknown): never => {
    const reason = failure ?? String(message).trim();
    failure = reason;
    throw new MarkupParseError(source, reason);
  };

  const parser = new DOMParser({
    errorHandler: { warning: fail, error: fail, fatalError: fail },
  });

  let document: Document;
  try {
    document = parser.parseFromString(text, "application/xml");
  } catch (error) {
    if (error instanceof MarkupParseError) throw error;
    return fail(error instanceof Error ? error.message : error);
  }

  if (!document.documentElement) {
    return fail("no root element");
  }
  return document;
}

/**
 * Replace the blank text between an element's children with a newline and
 * indentation, recursively. Elements kept inline are left as parsed.
 */
function indentChildren(
  document: Document,
  element: Element,
  depth: number,
  indent: string,
): void {
  if (keepsInline(element)) return;

  for (const child of childrenOf(element)) {
    if (isText(child)) {
      element.removeChild(child);
      continue;
    }
    element.insertBefore(
      document.createTextNode(`\n${indent.repeat(depth)}`),
      child,
    );
    if (isElement(child)) {
      indentChildren(document, child, depth + 1, indent);
    }
  }
  element.appendChild(document.createTextNode(`\n${indent.repeat(depth - 1)}`));
}

/**
 * Elements whose content is text, or under xml:space="preserve", are never
 * broken across lines.
 */
function keepsInline(element: Element): boolean {
  const children = childrenOf(element);

  if (!children.some(isElement)) return true;
  if (element.getAttribute("xml:space") === "preserve") return true;

  return children.some(
    (child) => isCData(child) || (isText(child) && !isBlank(child.data)),
  );
}

/**
 * The parser normalizes line ends, so a carriage return in serialized output
 * came from a `&#13;` reference in text and must stay one.
 */
function escapeCarriageReturns(markup: string): string {
  return markup.replace(/\r/g, "&#13;");
}

function childrenOf(node: Node): Node[] {
  const children: Node[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    children.push(node.childNodes[i]);
  }
  return children;
}

// A carriage return left after line-end normalization is a `&#13;` reference
function isBlank(text: string): boolean {
  return /^[ \t\n]*$/.test(text);
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

function isCData(node: Node): node is CDATASection {
  return node.nodeType === CDATA_SECTION_NODE;
}

function isProcessingInstruction(node: Node): node is ProcessingInstruction {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE;
}
