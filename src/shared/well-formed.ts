/**
 * Well-formedness check run ahead of the DOM parser.
 *
 * The parser repairs some broken input instead of reporting it: a mismatched
 * end tag is dropped, an unquoted attribute value is accepted and a bare `&`
 * is kept as text. Rewriting such a part would change its structure, so these
 * are found here first.
 */

const NAME_START = "A-Za-z_:\\u00C0-\\uFFFF";
const NAME_CHAR = `${NAME_START}0-9.\\u00B7-`;

const NAME_PATTERN = new RegExp(`[${NAME_START}][${NAME_CHAR}]*`, "y");
const REFERENCE_PATTERN = new RegExp(
  `&(?:#[0-9]+|#x[0-9a-fA-F]+|[${NAME_START}][${NAME_CHAR}]*);`,
  "y",
);
const SPACE_PATTERN = /[ \t\r\n]*/y;
const NON_SPACE_PATTERN = /[^ \t\r\n]/;

class Malformation extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
  }
}

/**
 * Describe the first well-formedness violation in a document, with its line
 * and column, or return undefined when there is none
 */
export function findMalformation(xml: string): string | undefined {
  try {
    scanDocument(xml);
    return undefined;
  } catch (error) {
    if (error instanceof Malformation) {
      const { line, column } = locate(xml, error.offset);
      return `${error.message} at line ${line}, column ${column}`;
    }
    throw error;
  }
}

function scanDocument(xml: string): void {
  const open: string[] = [];
  let rootSeen = false;
  let pos = 0;

  while (pos < xml.length) {
    const tagStart = xml.indexOf("<", pos);
    const textEnd = tagStart < 0 ? xml.length : tagStart;
    if (textEnd > pos) {
      checkText(xml, pos, textEnd, open.length > 0);
    }
    if (tagStart < 0) break;

    if (xml.startsWith("<?", tagStart)) {
      pos = skipInstruction(xml, tagStart);
    } else if (xml.startsWith("<!--", tagStart)) {
      pos = skipPast(
        xml,
        tagStart + "<!--".length,
        "-->",
        "unterminated comment",
        tagStart,
      );
    } else if (xml.startsWith("<![CDATA[", tagStart)) {
      if (open.length === 0) {
        throw new Malformation(
          "CDATA section outside the root element",
          tagStart,
        );
      }
      pos = skipPast(
        xml,
        tagStart + "<![CDATA[".length,
        "]]>",
        "unterminated CDATA section",
        tagStart,
      );
    } else if (xml.startsWith("<!DOCTYPE", tagStart)) {
      if (rootSeen) {
        throw new Malformation("DOCTYPE after the root element", tagStart);
      }
      pos = skipDoctype(xml, tagStart);
    } else if (xml.startsWith("<!", tagStart)) {
      throw new Malformation("unknown markup declaration", tagStart);
    } else if (xml.startsWith("</", tagStart)) {
      pos = scanEndTag(xml, tagStart, open);
    } else {
      if (open.length === 0 && rootSeen) {
        throw new Malformation("more than one root element", tagStart);
      }
      rootSeen = true;
      pos = scanStartTag(xml, tagStart, open);
    }
  }

  if (open.length > 0) {
    throw new Malformation(
      `element <${open[open.length - 1]}> is not closed`,
      xml.length,
    );
  }
  if (!rootSeen) {
    throw new Malformation("no root element", xml.length);
  }
}

function checkText(
  xml: string,
  start: number,
  end: number,
  insideRoot: boolean,
): void {
  const text = xml.slice(start, end);

  if (!insideRoot) {
    const stray = text.search(NON_SPACE_PATTERN);
    if (stray >= 0) {
      throw new Malformation("text outside the root element", start + stray);
    }
    return;
  }

  const sectionEnd = text.indexOf("]]>");
  if (sectionEnd >= 0) {
    throw new Malformation("']]>' in text", start + sectionEnd);
  }

  for (
    let amp = text.indexOf("&");
    amp >= 0;
    amp = text.indexOf("&", amp + 1)
  ) {
    checkReference(xml, start + amp);
  }
}

function checkReference(xml: string, at: number): void {
  REFERENCE_PATTERN.lastIndex = at;
  if (!REFERENCE_PATTERN.test(xml)) {
    throw new Malformation("'&' does not start a reference", at);
  }
}

function scanStartTag(xml: string, tagStart: number, open: string[]): number {
  const name = matchName(xml, tagStart + 1);
  if (!name) {
    throw new Malformation("'<' does not start an element", tagStart);
  }

  const attributes = new Set<string>();
  let pos = tagStart + 1 + name.length;

  for (;;) {
    const afterName = pos;
    pos = skipSpace(xml, pos);

    if (pos >= xml.length) {
      throw new Malformation(`start tag <${name}> is not terminated`, tagStart);
    }
    if (xml.startsWith("/>", pos)) {
      return pos + 2;
    }
    if (xml[pos] === ">") {
      open.push(name);
      return pos + 1;
    }
    if (pos === afterName) {
      throw new Malformation(`unexpected character in <${name}>`, pos);
    }

    const attribute = matchName(xml, pos);
    if (!attribute) {
      throw new Malformation(`unexpected character in <${name}>`, pos);
    }
    if (attributes.has(attribute)) {
      throw new Malformation(`attribute ${attribute} is repeated`, pos);
    }
    attributes.add(attribute);

    pos = skipSpace(xml, pos + attribute.length);
    if (xml[pos] !== "=") {
      throw new Malformation(`attribute ${attribute} has no value`, pos);
    }
    pos = skipSpace(xml, pos + 1);

    const quote = xml[pos];
    if (quote !== '"' && quote !== "'") {
      throw new Malformation(`value of attribute ${attribute} is not quoted`, pos);
    }
    const close = xml.indexOf(quote, pos + 1);
    if (close < 0) {
      throw new Malformation(`value of attribute ${attribute} is not terminated`, pos);
    }
    checkAttributeValue(xml, pos + 1, close);
    pos = close + 1;
  }
}

function checkAttributeValue(xml: string, start: number, end: number): void {
  for (let i = start; i < end; i++) {
    if (xml[i] === "<") {
      throw new Malformation("'<' in attribute value", i);
    }
    if (xml[i] === "&") {
      checkReference(xml, i);
    }
  }
}

function scanEndTag(xml: string, tagStart: number, open: string[]): number {
  const name = matchName(xml, tagStart + 2);
  if (!name) {
    throw new Malformation("malformed end tag", tagStart);
  }

  const close = skipSpace(xml, tagStart + 2 + name.length);
  if (xml[close] !== ">") {
    throw new Malformation(`end tag </${name}> is not terminated`, tagStart);
  }

  const expected = open.pop();
  if (expected === undefined) {
    throw new Malformation(`end tag </${name}> has no start tag`, tagStart);
  }
  if (expected !== name) {
    throw new Malformation(
      `end tag </${name}> does not match <${expected}>`,
      tagStart,
    );
  }
  return close + 1;
}

function skipInstruction(xml: string, tagStart: number): number {
  const target = matchName(xml, tagStart + 2);
  if (!target) {
    throw new Malformation("processing instruction has no target", tagStart);
  }
  if (target.toLowerCase() === "xml" && tagStart !== 0) {
    throw new Malformation("XML declaration is not at the start", tagStart);
  }
  return skipPast(
    xml,
    tagStart + 2 + target.length,
    "?>",
    "unterminated processing instruction",
    tagStart,
  );
}

function skipDoctype(xml: string, tagStart: number): number {
  let quote: string | undefined;

  for (let i = tagStart + "<!DOCTYPE".length; i < xml.length; i++) {
    const c = xml[i];
    if (quote) {
      if (c === quote) quote = undefined;
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === "[") {
      const subsetEnd = xml.indexOf("]", i);
      if (subsetEnd < 0) break;
      i = subsetEnd;
    } else if (c === ">") {
      return i + 1;
    }
  }
  throw new Malformation("unterminated DOCTYPE", tagStart);
}

function skipPast(
  xml: string,
  contentStart: number,
  terminator: string,
  message: string,
  tagStart: number,
): number {
  const end = xml.indexOf(terminator, contentStart);
  if (end < 0) {
    throw new Malformation(message, tagStart);
  }
  return end + terminator.length;
}

function matchName(xml: string, at: number): string | undefined {
  NAME_PATTERN.lastIndex = at;
  return NAME_PATTERN.exec(xml)?.[0];
}

function skipSpace(xml: string, at: number): number {
  SPACE_PATTERN.lastIndex = at;
  SPACE_PATTERN.test(xml);
  return SPACE_PATTERN.lastIndex;
}

function locate(xml: string, offset: number): { line: number; column: number } {
  const lines = xml.slice(0, offset).split(/\r\n|\r|\n/);
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}
