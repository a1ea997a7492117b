import { ZodError } from "zod";

import { MarkupParseError } from "../src/shared/errors.js";
import { parseMarkup, prettifyXml } from "../src/shared/pretty-xml.js";
import { SLIDE1_PRETTY, SLIDES } from "./helpers.js";

const DEFAULT_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

describe("prettifyXml", () => {
  it("should indent element-only content and keep the declaration", () => {
    expect(prettifyXml(SLIDES["ppt/slides/slide1.xml"])).toBe(SLIDE1_PRETTY);
  });

  it("should add a declaration when the document has none", () => {
    const result = prettifyXml('<root><child a="1"/></root>');

    expect(result).toBe(
      `${DEFAULT_DECLARATION}\n<root>\n  <child a="1"/>\n</root>\n`,
    );
  });

  it("should use the given indent", () => {
    const result = prettifyXml("<root><a><b/></a></root>", { indent: "\t" });

    expect(result).toBe(
      `${DEFAULT_DECLARATION}\n<root>\n\t<a>\n\t\t<b/>\n\t</a>\n</root>\n`,
    );
  });

  it("should keep mixed content on one line", () => {
    const result = prettifyXml("<p>one <b>two</b> three</p>");

    expect(result).toBe(`${DEFAULT_DECLARATION}\n<p>one <b>two</b> three</p>\n`);
  });

  it("should keep whitespace-only text in elements without children", () => {
    const result = prettifyXml("<r><t> </t><t>\t</t></r>");

    expect(result).toBe(
      `${DEFAULT_DECLARATION}\n<r>\n  <t> </t>\n  <t>\t</t>\n</r>\n`,
    );
  });

  it("should not reflow elements under xml:space=preserve", () => {
    const result = prettifyXml(
      '<root><w:t xml:space="preserve" xmlns:w="urn:w"><w:r/> <w:r/></w:t></root>',
    );

    expect(result).toBe(
      [
        DEFAULT_DECLARATION,
        "<root>",
        '  <w:t xml:space="preserve" xmlns:w="urn:w"><w:r/> <w:r/></w:t>',
        "</root>",
        "",
      ].join("\n"),
    );
  });

  it("should keep comments and CDATA sections", () => {
    const result = prettifyXml(
      "<root><!-- note --><data><![CDATA[a < b]]></data></root>",
    );

    expect(result).toBe(
      [
        DEFAULT_DECLARATION,
        "<root>",
        "  <!-- note -->",
        "  <data><![CDATA[a < b]]></data>",
        "</root>",
        "",
      ].join("\n"),
    );
  });

  it("should escape attribute values and text", () => {
    const result = prettifyXml(
      '<root a="x &amp; &quot;y&quot; &lt;z&gt;"><t>1 &lt; 2 &amp;&amp; 3 &gt; 2</t></root>',
    );

    expect(result).toBe(
      [
        DEFAULT_DECLARATION,
        '<root a="x &amp; &quot;y&quot; &lt;z&gt;">',
        "  <t>1 &lt; 2 &amp;&amp; 3 &gt; 2</t>",
        "</root>",
        "",
      ].join("\n"),
    );
  });

  it("should drop whitespace between elements", () => {
    const result = prettifyXml("<root>\n    <a/>\n\n  <b/>\n</root>");

    expect(result).toBe(`${DEFAULT_DECLARATION}\n<root>\n  <a/>\n  <b/>\n</root>\n`);
  });

  it("should be stable when applied twice", () => {
    const once = prettifyXml(SLIDES["[Content_Types].xml"]);

    expect(prettifyXml(once)).toBe(once);
  });

  it("should throw MarkupParseError naming the source for text without a root element", () => {
    expect(() =>
      prettifyXml("not markup", { source: "ppt/slides/slide9.xml" }),
    ).toThrow(MarkupParseError);
    expect(() =>
      prettifyXml("not markup", { source: "ppt/slides/slide9.xml" }),
    ).toThrow("Malformed markup in ppt/slides/slide9.xml");
  });

  it("should throw MarkupParseError for an empty document", () => {
    expect(() => prettifyXml("")).toThrow(MarkupParseError);
  });

  it("should reject a mismatched end tag instead of repairing it", () => {
    expect(() => prettifyXml("<a><b></a>")).toThrow(
      "Malformed markup in <input>: end tag </a> does not match <b> at line 1, column 7",
    );
  });

  it("should reject an unquoted attribute value", () => {
    expect(() => prettifyXml("<a x=1/>")).toThrow(
      "Malformed markup in <input>: value of attribute x is not quoted at line 1, column 6",
    );
  });

  it("should reject a bare ampersand in text", () => {
    expect(() => prettifyXml("<a>x & y</a>")).toThrow(
      "Malformed markup in <input>: '&' does not start a reference at line 1, column 5",
    );
  });

  it("should report the line of a violation", () => {
    expect(() =>
      prettifyXml("<a>\n  <b>\n</a>", { source: "ppt/slides/slide2.xml" }),
    ).toThrow(
      "Malformed markup in ppt/slides/slide2.xml: end tag </a> does not match <b> at line 3, column 1",
    );
  });

  it("should keep a carriage return reference in text", () => {
    const result = prettifyXml("<a>x&#13;y</a>");

    expect(result).toBe(`${DEFAULT_DECLARATION}\n<a>x&#13;y</a>\n`);
    expect(parseMarkup(result, "result").documentElement.textContent).toBe(
      "x\ry",
    );
  });

  it("should keep a carriage return reference between elements", () => {
    const result = prettifyXml("<a><b/>&#13;<c/></a>");

    expect(result).toBe(`${DEFAULT_DECLARATION}\n<a><b/>&#13;<c/></a>\n`);
  });

  it("should normalize literal line ends in text", () => {
    const result = prettifyXml("<a>x\r\ny</a>");

    expect(result).toBe(`${DEFAULT_DECLARATION}\n<a>x\ny</a>\n`);
  });

  it("should reject an indent that is not whitespace", () => {
    expect(() => prettifyXml("<a/>", { indent: "--" })).toThrow(ZodError);
  });
});
