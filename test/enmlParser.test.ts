import { describe, it, expect } from "vitest";
import { ParseError } from "../src/services/errors";
import { isEmptyContent, parseNoteContent } from "../src/services/enmlParser";
import { plainText, type DocumentNode } from "../src/services/noteModel";

const note = (body: string) => `<en-note>${body}</en-note>`;

const firstChild = (markup: string): DocumentNode => {
  const [first] = parseNoteContent(note(markup)).children;
  return first;
};

// ---------------------------------------------------------------------------
// Document structure
// ---------------------------------------------------------------------------

describe("parseNoteContent structure", () => {
  it("reads the en-note body past the xml prolog", () => {
    const root = parseNoteContent(
      '<?xml version="1.0" encoding="UTF-8"?><!DOCTYPE en-note SYSTEM "http://xml.evernote.com/pub/enml2.dtd">' +
        note("<div>Hello <b>world</b></div>")
    );
    expect(root.children).toHaveLength(1);
    const [paragraph] = root.children;
    expect(paragraph.kind).toBe("paragraph");
    expect(plainText(root.children)).toBe("Hello world");
    if (paragraph.kind !== "paragraph") throw new Error("expected a paragraph");
    const styled = paragraph.children[1];
    expect(styled.kind === "styled" && [...styled.styles]).toEqual(["bold"]);
  });

  it("collapses source line breaks inside text", () => {
    const root = parseNoteContent("<en-note>\n<div>a\nb</div>\n</en-note>");
    expect(root.children).toEqual([
      { kind: "paragraph", align: undefined, indent: 0, children: [{ kind: "text", text: "a b" }] },
    ]);
  });

  it("reads indentation and alignment from div styles", () => {
    expect(firstChild('<div style="padding-left: 80px; text-align: right;">x</div>')).toEqual({
      kind: "paragraph",
      align: "right",
      indent: 2,
      children: [{ kind: "text", text: "x" }],
    });
  });

  it("expands self-closing todos", () => {
    expect(firstChild('<div><en-todo checked="true"/>Buy milk</div>')).toEqual({
      kind: "paragraph",
      align: undefined,
      indent: 0,
      children: [
        { kind: "checkbox", checked: true },
        { kind: "text", text: "Buy milk" },
      ],
    });
  });

  it("reads en-media attributes", () => {
    expect(
      firstChild('<en-media hash="ABC123" type="image/png" width="300px" style="--en-imageAlignment:center"/>')
    ).toEqual({
      kind: "resource",
      hash: "abc123",
      mime: "image/png",
      width: "300px",
      height: undefined,
      view: "inline",
      align: "center",
    });
  });

  it("treats a pdf shown as attachment as an attachment view", () => {
    const media = firstChild('<en-media hash="ff" type="application/pdf" style="--en-viewAs:attachment;"/>');
    expect(media.kind === "resource" && media.view).toBe("attachment");
  });
});

// ---------------------------------------------------------------------------
// Lists and tables
// ---------------------------------------------------------------------------

describe("parseNoteContent lists", () => {
  it("detects checkbox lists from --en-checked", () => {
    const list = firstChild(
      '<ul><li style="--en-checked:true;"><div>Done</div></li><li style="--en-checked:false;"><div>Todo</div></li></ul>'
    );
    if (list.kind !== "list") throw new Error("expected a list");
    expect(list.listKind).toBe("checkbox");
    expect(list.depth).toBe(1);
    expect(list.items.map((item) => item.checked)).toEqual([true, false]);
  });

  it("attaches a nested list to the previous item", () => {
    const list = firstChild("<ul><li>a</li><ul><li>b</li></ul></ul>");
    if (list.kind !== "list") throw new Error("expected a list");
    expect(list.items).toHaveLength(1);
    const nested = list.items[0].children[1];
    expect(nested.kind === "list" && nested.depth).toBe(2);
  });

  it("numbers ordered lists", () => {
    const list = firstChild("<ol><li>a</li></ol>");
    expect(list.kind === "list" && list.listKind).toBe("numbered");
  });
});

describe("parseNoteContent tables", () => {
  it("keeps spans and cell alignment", () => {
    const table = firstChild(
      '<table><tr><td colspan="2">A1</td></tr><tr><td>B1</td><td style="text-align:right">B2</td></tr></table>'
    );
    if (table.kind !== "table") throw new Error("expected a table");
    expect(table.nested).toBe(false);
    expect(table.rows.map((row) => row.length)).toEqual([1, 2]);
    expect(table.rows[0][0].colSpan).toBe(2);
    expect(table.rows[1][1].align).toBe("right");
  });

  it("keeps inner rows out of the outer table", () => {
    const table = firstChild("<table><tr><td><table><tr><td>x</td></tr></table></td></tr></table>");
    if (table.kind !== "table") throw new Error("expected a table");
    expect(table.rows).toHaveLength(1);
    const inner = table.rows[0][0].children[0];
    expect(inner.kind === "table" && inner.nested).toBe(true);
  });

  it("treats a bad span value as one", () => {
    const table = firstChild('<table><tr><td rowspan="0" colspan="x">a</td></tr></table>');
    if (table.kind !== "table") throw new Error("expected a table");
    expect(table.rows[0][0].rowSpan).toBe(1);
    expect(table.rows[0][0].colSpan).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Special blocks
// ---------------------------------------------------------------------------

describe("parseNoteContent special blocks", () => {
  it("reads code blocks line by line", () => {
    expect(
      firstChild(
        '<div style="--en-codeblock:true;--en-syntaxLanguage:js"><div>const a = 1;</div><div><br/></div><div>a &lt; 2</div></div>'
      )
    ).toEqual({ kind: "codeBlock", language: "js", literal: "const a = 1;\n\na < 2" });
  });

  it("reads task group placeholders", () => {
    expect(firstChild('<div style="--en-task-group:true; --en-id:g-1"></div>')).toEqual({
      kind: "taskGroup",
      groupId: "g-1",
    });
  });

  it("marks floating layouts as html content", () => {
    const block = firstChild('<div style="float: left"><div>a</div></div>');
    expect(block.kind === "foreign" && block.reason).toBe("htmlContent");
  });

  it("keeps encrypted blocks as foreign", () => {
    const block = firstChild('<en-crypt hint="pw">Zm9v</en-crypt>');
    expect(block.kind === "foreign" && block.reason).toBe("encrypted");
  });

  it("keeps unsupported embeds as opaque", () => {
    const block = firstChild("<div><svg><circle r=\"2\"></circle></svg></div>");
    if (block.kind !== "paragraph") throw new Error("expected a paragraph");
    expect(block.children[0].kind === "opaque" && block.children[0].tag).toBe("svg");
  });

  it("reads highlight and color from spans", () => {
    const paragraph = firstChild('<div><span style="--en-highlight:yellow;color:rgb(255, 0, 0)">x</span></div>');
    if (paragraph.kind !== "paragraph") throw new Error("expected a paragraph");
    const styled = paragraph.children[0];
    if (styled.kind !== "styled") throw new Error("expected a styled span");
    expect([...styled.styles].sort()).toEqual(["color", "highlight"]);
    expect(styled.attributes).toEqual({ highlight: "yellow", color: "rgb(255, 0, 0)" });
  });

  it("marks links inside a snippet preview", () => {
    const paragraph = firstChild(
      '<div style="--en-richlink:true;--en-viewAs:evernote-note-snippet-preview"><a href="evernote:///view/1/s1/abc/abc/">Note</a></div>'
    );
    if (paragraph.kind !== "paragraph") throw new Error("expected a paragraph");
    const link = paragraph.children[0];
    expect(link.kind === "link" && link.preview).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Failures and emptiness
// ---------------------------------------------------------------------------

describe("parseNoteContent failures", () => {
  it("rejects markup with NUL characters", () => {
    expect(() => parseNoteContent(note("a\u0000b"), "n1")).toThrow(ParseError);
  });

  it("carries the note id on the error", () => {
    try {
      parseNoteContent("\u0000", "n1");
      throw new Error("expected a parse error");
    } catch (e) {
      expect(e instanceof ParseError && e.noteId).toBe("n1");
    }
  });
});

describe("isEmptyContent", () => {
  it("treats line breaks alone as empty", () => {
    expect(isEmptyContent(parseNoteContent(note("<div><br/></div>")))).toBe(true);
    expect(isEmptyContent(parseNoteContent(note("<div>x</div>")))).toBe(false);
  });
});
