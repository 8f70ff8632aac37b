import { describe, it, expect } from "vitest";
import type { NoteRecord } from "../src/state/types";
import type { ConversionWarning } from "../src/services/errors";
import { parseNoteContent } from "../src/services/enmlParser";
import { buildLinkIndex } from "../src/services/linkIndex";
import { renderNoteBody } from "../src/services/markdownEmitter";
import type { ConvertSettings } from "../src/services/settings";
import { formatTaskGroups } from "../src/services/taskFormat";
import { makeNote, makeSelection, makeTask, noteLink, settingsWith } from "./helpers";

type RenderOptions = {
  settings?: Partial<ConvertSettings>;
  note?: Partial<NoteRecord>;
  others?: NoteRecord[];
};

const render = (body: string, options: RenderOptions = {}) => {
  const settings = settingsWith(options.settings);
  const content = `<en-note>${body}</en-note>`;
  const note = makeNote({ content, ...options.note });
  const index = buildLinkIndex(makeSelection([note, ...(options.others ?? [])]), settings);
  const warnings: ConversionWarning[] = [];
  const taskGroups = formatTaskGroups(note.tasks, {
    timeZone: settings.timeZone,
    extraFields: settings.taskExtraFields,
  });
  const markdown = renderNoteBody(parseNoteContent(content, note.id), {
    noteId: note.id,
    index,
    settings,
    taskGroups,
    warnings,
  });
  return { markdown, warnings };
};

const details = (warnings: ConversionWarning[]) => warnings.map((warning) => warning.detail);

// ---------------------------------------------------------------------------
// Paragraphs and inline styles
// ---------------------------------------------------------------------------

describe("renderNoteBody paragraphs", () => {
  it("renders one line per div and keeps blank divs", () => {
    const { markdown, warnings } = render("<div>Hello <b>world</b></div><div><br/></div><div>Second</div>");
    expect(markdown).toBe("Hello **world**\n\nSecond\n");
    expect(warnings).toEqual([]);
  });

  it("escapes text that would start a list", () => {
    expect(render("<div>1. not a list</div>").markdown).toBe("1\\. not a list\n");
  });

  it("renders an empty note as an empty string", () => {
    expect(render("").markdown).toBe("");
  });

  it("keeps alignment as html in the html dialect", () => {
    const { markdown } = render('<div style="text-align: center">Title</div>', {
      settings: { dialect: "markdown-html" },
    });
    expect(markdown).toBe('<div style="text-align: center">Title</div>\n');
  });

  it("drops alignment with a notice in plain markdown", () => {
    const { markdown, warnings } = render('<div style="text-align: center">Title</div>');
    expect(markdown).toBe("Title\n");
    expect(warnings).toEqual([{ kind: "UnsupportedFeatureNotice", detail: "Text alignment removed" }]);
  });

  it("drops underline in plain markdown", () => {
    const { markdown, warnings } = render("<div><u>x</u></div>");
    expect(markdown).toBe("x\n");
    expect(details(warnings)).toEqual(["Underline removed"]);
  });

  it("keeps underline as html in the html dialect", () => {
    expect(render("<div><u>x</u></div>", { settings: { dialect: "markdown-html" } }).markdown).toBe("<u>x</u>\n");
  });

  it("drops the strike of a struck highlight in plain markdown", () => {
    const body = '<div><span style="--en-highlight:yellow;text-decoration:line-through">x</span></div>';
    const { markdown, warnings } = render(body);
    expect(markdown).toBe("==x==\n");
    expect(warnings).toEqual([{ kind: "UnsupportedFeatureNotice", detail: "Strikethrough removed" }]);
    expect(render(body, { settings: { dialect: "markdown-html" } }).markdown).toBe("<s><mark>x</mark></s>\n");
  });

  it("puts bold markers inside a heading it wraps", () => {
    expect(render("<b><h2>Title</h2></b>").markdown).toBe("## **Title**\n");
  });

  it("keeps a leading dash of bold text inside the markers", () => {
    expect(render("<div><b>- x</b></div>").markdown).toBe("**- x**\n");
  });

  it("puts bold markers after the quote marker", () => {
    expect(render("<b><blockquote><div>q</div></blockquote></b>").markdown).toBe("> **q**\n");
  });
});

// ---------------------------------------------------------------------------
// Lists and checkboxes
// ---------------------------------------------------------------------------

describe("renderNoteBody lists", () => {
  it("renders checkbox lists", () => {
    const { markdown } = render(
      '<ul><li style="--en-checked:true"><div>Done</div></li><li style="--en-checked:false"><div>Todo</div></li></ul>'
    );
    expect(markdown).toBe("- [x] Done\n- [ ] Todo\n");
  });

  it("splits two inline todos onto separate lines", () => {
    expect(render('<div><en-todo/>Call<en-todo checked="true"/>Write</div>').markdown).toBe(
      "- [ ] Call\n- [x] Write\n"
    );
  });

  it("indents nested lists by the configured unit", () => {
    const { markdown } = render("<ul><li>One</li><ul><li>Two</li></ul><li>Three</li></ul>", {
      settings: { indentUnit: "  " },
    });
    expect(markdown).toBe("- One\n  - Two\n- Three\n");
  });

  it("numbers ordered lists", () => {
    expect(render("<ol><li>a</li><li>b</li></ol>").markdown).toBe("1. a\n2. b\n");
  });

  it("separates a list from the paragraph after it", () => {
    expect(render("<ul><li>a</li></ul><div>after</div>").markdown).toBe("- a\n\nafter\n");
  });

  it("prefixes quoted lines", () => {
    expect(render("<blockquote><div>a</div><div>b</div></blockquote>").markdown).toBe("> a\n> b\n");
  });

  it("indents a second todo inside a list item", () => {
    expect(render("<ul><li><en-todo/>one<en-todo/>two</li></ul>").markdown).toBe("- - [ ] one\n    - [ ] two\n");
  });

  it("keeps blank lines of a code block inside a list item", () => {
    const body =
      '<ul><li><div>x</div><div style="--en-codeblock:true"><div>a</div><div><br/></div><div>b</div></div></li></ul>';
    expect(render(body).markdown).toBe("- x\n    ```\n    a\n\n    b\n    ```\n");
  });
});

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

describe("renderNoteBody tables", () => {
  const table = '<table><tr><td colspan="2">A1</td></tr><tr><td>B1</td><td>B2</td></tr></table>';

  it("flattens merged cells into a pipe table", () => {
    expect(render(table).markdown).toBe("| A1 |  |\n| --- | --- |\n| B1 | B2 |\n");
  });

  it("leaves a blank line after a table", () => {
    expect(render(`${table}<div>after</div>`).markdown).toBe("| A1 |  |\n| --- | --- |\n| B1 | B2 |\n\nafter\n");
  });

  it("flattens a nested table into its cell", () => {
    const { markdown, warnings } = render(
      "<table><tr><td><table><tr><td>x</td><td>y</td></tr><tr><td>z</td></tr></table></td></tr></table>"
    );
    expect(markdown).toBe("| x; y<br>z |\n| --- |\n");
    expect(details(warnings)).toEqual(["Nested table flattened into one cell"]);
  });

  it("escapes pipes in cells", () => {
    expect(render("<table><tr><td>a|b</td></tr></table>").markdown).toBe("| a\\|b |\n| --- |\n");
  });
});

// ---------------------------------------------------------------------------
// Links and attachments
// ---------------------------------------------------------------------------

describe("renderNoteBody links", () => {
  const target = makeNote({ id: "bb02", title: "Target" });

  it("turns a note link into a wikilink", () => {
    const { markdown, warnings } = render(`<div>See <a href="${noteLink("bb02")}">the target</a></div>`, {
      others: [target],
    });
    expect(markdown).toBe("See [[Inbox/Target.md|the target]]\n");
    expect(warnings).toEqual([]);
  });

  it("escapes the wikilink pipe inside a table", () => {
    const { markdown } = render(`<table><tr><td><a href="${noteLink("bb02")}">T</a></td></tr></table>`, {
      others: [target],
    });
    expect(markdown).toBe("| [[Inbox/Target.md\\|T]] |\n| --- |\n");
  });

  it("escapes doubled brackets in a wikilink label", () => {
    const { markdown } = render(`<div><a href="${noteLink("bb02")}">a]]b</a></div>`, { others: [target] });
    expect(markdown).toBe("[[Inbox/Target.md|a\\]\\]b]]\n");
  });

  it("keeps the label of a link outside the selection", () => {
    const { markdown, warnings } = render(`<div>See <a href="${noteLink("ffff")}">Gone</a></div>`);
    expect(markdown).toBe("See Gone\n");
    expect(warnings).toEqual([
      { kind: "UnresolvedLinkWarning", detail: "Link target not in selection: ffff (Gone)" },
    ]);
  });

  it("adds a block anchor only when enabled", () => {
    const body = `<div><a href="${noteLink("bb02")}#blk-1">T</a></div>`;
    expect(render(body, { others: [target] }).markdown).toBe("[[Inbox/Target.md|T]]\n");
    expect(render(body, { others: [target], settings: { blockAnchors: true } }).markdown).toBe(
      "[[Inbox/Target.md#^blk-1|T]]\n"
    );
  });

  it("renders web links with a bracketed destination when needed", () => {
    expect(render('<div><a href="https://example.com/x y">site</a></div>').markdown).toBe(
      "[site](<https://example.com/x y>)\n"
    );
  });

  it("embeds images with their width", () => {
    const { markdown } = render('<div><en-media hash="abc1" type="image/png" width="200"/></div>', {
      note: { resources: [{ id: "r1", hash: "abc1", mime: "image/png", fileName: "pic.png", size: 10 }] },
    });
    expect(markdown).toBe("![[_resources/pic.png|200]]\n");
  });

  it("links other attachments by name", () => {
    const { markdown } = render('<div><en-media hash="abc2" type="application/zip"/></div>', {
      note: { resources: [{ id: "r2", hash: "abc2", mime: "application/zip", fileName: "data.zip", size: 10 }] },
    });
    expect(markdown).toBe("[[_resources/data.zip|data.zip]]\n");
  });

  it("uses a placeholder for a missing attachment", () => {
    const { markdown, warnings } = render('<div><en-media hash="dead" type="image/png"/></div>');
    expect(markdown).toBe("==Missing attachment dead==\n");
    expect(warnings).toEqual([{ kind: "UnresolvedLinkWarning", detail: "Attachment not found: dead" }]);
  });
});

// ---------------------------------------------------------------------------
// Code, tasks and placeholders
// ---------------------------------------------------------------------------

describe("renderNoteBody special blocks", () => {
  it("fences code blocks with their language", () => {
    expect(render('<div style="--en-codeblock:true;--en-syntaxLanguage:js"><div>let a = 1;</div></div>').markdown).toBe(
      "```js\nlet a = 1;\n```\n"
    );
  });

  it("widens the fence of a code span holding a backtick", () => {
    expect(render("<div><code>a`b</code></div>").markdown).toBe("``a`b``\n");
  });

  it("replaces the table of contents with a placeholder", () => {
    const { markdown, warnings } = render('<div style="--en-tableofcontents:true"></div>');
    expect(markdown).toBe("==Table of contents removed==\n");
    expect(details(warnings)).toEqual(["Table of contents replaced with a placeholder"]);
  });

  it("places a task group where it is referenced", () => {
    const { markdown } = render('<div style="--en-task-group:true;--en-id:g1"></div>', {
      note: { tasks: [makeTask()] },
    });
    expect(markdown).toBe("- [ ] Pay bill\n");
  });

  it("marks a missing task group", () => {
    const { markdown, warnings } = render('<div style="--en-task-group:true;--en-id:g9"></div>');
    expect(markdown).toBe("- [ ] ==Could not find task(s) ID g9==\n");
    expect(warnings).toEqual([{ kind: "UnresolvedLinkWarning", detail: "Task group not found: g9" }]);
  });

  it("appends tasks whose group is not in the body", () => {
    const { markdown, warnings } = render("<div>Text</div>", { note: { tasks: [makeTask()] } });
    expect(markdown).toBe("Text\n\n- [ ] Pay bill\n");
    expect(details(warnings)).toEqual(["Task group g1 is not placed in the note body, appended at the end"]);
  });

  it("replaces embedded svg with a placeholder", () => {
    const { markdown, warnings } = render("<div><svg></svg></div>");
    expect(markdown).toBe("==Embedded svg element removed==\n");
    expect(details(warnings)).toEqual(["Unsupported svg element removed"]);
  });
});
