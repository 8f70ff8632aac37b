import type { ConversionWarning, WarningKind } from "./errors";
import { t } from "./i18n";
import { escapeAttr, escapeHtml } from "./importCommon";
import { isNoteLink, type LinkIndex } from "./linkIndex";
import { ListRenderer } from "./listRenderer";
import { escapeLinkDestination, escapeMarkdown, type LinkLabelMode } from "./markdownEscape";
import {
  childrenOf,
  isBlock,
  plainText,
  type CodeBlockNode,
  type CodeSpanNode,
  type DocumentNode,
  type ForeignNode,
  type ImageNode,
  type InlineStyle,
  type LinkNode,
  type ListItemNode,
  type ListNode,
  type ParagraphNode,
  type ResourceNode,
  type RootNode,
  type StyledNode,
  type TableCellNode,
  type TableNode,
} from "./noteModel";
import type { ConvertSettings } from "./settings";
import { renderTable } from "./tableGrid";

export type EmitContext = {
  noteId: string;
  index: LinkIndex;
  settings: ConvertSettings;
  taskGroups: Map<string, string[]>;
  warnings: ConversionWarning[];
};

const MARKDOWN_MARKERS: Array<[InlineStyle, string]> = [
  ["bold", "**"],
  ["italic", "*"],
  ["strike", "~~"],
  ["highlight", "=="],
];

const HTML_ONLY_STYLES: ReadonlySet<InlineStyle> = new Set(["underline", "superscript", "subscript", "color"]);

const STRUCTURE_LINE = /^[ \t]*(?:(\|)|(>)|[-+*] |\d{1,9}[.)] )/;

type Structure = "table" | "quote" | "list";

const structureOf = (line: string): Structure | null => {
  const match = line.match(STRUCTURE_LINE);
  if (!match) return null;
  if (match[1]) return "table";
  return match[2] ? "quote" : "list";
};

const isDefaultHighlight = (value?: string) => !value || value === "yellow" || value === "#ffef9e";

const longestRun = (text: string, ch: string) =>
  (text.match(new RegExp(`${ch}+`, "g")) ?? []).reduce((max, run) => Math.max(max, run.length), 0);

const readPixels = (value?: string) => {
  const match = (value ?? "").match(/^\s*(\d+)(?:\.\d+)?\s*(?:px)?\s*$/i);
  return match ? match[1] : "";
};

const FENCE_LINE = /^[ \t]*(`{3,})/;

const BLOCK_PREFIX = /^(?:[ \t]*(?:>[ \t]?|#{1,6}[ \t]+|[-+*][ \t]+(?:\[[ x]\][ \t]+)?|\d{1,9}[.)][ \t]+))+/;

const UNWRAPPABLE_LINE = /^[ \t]*(?:\||(?:_{3,}|-{3,}|\*{3,})[ \t]*$)/;

// Marks each line with whether it sits inside a fenced code block, fence lines included.
const fenceStates = (lines: string[]) => {
  let fence: string | null = null;
  return lines.map((line) => {
    const marker = line.match(FENCE_LINE)?.[1];
    if (fence) {
      if (marker && marker.length >= fence.length && line.trim() === marker) fence = null;
      return true;
    }
    if (marker) {
      fence = marker;
      return true;
    }
    return false;
  });
};

// With block content, line markers written by the blocks stay ahead of the emphasis.
const wrapLines = (content: string, open: string, close: string, hasBlocks: boolean) => {
  const lines = content.split("\n");
  const fenced = fenceStates(lines);
  return lines
    .map((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) return line;
      if (hasBlocks && (fenced[index] || UNWRAPPABLE_LINE.test(line))) return line;
      const lead = line.slice(0, line.length - line.trimStart().length);
      const prefix = (hasBlocks ? line.match(BLOCK_PREFIX)?.[0] : undefined) ?? lead;
      const text = line.slice(prefix.length).trim();
      if (!text) return line;
      const trail = line.slice(line.trimEnd().length);
      return `${prefix}${open}${text}${close}${trail}`;
    })
    .join("\n");
};

class NoteWalker {
  private lists: ListRenderer;
  private readonly activeStyles = new Set<InlineStyle>();
  private readonly usedGroups = new Set<string>();
  private htmlMode = false;
  private inTable = false;
  private linkLabel: LinkLabelMode = "none";

  constructor(private readonly context: EmitContext) {
    this.lists = new ListRenderer(context.settings.indentUnit);
  }

  render(root: RootNode) {
    let body = this.renderFlow(root.children);
    const appended: string[] = [];
    this.context.taskGroups.forEach((lines, groupId) => {
      if (this.usedGroups.has(groupId)) return;
      appended.push(...lines);
      this.notice("notice.tasksAppended", { id: groupId });
    });
    if (appended.length) {
      body = body.trim() ? `${body.replace(/\n*$/, "\n\n")}${appended.join("\n")}\n` : `${appended.join("\n")}\n`;
    }
    const content = body.replace(/\n+$/, "");
    return content ? `${content}\n` : "";
  }

  private get settings() {
    return this.context.settings;
  }

  private get pipe() {
    return this.inTable ? "\\|" : "|";
  }

  private warn(kind: WarningKind, key: string, vars?: Record<string, string | number>) {
    this.context.warnings.push({ kind, detail: t(key, vars) });
  }

  private notice(key: string, vars?: Record<string, string | number>) {
    this.warn("UnsupportedFeatureNotice", key, vars);
  }

  private placeholder(key: string, vars?: Record<string, string | number>) {
    const text = t(key, vars);
    return this.htmlMode ? `<mark>${escapeHtml(text)}</mark>` : `==${escapeMarkdown(text, { inTable: this.inTable })}==`;
  }

  private separatesBlocks() {
    return this.lists.depth === 0 && !this.inTable;
  }

  // Blank line needed so the next chunk is not read as part of a table, list or quote.
  private gapBefore(out: string, next: string) {
    if (!this.separatesBlocks() || !out || !next || next.startsWith("\n") || out.endsWith("\n\n")) return "";
    const lines = out.slice(0, -1).split("\n");
    const previous = structureOf(lines[lines.length - 1]);
    const upcoming = structureOf(next.split("\n")[0]);
    if (upcoming === "table") return "\n";
    if (!previous) return "";
    return previous === "table" || upcoming !== previous ? "\n" : "";
  }

  private renderFlow(nodes: DocumentNode[], lineStart = true) {
    let out = "";
    let line = "";
    const flushLine = () => {
      if (!line) return;
      out += line.endsWith("\n") ? line : `${line}\n`;
      line = "";
    };
    for (const node of nodes) {
      if (isBlock(node)) {
        flushLine();
        const rendered = this.renderBlock(node);
        if (!rendered) continue;
        out += this.gapBefore(out, rendered) + rendered;
        continue;
      }
      const atStart = line.endsWith("\n") || (line === "" && (out !== "" || lineStart));
      const rendered = this.renderInline(node, atStart);
      if (!rendered) continue;
      if (line === "") line = this.gapBefore(out, rendered);
      line += rendered;
    }
    return out + line;
  }

  private renderBlockContent(nodes: DocumentNode[]) {
    const content = this.renderFlow(nodes);
    if (!content) return "";
    return content.endsWith("\n") ? content : `${content}\n`;
  }

  private renderBlock(node: DocumentNode): string {
    switch (node.kind) {
      case "paragraph":
        return this.renderParagraph(node);
      case "heading": {
        const content = this.renderFlow(node.children, false).replace(/\s*\n\s*/g, " ").trim();
        if (!content) return "";
        if (this.inTable) return `${content}\n`;
        return `${"#".repeat(Math.min(6, Math.max(1, node.level)))} ${content}\n`;
      }
      case "divider":
        return this.inTable ? "" : "___\n";
      case "list":
        return this.renderList(node);
      case "table":
        return this.renderTableNode(node);
      case "quote":
        return this.renderQuote(node.children);
      case "codeBlock":
        return this.renderCodeBlock(node);
      case "taskGroup":
        return this.renderTaskGroup(node.groupId);
      case "tableOfContents":
        this.notice("notice.tableOfContents");
        return `${this.placeholder("placeholder.toc")}\n`;
      case "foreign":
        return this.renderForeign(node);
      default:
        return this.renderBlockContent(childrenOf(node));
    }
  }

  private renderParagraph(node: ParagraphNode) {
    const align = node.align === "center" || node.align === "right" ? node.align : null;
    if (align && !this.inTable && !this.htmlMode) {
      if (this.settings.dialect === "markdown-html") {
        const html = this.withHtml(() => this.renderFlow(node.children)).replace(/\n+$/, "").replace(/\n/g, "<br>");
        return html ? `<div style="text-align: ${align}">${html}</div>\n` : "";
      }
      if (plainText(node.children).trim()) this.notice("notice.alignmentDropped");
    }
    const content = this.renderBlockContent(node.children);
    if (!content || node.indent <= 0 || this.inTable) return content;
    const prefix = this.lists.indentPrefix(node.indent);
    return content
      .split("\n")
      .map((line) => (line ? `${prefix}${line}` : line))
      .join("\n");
  }

  private renderList(node: ListNode) {
    this.lists.enterList(node.listKind);
    try {
      return node.items.map((item) => this.renderListItem(item, node)).join("");
    } finally {
      this.lists.exitList();
    }
  }

  private renderListItem(item: ListItemNode, list: ListNode) {
    const prefix = this.lists.itemPrefix(list.listKind === "checkbox" ? item.checked ?? false : item.checked);
    const continuation = this.lists.continuationIndent();
    let out = "";
    let first = true;
    let pending: DocumentNode[] = [];
    const flush = () => {
      if (!pending.length) return;
      const rendered = this.renderFlow(pending).split("\n");
      const fenced = fenceStates(rendered);
      pending = [];
      rendered.forEach((line, index) => {
        if (!fenced[index] && line.trim() === "") return;
        if (first) out += `${prefix}${line}\n`;
        else out += line ? `${continuation}${line}\n` : "\n";
        first = false;
      });
    };
    for (const child of item.children) {
      if (child.kind === "list") {
        flush();
        if (first) {
          out += `${prefix.trimEnd()}\n`;
          first = false;
        }
        out += this.renderList(child);
      } else {
        pending.push(child);
      }
    }
    flush();
    return first ? `${prefix.trimEnd()}\n` : out;
  }

  private renderCell(cell: TableCellNode) {
    const savedLists = this.lists;
    const savedInTable = this.inTable;
    this.lists = new ListRenderer(this.settings.indentUnit);
    this.inTable = true;
    try {
      return this.renderFlow(cell.children).trim();
    } finally {
      this.lists = savedLists;
      this.inTable = savedInTable;
    }
  }

  private renderTableNode(node: TableNode) {
    if (node.nested || this.inTable) {
      this.notice("notice.nestedTable");
      const flattened = node.rows
        .map((row) => row.map((cell) => this.renderCell(cell).replace(/\n/g, " ")).join("; "))
        .filter(Boolean)
        .join("<br>");
      return flattened ? `${flattened}\n` : "";
    }
    const { lines, overflows } = renderTable(node.rows, (cell) => this.renderCell(cell));
    overflows.forEach((overflow) =>
      this.warn("SpanOverflowWarning", "warning.spanOverflow", {
        row: overflow.row + 1,
        column: overflow.column + 1,
        axis: overflow.axis,
        declared: overflow.declared,
        applied: overflow.applied,
      })
    );
    return lines.length ? `${lines.join("\n")}\n` : "";
  }

  private renderQuote(children: DocumentNode[]) {
    this.lists.enterQuote();
    let inner: string;
    try {
      inner = this.renderFlow(children).replace(/\n+$/, "");
    } finally {
      this.lists.exitQuote();
    }
    if (!inner) return "";
    if (this.inTable) return `${inner}\n`;
    return `${inner
      .split("\n")
      .map((line) => (line ? `> ${line}` : ">"))
      .join("\n")}\n`;
  }

  private renderCodeBlock(node: CodeBlockNode) {
    if (this.inTable) {
      return `${node.literal
        .split("\n")
        .map((line) => (line ? this.renderCodeSpan({ kind: "codeSpan", literal: line }) : ""))
        .join("\n")}\n`;
    }
    const fence = "`".repeat(Math.max(3, longestRun(node.literal, "`") + 1));
    return `${fence}${node.language}\n${node.literal}\n${fence}\n`;
  }

  private renderTaskGroup(groupId: string) {
    this.usedGroups.add(groupId);
    const lines = this.context.taskGroups.get(groupId);
    if (!lines) {
      this.warn("UnresolvedLinkWarning", "warning.missingTaskGroup", { id: groupId });
      return `- [ ] ${this.placeholder("placeholder.taskGroup", { id: groupId })}\n`;
    }
    return lines.length ? `${lines.join("\n")}\n` : "";
  }

  private renderForeign(node: ForeignNode) {
    if (node.reason === "encrypted") {
      this.notice("notice.encrypted");
      return `${this.placeholder("placeholder.encrypted")}\n`;
    }
    if (this.settings.dialect === "markdown-html" && !this.inTable) {
      this.notice("notice.htmlKept");
      return `${node.html.replace(/\n\s*\n/g, "\n").trim()}\n`;
    }
    this.notice("notice.htmlConverted");
    return this.renderBlockContent(node.children);
  }

  private renderInline(node: DocumentNode, lineStart: boolean): string {
    switch (node.kind) {
      case "text":
        return escapeMarkdown(node.text, {
          mode: this.htmlMode ? "html" : "prose",
          inTable: this.inTable,
          linkLabel: this.linkLabel,
          lineStart: lineStart && !this.inTable,
          strictness: this.settings.escapeStrictness,
        });
      case "lineBreak":
        return "\n";
      case "styled":
        return this.renderStyled(node, lineStart);
      case "link":
        return this.renderLink(node, lineStart);
      case "codeSpan":
        return this.renderCodeSpan(node);
      case "resource":
        return this.renderResource(node);
      case "image":
        return this.renderImage(node);
      case "checkbox":
        if (this.htmlMode) return `<input type="checkbox"${node.checked ? " checked" : ""}>`;
        if (this.inTable) return node.checked ? "[x] " : "[ ] ";
        return this.lists.checkboxPrefix(node.checked, !lineStart);
      case "opaque":
        if (this.settings.dialect === "markdown-html" && !this.inTable) {
          this.notice("notice.opaqueKept", { tag: node.tag });
          return node.html.replace(/\s*\n\s*/g, " ");
        }
        this.notice("notice.opaque", { tag: node.tag });
        return this.placeholder("placeholder.opaque", { tag: node.tag });
      default:
        return this.renderFlow(childrenOf(node), lineStart);
    }
  }

  private withHtml(render: () => string) {
    const saved = this.htmlMode;
    this.htmlMode = true;
    try {
      return render();
    } finally {
      this.htmlMode = saved;
    }
  }

  private renderStyled(node: StyledNode, lineStart: boolean) {
    const styles = new Set(node.styles);
    const droppedFont = styles.delete("fontFamily");
    const droppedSize = styles.delete("fontSize");
    if (droppedFont || droppedSize) this.notice("notice.fontDropped");
    if (node.linkColor && !this.settings.keepLinkColor) styles.delete("color");
    if (styles.size === 0) return this.renderFlow(node.children, lineStart);
    if (this.htmlMode) return this.renderStyledHtml(node, styles);

    const plainHighlight = isDefaultHighlight(node.attributes.highlight);
    const needsHtml =
      [...styles].some((style) => HTML_ONLY_STYLES.has(style)) ||
      (styles.has("highlight") && (!plainHighlight || styles.has("strike")));
    if (needsHtml) {
      if (this.settings.dialect === "markdown-html") return this.renderStyledHtml(node, styles);
      for (const style of [...styles]) {
        if (!HTML_ONLY_STYLES.has(style)) continue;
        styles.delete(style);
        this.notice("notice.styleDropped", { style: t(`style.${style}`) });
      }
      if (styles.has("highlight") && !plainHighlight) {
        this.notice("notice.styleDropped", { style: t("style.highlightColor") });
      }
      if (styles.has("highlight") && styles.has("strike")) {
        styles.delete("strike");
        this.notice("notice.styleDropped", { style: t("style.strike") });
      }
    }
    return this.renderStyledMarkdown(node, styles, lineStart);
  }

  private renderStyledMarkdown(node: StyledNode, styles: Set<InlineStyle>, lineStart: boolean) {
    const markers = MARKDOWN_MARKERS.filter(([style]) => styles.has(style) && !this.activeStyles.has(style));
    if (!markers.length) return this.renderFlow(node.children, lineStart);
    markers.forEach(([style]) => this.activeStyles.add(style));
    const hasBlocks = node.children.some(isBlock);
    let content: string;
    try {
      // Text opening a line among blocks is escaped so it cannot pass for a block marker.
      content = this.renderFlow(node.children, hasBlocks);
    } finally {
      markers.forEach(([style]) => this.activeStyles.delete(style));
    }
    const open = markers.map(([, marker]) => marker).join("");
    const close = [...markers].reverse().map(([, marker]) => marker).join("");
    return wrapLines(content, open, close, hasBlocks);
  }

  private renderStyledHtml(node: StyledNode, styles: Set<InlineStyle>) {
    const content = this.withHtml(() => this.renderFlow(node.children, false)).replace(/\n/g, "<br>");
    if (!content.trim()) return content;
    const tags: Array<[string, string]> = [];
    if (styles.has("bold")) tags.push(["<b>", "</b>"]);
    if (styles.has("italic")) tags.push(["<i>", "</i>"]);
    if (styles.has("underline")) tags.push(["<u>", "</u>"]);
    if (styles.has("strike")) tags.push(["<s>", "</s>"]);
    if (styles.has("superscript")) tags.push(["<sup>", "</sup>"]);
    if (styles.has("subscript")) tags.push(["<sub>", "</sub>"]);
    if (styles.has("highlight")) {
      const highlight = node.attributes.highlight;
      tags.push([
        isDefaultHighlight(highlight) ? "<mark>" : `<mark style="background-color: ${escapeAttr(highlight ?? "")}">`,
        "</mark>",
      ]);
    }
    if (styles.has("color") && node.attributes.color) {
      tags.push([`<span style="color: ${escapeAttr(node.attributes.color)}">`, "</span>"]);
    }
    const open = tags.map(([tag]) => tag).join("");
    const close = [...tags].reverse().map(([, tag]) => tag).join("");
    return `${open}${content}${close}`;
  }

  private renderLink(node: LinkNode, lineStart: boolean) {
    if (isNoteLink(node.href)) return this.renderNoteLink(node, lineStart);
    const savedLabel = this.linkLabel;
    this.linkLabel = "markdown";
    let label: string;
    try {
      label = this.renderFlow(node.children, false).replace(/\s*\n\s*/g, " ");
    } finally {
      this.linkLabel = savedLabel;
    }
    if (this.htmlMode) {
      return `<a href="${escapeAttr(node.href)}">${label.trim() ? label : escapeHtml(node.href)}</a>`;
    }
    const text = label.trim() ? label : escapeMarkdown(node.href, { linkLabel: "markdown", inTable: this.inTable });
    return `[${text}](${escapeLinkDestination(node.href)})`;
  }

  private linkColorOf(nodes: DocumentNode[]): string | null {
    for (const node of nodes) {
      if (node.kind === "styled" && node.linkColor && node.attributes.color) return node.attributes.color;
      if (node.kind === "styled") {
        const nested = this.linkColorOf(node.children);
        if (nested) return nested;
      }
    }
    return null;
  }

  private renderNoteLink(node: LinkNode, lineStart: boolean) {
    const resolved = this.context.index.resolve(node.href);
    const label = plainText(node.children).replace(/\s+/g, " ").trim();
    if (resolved.status === "unresolved") {
      this.warn("UnresolvedLinkWarning", "warning.unresolvedLink", { id: resolved.noteId ?? node.href, label });
      return this.renderFlow(node.children, lineStart);
    }
    const anchor = this.settings.blockAnchors && resolved.anchor ? `#^${resolved.anchor}` : "";
    const target = `${resolved.target}${anchor}`;
    const shown = this.settings.replaceBracketsInLinks ? label.replace(/\[/g, "(").replace(/\]/g, ")") : label;
    if (this.htmlMode) {
      return `<a class="internal-link" data-href="${escapeAttr(target)}" href="${escapeAttr(target)}">${escapeHtml(shown || target)}</a>`;
    }
    const escaped = escapeMarkdown(shown, { linkLabel: "wiki", inTable: this.inTable });
    const link = `${node.preview ? "!" : ""}[[${target}${escaped ? `${this.pipe}${escaped}` : ""}]]`;
    const color = this.settings.keepLinkColor ? this.linkColorOf(node.children) : null;
    if (color && this.settings.dialect === "markdown-html") {
      return `<span style="color: ${escapeAttr(color)}">${link}</span>`;
    }
    return link;
  }

  private renderCodeSpan(node: CodeSpanNode) {
    if (this.htmlMode) return `<code>${escapeHtml(node.literal)}</code>`;
    const fence = "`".repeat(longestRun(node.literal, "`") + 1);
    const pad = node.literal.startsWith("`") || node.literal.endsWith("`") ? " " : "";
    const body = this.inTable ? node.literal.replace(/\|/g, "\\|") : node.literal;
    return `${fence}${pad}${body}${pad}${fence}`;
  }

  private renderResource(node: ResourceNode) {
    const entry = this.context.index.resolveResource(this.context.noteId, node.hash);
    if (!entry) {
      this.warn("UnresolvedLinkWarning", "warning.missingResource", { hash: node.hash });
      return this.placeholder("placeholder.resource", { hash: node.hash });
    }
    const mime = (node.mime || entry.mime).toLowerCase();
    const width = readPixels(node.width);
    if (this.htmlMode) {
      return mime.startsWith("image/")
        ? `<img src="${escapeAttr(entry.link)}"${width ? ` width="${width}"` : ""}>`
        : `<a href="${escapeAttr(entry.link)}">${escapeHtml(entry.fileName)}</a>`;
    }
    const label = escapeMarkdown(entry.fileName, { linkLabel: "wiki", inTable: this.inTable });
    if (mime.startsWith("image/")) {
      if (node.align && !this.inTable) {
        if (this.settings.dialect === "markdown-html") {
          const size = node.align === "fullWidth" ? ` style="width: 100%"` : width ? ` width="${width}"` : "";
          const img = `<img src="${escapeAttr(entry.link)}"${size}>`;
          return node.align === "fullWidth" ? img : `<div style="text-align: ${node.align}">${img}</div>`;
        }
        this.notice("notice.imageAlignment");
      }
      return `![[${entry.link}${width ? `${this.pipe}${width}` : ""}]]`;
    }
    if (mime === "application/pdf") {
      const view =
        this.settings.pdfView === "default" ? (node.view === "attachment" ? "title" : "preview") : this.settings.pdfView;
      return view === "title" ? `[[${entry.link}${this.pipe}${label}]]` : `![[${entry.link}]]`;
    }
    if (mime.startsWith("audio/") || mime.startsWith("video/")) {
      return `![[${entry.link}]]`;
    }
    return `[[${entry.link}${this.pipe}${label}]]`;
  }

  private renderImage(node: ImageNode) {
    const alt = node.alt ? ` alt="${escapeAttr(node.alt)}"` : "";
    const title = node.title ? ` title="${escapeAttr(node.title)}"` : "";
    if (node.src.startsWith("data:")) {
      if (this.htmlMode || this.settings.dialect === "markdown-html") {
        this.notice("notice.base64ImageKept");
        return `<img src="${escapeAttr(node.src)}"${alt}${title}>`;
      }
      this.notice("notice.base64Image");
      return this.placeholder("placeholder.base64Image");
    }
    if (this.htmlMode) return `<img src="${escapeAttr(node.src)}"${alt}${title}>`;
    const label = escapeMarkdown(node.title || node.alt, { linkLabel: "markdown", inTable: this.inTable });
    return `![${label}](${escapeLinkDestination(node.src)})`;
  }
}

export const renderNoteBody = (root: RootNode, context: EmitContext) => new NoteWalker(context).render(root);
