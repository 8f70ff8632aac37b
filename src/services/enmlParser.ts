import { JSDOM } from "jsdom";
import { ParseError } from "./errors";
import { isLikelyEncoded, readStyle } from "./importCommon";
import type {
  Alignment,
  DocumentNode,
  ImageAlignment,
  InlineStyle,
  ListItemNode,
  ListKind,
  ParagraphNode,
  ResourceView,
  RootNode,
  StyleAttributes,
  TableCellNode,
} from "./noteModel";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "dd", "details", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "footer", "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "hr", "li", "main", "nav", "ol", "p", "pre", "section", "table", "ul",
]);

const OPAQUE_TAGS = new Set([
  "svg", "object", "embed", "iframe", "video", "audio", "canvas", "form", "math", "applet", "map",
]);

const STYLE_TAGS: Record<string, InlineStyle> = {
  b: "bold",
  strong: "bold",
  i: "italic",
  em: "italic",
  u: "underline",
  ins: "underline",
  s: "strike",
  strike: "strike",
  del: "strike",
  sup: "superscript",
  sub: "subscript",
};

const HTML_CONTENT_PATTERN =
  /(?:^|;)\s*(?:flex\s*:|box-shadow\s*:|float\s*:\s*(?:left|right)|position\s*:\s*(?:absolute|fixed|sticky))/i;

const LINK_GREEN_PATTERN =
  /^(?:rgb\(\s*105\s*,\s*170\s*,\s*53\s*\)|rgb\(\s*24\s*,\s*168\s*,\s*65\s*\)|#69aa35)$/i;

const DEFAULT_TEXT_COLOR = /^(?:rgb\(\s*0\s*,\s*0\s*,\s*0\s*\)|#000(?:000)?|black)$/i;

type BuildState = {
  listDepth: number;
  tableDepth: number;
};

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

const tagOf = (el: Element) => el.tagName.toLowerCase();

const styleOf = (el: Element) => el.getAttribute("style") ?? "";

const normalizeEnml = (markup: string) =>
  markup
    .replace(/<(en-media|en-todo|en-crypt)\b([^>]*?)\s*\/>/gi, "<$1$2></$1>")
    .replace(/<br\s*\/?>\s*<\/br>/gi, "<br>");

const collapseWhitespace = (text: string) => text.replace(/[ \t]*[\r\n]+[ \t]*/g, " ");

const readAlignment = (style: string, attr: string | null): Alignment | undefined => {
  const value = (readStyle(style, "text-align") ?? attr ?? "").toLowerCase();
  if (value === "center" || value === "right" || value === "left") return value;
  return undefined;
};

const readIndent = (style: string) => {
  const match = style.match(/(?:padding|margin)-left\s*:\s*(\d+)\s*px/i);
  return match ? Math.floor(Number(match[1]) / 40) : 0;
};

const readSpan = (value: string | null) => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 1 ? parsed : 1;
};

const extractLiteral = (el: Element): string => {
  const walk = (node: Node): string => {
    if (node.nodeType === TEXT_NODE) return node.textContent ?? "";
    if (!isElement(node)) return "";
    const tag = tagOf(node);
    if (tag === "br") return "\n";
    const inner = Array.from(node.childNodes).map(walk).join("");
    if (BLOCK_TAGS.has(tag) && node !== el) {
      return inner.endsWith("\n") ? inner : `${inner}\n`;
    }
    return inner;
  };
  return walk(el).replace(/\n$/, "");
};

const mergeText = (nodes: DocumentNode[]) => {
  const merged: DocumentNode[] = [];
  for (const node of nodes) {
    const last = merged[merged.length - 1];
    if (node.kind === "text" && last?.kind === "text") {
      merged[merged.length - 1] = { kind: "text", text: last.text + node.text };
    } else {
      merged.push(node);
    }
  }
  return merged;
};

const inlineStylesOf = (el: Element, style: string) => {
  const styles = new Set<InlineStyle>();
  const attributes: StyleAttributes = {};
  if (/font-weight\s*:\s*(?:bold|[6-9]00)/i.test(style)) styles.add("bold");
  if (/font-style\s*:\s*italic/i.test(style)) styles.add("italic");
  if (/text-decoration[^;]*line-through/i.test(style)) styles.add("strike");
  if (/text-decoration[^;]*underline/i.test(style)) styles.add("underline");
  const verticalAlign = readStyle(style, "vertical-align");
  if (verticalAlign === "super") styles.add("superscript");
  if (verticalAlign === "sub") styles.add("subscript");
  const highlight = readStyle(style, "--en-highlight");
  if (highlight) {
    styles.add("highlight");
    attributes.highlight = highlight.toLowerCase();
  }
  const color = readStyle(style, "color") ?? el.getAttribute("color");
  if (color && !DEFAULT_TEXT_COLOR.test(color.trim())) {
    styles.add("color");
    attributes.color = color.trim();
  }
  const fontFamily = readStyle(style, "--en-fontfamily") ?? readStyle(style, "font-family") ?? el.getAttribute("face");
  if (fontFamily) {
    styles.add("fontFamily");
    attributes.fontFamily = fontFamily;
  }
  const fontSize = readStyle(style, "font-size") ?? el.getAttribute("size");
  if (fontSize) {
    styles.add("fontSize");
    attributes.fontSize = fontSize;
  }
  return { styles, attributes };
};

const buildChildren = (parent: Node, state: BuildState): DocumentNode[] => {
  const nodes: DocumentNode[] = [];
  for (const child of Array.from(parent.childNodes)) {
    if (child.nodeType === TEXT_NODE) {
      const raw = child.textContent ?? "";
      if (!raw || (/[\r\n]/.test(raw) && !raw.trim())) continue;
      nodes.push({ kind: "text", text: collapseWhitespace(raw) });
    } else if (isElement(child)) {
      nodes.push(...buildElement(child, state));
    }
  }
  return mergeText(nodes);
};

const buildParagraph = (el: Element, style: string, state: BuildState): ParagraphNode => ({
  kind: "paragraph",
  align: readAlignment(style, el.getAttribute("align")),
  indent: readIndent(style),
  children: buildChildren(el, state),
});

const buildDiv = (el: Element, state: BuildState): DocumentNode[] => {
  const style = styleOf(el);
  if (/--en-tableofcontents\s*:\s*true/i.test(style)) {
    return [{ kind: "tableOfContents" }];
  }
  if (/--en-codeblock\s*:\s*true/i.test(style)) {
    return [{
      kind: "codeBlock",
      language: readStyle(style, "--en-syntaxLanguage") ?? "",
      literal: extractLiteral(el),
    }];
  }
  if (/--en-task-group\s*:\s*true/i.test(style)) {
    return [{ kind: "taskGroup", groupId: readStyle(style, "--en-id") ?? "" }];
  }
  if (HTML_CONTENT_PATTERN.test(style)) {
    return [{
      kind: "foreign",
      reason: "htmlContent",
      html: el.outerHTML,
      children: buildChildren(el, state),
    }];
  }
  return [buildParagraph(el, style, state)];
};

const buildList = (el: Element, state: BuildState): DocumentNode[] => {
  const depth = state.listDepth + 1;
  const inner: BuildState = { ...state, listDepth: depth };
  const items: ListItemNode[] = [];
  let isCheckbox = false;
  for (const child of Array.from(el.childNodes)) {
    if (!isElement(child)) {
      const text = collapseWhitespace(child.textContent ?? "").trim();
      if (text && child.nodeType === TEXT_NODE) {
        items.push({ kind: "listItem", depth, children: [{ kind: "text", text }] });
      }
      continue;
    }
    const tag = tagOf(child);
    if (tag === "li") {
      const style = styleOf(child);
      const checkedMatch = style.match(/--en-checked\s*:\s*(true|false)/i);
      if (checkedMatch) isCheckbox = true;
      items.push({
        kind: "listItem",
        depth,
        checked: checkedMatch ? checkedMatch[1].toLowerCase() === "true" : undefined,
        children: buildChildren(child, inner),
      });
    } else {
      const built = buildElement(child, inner);
      const previous = items[items.length - 1];
      if (previous) previous.children.push(...built);
      else items.push({ kind: "listItem", depth, children: built });
    }
  }
  const listKind: ListKind = isCheckbox ? "checkbox" : tagOf(el) === "ol" ? "numbered" : "bullet";
  return [{ kind: "list", listKind, depth, items }];
};

const cellAlignment = (cell: Element): Alignment | undefined => {
  const own = readAlignment(styleOf(cell), cell.getAttribute("align"));
  if (own) return own;
  const first = cell.firstElementChild;
  return first ? readAlignment(styleOf(first), first.getAttribute("align")) : undefined;
};

const buildTable = (el: Element, state: BuildState): DocumentNode[] => {
  const inner: BuildState = { ...state, tableDepth: state.tableDepth + 1 };
  const rows = Array.from(el.querySelectorAll("tr"))
    .filter((tr) => tr.closest("table") === el)
    .map((tr) =>
      Array.from(tr.children)
        .filter((cell) => tagOf(cell) === "td" || tagOf(cell) === "th")
        .map((cell): TableCellNode => ({
          kind: "tableCell",
          rowSpan: readSpan(cell.getAttribute("rowspan")),
          colSpan: readSpan(cell.getAttribute("colspan")),
          align: cellAlignment(cell),
          header: tagOf(cell) === "th",
          children: buildChildren(cell, { ...inner, listDepth: 0 }),
        }))
    );
  return [{ kind: "table", rows, nested: state.tableDepth > 0 }];
};

const buildMedia = (el: Element): DocumentNode[] => {
  const hash = (el.getAttribute("hash") ?? "").toLowerCase();
  if (!hash) return [];
  const style = styleOf(el);
  const mime = (el.getAttribute("type") ?? "").toLowerCase();
  const height = el.getAttribute("height") ?? undefined;
  let view: ResourceView = "inline";
  if (/--en-viewAs\s*:\s*attachment/i.test(style)) {
    view = "attachment";
  } else if (mime === "application/pdf" && !style && height?.includes("autopx")) {
    view = "attachment";
  } else if (/--en-viewAs\s*:\s*(?:pdf-|evernote-note-snippet-preview)/i.test(style)) {
    view = "preview";
  }
  const alignMatch = style.match(/--en-imageAlignment\s*:\s*(center|right|fullWidth)/i);
  const alignValue = alignMatch?.[1].toLowerCase();
  const align: ImageAlignment | undefined =
    alignValue === "center" ? "center" : alignValue === "right" ? "right" : alignValue === "fullwidth" ? "fullWidth" : undefined;
  return [{
    kind: "resource",
    hash,
    mime,
    width: el.getAttribute("width") ?? undefined,
    height,
    view,
    align,
  }];
};

const buildStyled = (el: Element, state: BuildState, extra?: InlineStyle): DocumentNode[] => {
  const { styles, attributes } = inlineStylesOf(el, styleOf(el));
  if (extra) styles.add(extra);
  const children = buildChildren(el, state);
  if (styles.size === 0) return children;
  const linkColor =
    attributes.color !== undefined && LINK_GREEN_PATTERN.test(attributes.color) && el.closest("a") !== null;
  return [{ kind: "styled", styles, attributes, linkColor, children }];
};

const buildElement = (el: Element, state: BuildState): DocumentNode[] => {
  const tag = tagOf(el);
  if (OPAQUE_TAGS.has(tag)) {
    return [{ kind: "opaque", tag, html: el.outerHTML }];
  }
  const styleTag = STYLE_TAGS[tag];
  if (styleTag) return buildStyled(el, state, styleTag);

  switch (tag) {
    case "en-crypt":
      return [{ kind: "foreign", reason: "encrypted", html: el.outerHTML, children: [] }];
    case "div":
      return buildDiv(el, state);
    case "p":
    case "li":
      return [buildParagraph(el, styleOf(el), state)];
    case "center":
      return [{ ...buildParagraph(el, styleOf(el), state), align: "center" }];
    case "span":
    case "font":
      return buildStyled(el, state);
    case "h1":
    case "h2":
    case "h3":
    case "h4":
    case "h5":
    case "h6":
      return [{ kind: "heading", level: Number(tag.slice(1)), children: buildChildren(el, state) }];
    case "ul":
    case "ol":
      return buildList(el, state);
    case "table":
      return buildTable(el, state);
    case "blockquote":
      return [{ kind: "quote", children: buildChildren(el, state) }];
    case "pre": {
      const codeEl = el.querySelector("code");
      const languageMatch = (codeEl?.getAttribute("class") ?? "").match(/language-([\w+#-]+)/);
      return [{ kind: "codeBlock", language: languageMatch?.[1] ?? "", literal: extractLiteral(el) }];
    }
    case "code": {
      const literal = extractLiteral(el);
      if (literal.includes("\n")) return [{ kind: "codeBlock", language: "", literal }];
      return literal ? [{ kind: "codeSpan", literal }] : [];
    }
    case "a": {
      const href = (el.getAttribute("href") ?? "").trim();
      const children = buildChildren(el, state);
      if (!href) return children;
      const parent = el.parentElement;
      const preview = parent !== null && /evernote-note-snippet-preview/i.test(styleOf(parent));
      return [{ kind: "link", href, preview, children }];
    }
    case "img": {
      const src = (el.getAttribute("src") ?? "").trim();
      if (!src) return [];
      return [{ kind: "image", src, alt: el.getAttribute("alt") ?? "", title: el.getAttribute("title") ?? "" }];
    }
    case "en-media":
      return buildMedia(el);
    case "en-todo":
      return [{ kind: "checkbox", checked: (el.getAttribute("checked") ?? "").toLowerCase() === "true" }];
    case "input":
      if ((el.getAttribute("type") ?? "").toLowerCase() === "checkbox") {
        return [{ kind: "checkbox", checked: el.hasAttribute("checked") }];
      }
      return [];
    case "hr":
      return [{ kind: "divider" }];
    case "br":
      return [{ kind: "lineBreak" }];
    case "script":
    case "style":
    case "head":
    case "title":
    case "meta":
      return [];
    default:
      return buildChildren(el, state);
  }
};

export const parseNoteContent = (markup: string, noteId: string | null = null): RootNode => {
  if (markup.includes("\u0000")) {
    throw new ParseError("markup contains NUL characters", noteId);
  }
  if (isLikelyEncoded(markup)) {
    throw new ParseError("content is an encoded blob, not markup", noteId);
  }
  const fragment = JSDOM.fragment(normalizeEnml(markup));
  const note = fragment.querySelector("en-note");
  if (!note && /<en-note\b/i.test(markup)) {
    throw new ParseError("en-note root element could not be built", noteId);
  }
  return {
    kind: "root",
    children: buildChildren(note ?? fragment, { listDepth: 0, tableDepth: 0 }),
  };
};

export const isEmptyContent = (root: RootNode) => {
  const hasContent = (nodes: DocumentNode[]): boolean =>
    nodes.some((node) => {
      switch (node.kind) {
        case "text":
          return node.text.trim().length > 0;
        case "lineBreak":
          return false;
        case "paragraph":
        case "styled":
        case "heading":
          return hasContent(node.children);
        default:
          return true;
      }
    });
  return !hasContent(root.children);
};
