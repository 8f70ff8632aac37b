import type { EscapeStrictness } from "./settings";
import { escapeHtml } from "./importCommon";

export type EscapeMode = "prose" | "code" | "html";
export type LinkLabelMode = "none" | "markdown" | "wiki";

export type EscapeContext = {
  mode: EscapeMode;
  inTable: boolean;
  linkLabel: LinkLabelMode;
  lineStart: boolean;
  strictness: EscapeStrictness;
};

export const DEFAULT_ESCAPE_CONTEXT: EscapeContext = {
  mode: "prose",
  inTable: false,
  linkLabel: "none",
  lineStart: false,
  strictness: "sparing",
};

const URL_PATTERN = /\b(?:[a-z][a-z0-9+.-]*:\/\/|www\.|mailto:)[^\s<>]*[^\s<>.,;:!?)\]'"]/gi;
const ASCII_PUNCT = /[!-/:-@[-`{-~]/;
const WORD = /[\p{L}\p{N}]/u;
const TAG_AHEAD = /^#[\p{L}\p{N}_/-]*[\p{L}_/-]/u;
const BLOCK_ID_AHEAD = /^\^[A-Za-z0-9-]+$/;
const HTML_TAG_AHEAD = /^<[A-Za-z/!?][^<>]*>/;
const ENTITY_AHEAD = /^&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/i;
const LINK_AHEAD = /^\[[^\]]*\]\s?[([]/;
const THEMATIC_BREAK = /^(?:(?:-[ \t]*){3,}|(?:_[ \t]*){3,}|(?:\*[ \t]*){3,}|=+|-+)$/;

const isSpace = (ch: string) => ch === "" || /\s/.test(ch);
const isWord = (ch: string) => ch !== "" && WORD.test(ch);

const urlMask = (text: string) => {
  const mask = new Array<boolean>(text.length).fill(false);
  for (const match of text.matchAll(URL_PATTERN)) {
    const start = match.index ?? 0;
    for (let i = start; i < start + match[0].length; i += 1) mask[i] = true;
  }
  return mask;
};

const runEnd = (text: string, start: number) => {
  let end = start;
  while (text[end] === text[start]) end += 1;
  return end;
};

const countRuns = (text: string, ch: string, minLength: number, mask: boolean[]) => {
  let count = 0;
  let i = 0;
  while (i < text.length) {
    if (text[i] === ch && !mask[i]) {
      const end = runEnd(text, i);
      if (end - i >= minLength) count += 1;
      i = end;
    } else {
      i += 1;
    }
  }
  return count;
};

const markLineStart = (text: string, marks: Set<number>) => {
  const lead = text.length - text.trimStart().length;
  if (lead > 3) return;
  const rest = text.slice(lead);
  if (THEMATIC_BREAK.test(rest.trimEnd())) {
    marks.add(lead);
    return;
  }
  if (/^>/.test(rest) || /^[-+*](?:\s|$)/.test(rest) || /^#{1,6}(?:\s|$)/.test(rest)) {
    marks.add(lead);
    return;
  }
  const ordered = rest.match(/^\d{1,9}([.)])(?:\s|$)/);
  if (ordered) {
    marks.add(lead + ordered[0].indexOf(ordered[1]));
  }
};

const markProse = (text: string, context: EscapeContext) => {
  const strict = context.strictness === "strict";
  const markdownLabel = context.linkLabel === "markdown";
  const mask = urlMask(text);
  const marks = new Set<number>();
  const pairCounts = new Map<string, number>();
  const pairs = (ch: string, minLength: number) => {
    const key = `${ch}${minLength}`;
    const cached = pairCounts.get(key);
    if (cached !== undefined) return cached;
    const count = countRuns(text, ch, minLength, mask);
    pairCounts.set(key, count);
    return count;
  };

  if (context.lineStart) markLineStart(text, marks);

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const prev = text[i - 1] ?? "";
    const next = text[i + 1] ?? "";
    if (mask[i]) {
      if (ch === "|" && context.inTable) marks.add(i);
      i += 1;
      continue;
    }
    switch (ch) {
      case "*":
      case "_": {
        const end = runEnd(text, i);
        const before = prev;
        const after = text[end] ?? "";
        let escape = strict;
        if (!escape && !(isSpace(before) && isSpace(after))) {
          const intraword = ch === "_" && isWord(before) && isWord(after);
          escape = !intraword && (pairs(ch, 1) >= 2 || i === 0 || end === text.length);
        }
        if (escape) {
          for (let j = i; j < end; j += 1) marks.add(j);
        }
        i = end;
        continue;
      }
      case "=":
      case "~": {
        const end = runEnd(text, i);
        if (end - i >= 2) {
          const after = text[end] ?? "";
          const flanking = !(isSpace(prev) && isSpace(after));
          if (flanking && (pairs(ch, 2) >= 2 || i === 0 || end === text.length)) marks.add(i);
        }
        i = end;
        continue;
      }
      case "$":
        if (strict || (pairs("$", 1) >= 2 && !(isSpace(prev) && isSpace(next)))) marks.add(i);
        break;
      case "\\":
        if (strict || i === text.length - 1 || ASCII_PUNCT.test(next)) marks.add(i);
        break;
      case "`":
        marks.add(i);
        break;
      case "[":
        if (strict || markdownLabel || next === "[" || prev === "[" || next === "^" || LINK_AHEAD.test(text.slice(i))) {
          marks.add(i);
        }
        break;
      case "]":
        if (strict || markdownLabel) marks.add(i);
        break;
      case "(":
      case ")":
        if (markdownLabel) marks.add(i);
        break;
      case "#":
        if (isSpace(prev) && TAG_AHEAD.test(text.slice(i))) marks.add(i);
        break;
      case "%":
        if (prev === "%") marks.add(i);
        break;
      case "^":
        if (isSpace(prev) && BLOCK_ID_AHEAD.test(text.slice(i))) marks.add(i);
        break;
      case "<":
        if (HTML_TAG_AHEAD.test(text.slice(i))) marks.add(i);
        break;
      case "&":
        if (ENTITY_AHEAD.test(text.slice(i))) marks.add(i);
        break;
      case "|":
        if (context.inTable) marks.add(i);
        break;
      default:
        break;
    }
    i += 1;
  }
  return marks;
};

export const escapeMarkdown = (text: string, context: Partial<EscapeContext> = {}) => {
  const ctx: EscapeContext = { ...DEFAULT_ESCAPE_CONTEXT, ...context };
  if (!text || ctx.mode === "code") return text;
  if (ctx.mode === "html") return escapeHtml(text);
  if (ctx.linkLabel === "wiki") {
    const label = text.replace(/\[{2,}|\]{2,}/g, (run) => run.replace(/./g, "\\$&"));
    return ctx.inTable ? label.replace(/\|/g, "\\|") : label;
  }
  const marks = markProse(text, ctx);
  if (marks.size === 0) return text;
  let out = "";
  for (let i = 0; i < text.length; i += 1) {
    out += marks.has(i) ? `\\${text[i]}` : text[i];
  }
  return out;
};

export const escapeLinkDestination = (href: string) => {
  if (!/[\s()<>]/.test(href)) return href;
  return `<${href.replace(/</g, "%3C").replace(/>/g, "%3E")}>`;
};
