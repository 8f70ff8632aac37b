import type { ListKind } from "./noteModel";

export type FrameKind = ListKind | "quote";

type IndentFrame = {
  kind: FrameKind;
  counter: number;
};

const columnsOf = (indent: string) =>
  Array.from(indent).reduce((width, ch) => width + (ch === "\t" ? 4 : 1), 0);

/**
 * Line prefixes for nested lists, quotes and free-standing indentation.
 * One instance per note; frames are pushed and popped as the walker enters
 * and leaves list and quote nodes.
 */
export class ListRenderer {
  private readonly frames: IndentFrame[] = [];

  constructor(private readonly indentUnit = "    ") {}

  get depth() {
    return this.frames.filter((frame) => frame.kind !== "quote").length;
  }

  get quoteDepth() {
    return this.frames.filter((frame) => frame.kind === "quote").length;
  }

  enterList(kind: ListKind) {
    this.frames.push({ kind, counter: 0 });
  }

  exitList() {
    const index = this.findLast((frame) => frame.kind !== "quote");
    if (index >= 0) this.frames.splice(index, 1);
  }

  enterQuote() {
    this.frames.push({ kind: "quote", counter: 0 });
  }

  exitQuote() {
    const index = this.findLast((frame) => frame.kind === "quote");
    if (index >= 0) this.frames.splice(index, 1);
  }

  itemPrefix(checked?: boolean) {
    const index = this.findLast((frame) => frame.kind !== "quote");
    if (index < 0) return "";
    const frame = this.frames[index];
    const indent = this.indentUnit.repeat(Math.max(0, this.depth - 1));
    if (frame.kind === "checkbox" || checked !== undefined) {
      return `${indent}- [${checked ? "x" : " "}] `;
    }
    if (frame.kind === "numbered") {
      frame.counter += 1;
      return `${indent}${frame.counter}. `;
    }
    return `${indent}- `;
  }

  continuationIndent() {
    return this.indentUnit.repeat(this.depth);
  }

  indentPrefix(level: number) {
    return this.indentUnit.repeat(Math.max(0, level));
  }

  quotePrefix() {
    return "> ".repeat(this.quoteDepth);
  }

  // A line already holding text cannot carry a second checkbox.
  // The enclosing item or quote prefixes the new line itself.
  checkboxPrefix(checked: boolean, lineHasContent: boolean) {
    const box = `- [${checked ? "x" : " "}] `;
    return lineHasContent ? `\n${box}` : box;
  }

  indentedCodeRisk(level: number, afterBlankLine: boolean) {
    return afterBlankLine && columnsOf(this.indentPrefix(level)) >= 4;
  }

  private findLast(predicate: (frame: IndentFrame) => boolean) {
    for (let i = this.frames.length - 1; i >= 0; i -= 1) {
      if (predicate(this.frames[i])) return i;
    }
    return -1;
  }
}
