import type { NoteRecord, NoteSelection, NotebookRecord } from "../state/types";
import { isEmptyContent, parseNoteContent } from "./enmlParser";
import { describeError, ParseError } from "./errors";
import { t, tCount } from "./i18n";
import { buildLinkIndex, isNoteLink, type LinkIndex } from "./linkIndex";
import { ListRenderer } from "./listRenderer";
import { logError } from "./logger";
import { childrenOf, plainText, walkNodes, type DocumentNode, type RootNode } from "./noteModel";
import type { ConvertSettings } from "./settings";
import { buildGrid } from "./tableGrid";

export type IssueCategory =
  | "parseError"
  | "titleCollision"
  | "invalidTitle"
  | "hiddenTitle"
  | "emptyNote"
  | "mergedCells"
  | "spanOverflow"
  | "nestedTable"
  | "unsupportedFormat"
  | "htmlContent"
  | "unresolvedLink"
  | "missingResource"
  | "indentedCodeBlock"
  | "emptyAttachment"
  | "largeAttachment"
  | "longPath"
  | "duplicateAttachmentName"
  | "invalidAttachmentName"
  | "invalidFolder"
  | "hiddenFolder";

export type IssueFinding = {
  noteId: string | null;
  category: IssueCategory;
  detail: string;
};

const INVALID_TITLE_CHARS = /[\\*"/<>:|?#^[\]]/g;
const EMOJI = /\p{Extended_Pictographic}/u;
const INVALID_FOLDER = /[\\*"/<>:|?]|[\s.]$/;
const INVALID_FILE_CHARS = /[\\*"/<>:|?]/g;

export const invalidTitleChars = (title: string, checkEmojis: boolean) => {
  const found = [...new Set(title.match(INVALID_TITLE_CHARS) ?? [])];
  if (checkEmojis && EMOJI.test(title)) found.push("emoji");
  return found;
};

class FindingList {
  readonly items: IssueFinding[] = [];
  private readonly seen = new Set<string>();

  add(noteId: string | null, category: IssueCategory, detail: string) {
    const key = `${noteId ?? ""}\u0000${category}\u0000${detail}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.items.push({ noteId, category, detail });
  }
}

const isBlankParagraph = (node: DocumentNode) =>
  node.kind === "paragraph" && plainText(node.children).trim() === "";

const scanIndentation = (root: RootNode, lists: ListRenderer, report: (detail: string) => void) => {
  const visitSiblings = (nodes: DocumentNode[]) => {
    nodes.forEach((node, position) => {
      const previous = position > 0 ? nodes[position - 1] : null;
      if (
        node.kind === "paragraph" &&
        node.indent > 0 &&
        previous !== null &&
        lists.indentedCodeRisk(node.indent, isBlankParagraph(previous))
      ) {
        report(t("issue.indentedCodeBlock"));
      }
      visitSiblings(childrenOf(node));
    });
  };
  visitSiblings(root.children);
};

const scanModel = (
  note: NoteRecord,
  root: RootNode,
  index: LinkIndex,
  settings: ConvertSettings,
  findings: FindingList
) => {
  const add = (category: IssueCategory, detail: string) => findings.add(note.id, category, detail);
  let mergedCells = 0;

  walkNodes(root, (node) => {
    switch (node.kind) {
      case "table": {
        if (!settings.checkTables) return;
        if (node.nested) add("nestedTable", t("issue.nestedTable"));
        mergedCells += node.rows.flat().filter((cell) => cell.rowSpan > 1 || cell.colSpan > 1).length;
        buildGrid(node.rows).overflows.forEach((overflow) =>
          add("spanOverflow", t("issue.spanOverflow", { row: overflow.row + 1, column: overflow.column + 1 }))
        );
        return;
      }
      case "styled": {
        if (!settings.checkFormat) return;
        const styles = node.styles;
        if (styles.has("underline")) add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.underline") }));
        if (styles.has("superscript")) add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.superscript") }));
        if (styles.has("subscript")) add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.subscript") }));
        if (styles.has("color") && !node.linkColor) {
          add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.color") }));
        }
        if (styles.has("highlight") && node.attributes.highlight && node.attributes.highlight !== "yellow") {
          add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.highlightColor") }));
        }
        if (styles.has("fontFamily") || styles.has("fontSize")) {
          add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("style.font") }));
        }
        return;
      }
      case "foreign":
        if (node.reason === "htmlContent") add("htmlContent", t("issue.htmlContent"));
        else add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("feature.encrypted") }));
        return;
      case "opaque":
        add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("feature.opaque", { tag: node.tag }) }));
        return;
      case "tableOfContents":
        add("unsupportedFormat", t("issue.unsupportedFormat", { feature: t("feature.tableOfContents") }));
        return;
      case "link": {
        if (!isNoteLink(node.href)) return;
        const resolved = index.resolve(node.href);
        if (resolved.status === "unresolved") {
          add("unresolvedLink", t("issue.unresolvedLink", { id: resolved.noteId ?? node.href }));
        }
        return;
      }
      case "resource":
        if (!index.resolveResource(note.id, node.hash)) {
          add("missingResource", t("issue.missingResource", { hash: node.hash }));
        }
        return;
      default:
        return;
    }
  });

  if (mergedCells > 0) add("mergedCells", tCount("issue.mergedCells", mergedCells));
  scanIndentation(root, new ListRenderer(settings.indentUnit), (detail) => add("indentedCodeBlock", detail));
};

const scanAttachments = (note: NoteRecord, index: LinkIndex, settings: ConvertSettings, findings: FindingList) => {
  const limitBytes = settings.maxAttachmentMB * 1024 * 1024;
  const names = new Map<string, number>();
  note.resources.forEach((resource) => {
    const name = resource.fileName?.trim() || resource.hash;
    if (resource.size === 0) {
      findings.add(note.id, "emptyAttachment", t("issue.emptyAttachment", { name }));
    } else if (settings.maxAttachmentMB > 0 && resource.size > limitBytes) {
      findings.add(
        note.id,
        "largeAttachment",
        t("issue.largeAttachment", {
          limit: settings.maxAttachmentMB,
          name,
          size: (resource.size / 1024 / 1024).toFixed(1),
        })
      );
    }
    if (resource.fileName) {
      const invalid = [...new Set(resource.fileName.match(INVALID_FILE_CHARS) ?? [])];
      if (resource.fileName.endsWith(".")) invalid.push(".");
      if (invalid.length) {
        findings.add(
          note.id,
          "invalidAttachmentName",
          t("issue.invalidAttachmentName", { name: resource.fileName, chars: invalid.join(" ") })
        );
      }
      const key = resource.fileName.trim().toLowerCase();
      names.set(key, (names.get(key) ?? 0) + 1);
      if (names.get(key) === 2) {
        findings.add(note.id, "duplicateAttachmentName", t("issue.duplicateAttachmentName", { name: resource.fileName }));
      }
    }
  });

  const limit = settings.maxPathLength;
  if (limit <= 0) return;
  const paths = [index.entry(note.id)?.path, ...index.attachmentsOf(note.id).map((asset) => asset.path)];
  paths.forEach((path) => {
    if (!path) return;
    const full = `${settings.outputFolder}/${path}`;
    if (full.length > limit) findings.add(note.id, "longPath", t("issue.longPath", { limit, path: full }));
  });
};

const scanFolders = (notebooks: NotebookRecord[], findings: FindingList) => {
  notebooks.forEach((notebook) => {
    [notebook.stack, notebook.name].forEach((name) => {
      if (!name) return;
      if (INVALID_FOLDER.test(name)) findings.add(null, "invalidFolder", t("issue.invalidFolder", { name }));
      if (name.startsWith(".")) findings.add(null, "hiddenFolder", t("issue.hiddenFolder", { name }));
    });
  });
};

/**
 * Read-only pass over the selection using the same parse, index and grid
 * logic as the conversion, without producing any output.
 */
export const scanSelection = (selection: NoteSelection, settings: ConvertSettings): IssueFinding[] => {
  const index = buildLinkIndex(selection, settings);
  const findings = new FindingList();
  scanFolders(selection.notebooks, findings);

  for (const note of selection.notes) {
    const invalid = invalidTitleChars(note.title, settings.checkEmojis);
    if (invalid.length) findings.add(note.id, "invalidTitle", t("issue.invalidTitle", { chars: invalid.join(" ") }));
    if (note.title.trim().startsWith(".")) findings.add(note.id, "hiddenTitle", t("issue.hiddenTitle"));
    const sharing = index.notesWithTitle(note.title);
    if (sharing.length > 1) {
      findings.add(note.id, "titleCollision", t("issue.titleCollision", { count: sharing.length }));
    }
    scanAttachments(note, index, settings, findings);

    let root: RootNode;
    try {
      root = parseNoteContent(note.content, note.id);
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      logError(`[scan] note ${note.id} could not be parsed`, e);
      findings.add(note.id, "parseError", t("issue.parseError", { message: describeError(e) }));
      continue;
    }
    if (isEmptyContent(root) && note.resources.length === 0 && note.tasks.length === 0) {
      findings.add(note.id, "emptyNote", t("issue.emptyNote"));
    }
    scanModel(note, root, index, settings, findings);
  }
  return findings.items;
};
