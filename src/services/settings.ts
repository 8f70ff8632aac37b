import { readFile, writeFile } from "node:fs/promises";
import { isValidTimeZone } from "./exportUtils";
import { isSupportedLanguage, type LanguageCode } from "./i18n";
import { logError } from "./logger";

export type Dialect = "markdown" | "markdown-html";
export type EscapeStrictness = "sparing" | "strict";
export type PdfView = "default" | "title" | "preview";
export type MetadataField = "created" | "updated" | "source" | "author" | "location" | "tags" | "notebook";
export type TaskExtraField = "assignee" | "description" | "overdue";

export type ConvertSettings = {
  dialect: Dialect;
  metadataFields: MetadataField[];
  keepLinkColor: boolean;
  escapeStrictness: EscapeStrictness;
  indentUnit: string;
  linksWithFolders: boolean;
  replaceBracketsInLinks: boolean;
  pdfView: PdfView;
  blockAnchors: boolean;
  firstLineEmpty: boolean;
  exportEmptyNotes: boolean;
  exportEmptyFiles: boolean;
  timeZone: string;
  taskExtraFields: TaskExtraField[];
  language: LanguageCode;
  outputFolder: string;
  maxPathLength: number;
  maxAttachmentMB: number;
  checkEmojis: boolean;
  checkTables: boolean;
  checkFormat: boolean;
};

const METADATA_FIELDS: MetadataField[] = ["created", "updated", "source", "author", "location", "tags", "notebook"];
const TASK_EXTRA_FIELDS: TaskExtraField[] = ["assignee", "description", "overdue"];

export const DEFAULT_SETTINGS: ConvertSettings = {
  dialect: "markdown",
  metadataFields: ["created", "updated", "source", "author", "tags"],
  keepLinkColor: false,
  escapeStrictness: "sparing",
  indentUnit: "    ",
  linksWithFolders: true,
  replaceBracketsInLinks: false,
  pdfView: "default",
  blockAnchors: false,
  firstLineEmpty: false,
  exportEmptyNotes: false,
  exportEmptyFiles: false,
  timeZone: "UTC",
  taskExtraFields: [],
  language: "en",
  outputFolder: "md",
  maxPathLength: 256,
  maxAttachmentMB: 5,
  checkEmojis: true,
  checkTables: true,
  checkFormat: true,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const pickList = <T extends string>(value: unknown, allowed: T[]): T[] | null => {
  if (!Array.isArray(value)) return null;
  const picked: T[] = [];
  value.forEach((item) => {
    const match = allowed.find((entry) => entry === item);
    if (match && !picked.includes(match)) picked.push(match);
  });
  return picked;
};

const readCount = (value: unknown) => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
};

export const normalizeSettings = (stored: unknown): ConvertSettings => {
  const draft: ConvertSettings = {
    ...DEFAULT_SETTINGS,
    metadataFields: [...DEFAULT_SETTINGS.metadataFields],
    taskExtraFields: [...DEFAULT_SETTINGS.taskExtraFields],
  };
  if (!isRecord(stored)) return draft;

  if (stored.dialect === "markdown" || stored.dialect === "markdown-html") {
    draft.dialect = stored.dialect;
  }
  const metadataFields = pickList(stored.metadataFields, METADATA_FIELDS);
  if (metadataFields) draft.metadataFields = metadataFields;
  if (stored.keepLinkColor !== undefined) {
    draft.keepLinkColor = Boolean(stored.keepLinkColor);
  }
  if (stored.escapeStrictness === "sparing" || stored.escapeStrictness === "strict") {
    draft.escapeStrictness = stored.escapeStrictness;
  }
  if (typeof stored.indentUnit === "string" && /^(?: {1,8}|\t)$/.test(stored.indentUnit)) {
    draft.indentUnit = stored.indentUnit;
  } else if (typeof stored.indentUnit === "number" && stored.indentUnit >= 1 && stored.indentUnit <= 8) {
    draft.indentUnit = " ".repeat(Math.floor(stored.indentUnit));
  }
  if (stored.linksWithFolders !== undefined) {
    draft.linksWithFolders = Boolean(stored.linksWithFolders);
  }
  if (stored.replaceBracketsInLinks !== undefined) {
    draft.replaceBracketsInLinks = Boolean(stored.replaceBracketsInLinks);
  }
  if (stored.pdfView === "default" || stored.pdfView === "title" || stored.pdfView === "preview") {
    draft.pdfView = stored.pdfView;
  }
  if (stored.blockAnchors !== undefined) {
    draft.blockAnchors = Boolean(stored.blockAnchors);
  }
  if (stored.firstLineEmpty !== undefined) {
    draft.firstLineEmpty = Boolean(stored.firstLineEmpty);
  }
  if (stored.exportEmptyNotes !== undefined) {
    draft.exportEmptyNotes = Boolean(stored.exportEmptyNotes);
  }
  if (stored.exportEmptyFiles !== undefined) {
    draft.exportEmptyFiles = Boolean(stored.exportEmptyFiles);
  }
  if (typeof stored.timeZone === "string" && isValidTimeZone(stored.timeZone)) {
    draft.timeZone = stored.timeZone;
  }
  const taskExtraFields = pickList(stored.taskExtraFields, TASK_EXTRA_FIELDS);
  if (taskExtraFields) draft.taskExtraFields = taskExtraFields;
  if (typeof stored.language === "string" && isSupportedLanguage(stored.language)) {
    draft.language = stored.language;
  }
  if (typeof stored.outputFolder === "string" && stored.outputFolder.trim()) {
    draft.outputFolder = stored.outputFolder.trim().replace(/\\/g, "/");
  }
  const maxPathLength = readCount(stored.maxPathLength);
  if (maxPathLength !== null) draft.maxPathLength = Math.floor(maxPathLength);
  const maxAttachmentMB = readCount(stored.maxAttachmentMB);
  if (maxAttachmentMB !== null) draft.maxAttachmentMB = maxAttachmentMB;
  if (stored.checkEmojis !== undefined) {
    draft.checkEmojis = Boolean(stored.checkEmojis);
  }
  if (stored.checkTables !== undefined) {
    draft.checkTables = Boolean(stored.checkTables);
  }
  if (stored.checkFormat !== undefined) {
    draft.checkFormat = Boolean(stored.checkFormat);
  }
  return draft;
};

export const loadSettings = async (path: string): Promise<ConvertSettings> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return normalizeSettings(null);
    }
    logError("[settings] load failed", e);
    return normalizeSettings(null);
  }
  try {
    return normalizeSettings(JSON.parse(raw));
  } catch (e) {
    logError(`[settings] invalid JSON in ${path}, using defaults`, e);
    return normalizeSettings(null);
  }
};

export const saveSettings = async (path: string, settings: ConvertSettings) => {
  const sorted = Object.fromEntries(
    Object.entries(settings).sort(([a], [b]) => a.localeCompare(b)),
  );
  await writeFile(path, `${JSON.stringify(sorted, null, 2)}\n`, "utf-8");
};
