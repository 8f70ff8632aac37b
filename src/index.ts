export type {
  GeoLocation,
  NoteRecord,
  NoteResource,
  NoteSelection,
  NotebookRecord,
  TaskPriority,
  TaskRecord,
  TaskReminder,
} from "./state/types";
export type * from "./services/noteModel";
export { childrenOf, isBlock, plainText, walkNodes } from "./services/noteModel";
export { isEmptyContent, parseNoteContent } from "./services/enmlParser";
export { ParseError, summarizeWarnings } from "./services/errors";
export type { ConversionWarning, WarningKind } from "./services/errors";
export { buildLinkIndex, isNoteLink, parseLinkReference } from "./services/linkIndex";
export type { AttachmentEntry, LinkIndex, LinkReference, NoteEntry, ResolvedLink, TitleCollision } from "./services/linkIndex";
export { DEFAULT_ESCAPE_CONTEXT, escapeLinkDestination, escapeMarkdown } from "./services/markdownEscape";
export type { EscapeContext, EscapeMode, LinkLabelMode } from "./services/markdownEscape";
export { buildGrid, flattenGrid, renderTable } from "./services/tableGrid";
export type { Grid, GridSlot, SpanCell, SpanOverflow } from "./services/tableGrid";
export { ListRenderer } from "./services/listRenderer";
export { renderNoteBody } from "./services/markdownEmitter";
export type { EmitContext } from "./services/markdownEmitter";
export { formatTask, formatTaskGroups } from "./services/taskFormat";
export type { TaskFormatOptions } from "./services/taskFormat";
export { buildFrontmatter, escapeYamlString } from "./services/frontmatter";
export { convertNote } from "./services/exportCommon";
export type { ExportAsset, NoteConversion } from "./services/exportCommon";
export { runMarkdownExport } from "./services/markdownExport";
export type { ExportFailure, ExportOptions, ExportReport, SkippedNote } from "./services/markdownExport";
export { invalidTitleChars, scanSelection } from "./services/issueScan";
export type { IssueCategory, IssueFinding } from "./services/issueScan";
export { DEFAULT_SETTINGS, loadSettings, normalizeSettings, saveSettings } from "./services/settings";
export type { ConvertSettings, Dialect, EscapeStrictness, MetadataField, PdfView, TaskExtraField } from "./services/settings";
export { getCurrentLanguage, initI18n, t, tCount } from "./services/i18n";
export type { LanguageCode } from "./services/i18n";
export { setLogLevel } from "./services/logger";
export type { LogLevel } from "./services/logger";
