import type { NoteRecord } from "../state/types";
import { isEmptyContent, parseNoteContent } from "./enmlParser";
import type { ConversionWarning } from "./errors";
import { sanitizeFilename } from "./exportUtils";
import { buildFrontmatter } from "./frontmatter";
import { t } from "./i18n";
import type { LinkIndex } from "./linkIndex";
import { renderNoteBody } from "./markdownEmitter";
import type { ConvertSettings } from "./settings";
import { formatTaskGroups } from "./taskFormat";

export type ExportAsset = {
  resourceId: string;
  path: string;
};

export type NoteConversion = {
  noteId: string;
  title: string;
  path: string;
  preamble: string;
  body: string;
  content: string;
  attachments: ExportAsset[];
  warnings: ConversionWarning[];
  empty: boolean;
};

/**
 * Converts one note against an index built over the whole selection.
 * Throws ParseError when the stored markup cannot produce a tree.
 */
export const convertNote = (
  note: NoteRecord,
  index: LinkIndex,
  settings: ConvertSettings
): NoteConversion => {
  const root = parseNoteContent(note.content, note.id);
  const entry = index.entry(note.id);
  const warnings: ConversionWarning[] = [];

  const sharing = index.notesWithTitle(note.title);
  if (sharing.length > 1) {
    warnings.push({
      kind: "TitleCollisionWarning",
      detail: t("warning.titleCollision", { title: note.title, count: sharing.length }),
    });
  }

  const badZones = new Set<string>();
  const taskGroups = formatTaskGroups(note.tasks, {
    timeZone: settings.timeZone,
    extraFields: settings.taskExtraFields,
    onInvalidZone: (zone, fallback) => {
      if (badZones.has(zone)) return;
      badZones.add(zone);
      warnings.push({
        kind: "UnsupportedFeatureNotice",
        detail: t("notice.invalidTimeZone", { zone, fallback }),
      });
    },
  });
  const rendered = renderNoteBody(root, { noteId: note.id, index, settings, taskGroups, warnings });
  const body = settings.firstLineEmpty ? `\n${rendered}` : rendered;
  const preamble = buildFrontmatter(note, entry?.notebook ?? null, settings);

  return {
    noteId: note.id,
    title: note.title,
    path: entry?.path ?? `${sanitizeFilename(note.title)}.md`,
    preamble,
    body,
    content: `${preamble}${body}`,
    attachments: index.attachmentsOf(note.id).map((asset) => ({
      resourceId: asset.resourceId,
      path: asset.path,
    })),
    warnings,
    empty: isEmptyContent(root) && note.resources.length === 0 && note.tasks.length === 0,
  };
};
