import type { NoteRecord, NoteResource, NoteSelection, NotebookRecord } from "../state/types";
import type { ConvertSettings } from "./settings";
import {
  buildNoteFolder,
  ensureUniqueName,
  extFromMime,
  joinPath,
  sanitizeFilename,
  splitExtension,
} from "./exportUtils";
import { normalizeTitle } from "./importCommon";

export type LinkReference = {
  noteId: string;
  blockId?: string;
};

export type ResolvedLink =
  | { status: "resolved"; noteId: string; target: string; anchor?: string }
  | { status: "unresolved"; noteId: string | null };

export type NoteEntry = {
  noteId: string;
  title: string;
  notebook: NotebookRecord | null;
  folder: string;
  fileName: string;
  path: string;
  linkTarget: string;
};

export type AttachmentEntry = {
  resourceId: string;
  noteId: string;
  hash: string;
  mime: string;
  size: number;
  originalName: string | null;
  fileName: string;
  path: string;
  link: string;
};

export type TitleCollision = {
  title: string;
  noteIds: string[];
};

export type LinkIndex = {
  readonly size: number;
  entry: (noteId: string) => NoteEntry | null;
  resolve: (reference: string | LinkReference) => ResolvedLink;
  resolveResource: (noteId: string, hash: string) => AttachmentEntry | null;
  attachmentsOf: (noteId: string) => AttachmentEntry[];
  skippedResources: (noteId: string) => NoteResource[];
  notesWithTitle: (title: string) => string[];
  collisions: () => TitleCollision[];
};

const INTERNAL_LINK = /^evernote:\/\/\/view\/[^/]+\/[^/]+\/([0-9a-f-]+)\/[^#]*(?:#(?:\^|block=)?([\w-]+))?/i;
const LEGACY_LINK = /^https?:\/\/www\.evernote\.com\/[^/]+\/[^/]+\/[^/]+\/[^/]+\/([0-9a-f-]+)/i;
const SHARE_LINK = /^https?:\/\/share\.evernote\.com\/note\/([0-9a-f-]+)/i;

export const isNoteLink = (href: string) =>
  INTERNAL_LINK.test(href) || LEGACY_LINK.test(href) || SHARE_LINK.test(href);

export const parseLinkReference = (href: string): LinkReference | null => {
  const trimmed = href.trim();
  const internal = trimmed.match(INTERNAL_LINK);
  if (internal) {
    return internal[2]
      ? { noteId: internal[1].toLowerCase(), blockId: internal[2] }
      : { noteId: internal[1].toLowerCase() };
  }
  const legacy = trimmed.match(LEGACY_LINK) ?? trimmed.match(SHARE_LINK);
  return legacy ? { noteId: legacy[1].toLowerCase() } : null;
};

const notebookKey = (notebook: NotebookRecord) =>
  `${notebook.stack ?? ""}${notebook.name}`.toLowerCase();

const compareNotes = (a: NoteRecord, b: NoteRecord) => {
  const byTitle = a.title.toLowerCase().localeCompare(b.title.toLowerCase());
  return byTitle !== 0 ? byTitle : a.id.localeCompare(b.id);
};

const attachmentName = (resource: NoteResource) => {
  const { base, ext } = splitExtension(resource.fileName?.trim() || "unnamed");
  let extension = ext;
  if (!extension.trim() && resource.mime.toLowerCase() !== "application/octet-stream") {
    const fromMime = extFromMime(resource.mime);
    if (fromMime) extension = `.${fromMime}`;
  }
  const root = base.trim() ? base : "unnamed";
  return splitExtension(sanitizeFilename(`${root}${extension}`));
};

/**
 * Index over every selected note, built before any note is rendered so
 * links resolve to the same destination whatever order notes are
 * converted in.
 */
export const buildLinkIndex = (selection: NoteSelection, settings: ConvertSettings): LinkIndex => {
  const notes = new Map<string, NoteEntry>();
  const attachments = new Map<string, AttachmentEntry[]>();
  const byHash = new Map<string, AttachmentEntry>();
  const skipped = new Map<string, NoteResource[]>();
  const titles = new Map<string, string[]>();
  const usedNames = new Map<string, number>();

  const notesByNotebook = new Map<string, NoteRecord[]>();
  selection.notes.forEach((note) => {
    const list = notesByNotebook.get(note.notebookId) ?? [];
    list.push(note);
    notesByNotebook.set(note.notebookId, list);
  });

  const knownNotebooks = new Set(selection.notebooks.map((notebook) => notebook.id));
  const orphanNotes = selection.notes.filter((note) => !knownNotebooks.has(note.notebookId));
  const groups: Array<{ notebook: NotebookRecord | null; notes: NoteRecord[] }> = [
    ...[...selection.notebooks]
      .sort((a, b) => notebookKey(a).localeCompare(notebookKey(b)))
      .map((notebook) => ({ notebook, notes: notesByNotebook.get(notebook.id) ?? [] })),
    { notebook: null, notes: orphanNotes },
  ];

  for (const { notebook, notes: members } of groups) {
    const folder = notebook ? buildNoteFolder(notebook.stack, notebook.name) : "";
    const scope = settings.linksWithFolders ? folder : "";
    for (const note of [...members].sort(compareNotes)) {
      const fileName = ensureUniqueName(sanitizeFilename(note.title), usedNames, ".md", scope);
      const path = joinPath(folder, fileName);
      notes.set(note.id.toLowerCase(), {
        noteId: note.id,
        title: note.title,
        notebook,
        folder,
        fileName,
        path,
        linkTarget: settings.linksWithFolders ? path : fileName,
      });

      const key = normalizeTitle(note.title);
      titles.set(key, [...(titles.get(key) ?? []), note.id]);

      const entries: AttachmentEntry[] = [];
      const resourcesFolder = joinPath(folder, "_resources");
      for (const resource of note.resources) {
        if (resource.size === 0 && !settings.exportEmptyFiles) {
          skipped.set(note.id, [...(skipped.get(note.id) ?? []), resource]);
          continue;
        }
        const { base, ext } = attachmentName(resource);
        const unique = ensureUniqueName(base, usedNames, ext, resourcesFolder);
        const entry: AttachmentEntry = {
          resourceId: resource.id,
          noteId: note.id,
          hash: resource.hash.toLowerCase(),
          mime: resource.mime,
          size: resource.size,
          originalName: resource.fileName,
          fileName: unique,
          path: joinPath(resourcesFolder, unique),
          link: joinPath("_resources", unique),
        };
        entries.push(entry);
        byHash.set(`${note.id}:${entry.hash}`, entry);
      }
      attachments.set(note.id, entries);
    }
  }

  const collisionList: TitleCollision[] = [...titles.entries()]
    .filter(([, ids]) => ids.length > 1)
    .map(([title, ids]) => ({ title, noteIds: ids }));

  return {
    size: notes.size,
    entry: (noteId) => notes.get(noteId.toLowerCase()) ?? null,
    resolve: (reference) => {
      const parsed = typeof reference === "string" ? parseLinkReference(reference) : reference;
      if (!parsed) return { status: "unresolved", noteId: null };
      const target = notes.get(parsed.noteId.toLowerCase());
      if (!target) return { status: "unresolved", noteId: parsed.noteId };
      return parsed.blockId
        ? { status: "resolved", noteId: target.noteId, target: target.linkTarget, anchor: parsed.blockId }
        : { status: "resolved", noteId: target.noteId, target: target.linkTarget };
    },
    resolveResource: (noteId, hash) => byHash.get(`${noteId}:${hash.toLowerCase()}`) ?? null,
    attachmentsOf: (noteId) => attachments.get(noteId) ?? [],
    skippedResources: (noteId) => skipped.get(noteId) ?? [],
    notesWithTitle: (title) => titles.get(normalizeTitle(title)) ?? [],
    collisions: () => collisionList.map((collision) => ({ ...collision, noteIds: [...collision.noteIds] })),
  };
};
