import type { NoteRecord, NotebookRecord, NoteSelection, TaskRecord } from "../src/state/types";
import { normalizeSettings, type ConvertSettings } from "../src/services/settings";

export const makeNotebook = (overrides: Partial<NotebookRecord> = {}): NotebookRecord => ({
  id: "nb-1",
  name: "Inbox",
  stack: null,
  ...overrides,
});

export const makeNote = (overrides: Partial<NoteRecord> = {}): NoteRecord => ({
  id: "aa01",
  title: "Main",
  content: "<en-note><div>Hello</div></en-note>",
  notebookId: "nb-1",
  createdAt: null,
  updatedAt: null,
  tags: [],
  resources: [],
  tasks: [],
  ...overrides,
});

export const makeTask = (overrides: Partial<TaskRecord> = {}): TaskRecord => ({
  id: "t1",
  groupId: "g1",
  label: "Pay bill",
  status: "open",
  flagged: false,
  reminders: [],
  ...overrides,
});

export const makeSelection = (notes: NoteRecord[], notebooks: NotebookRecord[] = [makeNotebook()]): NoteSelection => ({
  notebooks,
  notes,
});

export const settingsWith = (overrides: Partial<ConvertSettings> = {}): ConvertSettings => ({
  ...normalizeSettings(null),
  ...overrides,
});

export const noteLink = (id: string) => `evernote:///view/1/s1/${id}/${id}/`;
