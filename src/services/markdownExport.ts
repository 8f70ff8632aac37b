import { setImmediate as nextTurn } from "node:timers/promises";
import type { NoteSelection } from "../state/types";
import { describeError, summarizeWarnings, type ConversionWarning } from "./errors";
import { convertNote, type NoteConversion } from "./exportCommon";
import { getCurrentLanguage, initI18n, tCount } from "./i18n";
import { buildLinkIndex, type TitleCollision } from "./linkIndex";
import { logDebug, logError, logInfo, logWarn } from "./logger";
import type { ConvertSettings } from "./settings";

export type ExportOptions = {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (current: number, total: number) => void;
};

export type ExportFailure = {
  noteId: string;
  title: string;
  message: string;
};

export type SkippedNote = {
  noteId: string;
  title: string;
  reason: "empty";
};

export type ExportReport = {
  notes: number;
  converted: NoteConversion[];
  failures: ExportFailure[];
  skipped: SkippedNote[];
  warnings: string[];
  collisions: TitleCollision[];
  cancelled: boolean;
};

type Outcome =
  | { kind: "converted"; conversion: NoteConversion }
  | { kind: "failed"; failure: ExportFailure }
  | { kind: "skipped"; skipped: SkippedNote };

export const runMarkdownExport = async (
  selection: NoteSelection,
  settings: ConvertSettings,
  options: ExportOptions = {},
): Promise<ExportReport> => {
  if (getCurrentLanguage() !== settings.language) {
    await initI18n(settings.language);
  }

  // Every selected note is indexed before the first one is rendered.
  const index = buildLinkIndex(selection, settings);
  const notes = selection.notes;
  const outcomes: Array<Outcome | undefined> = new Array(notes.length);
  const workers = Math.max(1, Math.min(Math.floor(options.concurrency ?? 1), notes.length || 1));

  let cursor = 0;
  let processed = 0;
  let cancelled = false;
  options.onProgress?.(0, notes.length);

  const convertAt = (position: number): Outcome => {
    const note = notes[position];
    try {
      const conversion = convertNote(note, index, settings);
      if (conversion.empty && !settings.exportEmptyNotes) {
        return { kind: "skipped", skipped: { noteId: note.id, title: note.title, reason: "empty" } };
      }
      if (conversion.warnings.length) {
        logWarn(`[export] ${conversion.path}: ${conversion.warnings.length} warning(s)`);
      }
      logDebug("[export] converted", conversion.path);
      return { kind: "converted", conversion };
    } catch (e) {
      logError(`[export] note ${note.id} failed`, e);
      return { kind: "failed", failure: { noteId: note.id, title: note.title, message: describeError(e) } };
    }
  };

  const worker = async () => {
    while (cursor < notes.length) {
      if (options.signal?.aborted) {
        cancelled = true;
        return;
      }
      const position = cursor;
      cursor += 1;
      outcomes[position] = convertAt(position);
      processed += 1;
      options.onProgress?.(processed, notes.length);
      await nextTurn();
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));

  const converted: NoteConversion[] = [];
  const failures: ExportFailure[] = [];
  const skipped: SkippedNote[] = [];
  const warnings: ConversionWarning[] = [];
  outcomes.forEach((outcome) => {
    if (!outcome) return;
    if (outcome.kind === "converted") {
      converted.push(outcome.conversion);
      warnings.push(...outcome.conversion.warnings);
    } else if (outcome.kind === "failed") {
      failures.push(outcome.failure);
    } else {
      skipped.push(outcome.skipped);
    }
  });

  logInfo(`[export] ${tCount("report.converted", converted.length)}`);

  return {
    notes: notes.length,
    converted,
    failures,
    skipped,
    warnings: summarizeWarnings(warnings),
    collisions: index.collisions(),
    cancelled,
  };
};
