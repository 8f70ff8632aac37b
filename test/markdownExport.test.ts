import { beforeAll, describe, it, expect } from "vitest";
import { convertNote } from "../src/services/exportCommon";
import { buildLinkIndex } from "../src/services/linkIndex";
import { setLogLevel } from "../src/services/logger";
import { runMarkdownExport } from "../src/services/markdownExport";
import { makeNote, makeSelection, makeTask, noteLink, settingsWith } from "./helpers";

beforeAll(() => {
  setLogLevel("silent");
});

// ---------------------------------------------------------------------------
// Single note
// ---------------------------------------------------------------------------

describe("convertNote", () => {
  const note = makeNote({
    title: "Plan",
    tags: ["a"],
    content: "<en-note><div>Body</div></en-note>",
    resources: [{ id: "r1", hash: "abc1", mime: "image/png", fileName: "pic.png", size: 10 }],
  });
  const selection = makeSelection([note, makeNote({ id: "aa02", title: "Plan" })]);

  it("joins frontmatter and body", () => {
    const settings = settingsWith({ metadataFields: ["tags"], firstLineEmpty: true });
    const result = convertNote(note, buildLinkIndex(selection, settings), settings);
    expect(result.path).toBe("Inbox/Plan.md");
    expect(result.preamble).toBe('---\ntags:\n  - "a"\n---\n');
    expect(result.body).toBe("\nBody\n");
    expect(result.content).toBe('---\ntags:\n  - "a"\n---\n\nBody\n');
    expect(result.attachments).toEqual([{ resourceId: "r1", path: "Inbox/_resources/pic.png" }]);
    expect(result.empty).toBe(false);
  });

  it("warns about notes sharing the title", () => {
    const settings = settingsWith();
    const result = convertNote(note, buildLinkIndex(selection, settings), settings);
    expect(result.warnings).toEqual([{ kind: "TitleCollisionWarning", detail: '2 notes share the title "Plan"' }]);
  });

  it("reports an unknown task time zone once and uses the default zone", () => {
    const settings = settingsWith();
    const tasky = makeNote({
      tasks: [
        makeTask({ dueDate: Date.UTC(2025, 0, 15, 8, 30), timeZone: "Mars/Olympus" }),
        makeTask({ id: "t2", label: "Call", timeZone: "Mars/Olympus" }),
      ],
    });
    const result = convertNote(tasky, buildLinkIndex(makeSelection([tasky]), settings), settings);
    expect(result.body).toBe("Hello\n\n- [ ] Pay bill 📅 2025-01-15 08:30 +00:00\n- [ ] Call\n");
    expect(result.warnings).toEqual([
      { kind: "UnsupportedFeatureNotice", detail: "Unknown time zone Mars/Olympus replaced with UTC" },
      { kind: "UnsupportedFeatureNotice", detail: "Task group g1 is not placed in the note body, appended at the end" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Whole runs
// ---------------------------------------------------------------------------

const alpha = makeNote({
  id: "aa01",
  title: "Alpha",
  content: `<en-note><div>To <a href="${noteLink("bb02")}">Beta</a></div></en-note>`,
});
const beta = makeNote({
  id: "bb02",
  title: "Beta",
  content: `<en-note><div>Back to <a href="${noteLink("aa01")}">Alpha</a></div></en-note>`,
});
const empty = makeNote({ id: "cc03", title: "Empty", content: "<en-note><div><br/></div></en-note>" });
const broken = makeNote({ id: "dd04", title: "Broken", content: "<en-note>\u0000</en-note>" });

describe("runMarkdownExport", () => {
  it("converts, skips and fails notes independently", async () => {
    const report = await runMarkdownExport(makeSelection([alpha, beta, empty, broken]), settingsWith(), {
      concurrency: 2,
    });
    expect(report.notes).toBe(4);
    expect(report.converted.map((note) => [note.path, note.content])).toEqual([
      ["Inbox/Alpha.md", "To [[Inbox/Beta.md|Beta]]\n"],
      ["Inbox/Beta.md", "Back to [[Inbox/Alpha.md|Alpha]]\n"],
    ]);
    expect(report.skipped).toEqual([{ noteId: "cc03", title: "Empty", reason: "empty" }]);
    expect(report.failures).toEqual([{ noteId: "dd04", title: "Broken", message: "markup contains NUL characters" }]);
    expect(report.warnings).toEqual([]);
    expect(report.cancelled).toBe(false);
  });

  it("writes empty notes when asked to", async () => {
    const report = await runMarkdownExport(makeSelection([empty]), settingsWith({ exportEmptyNotes: true }));
    expect(report.converted.map((note) => [note.noteId, note.content, note.empty])).toEqual([["cc03", "", true]]);
    expect(report.skipped).toEqual([]);
  });

  it("reports progress for every note", async () => {
    const calls: Array<[number, number]> = [];
    await runMarkdownExport(makeSelection([alpha, beta, empty]), settingsWith(), {
      concurrency: 3,
      onProgress: (current, total) => calls.push([current, total]),
    });
    expect(calls).toEqual([
      [0, 3],
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it("counts repeated warnings across notes", async () => {
    const gone = (id: string) =>
      makeNote({ id, title: id, content: `<en-note><div><a href="${noteLink("ffff")}">Gone</a></div></en-note>` });
    const report = await runMarkdownExport(makeSelection([gone("aa01"), gone("aa02")]), settingsWith());
    expect(report.warnings).toEqual(["Link target not in selection: ffff (Gone) [2x]"]);
  });

  it("stops before the first note when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await runMarkdownExport(makeSelection([alpha, beta]), settingsWith(), {
      signal: controller.signal,
    });
    expect(report.cancelled).toBe(true);
    expect(report.converted).toEqual([]);
    expect(report.notes).toBe(2);
  });

  it("lists title collisions", async () => {
    const twin = makeNote({ id: "ee05", title: "alpha " });
    const report = await runMarkdownExport(makeSelection([alpha, twin]), settingsWith());
    expect(report.collisions).toEqual([{ title: "alpha", noteIds: ["aa01", "ee05"] }]);
  });
});
