import type { NoteRecord, NotebookRecord } from "../state/types";
import type { ConvertSettings, MetadataField } from "./settings";
import { formatTimestamp } from "./exportUtils";

/**
 * Escape special characters for a YAML double-quoted scalar.
 */
export const escapeYamlString = (value: string) =>
  value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "")
    .replace(/[\u2028\u2029]/g, "");

const quoted = (value: string) => `"${escapeYamlString(value)}"`;

const FIELD_ORDER: MetadataField[] = ["created", "updated", "source", "author", "location", "tags", "notebook"];

const fieldLines = (
  field: MetadataField,
  note: NoteRecord,
  notebook: NotebookRecord | null,
  settings: ConvertSettings
): string[] => {
  switch (field) {
    case "created":
      return note.createdAt ? [`created: ${quoted(formatTimestamp(note.createdAt, settings.timeZone))}`] : [];
    case "updated":
      return note.updatedAt ? [`updated: ${quoted(formatTimestamp(note.updatedAt, settings.timeZone))}`] : [];
    case "source":
      return note.sourceUrl ? [`source_url: ${quoted(note.sourceUrl)}`] : [];
    case "author":
      return note.author ? [`author: ${quoted(note.author)}`] : [];
    case "location": {
      const location = note.location;
      if (!location) return [];
      const coords = [location.latitude, location.longitude];
      if (typeof location.altitude === "number") coords.push(location.altitude);
      return [`location: ${quoted(coords.join(", "))}`];
    }
    case "tags": {
      const tags = note.tags.map((tag) => tag.trim().replace(/\s+/g, "-")).filter(Boolean);
      return tags.length ? ["tags:", ...tags.map((tag) => `  - ${quoted(tag)}`)] : [];
    }
    case "notebook":
      if (!notebook) return [];
      return [`notebook: ${quoted(notebook.stack ? `${notebook.stack}/${notebook.name}` : notebook.name)}`];
    default:
      return [];
  }
};

// Empty when no allowed field has a value.
export const buildFrontmatter = (
  note: NoteRecord,
  notebook: NotebookRecord | null,
  settings: ConvertSettings
) => {
  const lines = FIELD_ORDER.filter((field) => settings.metadataFields.includes(field)).flatMap((field) =>
    fieldLines(field, note, notebook, settings)
  );
  return lines.length ? `---\n${lines.join("\n")}\n---\n` : "";
};
