export const sanitizeFilename = (value: string) => {
  const cleaned = value
    .replace(/[<>:"/\\|?*\x00-\x1F]/g, "_")
    .replace(/\s+/g, " ")
    .trim();
  return cleaned || "Untitled";
};

export const normalizePathPart = (value: string) =>
  sanitizeFilename(value).replace(/[\s.]+$/g, "");

export const ensureUniqueName = (
  name: string,
  used: Map<string, number>,
  suffix: string,
  scope = ""
) => {
  const keyOf = (candidate: string) => `${scope}/${candidate}`.toLowerCase();
  const baseKey = keyOf(name + suffix);
  if (!used.has(baseKey)) {
    used.set(baseKey, 1);
    return name + suffix;
  }
  let count = used.get(baseKey) ?? 1;
  let candidate = name + suffix;
  do {
    count += 1;
    candidate = `${name}-${count}${suffix}`;
  } while (used.has(keyOf(candidate)));
  used.set(baseKey, count);
  used.set(keyOf(candidate), 1);
  return candidate;
};

export const joinPath = (...parts: Array<string | null | undefined>) =>
  parts.filter((part): part is string => Boolean(part)).join("/");

export const buildNoteFolder = (stack: string | null, notebook: string) => {
  const stackPart = stack ? normalizePathPart(stack) : "";
  const notebookPart = normalizePathPart(notebook) || "Untitled";
  return joinPath(stackPart, notebookPart);
};

export const splitExtension = (filename: string) => {
  const extIdx = filename.lastIndexOf(".");
  if (extIdx <= 0) return { base: filename, ext: "" };
  return { base: filename.slice(0, extIdx), ext: filename.slice(extIdx) };
};

export const extFromMime = (mime?: string | null) => {
  if (!mime) return null;
  const map: Record<string, string> = {
    "image/jpeg": "jpg",
    "image/jpg": "jpg",
    "image/png": "png",
    "image/gif": "gif",
    "image/webp": "webp",
    "image/bmp": "bmp",
    "image/svg+xml": "svg",
    "image/tiff": "tiff",
    "application/pdf": "pdf",
    "text/plain": "txt",
    "text/html": "html",
    "text/csv": "csv",
    "application/json": "json",
    "application/zip": "zip",
    "audio/mpeg": "mp3",
    "audio/wav": "wav",
    "audio/x-m4a": "m4a",
    "audio/amr": "amr",
    "video/mp4": "mp4",
    "video/quicktime": "mov",
    "application/msword": "doc",
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
    "application/vnd.ms-excel": "xls",
    "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  };
  return map[mime.toLowerCase()] || null;
};

type DateParts = {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  offset: string;
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string) => {
  const cached = formatterCache.get(timeZone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "longOffset",
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (zone: string) => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
};

export const dateParts = (epochMs: number, timeZone = "UTC"): DateParts => {
  const parts = getFormatter(timeZone).formatToParts(new Date(epochMs));
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value ?? "";
  const zoneName = pick("timeZoneName");
  const offsetMatch = zoneName.match(/([+-]\d{2}:\d{2})$/);
  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second"),
    offset: offsetMatch ? offsetMatch[1] : "+00:00",
  };
};

export const formatTimestamp = (epochMs: number, timeZone = "UTC") => {
  const p = dateParts(epochMs, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
};
