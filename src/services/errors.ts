export class ParseError extends Error {
  readonly noteId: string | null;

  constructor(message: string, noteId: string | null = null) {
    super(message);
    this.name = "ParseError";
    this.noteId = noteId;
  }
}

export type WarningKind =
  | "UnresolvedLinkWarning"
  | "TitleCollisionWarning"
  | "SpanOverflowWarning"
  | "UnsupportedFeatureNotice";

export type ConversionWarning = {
  kind: WarningKind;
  detail: string;
};

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

// "<detail> [Nx]", most frequent first.
export const summarizeWarnings = (warnings: ConversionWarning[]) => {
  const counts = new Map<string, number>();
  warnings.forEach((warning) => counts.set(warning.detail, (counts.get(warning.detail) ?? 0) + 1));
  return [...counts.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
    .map(([detail, count]) => `${detail} [${count}x]`);
};
