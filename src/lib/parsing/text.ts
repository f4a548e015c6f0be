const WHITESPACE_REGEX =
  /[\s\u00A0\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]+/g;
const LINE_BREAK_REGEX = /\r\n|\r|\n|\u2028|\u2029/;

/** Collapses every whitespace variant PDF extraction emits into one ASCII space. */
export function normalizeWhitespace(text: string): string {
  return text.normalize('NFC').replaceAll(WHITESPACE_REGEX, ' ').trim();
}

export function splitPageLines(pageText: string): string[] {
  return pageText
    .split(LINE_BREAK_REGEX)
    .map((line) => normalizeWhitespace(line))
    .filter((line) => line.length > 0);
}

export type LabelMatchMode = 'contains' | 'suffix';

export type LabelledEntry = {
  label: string;
  match: LabelMatchMode;
};

export function matchesLabel(line: string, entry: LabelledEntry): boolean {
  const haystack = line.toLowerCase();
  const needle = entry.label.toLowerCase();
  return entry.match === 'suffix'
    ? haystack.endsWith(needle)
    : haystack.includes(needle);
}

// Directories are curated so that at most one label fits a line.
export function findLabel<T extends LabelledEntry>(
  line: string,
  entries: readonly T[],
): T | null {
  return entries.find((entry) => matchesLabel(line, entry)) ?? null;
}

export function findAllLabels<T extends LabelledEntry>(
  line: string,
  entries: readonly T[],
): T[] {
  return entries.filter((entry) => matchesLabel(line, entry));
}

/** Index of the first case-insensitive occurrence of `label`, or null. */
export function firstOccurrence(text: string, label: string): number | null {
  const index = normalizeWhitespace(text)
    .toLowerCase()
    .indexOf(label.toLowerCase());
  return index === -1 ? null : index;
}

export type LineKind = 'dates' | 'label' | 'both' | 'none';

export function classifyLine(hasDates: boolean, hasLabel: boolean): LineKind {
  if (hasDates && hasLabel) return 'both';
  if (hasDates) return 'dates';
  if (hasLabel) return 'label';
  return 'none';
}
