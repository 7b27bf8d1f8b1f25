export type CatalogEntry =
  | { kind: 'year'; label: string }
  | { kind: 'file'; file: string };

const REPORT_EXTENSION = '.csv';

function unquote(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '');
}

/** Reads `file: "Display name"` lines; lines without a colon are ignored. */
export function parseTournamentMapping(text: string): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }
    mapping.set(unquote(line.slice(0, colon)), unquote(line.slice(colon + 1)));
  }
  return mapping;
}

export function isReportFile(file: string): boolean {
  return file.endsWith(REPORT_EXTENSION);
}

export function reportYear(file: string): string {
  const underscore = file.indexOf('_');
  return underscore === -1 ? file : file.slice(0, underscore);
}

export function sortReportFiles(files: readonly string[]): string[] {
  return files.filter(isReportFile).sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

/** Newest first, with a header entry whenever the year prefix changes. */
export function buildCatalogEntries(files: readonly string[]): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  let currentYear: string | null = null;
  for (const file of sortReportFiles(files)) {
    const year = reportYear(file);
    if (year !== currentYear) {
      entries.push({ kind: 'year', label: `--- ${year} ---` });
      currentYear = year;
    }
    entries.push({ kind: 'file', file });
  }
  return entries;
}

export function displayName(file: string, mapping: ReadonlyMap<string, string>): string {
  return mapping.get(file) ?? file;
}
