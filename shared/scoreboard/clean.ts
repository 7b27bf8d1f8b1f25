import { StructureNotFoundError } from './errors';

export const HOLE_COUNT = 18;

export const DISCLAIMER_PREFIXES: readonly string[] = ['CASH LINE'];

export const MARKERS = {
  tier: 'TIER',
  major: 'MAJOR',
  firstRound: 'RD 1',
  course: 'Thru',
  roundStart: 'ALL PLAYERS',
  roundEnd: 'COLOR ACCESSIBILITY',
} as const;

export function cleanLines(lines: readonly string[]): string[] {
  const cleaned: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (!line) {
      continue;
    }
    if (DISCLAIMER_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      continue;
    }
    cleaned.push(line);
  }
  return cleaned;
}

export function splitReport(text: string): string[] {
  return text.split(/\r?\n/);
}

export function locateLine(lines: readonly string[], marker: string, from = 0): number {
  for (let idx = Math.max(0, from); idx < lines.length; idx += 1) {
    if (lines[idx].includes(marker)) {
      return idx;
    }
  }
  return -1;
}

export function requireLine(lines: readonly string[], marker: string, what: string, from = 0): number {
  const index = locateLine(lines, marker, from);
  if (index === -1) {
    throw new StructureNotFoundError(marker, `${what} not found (missing "${marker}")`);
  }
  return index;
}
