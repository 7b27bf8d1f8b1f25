import { HOLE_COUNT } from './clean';
import { withHoleStatus } from './holeStatus';
import { SCORE_SENTINEL, parseRelativeScore } from './tokens';
import type { PlayerRoundRecord, StandingsRow } from './types';

type StandingEntry = {
  name: string;
  /** null when the total or round score cannot be resolved (DNF). */
  total: number | null;
  rd: number | null;
  holeScores: string[];
  order: number;
};

export function startScore(record: Pick<PlayerRoundRecord, 'totalScore' | 'roundScore'>): number | null {
  const total = parseRelativeScore(record.totalScore);
  const round = parseRelativeScore(record.roundScore);
  if (total === null || round === null) {
    return null;
  }
  return total - round;
}

export function formatToPar(value: number | null): string {
  if (value === null || value >= SCORE_SENTINEL) {
    return 'DNF';
  }
  if (value === 0) {
    return 'E';
  }
  return value > 0 ? `+${value}` : String(value);
}

export function standingsTitle(holes: number): string {
  if (holes === 0) {
    return 'Standings Before the Round';
  }
  return holes < HOLE_COUNT ? `Standings After ${holes} holes` : 'Final Standings';
}

function assertCutoff(holes: number): void {
  if (!Number.isInteger(holes) || holes < 0 || holes > HOLE_COUNT) {
    throw new RangeError(`Cutoff must be an integer between 0 and ${HOLE_COUNT}, got ${holes}`);
  }
}

function compareNullable(a: number | null, b: number | null): number {
  if (a === null && b === null) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a - b;
}

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function compareEntries(a: StandingEntry, b: StandingEntry, preRound: boolean): number {
  const byTotal = compareNullable(a.total, b.total);
  if (byTotal !== 0 || preRound) {
    return byTotal || a.order - b.order;
  }
  const byRound = compareNullable(a.rd, b.rd);
  if (byRound !== 0) {
    return byRound;
  }
  return compareNames(a.name, b.name) || a.order - b.order;
}

/**
 * "Min" competition ranking on the total: tied players share the best place
 * of their group and the next distinct total resumes after the group.
 */
export function competitionPlaces(totals: readonly number[]): number[] {
  return totals.map((value) => 1 + totals.filter((other) => other < value).length);
}

export function formatPlaces(places: readonly number[]): string[] {
  const counts = new Map<number, number>();
  for (const place of places) {
    counts.set(place, (counts.get(place) ?? 0) + 1);
  }
  return places.map((place) => ((counts.get(place) ?? 0) > 1 ? `T${place}` : String(place)));
}

// Every total rendered as DNF ranks in one group at the sentinel.
function rankingTotal(total: number | null): number {
  return total === null ? SCORE_SENTINEL : Math.min(total, SCORE_SENTINEL);
}

function buildEntries(records: readonly PlayerRoundRecord[], pars: readonly number[], holes: number): StandingEntry[] {
  if (holes === 0) {
    return records.map((record, order) => ({
      name: record.name,
      total: startScore(record),
      rd: 0,
      holeScores: [],
      order,
    }));
  }
  return withHoleStatus(records, pars).map((record, order) => {
    const start = startScore(record);
    const played = record.status.diff.slice(0, holes).reduce((sum, value) => sum + value, 0);
    const total = start === null ? null : start + played;
    return {
      name: record.name,
      total,
      rd: total === null || start === null ? null : total - start,
      holeScores: record.holeScores.slice(0, holes),
      order,
    };
  });
}

export function computeStandings(
  records: readonly PlayerRoundRecord[],
  pars: readonly number[],
  holes: number,
): StandingsRow[] {
  assertCutoff(holes);
  const preRound = holes === 0;
  const entries = buildEntries(records, pars, holes).sort((a, b) => compareEntries(a, b, preRound));
  const places = formatPlaces(competitionPlaces(entries.map((entry) => rankingTotal(entry.total))));
  return entries.map((entry, idx) => ({
    place: places[idx],
    name: entry.name,
    total: formatToPar(entry.total),
    rd: formatToPar(entry.rd),
    holeScores: entry.holeScores,
  }));
}
