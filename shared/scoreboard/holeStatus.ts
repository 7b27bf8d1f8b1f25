import { parseHoleScore } from './tokens';
import type { HoleStatus, PlayerRoundRecord, ScoredRecord } from './types';

const LABEL_BY_DIFF: Partial<Record<number, string>> = {
  [-4]: 'CONDOR',
  [-3]: 'ALBATROSS',
  [-2]: 'EAGLE',
  [-1]: 'BIRDIE',
  0: 'PAR',
  1: 'BOGEY',
  2: 'DOUBLE BOGEY',
  3: 'TRIPLE BOGEY',
  4: 'QUADRUPLE BOGEY',
  5: 'QUINTUPLE BOGEY',
};

export const HOLE_IN_ONE = 'HOLE IN ONE';

function isAce(diff: number, par: number): boolean {
  return (diff === -2 && par === 3) || (diff === -3 && par === 4);
}

export function holeLabel(diff: number, par: number): string {
  if (isAce(diff, par)) {
    return HOLE_IN_ONE;
  }
  return LABEL_BY_DIFF[diff] ?? `${diff}x BOGEY`;
}

export function computeHoleStatus(holeScores: readonly string[], pars: readonly number[]): HoleStatus {
  const count = Math.min(holeScores.length, pars.length);
  const diff: number[] = [];
  const label: string[] = [];
  for (let idx = 0; idx < count; idx += 1) {
    const par = pars[idx];
    const value = parseHoleScore(holeScores[idx]) - par;
    diff.push(value);
    label.push(holeLabel(value, par));
  }
  return { diff, label };
}

export function withHoleStatus(records: readonly PlayerRoundRecord[], pars: readonly number[]): ScoredRecord[] {
  return records.map((record) => ({ ...record, status: computeHoleStatus(record.holeScores, pars) }));
}
