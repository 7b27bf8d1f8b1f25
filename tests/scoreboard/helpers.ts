import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { PlayerRoundRecord } from '../../shared/scoreboard/types';

export const PARS_68 = [3, 4, 3, 4, 4, 3, 4, 4, 5, 3, 4, 3, 4, 4, 3, 4, 4, 5];

export const FIXTURE_FILE = '2024_09_prague_open.csv';

export function readFixture(name = FIXTURE_FILE): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');
}

export function parHoles(overrides: Record<number, string> = {}): string[] {
  return PARS_68.map((par, idx) => overrides[idx + 1] ?? String(par));
}

export function makeRecord(
  name: string,
  totalScore: string,
  roundScore: string,
  holeScores: string[] = parHoles(),
): PlayerRoundRecord {
  return { place: '1', name, totalScore, roundScore, holeScores, rating: '1000' };
}
