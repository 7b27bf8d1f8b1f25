import { MARKERS, locateLine, requireLine } from './clean';
import { StructureNotFoundError } from './errors';
import type { RoundInfo, TournamentDetails } from './types';

// Round info sits below the "RD 1", "RD 2", "FINAL" column labels.
const ROUND_INFO_OFFSET = 3;

export function parseTournamentDetails(lines: readonly string[]): TournamentDetails {
  let index = locateLine(lines, MARKERS.tier);
  let marker: string = MARKERS.tier;
  if (index === -1) {
    index = locateLine(lines, MARKERS.major);
    marker = MARKERS.major;
  }
  if (index === -1) {
    throw new StructureNotFoundError(MARKERS.tier, 'Tournament details not found');
  }
  const fields = lines.slice(index + 1, index + 4);
  if (fields.length < 3) {
    throw new StructureNotFoundError(marker, 'Tournament details are incomplete');
  }
  const [name, date, location] = fields;
  return { name, date, location };
}

export function parseRoundInfo(lines: readonly string[]): RoundInfo {
  const index = requireLine(lines, MARKERS.firstRound, 'Round information');
  if (index + ROUND_INFO_OFFSET >= lines.length) {
    throw new StructureNotFoundError(MARKERS.firstRound, 'Round information is missing after the round header');
  }
  return lines[index + ROUND_INFO_OFFSET];
}
