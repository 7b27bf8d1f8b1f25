import { HOLE_COUNT, MARKERS, locateLine, requireLine } from './clean';
import { StructureNotFoundError } from './errors';
import { normalizePlayerName } from './names';
import { isMovementToken } from './tokens';
import type { ParseOutcome, PlayerRoundRecord } from './types';

export type RecordField = 'place' | 'movement' | 'name' | 'score' | 'total' | 'round' | 'thru' | 'holes' | 'rating';

export type FieldStep = {
  field: RecordField;
  count: number;
  /** Optional steps consume their token only when it matches. */
  when?: (token: string) => boolean;
};

/**
 * Token consumption per player row. The movement, thru and first rating
 * tokens are read and thrown away; the layout must still account for them.
 */
export const FIRST_ROUND_LAYOUT: readonly FieldStep[] = [
  { field: 'place', count: 1 },
  { field: 'movement', count: 1, when: isMovementToken },
  { field: 'name', count: 1 },
  { field: 'score', count: 1 },
  { field: 'thru', count: 1 },
  { field: 'holes', count: HOLE_COUNT },
  { field: 'rating', count: 2 },
];

export const LATER_ROUND_LAYOUT: readonly FieldStep[] = [
  { field: 'place', count: 1 },
  { field: 'movement', count: 1, when: isMovementToken },
  { field: 'name', count: 1 },
  { field: 'total', count: 1 },
  { field: 'round', count: 1 },
  { field: 'thru', count: 1 },
  { field: 'holes', count: HOLE_COUNT },
  { field: 'rating', count: 2 },
];

export type ConsumedRecord = {
  fields: Map<RecordField, string[]>;
  next: number;
};

export type RoundParseResult = {
  records: PlayerRoundRecord[];
  /** Tokens left over when the stream ran out mid-record; 0 when it ended cleanly. */
  tokensLeft: number;
};

export type AllRoundsResult = {
  rounds: PlayerRoundRecord[][];
  outcomes: ParseOutcome[];
};

export function consumeRecord(
  tokens: readonly string[],
  start: number,
  layout: readonly FieldStep[],
): ConsumedRecord | null {
  const fields = new Map<RecordField, string[]>();
  let cursor = start;
  for (const step of layout) {
    if (step.when) {
      if (cursor < tokens.length && step.when(tokens[cursor])) {
        fields.set(step.field, [tokens[cursor]]);
        cursor += 1;
      }
      continue;
    }
    if (cursor + step.count > tokens.length) {
      return null;
    }
    fields.set(step.field, tokens.slice(cursor, cursor + step.count));
    cursor += step.count;
  }
  return { fields, next: cursor };
}

function field(fields: Map<RecordField, string[]>, name: RecordField, position = 0): string {
  return fields.get(name)?.[position] ?? '';
}

function toRecord(fields: Map<RecordField, string[]>, firstRound: boolean): PlayerRoundRecord {
  // Round 1 prints one score column: the round score is also the total.
  const totalScore = firstRound ? field(fields, 'score') : field(fields, 'total');
  const roundScore = firstRound ? field(fields, 'score') : field(fields, 'round');
  return {
    place: field(fields, 'place'),
    name: field(fields, 'name'),
    totalScore,
    roundScore,
    holeScores: fields.get('holes') ?? [],
    rating: field(fields, 'rating', 1),
  };
}

export function parseRoundRecords(
  tokens: readonly string[],
  options: { firstRound?: boolean } = {},
): RoundParseResult {
  const firstRound = Boolean(options.firstRound);
  const layout = firstRound ? FIRST_ROUND_LAYOUT : LATER_ROUND_LAYOUT;
  const records: PlayerRoundRecord[] = [];
  let cursor = 0;
  while (cursor < tokens.length) {
    const consumed = consumeRecord(tokens, cursor, layout);
    if (!consumed) {
      return { records, tokensLeft: tokens.length - cursor };
    }
    records.push(toRecord(consumed.fields, firstRound));
    cursor = consumed.next;
  }
  return { records, tokensLeft: 0 };
}

export function parseAllRounds(lines: readonly string[]): AllRoundsResult {
  const rounds: PlayerRoundRecord[][] = [];
  const outcomes: ParseOutcome[] = [];
  let start = 0;
  while (start < lines.length) {
    const marker = locateLine(lines, MARKERS.roundStart, start);
    if (marker === -1) {
      break;
    }
    const sectionStart = marker + 1;
    const sectionEnd = requireLine(lines, MARKERS.roundEnd, `End of player data for round ${rounds.length + 1}`, sectionStart);
    const { records, tokensLeft } = parseRoundRecords(lines.slice(sectionStart, sectionEnd), {
      firstRound: rounds.length === 0,
    });
    if (tokensLeft > 0) {
      outcomes.push({ kind: 'record-truncated', round: rounds.length + 1, records: records.length, tokensLeft });
    }
    rounds.push(records.map((record) => ({ ...record, name: normalizePlayerName(record.name) })));
    start = sectionEnd + 1;
  }
  if (!rounds.length) {
    throw new StructureNotFoundError(MARKERS.roundStart, 'Player data not found');
  }
  return { rounds, outcomes };
}
