import { describe, expect, it } from 'vitest';

import { StructureNotFoundError } from '../../shared/scoreboard/errors';
import {
  FIRST_ROUND_LAYOUT,
  LATER_ROUND_LAYOUT,
  consumeRecord,
  parseAllRounds,
  parseRoundRecords,
} from '../../shared/scoreboard/records';
import { parHoles } from './helpers';

const firstRoundRow = (place: string, name: string, score: string, holes = parHoles()): string[] => [
  place,
  name,
  score,
  'F',
  ...holes,
  '68',
  '1000',
];

const laterRoundRow = (place: string, name: string, total: string, round: string, movement?: string): string[] => [
  place,
  ...(movement ? [movement] : []),
  name,
  total,
  round,
  'F',
  ...parHoles(),
  '68',
  '990',
];

describe('record layouts', () => {
  it('needs 24 fixed tokens for a first-round row and 25 for a later row', () => {
    const fixed = (layout: typeof FIRST_ROUND_LAYOUT) =>
      layout.filter((step) => !step.when).reduce((sum, step) => sum + step.count, 0);
    expect(fixed(FIRST_ROUND_LAYOUT)).toBe(24);
    expect(fixed(LATER_ROUND_LAYOUT)).toBe(25);
  });

  it('consumes the optional movement token only when it is numeric', () => {
    const withMovement = consumeRecord(laterRoundRow('3', 'Eva', '-1', '-2', '2'), 0, LATER_ROUND_LAYOUT);
    expect(withMovement?.next).toBe(26);
    expect(withMovement?.fields.get('movement')).toEqual(['2']);
    expect(withMovement?.fields.get('name')).toEqual(['Eva']);

    const withoutMovement = consumeRecord(laterRoundRow('3', 'Eva', '-1', '-2'), 0, LATER_ROUND_LAYOUT);
    expect(withoutMovement?.next).toBe(25);
    expect(withoutMovement?.fields.has('movement')).toBe(false);
  });

  it('returns null when the row runs out of tokens', () => {
    expect(consumeRecord(firstRoundRow('1', 'Eva', '-1').slice(0, 23), 0, FIRST_ROUND_LAYOUT)).toBeNull();
  });
});

describe('parseRoundRecords', () => {
  it('uses the single first-round score as both total and round score', () => {
    const holes = parHoles({ 1: '2', 9: 'X' });
    const { records, tokensLeft } = parseRoundRecords(
      [...firstRoundRow('1', 'EvaNová', '-1', holes), ...firstRoundRow('2', 'JanKos', 'E')],
      { firstRound: true },
    );
    expect(tokensLeft).toBe(0);
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      place: '1',
      name: 'EvaNová',
      totalScore: '-1',
      roundScore: '-1',
      holeScores: holes,
      rating: '1000',
    });
    expect(records[1].totalScore).toBe('E');
    expect(records[1].roundScore).toBe('E');
  });

  it('reads total then round score in later rounds and discards the movement token', () => {
    const { records } = parseRoundRecords([
      ...laterRoundRow('1', 'EvaNová', '-4', '-3', '1'),
      ...laterRoundRow('T2', 'JanKos', '-2', 'E'),
    ]);
    expect(records.map((record) => [record.place, record.name, record.totalScore, record.roundScore])).toEqual([
      ['1', 'EvaNová', '-4', '-3'],
      ['T2', 'JanKos', '-2', 'E'],
    ]);
    expect(records.every((record) => record.holeScores.length === 18)).toBe(true);
    expect(records[0].rating).toBe('990');
  });

  it('drops a partial trailing row and reports the leftover tokens', () => {
    const tokens = [...laterRoundRow('1', 'EvaNová', '-4', '-3'), 'T2', 'JanKos', '-2', 'E', 'F', '3', '4'];
    const { records, tokensLeft } = parseRoundRecords(tokens);
    expect(records).toHaveLength(1);
    expect(tokensLeft).toBe(7);
  });

  it('yields nothing for an empty round', () => {
    expect(parseRoundRecords([], { firstRound: true })).toEqual({ records: [], tokensLeft: 0 });
  });
});

describe('parseAllRounds', () => {
  it('splits every round section and normalizes names', () => {
    const lines = [
      'header',
      'ALL PLAYERS',
      ...firstRoundRow('1', 'JiříČervenka', '-2'),
      'COLOR ACCESSIBILITY',
      'repeat header',
      'ALL PLAYERS',
      ...laterRoundRow('1', 'JiříČervenka', '-3', '-1'),
      'COLOR ACCESSIBILITY',
    ];
    const { rounds, outcomes } = parseAllRounds(lines);
    expect(rounds).toHaveLength(2);
    expect(rounds[0][0]).toMatchObject({ name: 'Jiří Červenka', totalScore: '-2', roundScore: '-2' });
    expect(rounds[1][0]).toMatchObject({ name: 'Jiří Červenka', totalScore: '-3', roundScore: '-1' });
    expect(outcomes).toEqual([]);
  });

  it('records a truncated round as an outcome', () => {
    const lines = ['ALL PLAYERS', ...firstRoundRow('1', 'Eva', '-2'), 'T2', 'Jan', 'COLOR ACCESSIBILITY'];
    const { rounds, outcomes } = parseAllRounds(lines);
    expect(rounds[0]).toHaveLength(1);
    expect(outcomes).toEqual([{ kind: 'record-truncated', round: 1, records: 1, tokensLeft: 2 }]);
  });

  it('fails when a round section is not closed', () => {
    expect(() => parseAllRounds(['ALL PLAYERS', ...firstRoundRow('1', 'Eva', '-2')])).toThrow(
      'End of player data for round 1 not found',
    );
  });

  it('fails when no round section exists', () => {
    expect(() => parseAllRounds(['header', 'COLOR ACCESSIBILITY'])).toThrow(StructureNotFoundError);
  });
});
