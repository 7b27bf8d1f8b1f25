import type { ParseOutcome } from './types';

export type ScoreboardTelemetryEmitter = (event: string, payload: Record<string, unknown>) => void;

let emitter: ScoreboardTelemetryEmitter | null = null;

function safeEmit(event: string, payload: Record<string, unknown>): void {
  if (!emitter) {
    return;
  }
  try {
    emitter(event, payload);
  } catch (error) {
    if (typeof process !== 'undefined' && process.env?.NODE_ENV !== 'production') {
      // eslint-disable-next-line no-console
      console.warn('[scoreboard/telemetry] emit failed', error);
    }
  }
}

export function setScoreboardTelemetryEmitter(candidate: ScoreboardTelemetryEmitter | null | undefined): void {
  emitter = typeof candidate === 'function' ? candidate : null;
}

export function emitParseOutcome(outcome: ParseOutcome): void {
  if (outcome.kind === 'record-truncated') {
    safeEmit('scoreboard.parse.record_truncated', {
      round: outcome.round,
      records: outcome.records,
      tokens_left: outcome.tokensLeft,
      ts: Date.now(),
    });
    return;
  }
  safeEmit('scoreboard.parse.course_truncated', {
    holes: outcome.holes,
    ts: Date.now(),
  });
}

export function emitReportParsed(payload: { rounds: number; players: number; holes: number; outcomes: number }): void {
  safeEmit('scoreboard.parse.complete', {
    rounds: payload.rounds,
    players: payload.players,
    holes: payload.holes,
    outcomes: payload.outcomes,
    ts: Date.now(),
  });
}

export function emitReportFailed(payload: { marker: string; message: string }): void {
  safeEmit('scoreboard.parse.error', {
    marker: payload.marker,
    message: payload.message,
    ts: Date.now(),
  });
}
