import { cleanLines, splitReport } from './clean';
import { readCourse } from './course';
import { isStructureNotFoundError } from './errors';
import { parseRoundInfo, parseTournamentDetails } from './header';
import { parseAllRounds } from './records';
import { emitParseOutcome, emitReportFailed, emitReportParsed } from './telemetry';
import type { ParseOutcome, ParsedReport } from './types';

function reportOutcome(outcome: ParseOutcome): void {
  emitParseOutcome(outcome);
  if (typeof process !== 'undefined' && process.env?.NODE_ENV !== 'production') {
    // eslint-disable-next-line no-console
    console.warn('[scoreboard] lenient parse', outcome);
  }
}

/**
 * Parses one tournament export. Structural errors abort the whole report;
 * truncated rows and a short course are kept as `outcomes`.
 */
export function parseReport(rawLines: readonly string[]): ParsedReport {
  const lines = cleanLines(rawLines);
  try {
    const tournament = parseTournamentDetails(lines);
    const roundInfo = parseRoundInfo(lines);
    const course = readCourse(lines);
    const { rounds, outcomes } = parseAllRounds(lines);
    if (course.truncated) {
      outcomes.unshift({ kind: 'course-truncated', holes: course.holes.length });
    }
    outcomes.forEach(reportOutcome);
    emitReportParsed({
      rounds: rounds.length,
      players: rounds[0]?.length ?? 0,
      holes: course.holes.length,
      outcomes: outcomes.length,
    });
    return { course: course.holes, rounds, tournament, roundInfo, outcomes };
  } catch (error) {
    if (isStructureNotFoundError(error)) {
      emitReportFailed({ marker: error.marker, message: error.message });
    }
    throw error;
  }
}

export function parseReportText(text: string): ParsedReport {
  return parseReport(splitReport(text));
}
