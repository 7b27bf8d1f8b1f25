import Papa from 'papaparse';

import type { CourseHole, StandingsRow } from './types';

export const STANDINGS_COLUMNS = ['Place', 'Name', 'Total', 'Rd', 'Hole Scores'] as const;
export const COURSE_COLUMNS = ['Hole Number', 'Length (m)', 'Par'] as const;

export function standingsToCsv(rows: readonly StandingsRow[]): string {
  return Papa.unparse(
    {
      fields: [...STANDINGS_COLUMNS],
      data: rows.map((row) => [row.place, row.name, row.total, row.rd, row.holeScores.join(' ')]),
    },
    { newline: '\n' },
  );
}

export function courseToCsv(course: readonly CourseHole[]): string {
  return Papa.unparse(
    {
      fields: [...COURSE_COLUMNS],
      data: course.map((hole) => [hole.number, hole.length, hole.par]),
    },
    { newline: '\n' },
  );
}
