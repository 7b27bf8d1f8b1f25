import { HOLE_COUNT, MARKERS, requireLine } from './clean';
import { parseIntegerToken } from './tokens';
import type { CourseHole } from './types';

const FIELDS_PER_HOLE = 3;

export type CourseParseResult = {
  holes: CourseHole[];
  truncated: boolean;
};

export type CourseSummary = {
  holes: number;
  totalLength: number;
  totalPar: number;
};

/**
 * Reads the hole layout printed after the "Thru" column label as
 * (hole number, length in meters, par) triplets. A short or non-numeric tail
 * ends the course early instead of failing the report.
 */
export function readCourse(lines: readonly string[]): CourseParseResult {
  const index = requireLine(lines, MARKERS.course, 'Course information');
  const tokens = lines.slice(index + 1, index + 1 + HOLE_COUNT * FIELDS_PER_HOLE);
  const holes: CourseHole[] = [];
  for (let offset = 0; offset + FIELDS_PER_HOLE <= tokens.length; offset += FIELDS_PER_HOLE) {
    const number = parseIntegerToken(tokens[offset]);
    const length = parseIntegerToken(tokens[offset + 1]);
    const par = parseIntegerToken(tokens[offset + 2]);
    if (number === null || length === null || par === null) {
      break;
    }
    holes.push({ number, length, par });
  }
  return { holes, truncated: holes.length < HOLE_COUNT };
}

export function parseCourse(lines: readonly string[]): CourseHole[] {
  return readCourse(lines).holes;
}

export function coursePars(course: readonly CourseHole[]): number[] {
  return course.map((hole) => hole.par);
}

export function summarizeCourse(course: readonly CourseHole[]): CourseSummary {
  let totalLength = 0;
  let totalPar = 0;
  for (const hole of course) {
    totalLength += hole.length;
    totalPar += hole.par;
  }
  return { holes: course.length, totalLength, totalPar };
}
