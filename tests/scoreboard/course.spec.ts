import { describe, expect, it } from 'vitest';

import { coursePars, parseCourse, readCourse, summarizeCourse } from '../../shared/scoreboard/course';
import { PARS_68 } from './helpers';

function courseLines(holes: number): string[] {
  const lines = ['Place', 'Name', 'Thru'];
  for (let hole = 1; hole <= holes; hole += 1) {
    lines.push(String(hole), String(60 + hole * 5), String(PARS_68[hole - 1]));
  }
  return lines;
}

describe('parseCourse', () => {
  it('reads 18 (number, length, par) triplets after the Thru marker', () => {
    const course = parseCourse([...courseLines(18), 'Rating', 'ALL PLAYERS']);
    expect(course).toHaveLength(18);
    expect(course[0]).toEqual({ number: 1, length: 65, par: 3 });
    expect(course[17]).toEqual({ number: 18, length: 150, par: 5 });
    expect(coursePars(course)).toEqual(PARS_68);
  });

  it('returns the holes it recovered when the layout is short', () => {
    const lines = [...courseLines(5), '6', '90'];
    const result = readCourse(lines);
    expect(result.truncated).toBe(true);
    expect(result.holes.map((hole) => hole.number)).toEqual([1, 2, 3, 4, 5]);
  });

  it('stops at a triplet that is not numeric', () => {
    const lines = [...courseLines(2), 'Rating', 'ALL PLAYERS', '1', ...courseLines(18).slice(3)];
    expect(parseCourse(lines)).toHaveLength(2);
  });

  it('fails without the Thru marker', () => {
    expect(() => parseCourse(['Place', 'Name'])).toThrow('Course information not found');
  });
});

describe('summarizeCourse', () => {
  it('sums length and par', () => {
    const course = parseCourse(courseLines(18));
    // lengths are 65..150 in steps of 5
    expect(summarizeCourse(course)).toEqual({ holes: 18, totalLength: 1935, totalPar: 68 });
  });
});
