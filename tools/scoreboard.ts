import path from 'node:path';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import process from 'node:process';

import {
  ParseCache,
  buildCatalogEntries,
  coursePars,
  courseToCsv,
  computeStandings,
  displayName,
  isStructureNotFoundError,
  parseCliArgs,
  parseTournamentMapping,
  resolveViewerConfig,
  standingsTitle,
  standingsToCsv,
  summarizeCourse,
  type CourseHole,
  type StandingsRow,
} from '../shared/scoreboard/index';

const TAG = '[scoreboard]';

const loadMapping = async (file: string): Promise<Map<string, string>> => {
  try {
    return parseTournamentMapping(await readFile(file, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      console.warn(`${TAG} Mapping file '${file}' not found.`);
      return new Map();
    }
    throw error;
  }
};

const pad = (value: string, width: number): string => value.padEnd(width, ' ');

const printStandings = (rows: StandingsRow[]): void => {
  const nameWidth = Math.max(4, ...rows.map((row) => row.name.length));
  console.log(`${pad('Place', 6)}${pad('Name', nameWidth + 2)}${pad('Total', 7)}${pad('Rd', 6)}Hole Scores`);
  for (const row of rows) {
    console.log(
      `${pad(row.place, 6)}${pad(row.name, nameWidth + 2)}${pad(row.total, 7)}${pad(row.rd, 6)}${row.holeScores.join(' ')}`,
    );
  }
};

const printCourse = (course: CourseHole[]): void => {
  const summary = summarizeCourse(course);
  console.log(`Length: ${summary.totalLength} m, Par: ${summary.totalPar}`);
  console.log(['Hole', ...course.map((hole) => String(hole.number))].join('\t'));
  console.log(['Length', ...course.map((hole) => String(hole.length))].join('\t'));
  console.log(['Par', ...course.map((hole) => String(hole.par))].join('\t'));
};

const main = async (): Promise<void> => {
  const overrides = parseCliArgs(process.argv.slice(2));
  const config = { ...resolveViewerConfig(process.env), ...overrides };

  const mapping = await loadMapping(config.mappingFile);
  const entries = buildCatalogEntries(await readdir(config.dataDir));
  const files = entries.flatMap((entry) => (entry.kind === 'file' ? [entry.file] : []));
  const selected = overrides.file ?? files[0];
  if (!selected) {
    throw new Error(`No tournament files found in ${config.dataDir}`);
  }
  if (!files.includes(selected)) {
    throw new Error(`Unknown tournament file: ${selected}`);
  }

  const content = await readFile(path.join(config.dataDir, selected), 'utf8');
  const report = new ParseCache().get(selected, content);

  const round = report.rounds[config.round - 1];
  if (!round) {
    throw new Error(`Round ${config.round} not found; the report has ${report.rounds.length} round(s)`);
  }

  const standings = computeStandings(round, coursePars(report.course), config.hole);

  console.log(displayName(selected, mapping));
  console.log(`${report.tournament.date}, ${report.tournament.location}`);
  console.log(report.roundInfo);
  console.log('');
  console.log(`Round ${config.round}: ${standingsTitle(config.hole)}`);
  printStandings(standings);
  console.log('');
  console.log('Course Information');
  printCourse(report.course);

  if (config.outDir) {
    await mkdir(config.outDir, { recursive: true });
    const standingsFile = path.join(config.outDir, `standings_rd${config.round}h${config.hole}.csv`);
    const courseFile = path.join(config.outDir, 'course_info.csv');
    await writeFile(standingsFile, `${standingsToCsv(standings)}\n`, 'utf8');
    await writeFile(courseFile, `${courseToCsv(report.course)}\n`, 'utf8');
    console.log(`${TAG} Wrote ${standingsFile} and ${courseFile}`);
  }
};

main().catch((error: unknown) => {
  if (isStructureNotFoundError(error)) {
    console.error(`${TAG} Report is not a scoreboard export: ${error.message}`);
  } else {
    console.error(`${TAG} ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
});
