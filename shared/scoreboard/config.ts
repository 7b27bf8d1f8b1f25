import { HOLE_COUNT } from './clean';

export type EnvRecord = Record<string, string | undefined> | null | undefined;

export interface ViewerConfig {
  dataDir: string;
  mappingFile: string;
  round: number;
  hole: number;
  outDir: string | null;
}

export const DEFAULT_VIEWER_CONFIG: ViewerConfig = {
  dataDir: 'data',
  mappingFile: 'tournament_names.txt',
  round: 1,
  hole: HOLE_COUNT,
  outDir: null,
};

function sanitizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return fallback;
}

function sanitizeInteger(value: unknown, fallback: number, min: number, max: number): number {
  const numeric = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  if (!Number.isInteger(numeric) || numeric < min || numeric > max) {
    return fallback;
  }
  return numeric;
}

export function resolveViewerConfig(env: EnvRecord, base: ViewerConfig = DEFAULT_VIEWER_CONFIG): ViewerConfig {
  const source = env ?? {};
  return {
    dataDir: sanitizeString(source.SCOREBOARD_DATA_DIR, base.dataDir),
    mappingFile: sanitizeString(source.SCOREBOARD_MAPPING_FILE, base.mappingFile),
    round: sanitizeInteger(source.SCOREBOARD_ROUND, base.round, 1, Number.MAX_SAFE_INTEGER),
    hole: sanitizeInteger(source.SCOREBOARD_HOLE, base.hole, 0, HOLE_COUNT),
    outDir: source.SCOREBOARD_OUT_DIR?.trim() || base.outDir,
  };
}

export type CliOverrides = Partial<ViewerConfig> & { file?: string };

/** Reads `--flag value` pairs; unknown flags are ignored. */
export function parseCliArgs(args: readonly string[]): CliOverrides {
  const overrides: CliOverrides = {};
  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      continue;
    }
    if (current === '--data') {
      overrides.dataDir = next;
    } else if (current === '--mapping') {
      overrides.mappingFile = next;
    } else if (current === '--file') {
      overrides.file = next;
    } else if (current === '--round') {
      overrides.round = sanitizeInteger(next, DEFAULT_VIEWER_CONFIG.round, 1, Number.MAX_SAFE_INTEGER);
    } else if (current === '--hole') {
      overrides.hole = sanitizeInteger(next, DEFAULT_VIEWER_CONFIG.hole, 0, HOLE_COUNT);
    } else if (current === '--out') {
      overrides.outDir = next;
    } else {
      continue;
    }
    i += 1;
  }
  return overrides;
}
