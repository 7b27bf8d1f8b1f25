export const SCORE_SENTINEL = 999;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const MOVEMENT_PATTERN = /^\d+$/;

export function parseIntegerToken(token: string | undefined): number | null {
  if (typeof token !== 'string') {
    return null;
  }
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

export function isMovementToken(token: string): boolean {
  return MOVEMENT_PATTERN.test(token);
}

// "E" (even) is zero; anything else that is not an integer cannot be resolved.
export function parseRelativeScore(token: string): number | null {
  if (token.trim() === 'E') {
    return 0;
  }
  return parseIntegerToken(token);
}

export function parseHoleScore(token: string): number {
  return parseIntegerToken(token) ?? SCORE_SENTINEL;
}
