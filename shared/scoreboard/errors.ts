export class StructureNotFoundError extends Error {
  readonly marker: string;

  constructor(marker: string, message: string) {
    super(message);
    this.name = 'StructureNotFoundError';
    this.marker = marker;
  }
}

export function isStructureNotFoundError(error: unknown): error is StructureNotFoundError {
  return error instanceof StructureNotFoundError;
}
