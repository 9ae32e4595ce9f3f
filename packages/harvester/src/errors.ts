type HarvestErrorCode = 'snapshot' | 'persistence';

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(message: string, code: HarvestErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HarvestError';
    this.code = code;
  }
}

export class SnapshotError extends HarvestError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Invalid snapshot file ${filePath}: ${reason}`, 'snapshot', options);
    this.name = 'SnapshotError';
    this.filePath = filePath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type { HarvestErrorCode };
