/**
 * Error Handling Utilities
 */

export type BarRaceErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'ASSET_UNAVAILABLE'
  | 'ENCODING_FAILURE'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_TABLE';

export class BarRaceError extends Error {
  constructor(
    message: string,
    public readonly code: BarRaceErrorCode
  ) {
    super(message);
    this.name = 'BarRaceError';
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/** Fewer than two rows, or nothing left to display after selection. */
export class InsufficientDataError extends BarRaceError {
  constructor(message: string) {
    super(message, 'INSUFFICIENT_DATA');
    this.name = 'InsufficientDataError';
  }
}

/**
 * A font or logo could not be read. Only the asset loader raises this, and it
 * keeps the error for diagnostics instead of throwing it.
 */
export class AssetUnavailableError extends BarRaceError {
  constructor(
    public readonly asset: 'font' | 'logo',
    public readonly path: string,
    reason: string
  ) {
    super(`Cannot load ${asset} from ${path}: ${reason}`, 'ASSET_UNAVAILABLE');
    this.name = 'AssetUnavailableError';
  }
}

export class EncodingFailureError extends BarRaceError {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr = ''
  ) {
    super(message, 'ENCODING_FAILURE');
    this.name = 'EncodingFailureError';
  }
}

export class InvalidConfigurationError extends BarRaceError {
  constructor(public readonly issues: string[]) {
    super(`Invalid render configuration:\n${formatIssues(issues)}`, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidTableError extends BarRaceError {
  constructor(message: string) {
    super(message, 'INVALID_TABLE');
    this.name = 'InvalidTableError';
  }
}

export function formatIssues(issues: string[]): string {
  return issues.map(issue => `  - ${issue}`).join('\n');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
