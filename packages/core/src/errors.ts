/**
 * Domain error types. Each carries a stable `name` so callers can branch on
 * the failure kind without `instanceof` across package boundaries.
 */

export class GatewayError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.provider = provider;
  }
}

export class SettingsError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'SettingsError';
    this.variable = variable;
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export default {
  GatewayError,
  SettingsError,
  CliUsageError,
  describeError,
};
