export type ErrorCode =
  | 'PROVIDER_UNAVAILABLE'
  | 'TOOL_INVALID_ARGUMENTS'
  | 'DEADLINE_EXCEEDED'
  | 'CONFIG_INVALID';

export class ClassifierError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Network, auth or malformed-response failure of an inference backend
export class ProviderUnavailableError extends ClassifierError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('PROVIDER_UNAVAILABLE', `${provider}: ${message}`, options);
    this.provider = provider;
  }
}

export class ToolArgumentError extends ClassifierError {
  constructor(toolName: string, issues: string[]) {
    super('TOOL_INVALID_ARGUMENTS', `Invalid arguments for ${toolName}: ${issues.join('; ')}`);
  }
}

// Raised when a call outlives its deadline or the caller cancels it
export class DeadlineError extends ClassifierError {
  readonly cancelled: boolean;

  constructor(label: string, timeoutMs: number, cancelled: boolean) {
    super(
      'DEADLINE_EXCEEDED',
      cancelled ? `${label} cancelled by caller` : `${label} did not finish within ${timeoutMs}ms`
    );
    this.cancelled = cancelled;
  }
}

export class ConfigError extends ClassifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
