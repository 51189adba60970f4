/**
 * Error taxonomy
 *
 * Only ConfigurationError is meant to reach callers; the capability and
 * run errors are contained by the executor and orchestrator and end up as
 * failures, synthetic findings or an incomplete report.
 */

export type EngineErrorCode =
  | 'CONFIGURATION'
  | 'CAPABILITY_TIMEOUT'
  | 'CAPABILITY_FATAL'
  | 'CAPABILITY_UNAVAILABLE'
  | 'RUN_CANCELLED'
  | 'RUN_DEADLINE_EXCEEDED';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'EngineError';
  }
}

export class ConfigurationError extends EngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
    this.name = 'ConfigurationError';
  }
}

export class CapabilityTimeoutError extends EngineError {
  readonly capability: string;
  readonly timeoutMs: number;

  constructor(capability: string, timeoutMs: number) {
    super('CAPABILITY_TIMEOUT', `Capability "${capability}" timed out after ${timeoutMs}ms`);
    this.capability = capability;
    this.timeoutMs = timeoutMs;
    this.name = 'CapabilityTimeoutError';
  }
}

export class CapabilityFatalError extends EngineError {
  readonly capability: string;

  constructor(capability: string, message: string, options?: { cause?: unknown }) {
    super('CAPABILITY_FATAL', message, options);
    this.capability = capability;
    this.name = 'CapabilityFatalError';
  }
}

/** Transient unavailability; retried with backoff */
export class CapabilityUnavailableError extends EngineError {
  readonly capability: string;

  constructor(capability: string, message: string, options?: { cause?: unknown }) {
    super('CAPABILITY_UNAVAILABLE', message, options);
    this.capability = capability;
    this.name = 'CapabilityUnavailableError';
  }
}

export class RunCancelledError extends EngineError {
  readonly runId: string;

  constructor(runId: string) {
    super('RUN_CANCELLED', `Run ${runId} was cancelled`);
    this.runId = runId;
    this.name = 'RunCancelledError';
  }
}

export class RunDeadlineExceededError extends EngineError {
  readonly runId: string;

  constructor(runId: string) {
    super('RUN_DEADLINE_EXCEEDED', `Run ${runId} exceeded its deadline`);
    this.runId = runId;
    this.name = 'RunDeadlineExceededError';
  }
}

// Transient failure markers in error messages from adapters that do not
// use CapabilityUnavailableError
const TRANSIENT_PATTERNS: Array<string | RegExp> = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'rate_limit',
  /\b(429|502|503|504)\b/,
];

/**
 * Whether an error raised by a capability should be retried
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof CapabilityUnavailableError) return true;
  if (error instanceof EngineError) return false;
  if (!(error instanceof Error)) return false;

  const message = error.message;
  return TRANSIENT_PATTERNS.some((pattern) =>
    typeof pattern === 'string' ? message.includes(pattern) : pattern.test(message)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Common error factory functions
export function unknownCapability(capability: string): CapabilityFatalError {
  return new CapabilityFatalError(capability, `No handler registered for capability "${capability}"`);
}

export function unknownCategory(category: string): ConfigurationError {
  return new ConfigurationError(`No workflow registered for category "${category}"`);
}
