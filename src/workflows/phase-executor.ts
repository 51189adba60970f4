/**
 * Phase executor - runs the capabilities of one phase
 *
 * Failures stay with the capability that raised them: a fatal error or an
 * exhausted retry budget removes only that capability's contribution, and
 * a timeout is reported as a synthetic finding. The phase fails outright
 * only when none of its capabilities contributed anything.
 */

import type { CapabilityFailure, Finding, PhaseDefinition, PhaseResult, PhaseStatus } from '../types.js';
import type { CapabilityAdapter } from '../capabilities/types.js';
import type { ExecutorConfig } from '../utils/config.js';
import type { PhaseContext } from './types.js';
import { CapabilityFatalError, CapabilityTimeoutError, errorMessage, isRecoverableError } from '../utils/errors.js';
import { RetryExhaustedError, retryWithBackoff } from '../utils/retry.js';
import { CapabilityResponseSchema } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('phase-executor');

export interface PhaseExecutorOptions {
  capabilityTimeoutMs?: number;
  capabilityTimeouts?: Record<string, number>;
  /** Retries after the first attempt for recoverable errors */
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  backoffMultiplier?: number;
  backoffJitter?: number;
}

interface ParsedResponse {
  findings: Finding[];
  partial: boolean;
  metrics?: Record<string, number>;
}

type CapabilityOutcome =
  | { kind: 'ok'; capability: string; response: ParsedResponse }
  | { kind: 'timeout'; capability: string; finding: Finding }
  | { kind: 'failed'; failure: CapabilityFailure };

export function timeoutFinding(capability: string, phaseId: string, timeoutMs: number): Finding {
  return Object.freeze({
    sourceCapability: capability,
    component: `phase:${phaseId}`,
    issueSignature: `capability-timeout:${phaseId}:${capability}`,
    severity: 'important',
    description: `${capability} did not finish within ${timeoutMs}ms; its analysis for phase "${phaseId}" is missing`,
  });
}

export class PhaseExecutor {
  private readonly adapter: CapabilityAdapter;
  private readonly defaultTimeoutMs: number;
  private readonly timeouts: Record<string, number>;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly backoffMultiplier: number;
  private readonly backoffJitter: number;

  constructor(adapter: CapabilityAdapter, options: PhaseExecutorOptions = {}) {
    this.adapter = adapter;
    this.defaultTimeoutMs = options.capabilityTimeoutMs ?? 120_000;
    this.timeouts = { ...options.capabilityTimeouts };
    this.maxRetries = options.maxRetries ?? 2;
    this.initialBackoffMs = options.initialBackoffMs ?? 500;
    this.maxBackoffMs = options.maxBackoffMs ?? 10_000;
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
    this.backoffJitter = options.backoffJitter ?? 0.3;
  }

  static fromConfig(adapter: CapabilityAdapter, config: ExecutorConfig): PhaseExecutor {
    return new PhaseExecutor(adapter, {
      capabilityTimeoutMs: config.capabilityTimeoutMs,
      capabilityTimeouts: config.capabilityTimeouts,
      maxRetries: config.maxRetries,
      initialBackoffMs: config.initialBackoffMs,
      maxBackoffMs: config.maxBackoffMs,
      backoffMultiplier: config.backoffMultiplier,
      backoffJitter: config.backoffJitter,
    });
  }

  timeoutFor(capability: string): number {
    return this.timeouts[capability] ?? this.defaultTimeoutMs;
  }

  async execute(phase: PhaseDefinition, context: PhaseContext): Promise<PhaseResult> {
    const startTime = Date.now();
    const outcomes: CapabilityOutcome[] = [];
    let interrupted = false;
    const phaseLog = log.bind({ runId: context.runId, workflow: context.workflowId, phase: phase.id });

    phaseLog.debug('Executing phase', { mode: phase.mode, capabilities: phase.capabilities });

    if (phase.mode === 'parallel') {
      if (context.signal.aborted) {
        interrupted = true;
      } else {
        outcomes.push(...await Promise.all(
          phase.capabilities.map((capability) =>
            this.invokeCapability(capability, phase, context, context.upstreamFindings)
          )
        ));
      }
    } else {
      // Later capabilities see what the earlier ones found
      const seen: Finding[] = [...context.upstreamFindings];
      for (const capability of phase.capabilities) {
        if (context.signal.aborted) {
          interrupted = true;
          break;
        }
        const outcome = await this.invokeCapability(capability, phase, context, seen);
        outcomes.push(outcome);
        if (outcome.kind === 'ok') {
          seen.push(...outcome.response.findings);
        }
      }
    }

    if (outcomes.some((o) => o.kind === 'failed' && o.failure.kind === 'cancelled')) {
      interrupted = true;
    }

    const findings: Finding[] = [];
    const failures: CapabilityFailure[] = [];
    let metrics: Record<string, number> | undefined;

    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case 'ok':
          findings.push(...outcome.response.findings);
          for (const [name, value] of Object.entries(outcome.response.metrics ?? {})) {
            metrics ??= {};
            if (!(name in metrics)) metrics[name] = value;
          }
          break;
        case 'timeout':
          findings.push(outcome.finding);
          break;
        case 'failed':
          failures.push(outcome.failure);
          break;
      }
    }

    const result: PhaseResult = {
      workflowId: context.workflowId,
      phaseId: phase.id,
      order: context.order,
      status: this.phaseStatus(phase, outcomes, interrupted),
      findings,
      failures,
      ...(metrics && { metrics }),
      interrupted,
      duration: Date.now() - startTime,
    };

    phaseLog.info('Phase executed', {
      status: result.status,
      findings: findings.length,
      failures: failures.length,
      interrupted,
    });

    return result;
  }

  private phaseStatus(
    phase: PhaseDefinition,
    outcomes: readonly CapabilityOutcome[],
    interrupted: boolean
  ): PhaseStatus {
    const contributed = outcomes.filter((o) => o.kind !== 'failed').length;
    const failed = outcomes.filter((o) => o.kind === 'failed' && o.failure.kind !== 'cancelled').length;

    if (contributed === 0 && failed > 0 && !interrupted) {
      return 'failed';
    }

    const clean = outcomes.every((o) => o.kind === 'ok' && !o.response.partial);
    if (clean && !interrupted && outcomes.length === phase.capabilities.length) {
      return 'success';
    }
    return 'partial';
  }

  private async invokeCapability(
    capability: string,
    phase: PhaseDefinition,
    context: PhaseContext,
    contextFindings: readonly Finding[]
  ): Promise<CapabilityOutcome> {
    const capabilityLog = log.bind({ runId: context.runId, phase: phase.id, capability });
    const run = async (): Promise<CapabilityOutcome> => {
      if (context.signal.aborted) {
        return cancelled(capability, 0);
      }

      let attempts = 0;
      try {
        const response = await retryWithBackoff(
          (attempt) => {
            attempts = attempt;
            return this.invokeOnce(capability, context, contextFindings);
          },
          {
            maxAttempts: this.maxRetries + 1,
            initialDelayMs: this.initialBackoffMs,
            maxDelayMs: this.maxBackoffMs,
            backoffMultiplier: this.backoffMultiplier,
            jitter: this.backoffJitter,
            signal: context.signal,
            isRetryable: (error) => !context.signal.aborted && isRecoverableError(error),
          }
        );
        return { kind: 'ok', capability, response };
      } catch (error) {
        if (context.signal.aborted) {
          return cancelled(capability, attempts);
        }

        if (error instanceof CapabilityTimeoutError) {
          capabilityLog.warn('Capability timed out', { timeoutMs: error.timeoutMs });
          return { kind: 'timeout', capability, finding: timeoutFinding(capability, phase.id, error.timeoutMs) };
        }

        const exhausted = error instanceof RetryExhaustedError;
        capabilityLog.warn('Capability failed', {
          attempts,
          exhausted,
          error: errorMessage(error),
        });
        return {
          kind: 'failed',
          failure: {
            capability,
            kind: exhausted ? 'exhausted' : 'fatal',
            message: errorMessage(error),
            attempts,
          },
        };
      }
    };

    if (!context.capabilitySlots) {
      return run();
    }
    try {
      return await context.capabilitySlots.execute(run, context.signal);
    } catch (error) {
      // run() settles every outcome itself; only a slot wait ends here
      if (context.signal.aborted) {
        return cancelled(capability, 0);
      }
      throw error;
    }
  }

  /**
   * One bounded call to the adapter
   */
  private async invokeOnce(
    capability: string,
    context: PhaseContext,
    contextFindings: readonly Finding[]
  ): Promise<ParsedResponse> {
    const timeoutMs = this.timeoutFor(capability);
    const controller = new AbortController();
    const interrupt = context.interrupt;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onInterrupt: () => void = () => undefined;

    // Cancellation alone lets the call finish; only the timeout or an
    // interrupt aborts it
    const bound = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new CapabilityTimeoutError(capability, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
      onInterrupt = (): void => {
        clearTimeout(timer);
        controller.abort(interrupt?.reason);
        reject(interrupt?.reason);
      };
    });
    if (interrupt?.aborted) {
      onInterrupt();
    } else {
      interrupt?.addEventListener('abort', onInterrupt, { once: true });
    }

    try {
      const raw = await Promise.race([
        this.adapter.invoke({
          capability,
          target: context.request.target ?? context.request.description,
          contextFindings: [...contextFindings],
          flags: { ...context.request.flags },
          signal: controller.signal,
        }),
        bound,
      ]);
      return parseResponse(capability, raw);
    } finally {
      clearTimeout(timer);
      interrupt?.removeEventListener('abort', onInterrupt);
    }
  }
}

function cancelled(capability: string, attempts: number): CapabilityOutcome {
  return {
    kind: 'failed',
    failure: { capability, kind: 'cancelled', message: 'Run stopped before the capability finished', attempts },
  };
}

function parseResponse(capability: string, raw: unknown): ParsedResponse {
  const parsed = CapabilityResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CapabilityFatalError(
      capability,
      `Malformed output from "${capability}": ${parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`
    );
  }

  return {
    findings: parsed.data.findings.map((finding) => Object.freeze(finding)),
    partial: parsed.data.status === 'partial',
    ...(parsed.data.metrics && { metrics: parsed.data.metrics }),
  };
}
