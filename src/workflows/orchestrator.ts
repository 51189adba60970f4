/**
 * Workflow orchestrator - drives one workflow's phase graph to completion
 *
 * Each run owns its state table. Phases move pending -> ready -> running
 * and end in done, failed-partial, failed-fatal or skipped. All
 * transitions happen synchronously between awaits, so no locking is
 * needed around the table.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type {
  Finding,
  PhaseDefinition,
  PhaseResult,
  PhaseState,
  SkipReason,
  SkippedPhase,
  StopReason,
  TaskRequest,
  WorkflowDefinition,
} from '../types.js';
import type { OrchestrationOutcome, PhaseContext } from './types.js';
import type { PhaseExecutor } from './phase-executor.js';
import type { OrchestratorConfig } from '../utils/config.js';
import { Semaphore } from '../utils/semaphore.js';
import { RunCancelledError, RunDeadlineExceededError, errorMessage } from '../utils/errors.js';
import { ancestorsOf } from './dag.js';
import { type Logger, logger } from '../utils/logger.js';

const log = logger.child('orchestrator');

export interface OrchestratorEvents {
  'phase:start': (event: { runId: string; workflowId: string; phaseId: string }) => void;
  'phase:complete': (result: PhaseResult, runId: string) => void;
  'phase:skipped': (skipped: SkippedPhase, runId: string) => void;
  'finding': (finding: Finding, runId: string) => void;
}

export interface OrchestratorOptions {
  maxInFlightPhases?: number;
  maxConcurrentCapabilities?: number;
}

export interface OrchestrateOptions {
  runId?: string;
  signal?: AbortSignal;
  /** Whole-run deadline in milliseconds from the start of the run */
  deadlineMs?: number;
}

export function deadlineFinding(workflowId: string, phaseId: string, deadlineMs: number): Finding {
  return Object.freeze({
    sourceCapability: 'orchestrator',
    component: `phase:${phaseId}`,
    issueSignature: `run-deadline:${workflowId}:${phaseId}`,
    severity: 'important',
    description: `Phase "${phaseId}" was still running when the ${deadlineMs}ms run deadline expired`,
  });
}

export function phaseStateOf(result: PhaseResult): PhaseState {
  if (result.interrupted) return 'failed-partial';
  switch (result.status) {
    case 'success':
      return 'done';
    case 'partial':
      return 'failed-partial';
    case 'failed':
      return 'failed-fatal';
  }
}

function isTerminal(state: PhaseState | undefined): boolean {
  return state === 'done' || state === 'failed-partial' || state === 'failed-fatal' || state === 'skipped';
}

function isSettled(state: PhaseState | undefined): boolean {
  return state === 'done' || state === 'failed-partial';
}

export class WorkflowOrchestrator extends EventEmitter {
  private readonly definition: WorkflowDefinition;
  private readonly executor: PhaseExecutor;
  private readonly maxInFlightPhases: number;
  private readonly maxConcurrentCapabilities: number;

  constructor(definition: WorkflowDefinition, executor: PhaseExecutor, options: OrchestratorOptions = {}) {
    super();
    this.definition = definition;
    this.executor = executor;
    this.maxInFlightPhases = options.maxInFlightPhases ?? 4;
    this.maxConcurrentCapabilities = options.maxConcurrentCapabilities ?? 4;
  }

  static fromConfig(
    definition: WorkflowDefinition,
    executor: PhaseExecutor,
    config: OrchestratorConfig,
    maxConcurrentCapabilities?: number
  ): WorkflowOrchestrator {
    return new WorkflowOrchestrator(definition, executor, {
      maxInFlightPhases: config.maxInFlightPhases,
      maxConcurrentCapabilities,
    });
  }

  get workflowId(): string {
    return this.definition.id;
  }

  /**
   * Run the workflow; resolves once every phase is terminal or the
   * deadline expires, never with an empty outcome
   */
  run(request: TaskRequest, options: OrchestrateOptions = {}): Promise<OrchestrationOutcome> {
    const run = new OrchestrationRun(this, this.definition, this.executor, request, {
      runId: options.runId ?? randomUUID(),
      signal: options.signal,
      deadlineMs: options.deadlineMs,
      phaseSlots: this.maxInFlightPhases,
      capabilitySlots: this.maxConcurrentCapabilities,
    });
    return run.start();
  }
}

interface RunSettings {
  runId: string;
  signal: AbortSignal | undefined;
  deadlineMs: number | undefined;
  phaseSlots: number;
  capabilitySlots: number;
}

class OrchestrationRun {
  private readonly runId: string;
  private readonly workflowId: string;
  private readonly phases: readonly PhaseDefinition[];
  private readonly nodes: Map<string, PhaseDefinition>;
  private readonly order: Map<string, number>;
  private readonly states = new Map<string, PhaseState>();
  private readonly results = new Map<string, PhaseResult>();
  private readonly startedAt = new Map<string, number>();
  private readonly rootBlocker = new Map<string, string>();
  private readonly skipped: SkippedPhase[] = [];
  private readonly log: Logger;
  /** Stops dispatch at the next safe point */
  private readonly controller = new AbortController();
  /** Aborts capability calls in flight */
  private readonly interrupter = new AbortController();
  private readonly phaseSlots: Semaphore;
  private readonly capabilitySlots: Semaphore;
  private readonly done: Promise<OrchestrationOutcome>;
  private settle: (outcome: OrchestrationOutcome) => void = () => undefined;
  private abort: (error: unknown) => void = () => undefined;
  private deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  private stopReason: StopReason | undefined;
  private closed = false;

  constructor(
    private readonly events: EventEmitter,
    definition: WorkflowDefinition,
    private readonly executor: PhaseExecutor,
    private readonly request: TaskRequest,
    private readonly settings: RunSettings
  ) {
    this.runId = settings.runId;
    this.workflowId = definition.id;
    this.log = log.bind({ runId: this.runId, workflow: this.workflowId });
    this.phases = definition.phases;
    this.nodes = new Map(definition.phases.map((phase) => [phase.id, phase]));
    this.order = new Map(definition.phases.map((phase, index) => [phase.id, index]));
    for (const phase of definition.phases) {
      this.states.set(phase.id, 'pending');
    }
    this.phaseSlots = new Semaphore(`phases:${this.runId}`, settings.phaseSlots);
    this.capabilitySlots = new Semaphore(`capabilities:${this.runId}`, settings.capabilitySlots);
    this.done = new Promise<OrchestrationOutcome>((resolve, reject) => {
      this.settle = resolve;
      this.abort = reject;
    });
  }

  start(): Promise<OrchestrationOutcome> {
    this.log.info('Orchestration started', {
      phases: this.phases.length,
      deadlineMs: this.settings.deadlineMs,
    });

    const { signal, deadlineMs } = this.settings;
    if (deadlineMs !== undefined) {
      this.deadlineTimer = setTimeout(() => this.expire(deadlineMs), deadlineMs);
    }
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
      this.advance();
    }
    return this.done;
  }

  private readonly onAbort = (): void => this.cancel();

  private cancel(): void {
    if (this.closed || this.stopReason) return;
    this.stopReason = 'cancelled';
    this.log.warn('Run cancelled');
    this.controller.abort(new RunCancelledError(this.runId));
    this.advance();
  }

  private expire(deadlineMs: number): void {
    if (this.closed) return;
    this.stopReason ??= 'deadline';
    this.log.warn('Run deadline exceeded', { deadlineMs });
    const reason = new RunDeadlineExceededError(this.runId);
    this.controller.abort(reason);
    this.interrupter.abort(reason);

    const now = Date.now();
    for (const phase of this.phases) {
      const state = this.states.get(phase.id);
      if (state === 'running') {
        this.record(phase, {
          workflowId: this.workflowId,
          phaseId: phase.id,
          order: this.orderOf(phase.id),
          status: 'partial',
          findings: [deadlineFinding(this.workflowId, phase.id, deadlineMs)],
          failures: [],
          interrupted: true,
          duration: now - (this.startedAt.get(phase.id) ?? now),
        });
      } else if (state === 'pending' || state === 'ready') {
        this.skip(phase, 'deadline-exceeded');
      }
    }
    this.finish();
  }

  private advance(): void {
    if (this.closed) return;

    for (const phase of this.phases) {
      const state = this.states.get(phase.id);
      if (state !== 'pending' && state !== 'ready') continue;

      if (this.stopReason) {
        this.skip(phase, this.stopReason === 'cancelled' ? 'run-cancelled' : 'deadline-exceeded');
        continue;
      }
      if (state === 'ready') continue;

      const blocker = phase.dependsOn.find((dep) => {
        const depState = this.states.get(dep);
        return depState === 'failed-fatal' || depState === 'skipped';
      });
      if (blocker !== undefined) {
        this.skip(phase, 'upstream-failure', this.rootBlocker.get(blocker) ?? blocker);
        continue;
      }

      if (phase.dependsOn.every((dep) => isSettled(this.states.get(dep)))) {
        this.states.set(phase.id, 'ready');
      }
    }

    for (const phase of this.phases) {
      if (this.states.get(phase.id) !== 'ready') continue;
      if (!this.phaseSlots.tryAcquire()) break;
      this.dispatch(phase);
    }

    if (this.phases.every((phase) => isTerminal(this.states.get(phase.id)))) {
      this.finish();
    }
  }

  private dispatch(phase: PhaseDefinition): void {
    this.states.set(phase.id, 'running');
    this.startedAt.set(phase.id, Date.now());
    this.events.emit('phase:start', { runId: this.runId, workflowId: this.workflowId, phaseId: phase.id });

    const context: PhaseContext = {
      runId: this.runId,
      workflowId: this.workflowId,
      order: this.orderOf(phase.id),
      request: this.request,
      upstreamFindings: this.upstreamFindings(phase.id),
      signal: this.controller.signal,
      interrupt: this.interrupter.signal,
      capabilitySlots: this.capabilitySlots,
    };

    void this.executor
      .execute(phase, context)
      .catch((error: unknown) => this.crashed(phase, context, error))
      .then((result) => {
        this.phaseSlots.release();
        if (this.closed) {
          this.log.debug('Discarding result after run closed', { phase: phase.id });
          return;
        }
        this.record(phase, result);
        this.advance();
      })
      .catch((error: unknown) => this.fail(error));
  }

  private crashed(phase: PhaseDefinition, context: PhaseContext, error: unknown): PhaseResult {
    this.log.error('Phase execution crashed', { phase: phase.id, error });
    return {
      workflowId: this.workflowId,
      phaseId: phase.id,
      order: context.order,
      status: 'failed',
      findings: [],
      failures: phase.capabilities.map((capability) => ({
        capability,
        kind: 'fatal',
        message: errorMessage(error),
        attempts: 0,
      })),
      interrupted: false,
      duration: Date.now() - (this.startedAt.get(phase.id) ?? Date.now()),
    };
  }

  private record(phase: PhaseDefinition, result: PhaseResult): void {
    const state = phaseStateOf(result);
    this.states.set(phase.id, state);
    this.results.set(phase.id, result);

    this.log.info('Phase finished', {
      phase: phase.id,
      state,
      findings: result.findings.length,
    });

    for (const finding of result.findings) {
      this.events.emit('finding', finding, this.runId);
    }
    this.events.emit('phase:complete', result, this.runId);
  }

  private skip(phase: PhaseDefinition, reason: SkipReason, blockedBy?: string): void {
    this.states.set(phase.id, 'skipped');
    if (blockedBy !== undefined) {
      this.rootBlocker.set(phase.id, blockedBy);
    }

    const skipped: SkippedPhase = {
      workflowId: this.workflowId,
      phaseId: phase.id,
      order: this.orderOf(phase.id),
      reason,
      ...(blockedBy !== undefined && { blockedBy }),
    };
    this.skipped.push(skipped);

    this.log.info('Phase skipped', { phase: phase.id, reason, blockedBy });
    this.events.emit('phase:skipped', skipped, this.runId);
  }

  private upstreamFindings(phaseId: string): Finding[] {
    return ancestorsOf(phaseId, this.nodes)
      .sort((a, b) => this.orderOf(a) - this.orderOf(b))
      .flatMap((id) => this.results.get(id)?.findings ?? []);
  }

  private orderOf(phaseId: string): number {
    return this.order.get(phaseId) ?? -1;
  }

  private finish(): void {
    if (this.closed) return;
    this.closed = true;
    clearTimeout(this.deadlineTimer);
    this.settings.signal?.removeEventListener('abort', this.onAbort);

    const results: PhaseResult[] = [];
    for (const phase of this.phases) {
      const result = this.results.get(phase.id);
      if (result) results.push(result);
    }

    const outcome: OrchestrationOutcome = {
      runId: this.runId,
      workflowId: this.workflowId,
      results,
      skipped: [...this.skipped],
      states: Object.fromEntries(this.states),
      incomplete: this.stopReason !== undefined,
      ...(this.stopReason && { stopReason: this.stopReason }),
      metricsExpected: this.phases.some((phase) => phase.producesMetrics === true),
    };

    this.log.info('Orchestration finished', {
      completed: results.length,
      skipped: outcome.skipped.length,
      incomplete: outcome.incomplete,
    });
    this.settle(outcome);
  }

  private fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    clearTimeout(this.deadlineTimer);
    this.settings.signal?.removeEventListener('abort', this.onAbort);
    this.controller.abort(error);
    this.interrupter.abort(error);
    this.log.error('Orchestration failed', { error });
    this.abort(error);
  }
}
