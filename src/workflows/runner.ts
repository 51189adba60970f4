/**
 * Workflow runner - classify a request, run the matching workflows and
 * consolidate their findings
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type {
  ClassificationMatch,
  ConsolidatedReport,
  Finding,
  PhaseResult,
  RuleTable,
  SkippedPhase,
  TaskRequest,
  WorkflowDefinition,
} from '../types.js';
import { GENERAL_CATEGORY } from '../types.js';
import type { CapabilityAdapter } from '../capabilities/types.js';
import type { RunEvent, RunOptions } from './types.js';
import { Classifier } from '../classifier/classifier.js';
import { RuleTableStore, getRuleTableStore } from '../classifier/rules.js';
import { WorkflowRegistry, applyToggles } from './registry.js';
import { PhaseExecutor } from './phase-executor.js';
import { WorkflowOrchestrator } from './orchestrator.js';
import { consolidateOutcomes } from './consolidator.js';
import { getCapabilityRegistry } from '../capabilities/registry.js';
import { type EngineConfig, applyLoggingConfig, getConfig, getDefaultConfig } from '../utils/config.js';
import { RunCancelledError } from '../utils/errors.js';
import { validateTaskRequest } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('workflow');

export interface WorkflowEvents {
  'run:start': (event: Extract<RunEvent, { type: 'run-start' }>) => void;
  'run:complete': (report: ConsolidatedReport, runId: string) => void;
  'phase:start': (event: Extract<RunEvent, { type: 'phase-start' }>) => void;
  'phase:complete': (result: PhaseResult, runId: string) => void;
  'phase:skipped': (skipped: SkippedPhase, runId: string) => void;
  'finding': (finding: Finding, runId: string) => void;
}

export interface WorkflowRunnerOptions {
  adapter: CapabilityAdapter;
  registry?: WorkflowRegistry;
  rules?: RuleTableStore;
  config?: EngineConfig;
}

/**
 * Rule categories that no workflow serves
 */
export function uncoveredCategories(rules: RuleTable, registry: WorkflowRegistry): string[] {
  const missing = new Set<string>();
  for (const rule of rules) {
    if (!registry.has(rule.category)) missing.add(rule.category);
  }
  return [...missing].map((category) => `rule category "${category}" has no workflow`);
}

export class WorkflowRunner extends EventEmitter {
  private readonly registry: WorkflowRegistry;
  private readonly rules: RuleTableStore;
  private readonly config: EngineConfig;
  private readonly executor: PhaseExecutor;
  private readonly classifiers = new WeakMap<RuleTable, Classifier>();

  constructor(options: WorkflowRunnerOptions) {
    super();
    this.config = options.config ?? getDefaultConfig();
    this.registry =
      options.registry ??
      WorkflowRegistry.fromFile(this.config.workflows.definitionsPath, {
        capabilities: options.adapter.listCapabilities?.(),
      });
    this.rules = options.rules ?? RuleTableStore.fromFile(this.config.classifier.rulesPath);
    this.rules.setValidator((rules) => uncoveredCategories(rules, this.registry));
    this.executor = PhaseExecutor.fromConfig(options.adapter, this.config.executor);
  }

  static fromConfig(adapter: CapabilityAdapter, config: EngineConfig = getConfig()): WorkflowRunner {
    return new WorkflowRunner({
      adapter,
      config,
      rules: config.classifier.rulesPath ? RuleTableStore.fromFile(config.classifier.rulesPath) : getRuleTableStore(),
    });
  }

  getRegistry(): WorkflowRegistry {
    return this.registry;
  }

  getRuleTableStore(): RuleTableStore {
    return this.rules;
  }

  /**
   * Classify against the rule table current at call time
   */
  classify(request: TaskRequest): ClassificationMatch[] {
    return this.classifierFor(this.rules.snapshot()).classify(request.description, request.categories);
  }

  private classifierFor(rules: RuleTable): Classifier {
    let classifier = this.classifiers.get(rules);
    if (!classifier) {
      classifier = new Classifier(rules, this.config.classifier);
      this.classifiers.set(rules, classifier);
    }
    return classifier;
  }

  /**
   * Workflows a classified request runs, toggles applied
   */
  resolveWorkflows(
    categories: readonly ClassificationMatch[],
    flags: Readonly<Record<string, boolean>> = {}
  ): WorkflowDefinition[] {
    const names = categories.map((match) => match.category);

    switch (this.config.orchestrator.multiCategoryPolicy) {
      case 'primary':
        return [applyToggles(this.registry.lookup(names[0] ?? GENERAL_CATEGORY), flags)];
      case 'independent': {
        const definitions: WorkflowDefinition[] = [];
        for (const name of names.length > 0 ? names : [GENERAL_CATEGORY]) {
          const definition = this.registry.lookup(name);
          if (!definitions.includes(definition)) definitions.push(definition);
        }
        return definitions.map((definition) => applyToggles(definition, flags));
      }
      case 'composite':
        return [applyToggles(this.registry.lookupComposite(names), flags)];
    }
  }

  /**
   * Run a request to its consolidated report
   *
   * Resolves when every phase is terminal, the run is cancelled, or the
   * deadline expires; only configuration problems reject.
   */
  async run(input: TaskRequest, options: RunOptions = {}): Promise<ConsolidatedReport> {
    const request = validateTaskRequest(input);
    const runId = options.runId ?? randomUUID();
    const categories = this.classify(request);
    const workflows = this.resolveWorkflows(categories, request.flags);
    const deadlineMs = options.deadlineMs ?? this.config.orchestrator.runDeadlineMs;

    const emit = (event: RunEvent): void => {
      options.onEvent?.(event);
    };

    const runLog = log.bind({ runId });
    runLog.info('Run started', {
      categories: categories.map((m) => `${m.category}:${m.confidence}`),
      workflows: workflows.map((w) => w.id),
      policy: this.config.orchestrator.multiCategoryPolicy,
    });
    const startEvent = { type: 'run-start', runId, categories } as const;
    this.emit('run:start', startEvent);
    emit(startEvent);

    const orchestrations = workflows.map((definition) => {
      const orchestrator = WorkflowOrchestrator.fromConfig(
        definition,
        this.executor,
        this.config.orchestrator,
        this.config.executor.maxConcurrentCapabilities
      );

      orchestrator.on('phase:start', (event: { runId: string; workflowId: string; phaseId: string }) => {
        const phaseEvent = { type: 'phase-start', ...event } as const;
        this.emit('phase:start', phaseEvent);
        emit(phaseEvent);
      });
      orchestrator.on('phase:complete', (result: PhaseResult) => {
        this.emit('phase:complete', result, runId);
        emit({ type: 'phase-complete', runId, result });
      });
      orchestrator.on('phase:skipped', (skipped: SkippedPhase) => {
        this.emit('phase:skipped', skipped, runId);
        emit({ type: 'phase-skipped', runId, skipped });
      });
      orchestrator.on('finding', (finding: Finding) => {
        this.emit('finding', finding, runId);
      });

      return orchestrator.run(request, {
        runId,
        ...(options.signal && { signal: options.signal }),
        ...(deadlineMs !== undefined && { deadlineMs }),
      });
    });

    const outcomes = await Promise.all(orchestrations);
    const report = consolidateOutcomes(outcomes, categories);

    runLog.info('Run completed', {
      workflow: report.workflowId,
      findings: report.summary.totalFindings,
      incomplete: report.incomplete,
    });
    this.emit('run:complete', report, runId);
    emit({ type: 'report', runId, report });

    return report;
  }

  /**
   * Run a request, yielding phase events as they happen and the report last
   *
   * Leaving the loop early cancels the run.
   */
  async *stream(input: TaskRequest, options: RunOptions = {}): AsyncGenerator<RunEvent, void, undefined> {
    const runId = options.runId ?? randomUUID();
    const controller = new AbortController();
    const outer = options.signal;
    const forwardAbort = (): void => controller.abort(outer?.reason);
    if (outer?.aborted) {
      forwardAbort();
    } else {
      outer?.addEventListener('abort', forwardAbort, { once: true });
    }

    const queue: RunEvent[] = [];
    let wake: (() => void) | undefined;
    const state: { finished: boolean; failure?: { error: unknown } } = { finished: false };

    const notify = (): void => {
      const resume = wake;
      wake = undefined;
      resume?.();
    };

    const running = this.run(input, {
      ...options,
      runId,
      signal: controller.signal,
      onEvent: (event) => {
        options.onEvent?.(event);
        queue.push(event);
        notify();
      },
    }).then(
      () => {
        state.finished = true;
        notify();
      },
      (error: unknown) => {
        state.failure = { error };
        state.finished = true;
        notify();
      }
    );

    try {
      while (true) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (state.finished) break;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
      if (state.failure) {
        throw state.failure.error;
      }
    } finally {
      if (!state.finished) {
        log.debug('Stream closed early, cancelling run', { runId });
        controller.abort(new RunCancelledError(runId));
      }
      outer?.removeEventListener('abort', forwardAbort);
      await running;
    }
  }
}

let runnerInstance: WorkflowRunner | null = null;

/**
 * Shared runner over the global capability registry and configuration
 */
export function getWorkflowRunner(): WorkflowRunner {
  if (!runnerInstance) {
    const config = getConfig();
    applyLoggingConfig(config);
    runnerInstance = WorkflowRunner.fromConfig(getCapabilityRegistry(), config);
  }
  return runnerInstance;
}

export function resetWorkflowRunner(): void {
  runnerInstance = null;
}

export function runWorkflow(request: TaskRequest, options?: RunOptions): Promise<ConsolidatedReport> {
  return getWorkflowRunner().run(request, options);
}

export function streamWorkflow(request: TaskRequest, options?: RunOptions): AsyncGenerator<RunEvent, void, undefined> {
  return getWorkflowRunner().stream(request, options);
}
