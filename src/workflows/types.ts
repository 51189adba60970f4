/**
 * Workflow execution types and interfaces
 */

import type {
  ClassificationMatch,
  ConsolidatedReport,
  Finding,
  PhaseResult,
  PhaseState,
  SkippedPhase,
  StopReason,
  TaskRequest,
} from '../types.js';
import type { Semaphore } from '../utils/semaphore.js';

export interface PhaseContext {
  runId: string;
  workflowId: string;
  /** Position of the phase in the resolved workflow */
  order: number;
  request: TaskRequest;
  /** Findings of every phase this one transitively depends on */
  upstreamFindings: readonly Finding[];
  /** Aborted when the run stops; checked before each capability starts */
  signal: AbortSignal;
  /** Forwarded to capability calls already running; fires on the run deadline */
  interrupt?: AbortSignal;
  /** Run-wide bound on concurrent capability invocations */
  capabilitySlots?: Semaphore;
}

export interface OrchestrationOutcome {
  runId: string;
  workflowId: string;
  results: PhaseResult[];
  skipped: SkippedPhase[];
  states: Record<string, PhaseState>;
  incomplete: boolean;
  stopReason?: StopReason;
  /** Whether the workflow declares metric-producing phases */
  metricsExpected: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Whole-run deadline, relative to the start of the run */
  deadlineMs?: number;
  runId?: string;
  onEvent?: (event: RunEvent) => void;
}

export type RunEvent =
  | { type: 'run-start'; runId: string; categories: ClassificationMatch[] }
  | { type: 'phase-start'; runId: string; workflowId: string; phaseId: string }
  | { type: 'phase-complete'; runId: string; result: PhaseResult }
  | { type: 'phase-skipped'; runId: string; skipped: SkippedPhase }
  | { type: 'report'; runId: string; report: ConsolidatedReport };
