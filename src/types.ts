/**
 * Core types for devflow-triage
 */

// Categories
export type BuiltinCategory =
  | 'deployment'
  | 'code-error'
  | 'db-performance'
  | 'app-performance'
  | 'legacy'
  | 'security'
  | 'architecture'
  | 'quality'
  | 'performance'
  | 'testing'
  | 'tdd-compliance'
  | 'review'
  | 'general';

export type Category = BuiltinCategory | string;

export const GENERAL_CATEGORY = 'general';

export interface TaskRequest {
  readonly description: string;
  readonly categories?: readonly Category[];
  readonly flags?: Readonly<Record<string, boolean>>;
  readonly target?: string;
}

export interface ClassificationMatch {
  category: Category;
  confidence: number;
  matched: string[];
}

// Classifier rule table
export interface ClassifierRule {
  category: Category;
  patterns: readonly string[];
  weight: number;
}

export type RuleTable = readonly Readonly<ClassifierRule>[];

// Findings
export type Severity = 'critical' | 'important' | 'minor' | 'positive';

/** Highest first */
export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'important', 'minor', 'positive'];

export interface Finding {
  readonly sourceCapability: string;
  readonly component: string;
  readonly issueSignature: string;
  readonly severity: Severity;
  readonly description: string;
  readonly evidence?: string;
  readonly remediation?: string;
}

export interface ConsolidatedFinding extends Finding {
  readonly mergedFrom: string[];
  readonly occurrences: number;
}

// Workflow definitions
export type ExecutionMode = 'sequential' | 'parallel';

export interface PhaseDefinition {
  id: string;
  name: string;
  capabilities: readonly string[];
  mode: ExecutionMode;
  dependsOn: readonly string[];
  toggle?: string;
  producesMetrics?: boolean;
}

export interface WorkflowToggle {
  description: string;
  default: boolean;
}

export interface WorkflowDefinition {
  id: string;
  version: string;
  name: string;
  description: string;
  categories: readonly Category[];
  phases: readonly PhaseDefinition[];
  toggles: Readonly<Record<string, WorkflowToggle>>;
}

// Phase execution
export type PhaseStatus = 'success' | 'partial' | 'failed';

export type CapabilityFailureKind = 'fatal' | 'exhausted' | 'cancelled';

export interface CapabilityFailure {
  capability: string;
  kind: CapabilityFailureKind;
  message: string;
  attempts: number;
}

export interface PhaseResult {
  workflowId: string;
  phaseId: string;
  order: number;
  status: PhaseStatus;
  findings: Finding[];
  failures: CapabilityFailure[];
  metrics?: Record<string, number>;
  interrupted: boolean;
  duration: number;
}

export type PhaseState =
  | 'pending'
  | 'ready'
  | 'running'
  | 'done'
  | 'failed-partial'
  | 'failed-fatal'
  | 'skipped';

export type TerminalPhaseState = Extract<PhaseState, 'done' | 'failed-partial' | 'failed-fatal' | 'skipped'>;

export type SkipReason = 'upstream-failure' | 'run-cancelled' | 'deadline-exceeded';

export interface SkippedPhase {
  workflowId: string;
  phaseId: string;
  order: number;
  reason: SkipReason;
  blockedBy?: string;
}

export type StopReason = 'cancelled' | 'deadline';

// Report
export interface PhaseSummary {
  workflowId: string;
  phaseId: string;
  state: TerminalPhaseState;
  findings: number;
  failures: CapabilityFailure[];
}

export interface ReportMetrics {
  scores: Record<string, number>;
  skippedPhases: SkippedPhase[];
}

export interface ConsolidatedReport {
  workflowId: string;
  categories: ClassificationMatch[];
  incomplete: boolean;
  stopReason?: StopReason;
  tiers: Record<Severity, ConsolidatedFinding[]>;
  summary: {
    totalFindings: number;
    duplicatesMerged: number;
    bySeverity: Record<Severity, number>;
  };
  phases: PhaseSummary[];
  metrics?: ReportMetrics;
}
