/**
 * Workflows module - phase graphs, execution and consolidation
 *
 * @packageDocumentation
 */

// Types
export type { PhaseContext, OrchestrationOutcome, RunOptions, RunEvent } from './types.js';

// Definitions
export { findCycle, topologicalSort, ancestorsOf, type DagNode } from './dag.js';
export {
  WorkflowRegistry,
  applyToggles,
  validateWorkflowDefinition,
  loadWorkflowDefinitions,
  defaultWorkflowsPath,
  getWorkflowRegistry,
  resetWorkflowRegistry,
  type WorkflowRegistryOptions,
} from './registry.js';

// Execution
export { PhaseExecutor, timeoutFinding, type PhaseExecutorOptions } from './phase-executor.js';
export {
  WorkflowOrchestrator,
  deadlineFinding,
  phaseStateOf,
  type OrchestratorEvents,
  type OrchestratorOptions,
  type OrchestrateOptions,
} from './orchestrator.js';

// Reporting
export { consolidate, consolidateOutcomes, type ConsolidationContext } from './consolidator.js';
export { tddAdherenceScore, TDD_ADHERENCE_METRIC } from './metrics.js';

// Runner
export {
  WorkflowRunner,
  getWorkflowRunner,
  resetWorkflowRunner,
  runWorkflow,
  streamWorkflow,
  uncoveredCategories,
  type WorkflowEvents,
  type WorkflowRunnerOptions,
} from './runner.js';
