/**
 * Consolidator - merges phase results into one prioritized report
 *
 * Pure: the output depends only on the multiset of inputs, never on the
 * order in which phases happened to finish, and carries no timestamps.
 */

import type {
  ClassificationMatch,
  ConsolidatedFinding,
  ConsolidatedReport,
  Finding,
  PhaseResult,
  PhaseSummary,
  ReportMetrics,
  Severity,
  SkippedPhase,
  StopReason,
} from '../types.js';
import { SEVERITY_ORDER } from '../types.js';
import type { OrchestrationOutcome } from './types.js';
import { phaseStateOf } from './orchestrator.js';

export interface ConsolidationContext {
  workflowId: string;
  categories: ClassificationMatch[];
  skipped?: readonly SkippedPhase[];
  incomplete?: boolean;
  stopReason?: StopReason;
  /** The workflow declares metric-producing phases */
  metricsExpected?: boolean;
}

interface PhaseKey {
  workflowId: string;
  order: number;
  phaseId: string;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function comparePhases(a: PhaseKey, b: PhaseKey): number {
  return compareText(a.workflowId, b.workflowId) || a.order - b.order || compareText(a.phaseId, b.phaseId);
}

function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

function joinDistinct(values: ReadonlyArray<string | undefined>): string | undefined {
  const distinct: string[] = [];
  for (const value of values) {
    if (value !== undefined && value !== '' && !distinct.includes(value)) {
      distinct.push(value);
    }
  }
  return distinct.length > 0 ? distinct.join('\n') : undefined;
}

interface Group {
  firstSeen: number;
  members: Finding[];
}

function mergeGroup(group: Group): ConsolidatedFinding {
  const [first, ...rest] = group.members;
  if (!first) {
    throw new RangeError('Cannot merge an empty finding group');
  }

  let severity = first.severity;
  for (const member of rest) {
    if (severityRank(member.severity) < severityRank(severity)) {
      severity = member.severity;
    }
  }

  const mergedFrom: string[] = [];
  for (const member of group.members) {
    if (!mergedFrom.includes(member.sourceCapability)) {
      mergedFrom.push(member.sourceCapability);
    }
  }

  const evidence = joinDistinct(group.members.map((m) => m.evidence));
  const remediation = joinDistinct(group.members.map((m) => m.remediation));

  return {
    sourceCapability: first.sourceCapability,
    component: first.component,
    issueSignature: first.issueSignature,
    severity,
    description: joinDistinct(group.members.map((m) => m.description)) ?? '',
    ...(evidence !== undefined && { evidence }),
    ...(remediation !== undefined && { remediation }),
    mergedFrom,
    occurrences: group.members.length,
  };
}

function summarizePhases(results: readonly PhaseResult[], skipped: readonly SkippedPhase[]): PhaseSummary[] {
  const summaries: Array<PhaseSummary & { order: number }> = [
    ...results.map((result) => ({
      workflowId: result.workflowId,
      phaseId: result.phaseId,
      order: result.order,
      state: terminalState(result),
      findings: result.findings.length,
      failures: [...result.failures],
    })),
    ...skipped.map((s) => ({
      workflowId: s.workflowId,
      phaseId: s.phaseId,
      order: s.order,
      state: 'skipped' as const,
      findings: 0,
      failures: [],
    })),
  ];

  return summaries
    .sort(comparePhases)
    .map(({ workflowId, phaseId, state, findings, failures }) => ({ workflowId, phaseId, state, findings, failures }));
}

function terminalState(result: PhaseResult): PhaseSummary['state'] {
  const state = phaseStateOf(result);
  return state === 'done' || state === 'failed-partial' || state === 'failed-fatal' ? state : 'failed-partial';
}

/**
 * Merge the findings of every phase result into severity tiers
 *
 * Findings sharing an issue signature collapse into one entry at the
 * highest severity present; tiers are ordered by component, then by the
 * position of each entry's first member in discovery order.
 */
export function consolidate(results: readonly PhaseResult[], context: ConsolidationContext): ConsolidatedReport {
  const ordered = [...results].sort(comparePhases);
  const skipped = [...(context.skipped ?? [])].sort(comparePhases);

  const groups = new Map<string, Group>();
  let discovered = 0;
  for (const result of ordered) {
    for (const finding of result.findings) {
      const group = groups.get(finding.issueSignature);
      if (group) {
        group.members.push(finding);
      } else {
        groups.set(finding.issueSignature, { firstSeen: discovered, members: [finding] });
      }
      discovered++;
    }
  }

  const merged = [...groups.values()].map((group) => ({ firstSeen: group.firstSeen, finding: mergeGroup(group) }));

  const tiers: Record<Severity, ConsolidatedFinding[]> = {
    critical: [],
    important: [],
    minor: [],
    positive: [],
  };
  const bySeverity: Record<Severity, number> = { critical: 0, important: 0, minor: 0, positive: 0 };

  for (const severity of SEVERITY_ORDER) {
    tiers[severity] = merged
      .filter((entry) => entry.finding.severity === severity)
      .sort((a, b) => compareText(a.finding.component, b.finding.component) || a.firstSeen - b.firstSeen)
      .map((entry) => entry.finding);
    bySeverity[severity] = tiers[severity].length;
  }

  const scores: Record<string, number> = {};
  for (const result of ordered) {
    for (const [name, value] of Object.entries(result.metrics ?? {})) {
      if (!(name in scores)) scores[name] = value;
    }
  }
  const sortedScores: Record<string, number> = {};
  for (const name of Object.keys(scores).sort(compareText)) {
    const value = scores[name];
    if (value !== undefined) sortedScores[name] = value;
  }

  const hasScores = Object.keys(sortedScores).length > 0;
  const metrics: ReportMetrics | undefined =
    hasScores || skipped.length > 0 || context.metricsExpected
      ? { scores: sortedScores, skippedPhases: skipped }
      : undefined;

  return {
    workflowId: context.workflowId,
    categories: context.categories.map((match) => ({ ...match, matched: [...match.matched] })),
    incomplete: context.incomplete ?? false,
    ...(context.stopReason && { stopReason: context.stopReason }),
    tiers,
    summary: {
      totalFindings: merged.length,
      duplicatesMerged: discovered - merged.length,
      bySeverity,
    },
    phases: summarizePhases(ordered, skipped),
    ...(metrics && { metrics }),
  };
}

/**
 * One report over several orchestrations of the same request
 */
export function consolidateOutcomes(
  outcomes: readonly OrchestrationOutcome[],
  categories: ClassificationMatch[]
): ConsolidatedReport {
  const stopReason = outcomes.find((outcome) => outcome.stopReason !== undefined)?.stopReason;
  return consolidate(
    outcomes.flatMap((outcome) => outcome.results),
    {
      workflowId: outcomes.map((outcome) => outcome.workflowId).join('+'),
      categories,
      skipped: outcomes.flatMap((outcome) => outcome.skipped),
      incomplete: outcomes.some((outcome) => outcome.incomplete),
      ...(stopReason && { stopReason }),
      metricsExpected: outcomes.some((outcome) => outcome.metricsExpected),
    }
  );
}
