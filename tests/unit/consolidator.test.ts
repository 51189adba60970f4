/**
 * Consolidator tests
 */

import { describe, it, expect, vi } from 'vitest';
import { consolidate, consolidateOutcomes } from '../../src/workflows/consolidator.js';
import type { Finding, PhaseResult, Severity } from '../../src/types.js';
import type { OrchestrationOutcome } from '../../src/workflows/types.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

function finding(
  sourceCapability: string,
  component: string,
  issueSignature: string,
  severity: Severity,
  description: string,
  extra: { evidence?: string; remediation?: string } = {}
): Finding {
  return { sourceCapability, component, issueSignature, severity, description, ...extra };
}

function result(phaseId: string, order: number, findings: Finding[], extra: Partial<PhaseResult> = {}): PhaseResult {
  return {
    workflowId: 'comprehensive-review',
    phaseId,
    order,
    status: 'success',
    findings,
    failures: [],
    interrupted: false,
    duration: 5,
    ...extra,
  };
}

const categories = [{ category: 'review', confidence: 0.9, matched: ['comprehensive review'] }];
const context = { workflowId: 'comprehensive-review', categories };

const quality = result('quality', 0, [
  finding('quality-review', 'api', 'sql-injection', 'important', 'Unparameterized query', {
    evidence: 'api/orders.ts:42',
  }),
  finding('quality-review', 'web', 'dup-code', 'minor', 'Duplicated handler'),
]);

const security = result('security', 2, [
  finding('security-audit', 'api', 'sql-injection', 'critical', 'Unparameterized query', {
    evidence: 'api/orders.ts:42',
    remediation: 'Use bound parameters',
  }),
  finding('security-audit', 'api', 'weak-hash', 'important', 'MD5 used for passwords'),
  finding('security-audit', 'api', 'token-rotation', 'positive', 'Tokens are rotated'),
]);

describe('consolidate', () => {
  it('should merge duplicates at the highest severity', () => {
    const report = consolidate([security, quality], context);

    expect(report.tiers.critical).toEqual([
      {
        sourceCapability: 'quality-review',
        component: 'api',
        issueSignature: 'sql-injection',
        severity: 'critical',
        description: 'Unparameterized query',
        evidence: 'api/orders.ts:42',
        remediation: 'Use bound parameters',
        mergedFrom: ['quality-review', 'security-audit'],
        occurrences: 2,
      },
    ]);
    expect(report.tiers.important.map((f) => f.issueSignature)).toEqual(['weak-hash']);
    expect(report.tiers.minor.map((f) => f.issueSignature)).toEqual(['dup-code']);
    expect(report.tiers.positive.map((f) => f.issueSignature)).toEqual(['token-rotation']);
  });

  it('should summarize tiers and merges', () => {
    const report = consolidate([quality, security], context);

    expect(report.summary).toEqual({
      totalFindings: 4,
      duplicatesMerged: 1,
      bySeverity: { critical: 1, important: 1, minor: 1, positive: 1 },
    });
    expect(report.phases).toEqual([
      { workflowId: 'comprehensive-review', phaseId: 'quality', state: 'done', findings: 2, failures: [] },
      { workflowId: 'comprehensive-review', phaseId: 'security', state: 'done', findings: 3, failures: [] },
    ]);
    expect(report.incomplete).toBe(false);
    expect(report.categories).toEqual(categories);
    expect('metrics' in report).toBe(false);
    expect('stopReason' in report).toBe(false);
  });

  it('should join distinct texts with newlines', () => {
    const report = consolidate(
      [
        result('quality', 0, [
          finding('quality-review', 'api', 'n-plus-one', 'minor', 'Query in a loop', { remediation: 'Batch the lookups' }),
        ]),
        result('performance', 1, [
          finding('performance-profile', 'api', 'n-plus-one', 'important', 'Query in a loop'),
          finding('database-optimization', 'api', 'n-plus-one', 'minor', '40 queries per request', {
            remediation: 'Batch the lookups',
          }),
        ]),
      ],
      context
    );

    const [merged] = report.tiers.important;
    expect(merged?.description).toBe('Query in a loop\n40 queries per request');
    expect(merged?.remediation).toBe('Batch the lookups');
    expect(merged && 'evidence' in merged).toBe(false);
    expect(merged?.mergedFrom).toEqual(['quality-review', 'performance-profile', 'database-optimization']);
    expect(merged?.occurrences).toBe(3);
  });

  it('should order a tier by component, then discovery', () => {
    const report = consolidate(
      [
        result('quality', 0, [
          finding('quality-review', 'web', 'w1', 'minor', 'first web'),
          finding('quality-review', 'api', 'a1', 'minor', 'first api'),
          finding('quality-review', 'web', 'w2', 'minor', 'second web'),
          finding('quality-review', 'api', 'a2', 'minor', 'second api'),
        ]),
      ],
      context
    );

    expect(report.tiers.minor.map((f) => f.issueSignature)).toEqual(['a1', 'a2', 'w1', 'w2']);
  });

  it('should not depend on the order results arrive in', () => {
    const forward = consolidate([quality, security], context);
    const backward = consolidate([security, quality], context);
    expect(JSON.stringify(backward)).toBe(JSON.stringify(forward));
  });

  it('should keep the first score by phase order with sorted keys', () => {
    const report = consolidate(
      [
        result('tdd', 4, [], { metrics: { tddAdherence: 40 } }),
        result('testing', 1, [], { metrics: { tddAdherence: 80, coverage: 71 } }),
      ],
      context
    );

    expect(report.metrics).toEqual({ scores: { coverage: 71, tddAdherence: 80 }, skippedPhases: [] });
    expect(Object.keys(report.metrics?.scores ?? {})).toEqual(['coverage', 'tddAdherence']);
  });

  it('should record skipped phases in metrics and the phase list', () => {
    const failed = result('quality', 0, [], {
      status: 'failed',
      failures: [{ capability: 'quality-review', kind: 'fatal', message: 'boom', attempts: 1 }],
    });
    const report = consolidate([failed], {
      ...context,
      skipped: [
        { workflowId: 'comprehensive-review', phaseId: 'tdd', order: 4, reason: 'upstream-failure', blockedBy: 'quality' },
        { workflowId: 'comprehensive-review', phaseId: 'security', order: 2, reason: 'upstream-failure', blockedBy: 'quality' },
      ],
    });

    expect(report.metrics?.skippedPhases.map((s) => s.phaseId)).toEqual(['security', 'tdd']);
    expect(report.phases.map((p) => [p.phaseId, p.state])).toEqual([
      ['quality', 'failed-fatal'],
      ['security', 'skipped'],
      ['tdd', 'skipped'],
    ]);
    expect(report.phases[0]?.failures).toEqual([
      { capability: 'quality-review', kind: 'fatal', message: 'boom', attempts: 1 },
    ]);
  });

  it('should include an empty metrics block when metrics were expected', () => {
    const report = consolidate([quality], { ...context, metricsExpected: true });
    expect(report.metrics).toEqual({ scores: {}, skippedPhases: [] });
  });

  it('should map interrupted and partial phases to failed-partial', () => {
    const report = consolidate(
      [
        result('quality', 0, [], { status: 'partial' }),
        result('security', 2, [], { status: 'success', interrupted: true }),
      ],
      { ...context, incomplete: true, stopReason: 'cancelled' }
    );

    expect(report.phases.map((p) => p.state)).toEqual(['failed-partial', 'failed-partial']);
    expect(report.incomplete).toBe(true);
    expect(report.stopReason).toBe('cancelled');
  });

  it('should produce empty tiers without results', () => {
    const report = consolidate([], context);
    expect(report.tiers).toEqual({ critical: [], important: [], minor: [], positive: [] });
    expect(report.summary.totalFindings).toBe(0);
  });
});

describe('consolidateOutcomes', () => {
  it('should combine independent orchestrations', () => {
    const outcome = (workflowId: string, results: PhaseResult[], incomplete: boolean): OrchestrationOutcome => ({
      runId: 'run-1',
      workflowId,
      results,
      skipped: [],
      states: {},
      incomplete,
      ...(incomplete && { stopReason: 'deadline' as const }),
      metricsExpected: false,
    });

    const report = consolidateOutcomes(
      [
        outcome('security-hardening', [{ ...security, workflowId: 'security-hardening', order: 0 }], false),
        outcome('quality-review', [{ ...quality, workflowId: 'quality-review' }], true),
      ],
      categories
    );

    expect(report.workflowId).toBe('security-hardening+quality-review');
    expect(report.incomplete).toBe(true);
    expect(report.stopReason).toBe('deadline');
    expect(report.phases.map((p) => `${p.workflowId}/${p.phaseId}`)).toEqual([
      'quality-review/quality',
      'security-hardening/security',
    ]);
    // quality-review sorts first, so its copy of the finding leads the merge
    expect(report.tiers.critical[0]?.mergedFrom).toEqual(['quality-review', 'security-audit']);
  });
});
