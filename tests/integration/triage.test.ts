/**
 * End-to-end triage: classify, run the workflow, consolidate
 */

import { describe, it, expect } from 'vitest';
import { createTestRunner, finding, respondAfter } from './setup.js';
import { timeoutFinding } from '../../src/workflows/phase-executor.js';
import { TDD_ADHERENCE_METRIC, tddAdherenceScore } from '../../src/workflows/metrics.js';
import type { CapabilityHandler, CapabilityInvocation } from '../../src/capabilities/types.js';
import { CapabilityFatalError, CapabilityUnavailableError } from '../../src/utils/errors.js';

const slow = (ms: number): CapabilityHandler => respondAfter(ms, (call) => [finding(call, `${call.capability}-late`, 'minor')]);

describe('triage', () => {
  it('should diagnose a crash-looping deployment', async () => {
    const runner = createTestRunner({
      'deployment-diagnostics': respondAfter(1, (call) => [
        finding(call, 'crash-loop-backoff', 'critical', 'deployment/checkout-api'),
        finding(call, 'missing-readiness-probe', 'minor', 'deployment/checkout-api'),
      ]),
    });

    const report = await runner.run({ description: 'deploy is failing, pods crash looping' });

    expect(report.categories[0]?.category).toBe('deployment');
    expect(report.categories[0]?.confidence).toBeGreaterThanOrEqual(0.6);
    expect(report.workflowId).toBe('deployment-diagnosis');
    expect(report.tiers.critical.map((f) => [f.issueSignature, f.component])).toEqual([
      ['crash-loop-backoff', 'deployment/checkout-api'],
    ]);
    expect(report.summary.bySeverity).toEqual({ critical: 1, important: 0, minor: 1, positive: 0 });
    expect(report.incomplete).toBe(false);
  });

  it('should merge one issue reported by every review perspective', async () => {
    const dup = (severity: 'minor' | 'important' | 'critical'): CapabilityHandler =>
      respondAfter(1, (call) => [finding(call, 'dup-x', severity)]);
    const runner = createTestRunner({
      'quality-review': dup('minor'),
      'architecture-review': dup('important'),
      'security-audit': respondAfter(1, (call) => [
        finding(call, 'dup-x', 'critical'),
        finding(call, 'weak-hash', 'important', 'auth'),
      ]),
      'performance-profile': dup('important'),
    });

    const report = await runner.run({ description: 'Comprehensive review of the checkout module before merging' });

    expect(report.workflowId).toBe('composite:comprehensive-review+quality-review');
    expect(report.phases.map((p) => [p.phaseId, p.state])).toEqual([
      ['quality', 'done'],
      ['architecture', 'done'],
      ['security', 'done'],
      ['performance', 'done'],
    ]);
    expect(report.tiers.critical).toEqual([
      {
        sourceCapability: 'quality-review',
        component: 'checkout',
        issueSignature: 'dup-x',
        severity: 'critical',
        description: [
          'quality-review: dup-x',
          'architecture-review: dup-x',
          'security-audit: dup-x',
          'performance-profile: dup-x',
        ].join('\n'),
        mergedFrom: ['quality-review', 'architecture-review', 'security-audit', 'performance-profile'],
        occurrences: 4,
      },
    ]);
    expect(report.tiers.important.map((f) => f.issueSignature)).toEqual(['weak-hash']);
    expect(report.summary.totalFindings).toBe(2);
    expect(report.summary.duplicatesMerged).toBe(3);
  });

  it('should return an incomplete report when the run deadline expires', async () => {
    const runner = createTestRunner({
      'quality-review': respondAfter(5, (call) => [finding(call, 'long-function', 'minor')]),
      'architecture-review': respondAfter(5, (call) => [finding(call, 'tight-coupling', 'important')]),
      'security-audit': slow(5_000),
      'performance-profile': slow(5_000),
    });

    const started = Date.now();
    const report = await runner.run({ description: 'look at everything', categories: ['review'] }, { deadlineMs: 150 });

    expect(Date.now() - started).toBeLessThan(650);
    expect(report.incomplete).toBe(true);
    expect(report.stopReason).toBe('deadline');
    expect(report.phases.map((p) => [p.phaseId, p.state])).toEqual([
      ['quality', 'done'],
      ['architecture', 'done'],
      ['security', 'failed-partial'],
      ['performance', 'failed-partial'],
    ]);
    expect(report.tiers.minor.map((f) => f.issueSignature)).toEqual(['long-function']);
    expect(report.tiers.important.map((f) => f.issueSignature)).toEqual([
      'tight-coupling',
      'run-deadline:comprehensive-review:performance',
      'run-deadline:comprehensive-review:security',
    ]);
  });

  it('should keep the findings of the call running when the caller cancels', async () => {
    const controller = new AbortController();
    const runner = createTestRunner({ 'code-exploration': slow(60) });

    setTimeout(() => controller.abort(), 20);
    const report = await runner.run({ description: 'Please tidy the README' }, { signal: controller.signal });

    expect(report.workflowId).toBe('general-triage');
    expect(report.incomplete).toBe(true);
    expect(report.stopReason).toBe('cancelled');
    expect(report.phases.map((p) => [p.phaseId, p.state])).toEqual([
      ['explore', 'done'],
      ['review', 'skipped'],
    ]);
    expect(report.tiers.minor.map((f) => f.issueSignature)).toEqual(['code-exploration-late']);
    expect(report.metrics?.skippedPhases).toEqual([
      { workflowId: 'general-triage', phaseId: 'review', order: 1, reason: 'run-cancelled' },
    ]);
  });

  it('should report a timed-out capability as a finding', async () => {
    const runner = createTestRunner(
      { 'deployment-diagnostics': slow(2_000) },
      { executor: { capabilityTimeouts: { 'deployment-diagnostics': 30 } } }
    );

    const report = await runner.run({ description: 'deploy is failing, pods crash looping' });

    expect(report.tiers.important).toEqual([
      {
        ...timeoutFinding('deployment-diagnostics', 'diagnose', 30),
        mergedFrom: ['deployment-diagnostics'],
        occurrences: 1,
      },
    ]);
    expect(report.phases).toEqual([
      { workflowId: 'deployment-diagnosis', phaseId: 'diagnose', state: 'failed-partial', findings: 1, failures: [] },
    ]);
    expect(report.incomplete).toBe(false);
  });

  it('should retry a transiently unavailable capability', async () => {
    let calls = 0;
    const runner = createTestRunner({
      'security-audit': async (call) => {
        calls++;
        if (calls === 1) {
          throw new CapabilityUnavailableError(call.capability, 'scanner warming up');
        }
        return { findings: [finding(call, 'sql-injection', 'critical', 'orders-api')], status: 'complete' };
      },
    });

    const report = await runner.run({ description: 'Security audit of the login flow' });

    expect(calls).toBe(2);
    expect(report.tiers.critical.map((f) => f.issueSignature)).toEqual(['sql-injection']);
    expect(report.phases[0]).toEqual({
      workflowId: 'security-hardening',
      phaseId: 'audit',
      state: 'done',
      findings: 1,
      failures: [],
    });
  });

  it('should skip the dependents of a fatally failed phase', async () => {
    const runner = createTestRunner({
      'code-exploration': async (call) => {
        throw new CapabilityFatalError(call.capability, 'repository not found');
      },
    });

    const report = await runner.run({ description: 'Please tidy the README' });

    expect(report.incomplete).toBe(false);
    expect(report.phases).toEqual([
      {
        workflowId: 'general-triage',
        phaseId: 'explore',
        state: 'failed-fatal',
        findings: 0,
        failures: [{ capability: 'code-exploration', kind: 'fatal', message: 'repository not found', attempts: 1 }],
      },
      { workflowId: 'general-triage', phaseId: 'review', state: 'skipped', findings: 0, failures: [] },
    ]);
    expect(report.metrics).toEqual({
      scores: {},
      skippedPhases: [
        { workflowId: 'general-triage', phaseId: 'review', order: 1, reason: 'upstream-failure', blockedBy: 'explore' },
      ],
    });
  });

  it('should hand earlier findings to later capabilities of a sequential phase', async () => {
    const seen: CapabilityInvocation[] = [];
    const runner = createTestRunner({
      'security-audit': respondAfter(1, (call) => [finding(call, 'open-redirect', 'important', 'login')]),
      'architecture-review': async (call) => {
        seen.push(call);
        return { findings: [], status: 'complete' };
      },
    });

    await runner.run({ description: 'Security audit of the login flow', target: 'services/login' });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.target).toBe('services/login');
    expect(seen[0]?.contextFindings.map((f) => f.issueSignature)).toEqual(['open-redirect']);
  });

  it('should score TDD adherence only when the toggle is on', async () => {
    const runner = createTestRunner({
      'tdd-compliance': async () => ({
        findings: [],
        status: 'complete',
        metrics: { [TDD_ADHERENCE_METRIC]: tddAdherenceScore(3, 4) },
      }),
    });
    const request = { description: 'Improve the test suite coverage' };

    const plain = await runner.run(request);
    const scored = await runner.run({ ...request, flags: { 'tdd-compliance': true } });

    expect(plain.workflowId).toBe('test-improvement');
    expect(plain.metrics).toBeUndefined();
    expect(scored.phases.map((p) => p.phaseId)).toEqual(['testing', 'tdd']);
    expect(scored.metrics).toEqual({ scores: { tddAdherence: 75 }, skippedPhases: [] });
  });

  it('should stream phase events with the report last', async () => {
    const runner = createTestRunner({});
    const types: string[] = [];

    for await (const event of runner.stream({ description: 'Please tidy the README' })) {
      types.push(event.type === 'phase-start' ? `${event.type}:${event.phaseId}` : event.type);
    }

    expect(types).toEqual([
      'run-start',
      'phase-start:explore',
      'phase-complete',
      'phase-start:review',
      'phase-complete',
      'report',
    ]);
  });
});
