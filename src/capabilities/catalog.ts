/**
 * Built-in capability catalog
 *
 * Workflow definitions may only reference capabilities listed here or
 * served by the configured adapter.
 */

import type { CapabilityDescriptor } from './types.js';

export const BUILTIN_CAPABILITIES: readonly CapabilityDescriptor[] = [
  { name: 'code-exploration', description: 'Map the code paths and components a request touches' },
  { name: 'deployment-diagnostics', description: 'Inspect rollouts, pods, manifests and pipeline runs' },
  { name: 'error-debugging', description: 'Trace errors and stack traces to their root cause' },
  { name: 'database-optimization', description: 'Review queries, indexes, plans and connection handling' },
  { name: 'performance-profile', description: 'Profile latency, throughput, CPU and memory hot spots' },
  { name: 'legacy-modernization', description: 'Assess legacy code and plan incremental migration' },
  { name: 'security-audit', description: 'Scan for vulnerabilities, secrets and unsafe patterns' },
  { name: 'compliance-audit', description: 'Check regulatory and policy controls' },
  { name: 'architecture-review', description: 'Evaluate boundaries, coupling and design decisions' },
  { name: 'quality-review', description: 'Review readability, duplication, complexity and conventions' },
  { name: 'test-automation', description: 'Assess and extend automated test coverage' },
  { name: 'tdd-compliance', description: 'Measure red-green-refactor discipline across commits' },
];

export function builtinCapabilityNames(): string[] {
  return BUILTIN_CAPABILITIES.map((c) => c.name);
}
