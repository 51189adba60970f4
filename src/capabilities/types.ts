/**
 * Capability adapter contract
 */

import type { Finding } from '../types.js';

export interface CapabilityInvocation {
  capability: string;
  /** What to analyse: the request's target, or its description */
  target: string;
  /** Findings from upstream phases and, in sequential phases, earlier capabilities */
  contextFindings: readonly Finding[];
  flags: Readonly<Record<string, boolean>>;
  /** Aborted on run cancellation, run deadline or capability timeout */
  signal: AbortSignal;
}

export type InvocationStatus = 'complete' | 'partial';

export interface CapabilityResponse {
  findings: Finding[];
  status: InvocationStatus;
  metrics?: Record<string, number>;
}

/**
 * Uniform entry point to external analysis capabilities
 *
 * Implementations should honour `signal` and may throw
 * CapabilityUnavailableError for transient problems (retried),
 * CapabilityTimeoutError, or CapabilityFatalError.
 */
export interface CapabilityAdapter {
  invoke(invocation: CapabilityInvocation): Promise<CapabilityResponse>;
  /** Capability names this adapter can serve, used for definition validation */
  listCapabilities?(): string[];
}

export type CapabilityHandler = (invocation: CapabilityInvocation) => Promise<CapabilityResponse>;

export interface CapabilityDescriptor {
  name: string;
  description: string;
}
