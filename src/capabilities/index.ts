/**
 * Capabilities module - adapter contract and handler registry
 *
 * @packageDocumentation
 */

export type {
  CapabilityAdapter,
  CapabilityDescriptor,
  CapabilityHandler,
  CapabilityInvocation,
  CapabilityResponse,
  InvocationStatus,
} from './types.js';

export { BUILTIN_CAPABILITIES, builtinCapabilityNames } from './catalog.js';

export {
  CapabilityRegistry,
  getCapabilityRegistry,
  resetCapabilityRegistry,
} from './registry.js';
