/**
 * Capability registry - an adapter that dispatches to handlers by name
 */

import type {
  CapabilityAdapter,
  CapabilityHandler,
  CapabilityInvocation,
  CapabilityResponse,
} from './types.js';
import { builtinCapabilityNames } from './catalog.js';
import { unknownCapability } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('capabilities');

export class CapabilityRegistry implements CapabilityAdapter {
  private readonly handlers: Map<string, CapabilityHandler> = new Map();
  private readonly known: Set<string>;

  constructor(knownCapabilities: Iterable<string> = builtinCapabilityNames()) {
    this.known = new Set(knownCapabilities);
  }

  /**
   * Register the handler serving a capability
   */
  register(name: string, handler: CapabilityHandler): void {
    if (this.handlers.has(name)) {
      log.warn('Overwriting capability handler', { capability: name });
    }
    this.handlers.set(name, handler);
    this.known.add(name);
    log.debug('Registered capability handler', { capability: name });
  }

  unregister(name: string): boolean {
    const deleted = this.handlers.delete(name);
    if (deleted) {
      log.debug('Unregistered capability handler', { capability: name });
    }
    return deleted;
  }

  hasHandler(name: string): boolean {
    return this.handlers.has(name);
  }

  /**
   * Every capability a workflow may reference, served or not
   */
  listCapabilities(): string[] {
    return [...this.known];
  }

  async invoke(invocation: CapabilityInvocation): Promise<CapabilityResponse> {
    const handler = this.handlers.get(invocation.capability);
    if (!handler) {
      throw unknownCapability(invocation.capability);
    }
    return handler(invocation);
  }

  clear(): void {
    this.handlers.clear();
  }
}

let registryInstance: CapabilityRegistry | null = null;

export function getCapabilityRegistry(): CapabilityRegistry {
  if (!registryInstance) {
    registryInstance = new CapabilityRegistry();
  }
  return registryInstance;
}

export function resetCapabilityRegistry(): void {
  registryInstance = null;
}
