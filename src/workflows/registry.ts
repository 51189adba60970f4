/**
 * Workflow registry - validated phase graphs per category
 *
 * Definitions are checked when the registry is built; a definition with a
 * dependency cycle, a forward or unknown dependency, an unknown capability
 * or an undefined toggle never reaches a run. The registry is read-only
 * afterwards and may be shared by concurrent runs.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Category, PhaseDefinition, WorkflowDefinition, WorkflowToggle } from '../types.js';
import { GENERAL_CATEGORY } from '../types.js';
import { ConfigurationError, errorMessage, unknownCategory } from '../utils/errors.js';
import { parseWorkflowDefinitions } from '../utils/validation.js';
import { builtinCapabilityNames } from '../capabilities/catalog.js';
import { findCycle, topologicalSort } from './dag.js';
import { logger } from '../utils/logger.js';

const log = logger.child('workflow-registry');

export interface WorkflowRegistryOptions {
  /** Capability names phases may reference */
  capabilities?: Iterable<string>;
}

export function defaultWorkflowsPath(): string {
  return fileURLToPath(new URL('../../config/workflows.json', import.meta.url));
}

export function loadWorkflowDefinitions(path: string = defaultWorkflowsPath()): WorkflowDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read workflow definitions ${path}`, [errorMessage(error)]);
  }
  return parseWorkflowDefinitions(raw);
}

/**
 * Problems with a single definition; empty when it is valid
 */
export function validateWorkflowDefinition(
  definition: WorkflowDefinition,
  capabilities: ReadonlySet<string>
): string[] {
  const issues: string[] = [];
  const where = `workflow "${definition.id}"`;
  const declared = new Set<string>();
  const allIds = new Set(definition.phases.map((p) => p.id));

  for (const phase of definition.phases) {
    if (declared.has(phase.id)) {
      issues.push(`${where}: duplicate phase id "${phase.id}"`);
    }

    for (const dep of phase.dependsOn) {
      if (dep === phase.id) {
        issues.push(`${where}: phase "${phase.id}" depends on itself`);
      } else if (!allIds.has(dep)) {
        issues.push(`${where}: phase "${phase.id}" depends on unknown phase "${dep}"`);
      } else if (!declared.has(dep)) {
        issues.push(`${where}: phase "${phase.id}" depends on "${dep}" which is declared after it`);
      }
    }

    for (const capability of phase.capabilities) {
      if (!capabilities.has(capability)) {
        issues.push(`${where}: phase "${phase.id}" references unknown capability "${capability}"`);
      }
    }

    if (phase.toggle !== undefined && !(phase.toggle in definition.toggles)) {
      issues.push(`${where}: phase "${phase.id}" uses undefined toggle "${phase.toggle}"`);
    }

    declared.add(phase.id);
  }

  const cycle = findCycle(definition.phases);
  if (cycle) {
    issues.push(`${where}: dependency cycle ${cycle.join(' -> ')}`);
  }

  return issues;
}

/**
 * Drop phases whose toggle is off
 *
 * A dependency on a dropped phase is replaced by that phase's own
 * dependencies, so ordering through it is preserved.
 */
export function applyToggles(
  definition: WorkflowDefinition,
  flags: Readonly<Record<string, boolean>> = {}
): WorkflowDefinition {
  const isEnabled = (phase: PhaseDefinition): boolean => {
    if (phase.toggle === undefined) return true;
    return flags[phase.toggle] ?? definition.toggles[phase.toggle]?.default ?? false;
  };

  const byId = new Map(definition.phases.map((p) => [p.id, p]));
  const enabled = new Set(definition.phases.filter(isEnabled).map((p) => p.id));

  const resolveDeps = (deps: readonly string[], seen: Set<string>): string[] => {
    const resolved: string[] = [];
    for (const dep of deps) {
      if (seen.has(dep)) continue;
      seen.add(dep);
      if (enabled.has(dep)) {
        resolved.push(dep);
      } else {
        resolved.push(...resolveDeps(byId.get(dep)?.dependsOn ?? [], seen));
      }
    }
    return resolved;
  };

  return {
    ...definition,
    phases: definition.phases
      .filter((phase) => enabled.has(phase.id))
      .map((phase) => ({
        ...phase,
        capabilities: [...phase.capabilities],
        dependsOn: resolveDeps(phase.dependsOn, new Set()),
      })),
  };
}

/**
 * Deep-frozen copy; registered definitions are shared by every run
 */
function freezeDefinition(definition: WorkflowDefinition): WorkflowDefinition {
  const toggles: Record<string, WorkflowToggle> = {};
  for (const [flag, toggle] of Object.entries(definition.toggles)) {
    toggles[flag] = Object.freeze({ ...toggle });
  }
  return Object.freeze({
    ...definition,
    categories: Object.freeze([...definition.categories]),
    phases: Object.freeze(
      definition.phases.map((phase) =>
        Object.freeze({
          ...phase,
          capabilities: Object.freeze([...phase.capabilities]),
          dependsOn: Object.freeze([...phase.dependsOn]),
        })
      )
    ),
    toggles: Object.freeze(toggles),
  });
}

/** A composite phase while its copies are being merged */
interface PhaseDraft extends PhaseDefinition {
  capabilities: string[];
  dependsOn: string[];
}

function union(target: string[], extra: readonly string[]): string[] {
  for (const item of extra) {
    if (!target.includes(item)) target.push(item);
  }
  return target;
}

export class WorkflowRegistry {
  private readonly byId: Map<string, WorkflowDefinition> = new Map();
  private readonly byCategory: Map<Category, WorkflowDefinition> = new Map();
  private readonly composites: Map<string, WorkflowDefinition> = new Map();
  private readonly capabilities: ReadonlySet<string>;

  constructor(definitions: readonly WorkflowDefinition[], options: WorkflowRegistryOptions = {}) {
    this.capabilities = new Set(options.capabilities ?? builtinCapabilityNames());

    const issues: string[] = [];
    for (const definition of definitions) {
      if (this.byId.has(definition.id)) {
        issues.push(`duplicate workflow id "${definition.id}"`);
        continue;
      }
      issues.push(...validateWorkflowDefinition(definition, this.capabilities));
      const frozen = freezeDefinition(definition);
      this.byId.set(frozen.id, frozen);

      for (const category of frozen.categories) {
        const owner = this.byCategory.get(category);
        if (owner) {
          issues.push(`category "${category}" is served by both "${owner.id}" and "${frozen.id}"`);
        } else {
          this.byCategory.set(category, frozen);
        }
      }
    }

    if (!this.byCategory.has(GENERAL_CATEGORY)) {
      issues.push(`no workflow serves the "${GENERAL_CATEGORY}" category`);
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid workflow definitions', issues);
    }

    log.debug('Workflow registry loaded', {
      workflows: this.byId.size,
      categories: this.byCategory.size,
    });
  }

  static fromFile(path?: string, options?: WorkflowRegistryOptions): WorkflowRegistry {
    return new WorkflowRegistry(loadWorkflowDefinitions(path), options);
  }

  has(category: Category): boolean {
    return this.byCategory.has(category);
  }

  categories(): Category[] {
    return [...this.byCategory.keys()];
  }

  list(): WorkflowDefinition[] {
    return [...this.byId.values()];
  }

  get(id: string): WorkflowDefinition | undefined {
    return this.byId.get(id);
  }

  lookup(category: Category): WorkflowDefinition {
    const definition = this.byCategory.get(category);
    if (!definition) {
      throw unknownCategory(category);
    }
    return definition;
  }

  /**
   * One workflow covering several categories
   *
   * Phases with the same id are merged (capabilities and dependencies
   * united, the first declaration's mode kept) and the result is ordered
   * again; a merge that closes a cycle raises ConfigurationError.
   */
  lookupComposite(categories: readonly Category[]): WorkflowDefinition {
    const definitions: WorkflowDefinition[] = [];
    for (const category of categories.length > 0 ? categories : [GENERAL_CATEGORY]) {
      const definition = this.lookup(category);
      if (!definitions.includes(definition)) definitions.push(definition);
    }

    const [first] = definitions;
    if (first && definitions.length === 1) {
      return first;
    }

    const key = definitions.map((d) => d.id).join('+');
    const cached = this.composites.get(key);
    if (cached) return cached;

    const phases = new Map<string, PhaseDraft>();
    const toggles: Record<string, WorkflowToggle> = {};
    const mergedCategories: Category[] = [];

    for (const definition of definitions) {
      union(mergedCategories, definition.categories);
      for (const [flag, toggle] of Object.entries(definition.toggles)) {
        toggles[flag] ??= { ...toggle };
      }

      for (const phase of definition.phases) {
        const existing = phases.get(phase.id);
        if (!existing) {
          phases.set(phase.id, {
            ...phase,
            capabilities: [...phase.capabilities],
            dependsOn: [...phase.dependsOn],
          });
          continue;
        }

        union(existing.capabilities, phase.capabilities);
        union(existing.dependsOn, phase.dependsOn);
        if (phase.producesMetrics) existing.producesMetrics = true;
        // Differently gated copies of a phase run whenever either would
        if (existing.toggle !== phase.toggle) delete existing.toggle;
      }
    }

    let ordered: PhaseDefinition[];
    try {
      ordered = topologicalSort([...phases.values()]);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`Cannot compose workflows ${key}`, error.issues);
      }
      throw error;
    }

    const composite = freezeDefinition({
      id: `composite:${key}`,
      version: definitions.map((d) => d.version).join('+'),
      name: definitions.map((d) => d.name).join(' + '),
      description: `Composite of ${definitions.map((d) => d.id).join(', ')}`,
      categories: mergedCategories,
      phases: ordered,
      toggles,
    });

    this.composites.set(key, composite);
    log.debug('Composed workflow', { id: composite.id, phases: ordered.length });
    return composite;
  }
}

let registryInstance: WorkflowRegistry | null = null;

export function getWorkflowRegistry(): WorkflowRegistry {
  if (!registryInstance) {
    registryInstance = WorkflowRegistry.fromFile();
  }
  return registryInstance;
}

export function resetWorkflowRegistry(): void {
  registryInstance = null;
}
