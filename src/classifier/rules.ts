/**
 * Classifier rule table loading and hot reload
 *
 * Runs take a snapshot when they start; replacing the table swaps the
 * reference, so an in-flight run keeps the rules it was classified with.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { ClassifierRule, RuleTable } from '../types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { parseRuleTable } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('rules');

/** Returns a list of problems; empty when the table is acceptable */
export type RuleTableValidator = (rules: RuleTable) => string[];

export function defaultRulesPath(): string {
  return fileURLToPath(new URL('../../config/classifier-rules.json', import.meta.url));
}

/**
 * Read and validate a rule table file
 */
export function loadRuleTable(path: string = defaultRulesPath()): ClassifierRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read classifier rule table ${path}`, [errorMessage(error)]);
  }
  return parseRuleTable(raw);
}

function freezeTable(rules: readonly ClassifierRule[]): RuleTable {
  return Object.freeze(
    rules.map((rule) =>
      Object.freeze({
        category: rule.category,
        patterns: Object.freeze([...rule.patterns]),
        weight: rule.weight,
      })
    )
  );
}

export class RuleTableStore {
  private current: RuleTable;
  private version = 1;
  private validator: RuleTableValidator | undefined;

  constructor(rules: readonly ClassifierRule[], validator?: RuleTableValidator) {
    this.validator = validator;
    this.current = this.check(freezeTable(rules));
  }

  static fromFile(path?: string, validator?: RuleTableValidator): RuleTableStore {
    return new RuleTableStore(loadRuleTable(path), validator);
  }

  /**
   * The table a new run should classify with
   */
  snapshot(): RuleTable {
    return this.current;
  }

  getVersion(): number {
    return this.version;
  }

  /**
   * Install a validator and check the current table against it
   */
  setValidator(validator: RuleTableValidator): void {
    this.validator = validator;
    this.check(this.current);
  }

  /**
   * Swap in a new table; the old snapshot stays valid for runs holding it
   */
  replace(rules: readonly ClassifierRule[]): void {
    this.current = this.check(freezeTable(rules));
    this.version++;
    log.info('Classifier rule table replaced', { version: this.version, rules: rules.length });
  }

  reloadFromFile(path: string = defaultRulesPath()): void {
    this.replace(loadRuleTable(path));
  }

  private check(table: RuleTable): RuleTable {
    const issues = this.validator?.(table) ?? [];
    if (issues.length > 0) {
      throw new ConfigurationError('Rejected classifier rule table', issues);
    }
    return table;
  }
}

let storeInstance: RuleTableStore | null = null;

export function getRuleTableStore(): RuleTableStore {
  if (!storeInstance) {
    storeInstance = RuleTableStore.fromFile();
  }
  return storeInstance;
}

export function resetRuleTableStore(): void {
  storeInstance = null;
}
