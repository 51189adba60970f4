/**
 * Request classifier - maps a task description to workflow categories
 *
 * Scores come from a weighted keyword rule table. A rule fires when any of
 * its patterns occurs in the description, either as a case-insensitive
 * substring or as a contiguous run of stemmed tokens ("crash looping"
 * matches "crash loop"). Classification never comes back empty: when no
 * category clears the threshold the synthetic general category is used.
 */

import type { Category, ClassificationMatch, RuleTable } from '../types.js';
import { GENERAL_CATEGORY } from '../types.js';
import { containsSequence, stemTokens } from './stemmer.js';
import { logger } from '../utils/logger.js';

const log = logger.child('classifier');

export interface ClassifierOptions {
  threshold?: number;
  scoreScale?: number;
  maxCategories?: number;
}

interface CompiledPattern {
  source: string;
  lower: string;
  stems: string[];
}

interface CompiledRule {
  category: Category;
  weight: number;
  patterns: CompiledPattern[];
}

function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export class Classifier {
  private readonly rules: CompiledRule[];
  private readonly declarationOrder = new Map<Category, number>();
  private readonly threshold: number;
  private readonly scoreScale: number;
  private readonly maxCategories: number;

  constructor(rules: RuleTable, options: ClassifierOptions = {}) {
    this.threshold = options.threshold ?? 0.15;
    this.scoreScale = options.scoreScale ?? 1;
    this.maxCategories = options.maxCategories ?? 3;

    this.rules = rules.map((rule) => {
      if (!this.declarationOrder.has(rule.category)) {
        this.declarationOrder.set(rule.category, this.declarationOrder.size);
      }
      return {
        category: rule.category,
        weight: rule.weight,
        patterns: rule.patterns.map((source) => {
          const lower = source.trim().toLowerCase();
          return { source, lower, stems: stemTokens(lower) };
        }),
      };
    });
  }

  /**
   * Categories known to the rule table, in declaration order
   */
  categories(): Category[] {
    return [...this.declarationOrder.keys()];
  }

  classify(description: string, overrides?: readonly Category[]): ClassificationMatch[] {
    if (overrides && overrides.length > 0) {
      const unique = [...new Set(overrides)];
      log.debug('Classification overridden', { categories: unique });
      return unique.map((category) => ({ category, confidence: 1, matched: [] }));
    }

    const text = description.toLowerCase();
    const tokens = stemTokens(text);
    const totals = new Map<Category, { weight: number; matched: string[] }>();

    for (const rule of this.rules) {
      const hits = rule.patterns.filter(
        (pattern) => text.includes(pattern.lower) || containsSequence(tokens, pattern.stems)
      );
      if (hits.length === 0) continue;

      const total = totals.get(rule.category) ?? { weight: 0, matched: [] };
      total.weight += rule.weight;
      for (const hit of hits) {
        if (!total.matched.includes(hit.source)) total.matched.push(hit.source);
      }
      totals.set(rule.category, total);
    }

    const matches: ClassificationMatch[] = [];
    for (const [category, total] of totals) {
      const confidence = roundScore(Math.min(1, Math.max(0, total.weight / this.scoreScale)));
      if (confidence >= this.threshold) {
        matches.push({ category, confidence, matched: total.matched });
      }
    }

    matches.sort((a, b) =>
      b.confidence - a.confidence ||
      (this.declarationOrder.get(a.category) ?? 0) - (this.declarationOrder.get(b.category) ?? 0)
    );

    if (matches.length === 0) {
      log.debug('No category cleared the threshold, using general', { threshold: this.threshold });
      return [{ category: GENERAL_CATEGORY, confidence: 1, matched: [] }];
    }

    const selected = matches.slice(0, this.maxCategories);
    log.debug('Classified request', {
      categories: selected.map((m) => `${m.category}:${m.confidence}`),
    });
    return selected;
  }
}
