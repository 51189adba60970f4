/**
 * Classifier module - request categorization
 *
 * @packageDocumentation
 */

export { Classifier, type ClassifierOptions } from './classifier.js';
export {
  RuleTableStore,
  loadRuleTable,
  defaultRulesPath,
  getRuleTableStore,
  resetRuleTableStore,
  type RuleTableValidator,
} from './rules.js';
export { stem, tokenize, stemTokens, containsSequence } from './stemmer.js';
