/**
 * Scores reported by metric-producing phases
 */

/** Metric name under which a TDD-compliance capability reports its score */
export const TDD_ADHERENCE_METRIC = 'tddAdherence';

/**
 * Share of evaluated commits showing red-green-refactor evidence, 0-100
 */
export function tddAdherenceScore(redGreenRefactor: number, evaluated: number): number {
  if (!Number.isFinite(evaluated) || evaluated <= 0) return 0;
  const ratio = Math.min(Math.max(redGreenRefactor, 0), evaluated) / evaluated;
  return Math.round(ratio * 100);
}
