/**
 * @module @llmverify/verifier/naming
 * `(SC:8.5)` score suffixes on model display names.
 */

const SUFFIX = /\s*\(SC:(\d+\.\d+)\)\s*$/;

/**
 * Append the score (0–100) as a one-decimal ten-point suffix, replacing any
 * suffix already present: `addScoreSuffix('gpt-4o (SC:7.0)', 85)` gives
 * `'gpt-4o (SC:8.5)'`.
 */
export function addScoreSuffix(name: string, score: number): string {
  return `${removeScoreSuffix(name).trim()} (SC:${(score / 10).toFixed(1)})`;
}

export function removeScoreSuffix(name: string): string {
  return name.replace(SUFFIX, '');
}

export function hasScoreSuffix(name: string): boolean {
  return SUFFIX.test(name);
}

/**
 * Read the ten-point value back out of a suffixed name, or undefined when the
 * name carries none.
 */
export function extractScoreFromName(name: string): number | undefined {
  const match = SUFFIX.exec(name);
  return match?.[1] === undefined ? undefined : Number.parseFloat(match[1]);
}
