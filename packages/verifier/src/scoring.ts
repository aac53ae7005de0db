/**
 * @module @llmverify/verifier/scoring
 * Turns a probe set into a 0–100 capability score.
 */

import { FEATURE_PROBE_KINDS } from '@llmverify/core';
import type { CapabilityCategory, ProbeKind, ProbeResult, ScoreBreakdown } from '@llmverify/core';

export const SCORE_WEIGHTS: Readonly<ScoreBreakdown> = {
  existence: 20,
  responsiveness: 25,
  features: 30,
  latency: 15,
  transport: 10,
};

export interface Score {
  score: number;
  category: CapabilityCategory;
  /** Points each component contributed */
  breakdown: ScoreBreakdown;
}

const FAST_ANSWER_MS = 1000;
const SLOW_ANSWER_MS = 5000;
const LATENCY_BEST_MS = 100;
const LATENCY_WORST_MS = 500;

/**
 * Score a probe set. Pure: the same probes always give the same score.
 * When a kind was probed more than once the first result counts.
 */
export function calculateScore(probes: readonly ProbeResult[]): Score {
  const find = (kind: ProbeKind): ProbeResult | undefined => probes.find((probe) => probe.kind === kind);

  const existence = find('existence')?.passed ? 1 : 0;
  const transport = find('transport')?.passed ? 1 : 0;

  const responsivenessProbe = find('responsiveness');
  const measured = responsivenessProbe?.passed ? responsivenessProbe.latencyMs : undefined;
  const responsiveness = measured === undefined ? 0 : responsivenessComponent(measured);
  const latency = measured === undefined ? 0 : latencyComponent(measured);

  const attempted = FEATURE_PROBE_KINDS.map(find).filter((probe): probe is ProbeResult => probe !== undefined);
  const featurePassed = attempted.filter((probe) => probe.passed).length;

  const breakdown: ScoreBreakdown = {
    existence: existence * SCORE_WEIGHTS.existence,
    responsiveness: responsiveness * SCORE_WEIGHTS.responsiveness,
    features: attempted.length === 0 ? 0 : (featurePassed * SCORE_WEIGHTS.features) / attempted.length,
    latency: latency * SCORE_WEIGHTS.latency,
    transport: transport * SCORE_WEIGHTS.transport,
  };
  const total =
    breakdown.existence + breakdown.responsiveness + breakdown.features + breakdown.latency + breakdown.transport;
  const score = Math.min(100, Math.max(0, Math.round(total)));

  return { score, category: categoryFor(score), breakdown };
}

export function responsivenessComponent(latencyMs: number): number {
  if (latencyMs <= FAST_ANSWER_MS) return 1;
  if (latencyMs <= SLOW_ANSWER_MS) return 0.75;
  return 0.5;
}

/** 1 at or under 100ms, 0 at or over 500ms, linear in between */
export function latencyComponent(latencyMs: number): number {
  if (latencyMs <= LATENCY_BEST_MS) return 1;
  if (latencyMs >= LATENCY_WORST_MS) return 0;
  return (LATENCY_WORST_MS - latencyMs) / (LATENCY_WORST_MS - LATENCY_BEST_MS);
}

export function categoryFor(score: number): CapabilityCategory {
  if (score >= 80) return 'fully capable';
  if (score >= 60) return 'capable with tooling';
  if (score >= 40) return 'chat with tooling';
  return 'chat only';
}
