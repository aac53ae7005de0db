/**
 * @module @llmverify/verifier/result-schema
 * Shape check for verification results read back from a shared cache tier.
 */

import { z } from 'zod';
import { deepFreeze } from '@llmverify/core';
import type { VerificationResult } from '@llmverify/core';

const taxonomyErrorSchema = z.object({
  kind: z.enum([
    'unauthorized',
    'rate_limited',
    'server_error',
    'not_found',
    'transport',
    'parse',
    'queue_full',
    'unclassified',
  ]),
  message: z.string(),
  status: z.number().int().optional(),
  providerType: z.string().optional(),
  raw: z.string().optional(),
});

const probeResultSchema = z.object({
  kind: z.enum(['existence', 'responsiveness', 'streaming', 'transport', 'function_calling', 'vision', 'embeddings']),
  provider: z.string(),
  model: z.string(),
  passed: z.boolean(),
  status: z.number().int().optional(),
  latencyMs: z.number().optional(),
  ttftMs: z.number().optional(),
  error: taxonomyErrorSchema.optional(),
  evidence: z.string().optional(),
  rateLimit: z
    .object({
      requestsPerMinute: z.number().optional(),
      tokensPerMinute: z.number().optional(),
      resetAt: z.string().datetime().optional(),
    })
    .optional(),
  completedAt: z.string().datetime(),
});

export const verificationResultSchema = z.object({
  provider: z.string(),
  model: z.string(),
  probes: z.array(probeResultSchema),
  score: z.number().int().min(0).max(100),
  category: z.enum(['fully capable', 'capable with tooling', 'chat with tooling', 'chat only']),
  breakdown: z.object({
    existence: z.number(),
    responsiveness: z.number(),
    features: z.number(),
    latency: z.number(),
    transport: z.number(),
  }),
  verifiedAt: z.string().datetime(),
  durationMs: z.number(),
});

/**
 * Cache `revive` hook for verification results: a value of the wrong shape
 * becomes a miss, a valid one is frozen like a freshly assembled result.
 */
export function reviveResult(value: VerificationResult): VerificationResult | null {
  return verificationResultSchema.safeParse(value).success ? deepFreeze(value) : null;
}
