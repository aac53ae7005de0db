/**
 * @module @llmverify/notifications/render
 * Turns verification events into notification text.
 */

import { format } from 'date-fns';
import type { EventSeverity, VerifierEvent, VerifierEventType } from '@llmverify/core';
import type { NotificationPriority } from './types.js';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss xxx';

const TITLES: Record<VerifierEventType, string> = {
  'verification.started': 'Verification started',
  'verification.completed': 'Verification completed',
  'verification.failed': 'Verification failed',
  'score.changed': 'Score changed',
};

const PRIORITIES: Record<EventSeverity, NotificationPriority> = {
  critical: 'critical',
  error: 'high',
  warning: 'normal',
  info: 'low',
};

export function priorityFor(severity: EventSeverity): NotificationPriority {
  return PRIORITIES[severity];
}

/**
 * "Verification completed: openai/gpt-4o", or just the event label when the
 * payload does not name a model.
 */
export function renderTitle(event: VerifierEvent): string {
  const { provider, model } = event.payload;
  const title = TITLES[event.type];
  return typeof provider === 'string' && typeof model === 'string' ? `${title}: ${provider}/${model}` : title;
}

export function renderBody(event: VerifierEvent): string {
  const lines = [
    `Source: ${event.source}`,
    `Severity: ${event.severity}`,
    `Time: ${format(new Date(event.timestamp), TIMESTAMP_FORMAT)}`,
  ];
  for (const [key, value] of Object.entries(event.payload)) {
    lines.push(`${key}: ${renderValue(value)}`);
  }
  return lines.join('\n');
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value) ?? String(value);
}
