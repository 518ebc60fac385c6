/**
 * Notification message builders
 */

import {
  ACTION_LABELS,
  type ActionOutcome,
  type NotificationLevel,
  type NotificationMessage,
  type SchedulerEvent,
  type SchedulerEventType,
} from '../types/index.js';

const SCHEDULER_TITLES: Record<SchedulerEventType, string> = {
  started: 'Scheduler started',
  stopped: 'Scheduler stopped',
  error: 'Scheduler error',
};

export function levelForOutcome(outcome: ActionOutcome): NotificationLevel {
  if (outcome.success) {
    return 'success';
  }
  return outcome.failure?.kind === 'circuit-open' ? 'warning' : 'error';
}

function titleForOutcome(outcome: ActionOutcome): string {
  const label = ACTION_LABELS[outcome.action];
  if (outcome.success) {
    return outcome.isSimulation ? `${label} simulated` : `${label} succeeded`;
  }
  return outcome.failure?.kind === 'circuit-open' ? `${label} skipped` : `${label} failed`;
}

function freezeMessage(message: NotificationMessage): NotificationMessage {
  return Object.freeze({
    ...message,
    details: Object.freeze(message.details.map((pair) => Object.freeze([...pair] as const))),
    attachments: Object.freeze([...message.attachments]),
  });
}

/**
 * Build the message for one run outcome
 */
export function buildOutcomeMessage(outcome: ActionOutcome): NotificationMessage {
  const details: Array<readonly [string, string]> = [
    ['Action', ACTION_LABELS[outcome.action]],
    ['Mode', outcome.isSimulation ? 'Simulation' : 'Real'],
    ['Timestamp', outcome.timestamp],
    ['Result', outcome.success ? 'Success' : 'Failure'],
  ];
  if (outcome.externalSignal) {
    details.push(['Server signal', outcome.externalSignal]);
  }
  if (outcome.failure) {
    details.push(['Failed step', outcome.failure.step]);
  }

  return freezeMessage({
    title: titleForOutcome(outcome),
    body: outcome.message,
    level: levelForOutcome(outcome),
    timestamp: outcome.timestamp,
    details,
    attachments: outcome.attachments,
  });
}

/**
 * Build the message for a scheduler lifecycle event
 */
export function buildSchedulerMessage(
  event: SchedulerEvent,
  now: Date = new Date()
): NotificationMessage {
  return freezeMessage({
    title: SCHEDULER_TITLES[event.type],
    body: event.text,
    level: event.type === 'error' ? 'error' : 'info',
    timestamp: now.toISOString(),
    details: event.details ?? [],
    attachments: [],
  });
}
