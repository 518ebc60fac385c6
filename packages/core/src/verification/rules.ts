/**
 * Signal matcher rules
 *
 * Pure functions over the text the surface shows after an action. The
 * verifier reads signals; these rules decide what they mean.
 */

import { DEFAULT_VOCABULARY, FAILURE_KEYWORDS, SUCCESS_KEYWORDS } from '../constants.js';
import type {
  ActionVocabulary,
  RealAction,
  SignalKind,
  SignalRule,
  SurfaceSignal,
} from '../types/index.js';

/** Kinds in the order a single tick resolves them */
export const SIGNAL_PRIORITY: readonly SignalKind[] = ['success', 'failure', 'notice'];

const ANY_TEXT = /\S/;

export const DEFAULT_SIGNAL_RULES: readonly SignalRule[] = [
  {
    id: 'explicit-success',
    kind: 'success',
    classification: 'success',
    pattern: ANY_TEXT,
  },
  {
    id: 'explicit-failure',
    kind: 'failure',
    classification: 'failure',
    pattern: ANY_TEXT,
  },
  {
    id: 'notice-success',
    kind: 'notice',
    classification: 'success',
    pattern: SUCCESS_KEYWORDS,
    requireActionTerm: true,
  },
  {
    id: 'notice-failure',
    kind: 'notice',
    classification: 'failure',
    pattern: FAILURE_KEYWORDS,
    requireActionTerm: true,
  },
];

export interface SignalMatch {
  rule: SignalRule;
  signal: SurfaceSignal;
}

/** Whether the text mentions the action or a term shared by both actions */
export function mentionsAction(
  text: string,
  action: RealAction,
  vocabulary: ActionVocabulary = DEFAULT_VOCABULARY
): boolean {
  const haystack = text.toLowerCase();
  return [...vocabulary[action], ...vocabulary.shared].some((term) =>
    haystack.includes(term.toLowerCase())
  );
}

export function ruleMatches(
  rule: SignalRule,
  signal: SurfaceSignal,
  action: RealAction,
  vocabulary: ActionVocabulary = DEFAULT_VOCABULARY
): boolean {
  if (rule.kind !== signal.kind) {
    return false;
  }
  if (rule.actions && !rule.actions.includes(action)) {
    return false;
  }
  if (!rule.pattern.test(signal.text)) {
    return false;
  }
  return !rule.requireActionTerm || mentionsAction(signal.text, action, vocabulary);
}

/**
 * Find the deciding signal among those read in one tick.
 *
 * Kinds are tried in priority order; within a kind, rules in list order;
 * within a rule, signals in the order the surface reported them.
 */
export function matchSignals(
  signals: readonly SurfaceSignal[],
  action: RealAction,
  rules: readonly SignalRule[] = DEFAULT_SIGNAL_RULES,
  vocabulary: ActionVocabulary = DEFAULT_VOCABULARY
): SignalMatch | null {
  for (const kind of SIGNAL_PRIORITY) {
    for (const rule of rules) {
      if (rule.kind !== kind) {
        continue;
      }
      const signal = signals.find((candidate) => ruleMatches(rule, candidate, action, vocabulary));
      if (signal) {
        return { rule, signal };
      }
    }
  }
  return null;
}
