export {
  DEFAULT_SIGNAL_RULES,
  SIGNAL_PRIORITY,
  matchSignals,
  mentionsAction,
  ruleMatches,
  type SignalMatch,
} from './rules.js';
export {
  ResultVerifier,
  VERIFICATION_TIMEOUT_MESSAGE,
  showsCompletedAction,
  type ResultVerifierOptions,
  type VerificationSurface,
} from './verifier.js';
