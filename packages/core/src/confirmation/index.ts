export {
  ConfirmationGate,
  isQuitToken,
  type ConfirmationGateOptions,
  type OperatorPrompt,
} from './gate.js';
