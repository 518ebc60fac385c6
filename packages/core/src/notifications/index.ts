export { NotificationDispatcher, type DispatcherOptions } from './dispatcher.js';
export { postToChannel } from './http.js';
export { buildOutcomeMessage, buildSchedulerMessage, levelForOutcome } from './message.js';
export {
  NotificationProvider,
  responseError,
  type DeliveryReceipt,
  type ProviderOptions,
} from './provider.js';
export * from './providers/index.js';
