export {
  RetryPolicy,
  classifyError,
  sleep,
  type RetryAttemptRecord,
  type RetryPolicyOptions,
} from './retry-policy.js';
export { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker.js';
