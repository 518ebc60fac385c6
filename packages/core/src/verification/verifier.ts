/**
 * Result verifier
 *
 * Polls the surface for a bounded number of ticks after an action and
 * settles on the first matching signal. With no signal, falls back to the
 * availability flip the action should have caused. The fallback is a best
 * effort: availability flags can lag behind the remote effect.
 */

import { DEFAULT_VOCABULARY, VERIFICATION } from '../constants.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { sleep as defaultSleep } from '../resilience/retry-policy.js';
import { parseStatusSnapshot } from '../schemas/index.js';
import {
  ACTION_LABELS,
  type ActionVocabulary,
  type RealAction,
  type SignalRule,
  type StatusSnapshot,
  type SurfaceSignal,
  type VerificationResult,
} from '../types/index.js';
import { DEFAULT_SIGNAL_RULES, matchSignals } from './rules.js';

export const VERIFICATION_TIMEOUT_MESSAGE = 'result verification timed out';

/** What the verifier needs from the surface */
export interface VerificationSurface {
  /** Text of every visible signal element, tagged with its group */
  readSignals(): Promise<SurfaceSignal[]>;
  /** Validated before use */
  readStatus(): Promise<unknown>;
}

export interface ResultVerifierOptions {
  rules?: readonly SignalRule[];
  vocabulary?: ActionVocabulary;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Whether a snapshot shows the availability an action leaves behind.
 * After enter, enter is gone and exit is offered; after exit, exit is gone.
 */
export function showsCompletedAction(action: RealAction, snapshot: StatusSnapshot): boolean {
  if (action === 'enter') {
    return !snapshot.enterAvailable && snapshot.exitAvailable;
  }
  return !snapshot.exitAvailable;
}

export class ResultVerifier {
  private readonly surface: VerificationSurface;
  private readonly rules: readonly SignalRule[];
  private readonly vocabulary: ActionVocabulary;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(surface: VerificationSurface, options?: ResultVerifierOptions) {
    this.surface = surface;
    this.rules = options?.rules ?? DEFAULT_SIGNAL_RULES;
    this.vocabulary = options?.vocabulary ?? DEFAULT_VOCABULARY;
    this.pollIntervalMs = options?.pollIntervalMs ?? VERIFICATION.POLL_INTERVAL_MS;
    this.sleep = options?.sleep ?? defaultSleep;
    this.logger = (options?.logger ?? rootLogger).child('verifier');

    if (this.pollIntervalMs <= 0) {
      throw new RangeError('pollIntervalMs must be positive');
    }
  }

  /** Number of polls a timeout allows, never fewer than one */
  ticksFor(timeoutMs: number): number {
    return Math.max(1, Math.floor(timeoutMs / this.pollIntervalMs));
  }

  /**
   * Decide whether an issued action took effect.
   *
   * @param before - Snapshot taken before the action; when given, the
   *   state-diff only counts if the action's own flag was set beforehand
   */
  async verify(
    action: RealAction,
    timeoutMs: number = VERIFICATION.TIMEOUT_MS,
    before?: StatusSnapshot
  ): Promise<VerificationResult> {
    const label = ACTION_LABELS[action];
    const ticks = this.ticksFor(timeoutMs);

    for (let tick = 1; tick <= ticks; tick++) {
      const signals = await this.readSignals(tick);
      const match = matchSignals(signals, action, this.rules, this.vocabulary);

      if (match) {
        const success = match.rule.classification === 'success';
        this.logger.info('Signal matched', {
          action,
          tick,
          rule: match.rule.id,
          signal: match.signal.text,
        });
        return {
          success,
          message: success ? `${label} succeeded` : `${label} failed`,
          externalSignal: match.signal.text,
          method: 'signal',
        };
      }

      if (tick < ticks) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    this.logger.info('No signal within timeout, checking availability', { action, ticks });
    return this.verifyByStateDiff(action, before);
  }

  private async readSignals(tick: number): Promise<SurfaceSignal[]> {
    try {
      return await this.surface.readSignals();
    } catch (error) {
      this.logger.warn('Signal read failed', { tick, error: errorMessage(error) });
      return [];
    }
  }

  private async verifyByStateDiff(
    action: RealAction,
    before: StatusSnapshot | undefined
  ): Promise<VerificationResult> {
    const flagBefore = action === 'enter' ? before?.enterAvailable : before?.exitAvailable;

    if (flagBefore !== false) {
      try {
        const after = parseStatusSnapshot(await this.surface.readStatus());
        if (showsCompletedAction(action, after)) {
          return {
            success: true,
            message: `${ACTION_LABELS[action]} confirmed by availability change`,
            externalSignal: null,
            method: 'state-diff',
          };
        }
      } catch (error) {
        this.logger.warn('Status read failed during verification', {
          action,
          error: errorMessage(error),
        });
      }
    }

    this.logger.warn('Verification inconclusive', { action });
    return {
      success: false,
      message: VERIFICATION_TIMEOUT_MESSAGE,
      externalSignal: null,
      method: 'timeout',
    };
  }
}
