/**
 * Confirmation gate
 *
 * Authorizes a state-mutating action. Three paths, in order:
 * an explicit confirmation from an automated caller, a yes/no question to
 * an operator in interactive mode, or a default denial.
 */

import { CONFIRMATION } from '../constants.js';
import { UserCancelledError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ACTION_LABELS, type RealAction } from '../types/index.js';

/** Source of operator answers, typically a terminal */
export interface OperatorPrompt {
  /** Resolve with the raw answer; reject if the signal aborts */
  ask(question: string, signal?: AbortSignal): Promise<string>;
}

export interface ConfirmationGateOptions {
  prompt?: OperatorPrompt;
  logger?: Logger;
}

function normaliseAnswer(answer: string): string {
  return answer.trim().toLowerCase();
}

export function isQuitToken(answer: string): boolean {
  const normalised = normaliseAnswer(answer);
  return CONFIRMATION.QUIT.some((token) => token === normalised);
}

export class ConfirmationGate {
  private readonly prompt: OperatorPrompt | undefined;
  private readonly logger: Logger;

  constructor(options?: ConfirmationGateOptions) {
    this.prompt = options?.prompt;
    this.logger = (options?.logger ?? rootLogger).child('confirmation');
  }

  /**
   * Decide whether a real action may run.
   *
   * @throws {UserCancelledError} when the operator quits or the signal aborts
   */
  async authorize(
    action: RealAction,
    interactive: boolean,
    explicitConfirm: boolean,
    signal?: AbortSignal
  ): Promise<boolean> {
    if (explicitConfirm) {
      this.logger.info('Action authorized by caller', { action });
      return true;
    }

    if (!interactive || !this.prompt) {
      this.logger.info('Action not confirmed, running as simulation', { action, interactive });
      return false;
    }

    if (signal?.aborted) {
      throw new UserCancelledError();
    }

    let answer: string;
    try {
      answer = await this.prompt.ask(
        `Perform a real ${ACTION_LABELS[action]}? Type '${CONFIRMATION.AFFIRMATIVE}' to confirm, 'q' to quit: `,
        signal
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new UserCancelledError();
      }
      this.logger.warn('Confirmation prompt failed, denying', { action, error: errorMessage(error) });
      return false;
    }

    if (isQuitToken(answer)) {
      throw new UserCancelledError();
    }

    const authorized = normaliseAnswer(answer) === CONFIRMATION.AFFIRMATIVE;
    this.logger.info(authorized ? 'Operator confirmed action' : 'Operator declined action', {
      action,
    });
    return authorized;
  }
}
