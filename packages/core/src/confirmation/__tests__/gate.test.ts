import { describe, it, expect, vi } from 'vitest';

import { UserCancelledError } from '../../errors.js';
import { createSilentLogger } from '../../logging/logger.js';
import { REAL_ACTIONS } from '../../types/index.js';
import { ConfirmationGate, isQuitToken, type OperatorPrompt } from '../gate.js';

function answering(answer: string) {
  return { ask: vi.fn().mockResolvedValue(answer) };
}

describe('ConfirmationGate', () => {
  it('authorizes immediately on explicit confirmation without asking', async () => {
    const prompt = answering('no');
    const gate = new ConfirmationGate({ prompt, logger: createSilentLogger() });

    await expect(gate.authorize('enter', true, true)).resolves.toBe(true);
    expect(prompt.ask).not.toHaveBeenCalled();
  });

  it.each(REAL_ACTIONS)('denies %s by default when neither interactive nor confirmed', async (action) => {
    const prompt = answering('yes');
    const gate = new ConfirmationGate({ prompt, logger: createSilentLogger() });

    await expect(gate.authorize(action, false, false)).resolves.toBe(false);
    expect(prompt.ask).not.toHaveBeenCalled();
  });

  it('authorizes only on the affirmative token', async () => {
    const logger = createSilentLogger();

    await expect(
      new ConfirmationGate({ prompt: answering('yes'), logger }).authorize('exit', true, false)
    ).resolves.toBe(true);
    await expect(
      new ConfirmationGate({ prompt: answering('  YES \n'), logger }).authorize('exit', true, false)
    ).resolves.toBe(true);
    await expect(
      new ConfirmationGate({ prompt: answering('y'), logger }).authorize('exit', true, false)
    ).resolves.toBe(false);
    await expect(
      new ConfirmationGate({ prompt: answering(''), logger }).authorize('exit', true, false)
    ).resolves.toBe(false);
  });

  it('denies in interactive mode when no prompt is wired', async () => {
    const gate = new ConfirmationGate({ logger: createSilentLogger() });
    await expect(gate.authorize('enter', true, false)).resolves.toBe(false);
  });

  it('raises UserCancelledError on a quit token', async () => {
    const gate = new ConfirmationGate({ prompt: answering('Quit'), logger: createSilentLogger() });
    await expect(gate.authorize('enter', true, false)).rejects.toBeInstanceOf(UserCancelledError);
  });

  it('raises UserCancelledError when the signal aborts the wait', async () => {
    const controller = new AbortController();
    const prompt: OperatorPrompt = {
      ask: (_question, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    };
    const gate = new ConfirmationGate({ prompt, logger: createSilentLogger() });

    const pending = gate.authorize('enter', true, false, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('cancelled by operator');
  });

  it('denies when the prompt itself fails', async () => {
    const prompt: OperatorPrompt = { ask: vi.fn().mockRejectedValue(new Error('stdin closed')) };
    const gate = new ConfirmationGate({ prompt, logger: createSilentLogger() });

    await expect(gate.authorize('enter', true, false)).resolves.toBe(false);
  });
});

describe('isQuitToken', () => {
  it('recognises q and quit in any case', () => {
    expect(isQuitToken('q')).toBe(true);
    expect(isQuitToken(' QUIT ')).toBe(true);
    expect(isQuitToken('quite')).toBe(false);
  });
});
