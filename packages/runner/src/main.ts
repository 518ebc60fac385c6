/**
 * shiftclock command line
 *
 *   shiftclock serve                       run the daily scheduler
 *   shiftclock run <enter|exit|simulate>   run one action now
 *   shiftclock next                        print the upcoming scheduled runs
 */

import process from 'node:process';

import { ACTION_LABELS, ActionSchema, errorMessage, parseConfig } from '@shiftclock/core';
import { Argument, Command } from 'commander';

import { createRunnerApp } from './app.js';
import { createRunnerLogger, loadConfig } from './shared/context.js';
import { TerminalPrompt } from './shared/prompt.js';

interface RunCommandOptions {
  real: boolean;
  interactive: boolean;
}

const program = new Command();
program
  .name('shiftclock')
  .description('Scheduled clock-in and clock-out against a web attendance portal')
  .version('0.1.0');

program
  .command('serve')
  .description('Arm the daily jobs and run until interrupted')
  .action(async () => {
    const config = await loadConfig();
    const logger = createRunnerLogger(config);
    const { scheduler } = createRunnerApp(config, { logger });

    scheduler.start();
    const signal = await waitForShutdown();
    logger.info('Shutting down', { signal });
    await scheduler.stop();
  });

program
  .command('run')
  .description('Run one action now')
  .addArgument(new Argument('<action>', 'action to perform').choices(['enter', 'exit', 'simulate']))
  .option('--real', 'perform the real action without asking', false)
  .option('-i, --interactive', 'ask before performing a real action', false)
  .action(async (value: string, options: RunCommandOptions) => {
    const action = parseConfig(ActionSchema, value, 'action');
    const config = await loadConfig();
    const logger = createRunnerLogger(config);
    const { handler } = createRunnerApp(config, { logger, prompt: new TerminalPrompt() });

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
      const outcome = await handler.run(action, {
        interactive: options.interactive,
        explicitConfirm: options.real,
        signal: controller.signal,
      });
      const mode = outcome.isSimulation ? ' (simulated)' : '';
      console.log(`${ACTION_LABELS[outcome.action]}${mode}: ${outcome.message}`);
      for (const file of outcome.attachments) {
        console.log(`  screenshot: ${file}`);
      }
      process.exitCode = outcome.success ? 0 : 1;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });

program
  .command('next')
  .description('Print the upcoming scheduled runs')
  .action(async () => {
    const config = await loadConfig();
    const logger = createRunnerLogger({ ...config, logLevel: 'silent' });
    const { scheduler } = createRunnerApp(config, { logger });

    if (!config.schedule.enabled) {
      console.log('Scheduling is disabled');
    }
    for (const run of scheduler.getNextRuns()) {
      console.log(`${ACTION_LABELS[run.action].padEnd(10)} ${run.at.toString()}`);
    }
  });

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const stop = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve(signal);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
