/**
 * Action scheduler
 *
 * Fires one daily job per action plus a heartbeat. Each job runs at most
 * once at a time: a fire while the job is still running is coalesced away.
 * Every run, scheduled or manual, passes through one exclusive lane because
 * the remote session can only serve one action at a time.
 */

import { errorMessage, toError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import {
  ACTION_LABELS,
  type ActionOutcome,
  type RealAction,
  type ScheduleConfig,
  type SchedulerEvent,
} from '../types/index.js';
import { nextDailyRun, parseTimeOfDay } from './time-of-day.js';

/** Runs one action end to end; injected once at construction */
export interface ActionRunner {
  run(action: RealAction): Promise<ActionOutcome>;
}

export interface SchedulerListener {
  onEvent?(event: SchedulerEvent): void | Promise<void>;
  onOutcome?(outcome: ActionOutcome): void | Promise<void>;
  onHeartbeat?(snapshot: SchedulerSnapshot): void | Promise<void>;
}

export interface SchedulerOptions {
  listener?: SchedulerListener;
  logger?: Logger;
  now?: () => Date;
}

export interface JobSnapshot {
  id: string;
  action: RealAction;
  timeOfDay: string;
  weekdaysOnly: boolean;
  nextRunAt: string | null;
  running: boolean;
  runCount: number;
  successCount: number;
  failureCount: number;
  coalescedCount: number;
  misfireCount: number;
  lastRunAt: string | null;
  lastMessage: string | null;
}

export interface SchedulerSnapshot {
  running: boolean;
  enabled: boolean;
  jobs: JobSnapshot[];
}

export interface NextRun {
  action: RealAction;
  at: Date;
}

interface Job {
  action: RealAction;
  timeOfDay: string;
  weekdaysOnly: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunAt: Date | null;
  running: boolean;
  runCount: number;
  successCount: number;
  failureCount: number;
  coalescedCount: number;
  misfireCount: number;
  lastRunAt: Date | null;
  lastMessage: string | null;
}

function jobId(action: RealAction): string {
  return `${action}-daily`;
}

export class ActionScheduler {
  private readonly jobs = new Map<RealAction, Job>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private running = false;
  /** Tail of the exclusive run lane */
  private lane: Promise<void> = Promise.resolve();

  private readonly runner: ActionRunner;
  private readonly config: Readonly<ScheduleConfig>;
  private readonly listener: SchedulerListener;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(runner: ActionRunner, config: ScheduleConfig, options?: SchedulerOptions) {
    this.runner = runner;
    this.config = Object.freeze({ ...config });
    this.listener = options?.listener ?? {};
    this.logger = (options?.logger ?? rootLogger).child('scheduler');
    this.now = options?.now ?? (() => new Date());

    this.schedule('enter', config.enterTime, config.weekdaysOnly);
    this.schedule('exit', config.exitTime, config.weekdaysOnly);
  }

  /**
   * Register or replace the daily job for an action. Takes effect at once
   * when the scheduler is running.
   */
  schedule(action: RealAction, timeOfDay: string, weekdaysOnly: boolean): void {
    parseTimeOfDay(timeOfDay);

    // A replaced job keeps its counters and any in-flight run
    let job = this.jobs.get(action);
    if (job) {
      this.disarm(job);
      job.timeOfDay = timeOfDay;
      job.weekdaysOnly = weekdaysOnly;
    } else {
      job = {
        action,
        timeOfDay,
        weekdaysOnly,
        timer: null,
        nextRunAt: null,
        running: false,
        runCount: 0,
        successCount: 0,
        failureCount: 0,
        coalescedCount: 0,
        misfireCount: 0,
        lastRunAt: null,
        lastMessage: null,
      };
      this.jobs.set(action, job);
    }

    if (this.running) {
      this.arm(job, this.now());
    }
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Scheduler already running');
      return;
    }
    if (!this.config.enabled) {
      this.logger.info('Scheduling disabled, no jobs armed');
      return;
    }

    this.running = true;
    const now = this.now();
    for (const job of this.jobs.values()) {
      this.arm(job, now);
    }
    this.heartbeat = setInterval(() => {
      void this.beat();
    }, this.config.heartbeatIntervalMs);

    const details: Array<[string, string]> = [...this.jobs.values()].map((job) => [
      ACTION_LABELS[job.action],
      job.timeOfDay,
    ]);
    details.push(['Weekdays only', this.config.weekdaysOnly ? 'yes' : 'no']);

    this.logger.info('Scheduler started', { jobs: this.describeNextRuns() });
    void this.emit({ type: 'started', text: 'Scheduler started', details });
  }

  /**
   * Disarm every trigger, then wait for the run in progress, if any
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const job of this.jobs.values()) {
      this.disarm(job);
    }
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    await this.lane;
    this.logger.info('Scheduler stopped');
    await this.emit({ type: 'stopped', text: 'Scheduler stopped' });
  }

  /**
   * Run an action now, after any run already in the lane
   */
  async triggerNow(action: RealAction): Promise<ActionOutcome> {
    this.logger.info('Manual trigger', { action });
    const outcome = await this.exclusive(() => this.runner.run(action));
    await this.notifyOutcome(outcome);
    return outcome;
  }

  isRunning(): boolean {
    return this.running;
  }

  getSnapshot(): SchedulerSnapshot {
    return {
      running: this.running,
      enabled: this.config.enabled,
      jobs: [...this.jobs.values()].map((job) => ({
        id: jobId(job.action),
        action: job.action,
        timeOfDay: job.timeOfDay,
        weekdaysOnly: job.weekdaysOnly,
        nextRunAt: job.nextRunAt?.toISOString() ?? null,
        running: job.running,
        runCount: job.runCount,
        successCount: job.successCount,
        failureCount: job.failureCount,
        coalescedCount: job.coalescedCount,
        misfireCount: job.misfireCount,
        lastRunAt: job.lastRunAt?.toISOString() ?? null,
        lastMessage: job.lastMessage,
      })),
    };
  }

  /**
   * Upcoming fires in time order. Computed from the clock when the
   * scheduler is not running.
   */
  getNextRuns(): NextRun[] {
    const now = this.now();
    return [...this.jobs.values()]
      .map((job) => ({
        action: job.action,
        at: job.nextRunAt ?? nextDailyRun(now, job.timeOfDay, job.weekdaysOnly),
      }))
      .sort((a, b) => a.at.getTime() - b.at.getTime());
  }

  private arm(job: Job, from: Date): void {
    this.disarm(job);
    const at = nextDailyRun(from, job.timeOfDay, job.weekdaysOnly);
    job.nextRunAt = at;
    job.timer = setTimeout(() => {
      void this.fire(job, at);
    }, Math.max(0, at.getTime() - this.now().getTime()));
  }

  private disarm(job: Job): void {
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    job.nextRunAt = null;
  }

  private async fire(job: Job, scheduledAt: Date): Promise<void> {
    job.timer = null;
    const firedAt = this.now();
    if (this.running) {
      // Re-arm from the later of the two so a late fire cannot re-trigger itself
      this.arm(job, firedAt > scheduledAt ? firedAt : scheduledAt);
    }

    const lateByMs = firedAt.getTime() - scheduledAt.getTime();
    if (lateByMs > this.config.misfireGraceMs) {
      job.misfireCount++;
      this.logger.warn('Missed trigger outside grace window, skipping', {
        job: jobId(job.action),
        lateByMs,
        misfireGraceMs: this.config.misfireGraceMs,
      });
      return;
    }

    if (job.running) {
      job.coalescedCount++;
      this.logger.warn('Previous run still active, coalescing trigger', {
        job: jobId(job.action),
      });
      return;
    }

    job.running = true;
    try {
      const outcome = await this.exclusive(() => {
        job.lastRunAt = this.now();
        job.runCount++;
        return this.runner.run(job.action);
      });
      job.lastMessage = outcome.message;
      if (outcome.success) {
        job.successCount++;
      } else {
        job.failureCount++;
      }
      await this.notifyOutcome(outcome);
    } catch (error) {
      job.failureCount++;
      job.lastMessage = errorMessage(error);
      this.logger.error('Scheduled run failed', toError(error), { job: jobId(job.action) });
      await this.emit({
        type: 'error',
        text: `${ACTION_LABELS[job.action]} run failed: ${errorMessage(error)}`,
      });
    } finally {
      job.running = false;
    }
  }

  /** Chain a task onto the lane so only one runs at a time */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.lane.then(task);
    this.lane = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async beat(): Promise<void> {
    const snapshot = this.getSnapshot();
    this.logger.info('Heartbeat', {
      nextRuns: this.describeNextRuns(),
      runs: snapshot.jobs.map((job) => `${job.id}:${job.runCount}`),
    });
    try {
      await this.listener.onHeartbeat?.(snapshot);
    } catch (error) {
      this.logger.error('Heartbeat listener failed', toError(error));
    }
  }

  private describeNextRuns(): string[] {
    return this.getNextRuns().map((run) => `${run.action}@${run.at.toISOString()}`);
  }

  private async notifyOutcome(outcome: ActionOutcome): Promise<void> {
    try {
      await this.listener.onOutcome?.(outcome);
    } catch (error) {
      this.logger.error('Outcome listener failed', toError(error));
    }
  }

  private async emit(event: SchedulerEvent): Promise<void> {
    try {
      await this.listener.onEvent?.(event);
    } catch (error) {
      this.logger.error('Event listener failed', toError(error), { event: event.type });
    }
  }
}
