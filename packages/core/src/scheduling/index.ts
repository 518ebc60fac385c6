export {
  ActionScheduler,
  type ActionRunner,
  type JobSnapshot,
  type NextRun,
  type SchedulerListener,
  type SchedulerOptions,
  type SchedulerSnapshot,
} from './scheduler.js';
export { isWeekday, nextDailyRun, parseTimeOfDay, type TimeOfDay } from './time-of-day.js';
