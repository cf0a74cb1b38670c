/**
 * Scheduling Module
 */

export { IntervalScheduler, createIntervalScheduler, intervalToCron } from './IntervalScheduler.js';
export type { IntervalSchedulerOptions } from './IntervalScheduler.js';
export type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult } from './types.js';
