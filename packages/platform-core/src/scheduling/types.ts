/**
 * Scheduler Types
 */

export type SchedulerStatus = 'stopped' | 'running';

export interface SchedulerInfo {
  name: string;
  cronExpression: string;
  status: SchedulerStatus;
  lastRunAt: Date | null;
  lastRunDurationMs: number | null;
  lastRunSuccess: boolean | null;
  runCount: number;
  errorCount: number;
  serviceName: string;
}

export interface SchedulerExecutionResult {
  success: boolean;
  message?: string;
  durationMs: number;
}
