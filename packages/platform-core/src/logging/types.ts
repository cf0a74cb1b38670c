/**
 * Logging Types
 */

export type { Logger } from 'winston';

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}
