/**
 * Core type definitions for power-control.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Outcome of evaluating a single instance against its tags and schedule.
 */
export type PowerControlReason =
  | 'NOT_RUNNING'
  | 'MALFORMED'
  | 'DAY_MISMATCH'
  | 'TIME_MISMATCH'
  | 'ALLOWED'
  | 'NO_OWNER'
  | 'PROTECTED_OWNER'
  | 'INVALID_ZONE';

/**
 * Action applied to instances running outside their schedule.
 */
export type PowerAction = 'stop' | 'terminate';

/**
 * Instance tag keys read by power-control.
 */
export const TAG_KEYS = {
  name: 'Name',
  owner: 'OWNEREMAIL',
  schedule: 'RUNNINGSCHEDULE',
  scheduleTz: 'RUNNINGSCHEDULE_TZ',
} as const;

export const NO_NAME = '(no name)';
export const NO_OWNER = '(no owner)';
export const NO_SCHEDULE = '(no schedule)';

/**
 * Configuration loaded from the process environment.
 */
export interface Config {
  adminEmail: string;
  awsDefaultRegion: string;
  awsSesConfigurationSet: string;
  dryRun: boolean;
  immediate: boolean;
  notificationWaitHours: number;
  powerAction: PowerAction;
  protectedOwners: string[];
  regions: string[];
  sendEmail: boolean;
  smtpFrom: string;
  smtpHost: string;
  smtpPort: number;
  smtpUsername: string;
  smtpPassword: string;
  templatePath: string;
  trackingFile: string;
  tz: string;
  version: string;
}

/**
 * Wall-clock time without a date.
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * Parsed RUNNINGSCHEDULE tag: allowed hours and ISO weekday range (Monday = 1).
 */
export interface RunningSchedule {
  startTime: TimeOfDay;
  stopTime: TimeOfDay;
  firstDay: number;
  lastDay: number;
}

/**
 * EC2 instance as seen by discovery.
 *
 * `owner`, `runningSchedule` and `runningScheduleTz` hold the raw tag values
 * (owner already trimmed and lower-cased); empty string when the tag is absent.
 */
export interface DiscoveredInstance {
  instanceId: string;
  name: string;
  owner: string;
  region: string;
  state: string;
  runningSchedule: string;
  runningScheduleTz: string;
}

/**
 * Instance summary handed to templates and reports.
 */
export interface InstanceSummary {
  id: string;
  name: string;
  owner: string;
  region: string;
  runningSchedule: string;
  runningScheduleTz: string;
}

export type InstancesByReason = Record<PowerControlReason, InstanceSummary[]>;

/**
 * Discovery result across all scanned regions.
 */
export interface DiscoveryResult {
  regions: string[];
  failedRegions: string[];
  instances: DiscoveredInstance[];
}

/**
 * Outgoing email.
 */
export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  html: string;
}

/**
 * Sends email through one transport.
 */
export interface EmailSender {
  /**
   * @returns true when the message was accepted (or intentionally not sent), false on failure
   */
  send(message: EmailMessage): Promise<boolean>;
}

/**
 * Handler operation result for one instance.
 */
export interface HandlerResult {
  success: boolean;
  action: PowerAction;
  resourceType: 'ec2-instance';
  resourceId: string;
  region: string;
  message: string;
  previousState?: string;
  currentState?: string;
  error?: string;
}

/**
 * Summary of one power-control run.
 */
export interface RunReport {
  runTime: string;
  dryRun: boolean;
  action: PowerAction;
  regions: string[];
  failedRegions: string[];
  instancesByReason: InstancesByReason;
  instancesToStop: InstanceSummary[];
  instancesNotified: InstanceSummary[];
  notifiedOwners: string[];
  problemOwners: string[];
  adminReportSent: boolean;
  results: HandlerResult[];
}
