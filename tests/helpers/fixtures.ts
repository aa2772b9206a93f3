/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable test data for unit tests.
 */

import type { Config, DiscoveredInstance, InstanceSummary } from '@shared/types';

/**
 * Monday 2024-03-04 14:05:00 UTC.
 */
export const MONDAY_AFTERNOON = new Date('2024-03-04T14:05:00Z');

/**
 * Creates a mock Config object.
 *
 * @param overrides - Optional overrides for specific config properties
 * @returns Mock Config
 */
export function createMockConfig(overrides: Partial<Config> = {}): Config {
  const defaultConfig: Config = {
    adminEmail: 'admin@example.com',
    awsDefaultRegion: 'us-west-2',
    awsSesConfigurationSet: '',
    dryRun: true,
    immediate: true,
    notificationWaitHours: 12,
    powerAction: 'stop',
    protectedOwners: ['carol@example.com'],
    regions: [],
    sendEmail: false,
    smtpFrom: 'power-control@example.com',
    smtpHost: '',
    smtpPort: 465,
    smtpUsername: '',
    smtpPassword: '',
    templatePath: 'templates',
    trackingFile: '/tmp/power-control-test.json',
    tz: 'Etc/UTC',
    version: 'test',
  };

  return { ...defaultConfig, ...overrides };
}

/**
 * Creates a running, owned instance with a weekday 08:00-18:00 schedule.
 *
 * @param overrides - Optional overrides for specific instance properties
 * @returns Mock DiscoveredInstance
 */
export function createInstance(overrides: Partial<DiscoveredInstance> = {}): DiscoveredInstance {
  const defaultInstance: DiscoveredInstance = {
    instanceId: 'i-0123456789abcdef0',
    name: 'build-server',
    owner: 'alice@example.com',
    region: 'us-east-1',
    state: 'running',
    runningSchedule: '08:00:18:00:1-5',
    runningScheduleTz: '',
  };

  return { ...defaultInstance, ...overrides };
}

/**
 * Creates an InstanceSummary as handed to templates.
 *
 * @param overrides - Optional overrides for specific summary properties
 * @returns Mock InstanceSummary
 */
export function createSummary(overrides: Partial<InstanceSummary> = {}): InstanceSummary {
  const defaultSummary: InstanceSummary = {
    id: 'i-0123456789abcdef0',
    name: 'build-server',
    owner: 'alice@example.com',
    region: 'us-east-1',
    runningSchedule: '08:00:12:00:1-5',
    runningScheduleTz: 'Etc/UTC',
  };

  return { ...defaultSummary, ...overrides };
}
