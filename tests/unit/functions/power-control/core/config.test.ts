import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  loadConfig,
  ConfigError,
  ConfigValidationError,
} from '@functions/power-control/core/config';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        adminEmail: '',
        awsDefaultRegion: 'us-west-2',
        awsSesConfigurationSet: '',
        dryRun: true,
        immediate: true,
        notificationWaitHours: 12,
        powerAction: 'stop',
        protectedOwners: [],
        regions: [],
        sendEmail: false,
        smtpFrom: '',
        smtpHost: '',
        smtpPort: 465,
        smtpUsername: '',
        smtpPassword: '',
        templatePath: path.resolve(process.cwd(), 'templates'),
        trackingFile: '/data/power-control.json',
        tz: 'Etc/UTC',
        version: 'unknown',
      });
    });

    it('should read every supported variable', () => {
      const config = loadConfig({
        ADMIN_EMAIL: 'admin@example.com',
        APP_VERSION: '2024.3',
        AWS_DEFAULT_REGION: 'eu-west-1',
        AWS_SES_CONFIGURATION_SET: 'power-control',
        DRY_RUN: 'false',
        IMMEDIATE: 'no',
        LOG_FORMAT: 'PRETTY',
        LOG_LEVEL: 'DEBUG',
        NOTIFICATION_WAIT_HOURS: '24',
        POWER_ACTION: 'Terminate',
        PROTECTED_OWNERS: 'Alice@Example.com,bob@example.com',
        REGIONS: 'us-east-1, eu-west-1',
        SEND_EMAIL: 'yes',
        SMTP_FROM: 'power-control@example.com',
        SMTP_HOST: 'smtp.example.com',
        SMTP_PORT: '587',
        SMTP_USERNAME: 'mailer',
        SMTP_PASSWORD: 'test-password',
        TEMPLATE_PATH: '/srv/templates',
        TRACKING_FILE: '/tmp/tracking.json',
        TZ: 'America/Chicago',
      });

      expect(config).toEqual({
        adminEmail: 'admin@example.com',
        awsDefaultRegion: 'eu-west-1',
        awsSesConfigurationSet: 'power-control',
        dryRun: false,
        immediate: false,
        notificationWaitHours: 24,
        powerAction: 'terminate',
        protectedOwners: ['alice@example.com', 'bob@example.com'],
        regions: ['us-east-1', 'eu-west-1'],
        sendEmail: true,
        smtpFrom: 'power-control@example.com',
        smtpHost: 'smtp.example.com',
        smtpPort: 587,
        smtpUsername: 'mailer',
        smtpPassword: 'test-password',
        templatePath: '/srv/templates',
        trackingFile: '/tmp/tracking.json',
        tz: 'America/Chicago',
        version: '2024.3',
      });
    });

    it.each([
      ['true', true],
      ['TRUE', true],
      ['yes', true],
      ['on', true],
      ['1', true],
      ['false', false],
      ['0', false],
      ['off', false],
      ['anything', false],
    ])('should parse DRY_RUN=%s as %s', (value, expected) => {
      expect(loadConfig({ DRY_RUN: value }).dryRun).toBe(expected);
    });

    it('should keep the default when a flag is blank', () => {
      const config = loadConfig({ DRY_RUN: '', SEND_EMAIL: '  ' });

      expect(config.dryRun).toBe(true);
      expect(config.sendEmail).toBe(false);
    });

    it('should normalize PROTECTED_OWNERS and drop empty entries', () => {
      const config = loadConfig({ PROTECTED_OWNERS: ' Alice@Example.COM , ,bob@example.com,' });

      expect(config.protectedOwners).toEqual(['alice@example.com', 'bob@example.com']);
    });

    it('should accept zero NOTIFICATION_WAIT_HOURS', () => {
      expect(loadConfig({ NOTIFICATION_WAIT_HOURS: '0' }).notificationWaitHours).toBe(0);
    });

    it('should throw ConfigValidationError for a non-numeric NOTIFICATION_WAIT_HOURS', () => {
      expect(() => loadConfig({ NOTIFICATION_WAIT_HOURS: 'soon' })).toThrow(ConfigValidationError);
      expect(() => loadConfig({ NOTIFICATION_WAIT_HOURS: 'soon' })).toThrow(
        /NOTIFICATION_WAIT_HOURS/
      );
    });

    it('should reject a negative NOTIFICATION_WAIT_HOURS', () => {
      expect(() => loadConfig({ NOTIFICATION_WAIT_HOURS: '-1' })).toThrow(
        /NOTIFICATION_WAIT_HOURS/
      );
    });

    it('should reject an unknown time zone', () => {
      expect(() => loadConfig({ TZ: 'Mars/Olympus_Mons' })).toThrow(
        'Configuration validation failed. Invalid variables: TZ (Unknown IANA time zone)'
      );
    });

    it('should reject an unknown POWER_ACTION', () => {
      expect(() => loadConfig({ POWER_ACTION: 'hibernate' })).toThrow(/POWER_ACTION/);
    });

    it('should leave LOG_LEVEL and LOG_FORMAT to the logger', () => {
      const config = loadConfig({ LOG_LEVEL: 'loud', LOG_FORMAT: 'xml' });

      expect(config).not.toHaveProperty('logLevel');
      expect(config).not.toHaveProperty('logFormat');
    });

    it('should reject an out-of-range SMTP_PORT', () => {
      expect(() => loadConfig({ SMTP_PORT: '70000' })).toThrow(/SMTP_PORT/);
    });

    it('should require SMTP_FROM when SEND_EMAIL is enabled', () => {
      expect(() => loadConfig({ SEND_EMAIL: 'true' })).toThrow(
        'Configuration validation failed. Invalid variables: SMTP_FROM (Required when SEND_EMAIL is enabled)'
      );
    });

    it('should make ConfigValidationError a ConfigError', () => {
      try {
        loadConfig({ TZ: 'Nowhere/Special' });
        expect.unreachable('loadConfig should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toBeInstanceOf(ConfigValidationError);
      }
    });
  });
});
