/**
 * HTML email rendering with Nunjucks.
 */

import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';
import type { Config, InstanceSummary } from '@shared/types';

export const OWNER_NOTIFICATION_TEMPLATE = 'owner-notification.html';
export const ADMIN_REPORT_TEMPLATE = 'admin-report.html';

/**
 * Configuration values exposed to templates. Credentials are never passed in.
 */
export type TemplateConfig = Pick<
  Config,
  'adminEmail' | 'dryRun' | 'notificationWaitHours' | 'powerAction' | 'protectedOwners' | 'tz' | 'version'
>;

export interface OwnerNotificationContext {
  config: TemplateConfig;
  owner: string;
  instances: InstanceSummary[];
}

export interface AdminReportContext {
  config: TemplateConfig;
  runTime: string;
  instancesAllowed: InstanceSummary[];
  instancesMalformed: InstanceSummary[];
  instancesInvalidZone: InstanceSummary[];
  instancesNoOwner: InstanceSummary[];
  instancesNotRunning: InstanceSummary[];
  instancesProtectedOwner: InstanceSummary[];
  instancesToStop: InstanceSummary[];
  notifiedOwners: string[];
  problemOwners: string[];
  failedRegions: string[];
}

export function toTemplateConfig(config: Config): TemplateConfig {
  return {
    adminEmail: config.adminEmail,
    dryRun: config.dryRun,
    notificationWaitHours: config.notificationWaitHours,
    powerAction: config.powerAction,
    protectedOwners: config.protectedOwners,
    tz: config.tz,
    version: config.version,
  };
}

/**
 * Renders the owner notification and admin report templates from a directory.
 */
export class TemplateRenderer {
  private readonly env: Environment;

  /**
   * @param templatePath - Directory containing the HTML templates
   */
  constructor(templatePath: string) {
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templatePath), {
      autoescape: true,
      trimBlocks: true,
      lstripBlocks: true,
    });
  }

  renderOwnerNotification(context: OwnerNotificationContext): string {
    return this.env.render(OWNER_NOTIFICATION_TEMPLATE, context);
  }

  renderAdminReport(context: AdminReportContext): string {
    return this.env.render(ADMIN_REPORT_TEMPLATE, context);
  }
}
