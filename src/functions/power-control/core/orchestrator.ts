/**
 * Orchestrator for power-control.
 *
 * One run: discover instances, classify them, notify owners of instances that
 * run outside their schedule, report to the admin, then stop (or terminate)
 * those instances unless this is a dry run.
 */

import type {
  Config,
  DiscoveredInstance,
  DiscoveryResult,
  EmailSender,
  HandlerResult,
  InstancesByReason,
  InstanceSummary,
  PowerAction,
  RunReport,
} from '@shared/types';
import { NO_OWNER, NO_SCHEDULE } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { InstanceDiscovery } from '../discovery/instanceDiscovery';
import { EC2InstanceHandler } from '../handlers/ec2Instance';
import { createEmailSender } from '../notifications/emailSender';
import { TemplateRenderer, toTemplateConfig } from '../notifications/templates';
import { evaluateInstance } from './evaluator';
import { NotificationTracker } from './tracker';

const logger = setupLogger('power-control:orchestrator');

export const OWNER_SUBJECT = 'Automatically stopping your environments';
export const ADMIN_SUBJECT = 'Power Control Run Report';

/**
 * Collaborators of a run. Every field defaults to the real implementation built from config.
 */
export interface OrchestratorDependencies {
  discovery?: Pick<InstanceDiscovery, 'discover'>;
  tracker?: Pick<NotificationTracker, 'filterNotifiable'>;
  renderer?: Pick<TemplateRenderer, 'renderOwnerNotification' | 'renderAdminReport'>;
  emailSender?: EmailSender;
  handlerFactory?: (region: string) => Pick<EC2InstanceHandler, 'apply'>;
}

/**
 * Group items by a key, keeping first-seen key order.
 */
export function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

export function toSummary(instance: DiscoveredInstance, defaultTz: string): InstanceSummary {
  return {
    id: instance.instanceId,
    name: instance.name,
    owner: instance.owner || NO_OWNER,
    region: instance.region,
    runningSchedule: instance.runningSchedule || NO_SCHEDULE,
    runningScheduleTz: instance.runningScheduleTz || defaultTz,
  };
}

/**
 * Format the run time as `<Weekday> (<ISO weekday>) <HH:MM>` in the given zone.
 *
 * @example formatRunTime(new Date('2024-03-04T14:05:00Z'), 'Etc/UTC') // 'Monday (1) 14:05'
 */
export function formatRunTime(now: Date, timeZone: string): string {
  const parts: Record<string, string> = {};
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  for (const part of formatter.formatToParts(now)) {
    parts[part.type] = part.value;
  }
  const isoWeekday =
    ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'].indexOf(
      parts.weekday
    ) + 1;
  return `${parts.weekday} (${isoWeekday}) ${parts.hour}:${parts.minute}`;
}

function emptyByReason(): InstancesByReason {
  return {
    NOT_RUNNING: [],
    MALFORMED: [],
    DAY_MISMATCH: [],
    TIME_MISMATCH: [],
    ALLOWED: [],
    NO_OWNER: [],
    PROTECTED_OWNER: [],
    INVALID_ZONE: [],
  };
}

export class Orchestrator {
  private readonly config: Config;
  private readonly discovery: Pick<InstanceDiscovery, 'discover'>;
  private readonly tracker: Pick<NotificationTracker, 'filterNotifiable'>;
  private readonly renderer: Pick<TemplateRenderer, 'renderOwnerNotification' | 'renderAdminReport'>;
  private readonly emailSender: EmailSender;
  private readonly handlerFactory: (region: string) => Pick<EC2InstanceHandler, 'apply'>;

  constructor(config: Config, dependencies: OrchestratorDependencies = {}) {
    this.config = config;
    this.discovery =
      dependencies.discovery ?? new InstanceDiscovery(config.awsDefaultRegion, config.regions);
    this.tracker =
      dependencies.tracker ??
      new NotificationTracker(config.trackingFile, config.notificationWaitHours);
    this.renderer = dependencies.renderer ?? new TemplateRenderer(config.templatePath);
    this.emailSender = dependencies.emailSender ?? createEmailSender(config);
    this.handlerFactory =
      dependencies.handlerFactory ?? ((region) => new EC2InstanceHandler(region));
  }

  /**
   * Execute one power-control run.
   *
   * @param now - Instant the schedules are evaluated at
   * @returns Run summary
   */
  async run(now: Date = new Date()): Promise<RunReport> {
    const runTime = formatRunTime(now, this.config.tz);
    logger.info({ runTime, dryRun: this.config.dryRun }, 'Starting power-control run');

    const discovery: DiscoveryResult = await this.discovery.discover();
    const instancesByReason = this.classify(discovery.instances, now);

    const instancesToStop = [
      ...instancesByReason.DAY_MISMATCH,
      ...instancesByReason.TIME_MISMATCH,
    ];

    const instancesNotified = await this.tracker.filterNotifiable(instancesToStop, now);
    const { notifiedOwners, problemOwners } = await this.notifyOwners(instancesNotified);

    let adminReportSent = false;
    if (instancesNotified.length > 0) {
      adminReportSent = await this.sendAdminReport({
        runTime,
        instancesByReason,
        instancesToStop,
        notifiedOwners,
        problemOwners,
        failedRegions: discovery.failedRegions,
      });
    }

    const results = await this.applyAction(instancesToStop);

    const report: RunReport = {
      runTime,
      dryRun: this.config.dryRun,
      action: this.config.powerAction,
      regions: discovery.regions,
      failedRegions: discovery.failedRegions,
      instancesByReason,
      instancesToStop,
      instancesNotified,
      notifiedOwners,
      problemOwners,
      adminReportSent,
      results,
    };

    logger.info(
      {
        total: discovery.instances.length,
        toStop: instancesToStop.length,
        notified: instancesNotified.length,
        notifiedOwners: notifiedOwners.length,
        problemOwners: problemOwners.length,
        succeeded: results.filter((r) => r.success).length,
        failed: results.filter((r) => !r.success).length,
      },
      'Power-control run completed'
    );

    return report;
  }

  private classify(instances: DiscoveredInstance[], now: Date): InstancesByReason {
    const byReason = emptyByReason();
    for (const instance of instances) {
      const reason = evaluateInstance(instance, this.config, now);
      byReason[reason].push(toSummary(instance, this.config.tz));
    }
    return byReason;
  }

  private async notifyOwners(
    instances: InstanceSummary[]
  ): Promise<{ notifiedOwners: string[]; problemOwners: string[] }> {
    const notifiedOwners: string[] = [];
    const problemOwners: string[] = [];
    const templateConfig = toTemplateConfig(this.config);

    for (const [owner, ownerInstances] of groupBy(instances, (i) => i.owner)) {
      const html = this.renderer.renderOwnerNotification({
        config: templateConfig,
        owner,
        instances: ownerInstances,
      });

      const success = await this.emailSender.send({
        from: this.config.smtpFrom,
        to: owner,
        subject: OWNER_SUBJECT,
        html,
      });

      if (success) {
        notifiedOwners.push(owner);
      } else {
        problemOwners.push(owner);
      }
    }

    return { notifiedOwners, problemOwners };
  }

  private async sendAdminReport(report: {
    runTime: string;
    instancesByReason: InstancesByReason;
    instancesToStop: InstanceSummary[];
    notifiedOwners: string[];
    problemOwners: string[];
    failedRegions: string[];
  }): Promise<boolean> {
    if (!this.config.adminEmail) {
      logger.warn('ADMIN_EMAIL is not set, skipping admin report');
      return false;
    }

    const byReason = report.instancesByReason;
    const html = this.renderer.renderAdminReport({
      config: toTemplateConfig(this.config),
      runTime: report.runTime,
      instancesAllowed: byReason.ALLOWED,
      instancesMalformed: byReason.MALFORMED,
      instancesInvalidZone: byReason.INVALID_ZONE,
      instancesNoOwner: byReason.NO_OWNER,
      instancesNotRunning: byReason.NOT_RUNNING,
      instancesProtectedOwner: byReason.PROTECTED_OWNER,
      instancesToStop: report.instancesToStop,
      notifiedOwners: report.notifiedOwners,
      problemOwners: report.problemOwners,
      failedRegions: report.failedRegions,
    });

    return this.emailSender.send({
      from: this.config.smtpFrom,
      to: this.config.adminEmail,
      subject: ADMIN_SUBJECT,
      html,
    });
  }

  private async applyAction(instances: InstanceSummary[]): Promise<HandlerResult[]> {
    const action: PowerAction = this.config.powerAction;

    if (instances.length === 0) {
      return [];
    }

    if (this.config.dryRun) {
      logger.warn(
        { action, instanceIds: instances.map((i) => i.id) },
        `DRY_RUN is enabled, not applying ${action} to ${instances.length} instances`
      );
      return [];
    }

    const results: HandlerResult[] = [];
    for (const [region, regionInstances] of groupBy(instances, (i) => i.region)) {
      const handler = this.handlerFactory(region);
      results.push(...(await handler.apply(action, regionInstances.map((i) => i.id))));
    }
    return results;
  }
}
