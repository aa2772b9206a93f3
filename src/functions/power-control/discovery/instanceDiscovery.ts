/**
 * EC2 instance discovery for power-control.
 *
 * Lists enabled regions and enumerates every instance in them, reading the
 * owner and schedule tags power-control acts on.
 */

import {
  EC2Client,
  DescribeRegionsCommand,
  paginateDescribeInstances,
  type Instance,
} from '@aws-sdk/client-ec2';
import type { DiscoveredInstance, DiscoveryResult } from '@shared/types';
import { NO_NAME, TAG_KEYS } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('power-control:discovery');

export type EC2ClientFactory = (region: string) => EC2Client;

const defaultClientFactory: EC2ClientFactory = (region) => new EC2Client({ region });

/**
 * Discovers EC2 instances across regions.
 */
export class InstanceDiscovery {
  private readonly defaultRegion: string;
  private readonly regions: string[];
  private readonly clientFactory: EC2ClientFactory;

  /**
   * @param defaultRegion - Region queried for the list of enabled regions
   * @param regions - Regions to scan; empty means every enabled region
   * @param clientFactory - Optional EC2 client factory for testing
   */
  constructor(
    defaultRegion: string,
    regions: string[] = [],
    clientFactory: EC2ClientFactory = defaultClientFactory
  ) {
    this.defaultRegion = defaultRegion;
    this.regions = regions;
    this.clientFactory = clientFactory;
  }

  /**
   * Regions to scan: the configured list, or every region enabled for the account.
   */
  async listRegions(): Promise<string[]> {
    if (this.regions.length > 0) {
      return this.regions;
    }

    const client = this.clientFactory(this.defaultRegion);
    const response = await client.send(new DescribeRegionsCommand({ AllRegions: false }));

    const regions = (response.Regions ?? [])
      .filter((r) => r.OptInStatus !== 'not-opted-in')
      .map((r) => r.RegionName)
      .filter((name): name is string => typeof name === 'string' && name.length > 0)
      .sort();

    logger.debug({ regions }, `Found ${regions.length} enabled regions`);
    return regions;
  }

  /**
   * Discover instances in all regions in parallel.
   *
   * A region that fails is logged and reported in `failedRegions`; the others still count.
   */
  async discover(): Promise<DiscoveryResult> {
    const regions = await this.listRegions();
    logger.info(`Scanning ${regions.length} region(s): ${regions.join(', ')}`);

    const settled = await Promise.allSettled(
      regions.map((region) => this.discoverInRegion(region))
    );

    const instances: DiscoveredInstance[] = [];
    const failedRegions: string[] = [];

    settled.forEach((outcome, index) => {
      const region = regions[index];
      if (outcome.status === 'fulfilled') {
        instances.push(...outcome.value);
      } else {
        logger.fatal({ region, error: String(outcome.reason) }, `Skipping ${region}`);
        failedRegions.push(region);
      }
    });

    logger.info(
      { total: instances.length, failedRegions },
      `Discovered ${instances.length} instances`
    );

    return { regions, failedRegions, instances };
  }

  /**
   * Discover instances in a single region, following pagination.
   */
  async discoverInRegion(region: string): Promise<DiscoveredInstance[]> {
    logger.info(`Checking ${region}`);
    const client = this.clientFactory(region);
    const discovered: DiscoveredInstance[] = [];

    for await (const page of paginateDescribeInstances({ client }, {})) {
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const mapped = toDiscoveredInstance(instance, region);
          if (mapped) {
            discovered.push(mapped);
          }
        }
      }
    }

    logger.debug(`Found ${discovered.length} instances in ${region}`);
    return discovered;
  }
}

/**
 * Map an EC2 API instance to the fields power-control uses.
 *
 * @returns null for entries without an instance id
 */
export function toDiscoveredInstance(instance: Instance, region: string): DiscoveredInstance | null {
  if (!instance.InstanceId) {
    return null;
  }

  const tags: Record<string, string> = {};
  for (const tag of instance.Tags ?? []) {
    if (tag.Key) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }

  return {
    instanceId: instance.InstanceId,
    name: tags[TAG_KEYS.name] || NO_NAME,
    owner: (tags[TAG_KEYS.owner] ?? '').trim().toLowerCase(),
    region,
    state: instance.State?.Name ?? 'unknown',
    runningSchedule: tags[TAG_KEYS.schedule] ?? '',
    runningScheduleTz: tags[TAG_KEYS.scheduleTz] ?? '',
  };
}
