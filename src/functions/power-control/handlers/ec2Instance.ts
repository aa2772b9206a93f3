/**
 * EC2 Instance Handler implementation.
 *
 * Stops or terminates a batch of EC2 instances in one region.
 */

import {
  EC2Client,
  StopInstancesCommand,
  TerminateInstancesCommand,
  type InstanceStateChange,
} from '@aws-sdk/client-ec2';
import type { Logger } from 'pino';
import type { HandlerResult, PowerAction } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

/**
 * Handler for the EC2 instances of a single region.
 *
 * One API call per batch; the response's state changes are reported per instance.
 * Failures are returned as unsuccessful results, never thrown.
 */
export class EC2InstanceHandler {
  private ec2Client: EC2Client;
  private logger: Logger;

  constructor(
    private readonly region: string,
    client?: EC2Client
  ) {
    this.logger = setupLogger('power-control:handler.ec2-instance');
    this.ec2Client = client ?? new EC2Client({ region });
  }

  /**
   * Apply an action to a batch of instances.
   */
  async apply(action: PowerAction, instanceIds: string[]): Promise<HandlerResult[]> {
    return action === 'terminate' ? this.terminate(instanceIds) : this.stop(instanceIds);
  }

  /**
   * Stop instances. Already stopped or stopping instances are reported as successful.
   */
  async stop(instanceIds: string[]): Promise<HandlerResult[]> {
    if (instanceIds.length === 0) {
      return [];
    }

    try {
      this.logger.info({ region: this.region, instanceIds }, 'Stopping instances');
      const response = await this.ec2Client.send(
        new StopInstancesCommand({ InstanceIds: instanceIds })
      );
      return this.toResults('stop', instanceIds, response.StoppingInstances ?? []);
    } catch (error) {
      return this.toFailures('stop', instanceIds, error);
    }
  }

  /**
   * Terminate instances.
   */
  async terminate(instanceIds: string[]): Promise<HandlerResult[]> {
    if (instanceIds.length === 0) {
      return [];
    }

    try {
      this.logger.info({ region: this.region, instanceIds }, 'Terminating instances');
      const response = await this.ec2Client.send(
        new TerminateInstancesCommand({ InstanceIds: instanceIds })
      );
      return this.toResults('terminate', instanceIds, response.TerminatingInstances ?? []);
    } catch (error) {
      return this.toFailures('terminate', instanceIds, error);
    }
  }

  private toResults(
    action: PowerAction,
    instanceIds: string[],
    changes: InstanceStateChange[]
  ): HandlerResult[] {
    const byId = new Map<string | undefined, InstanceStateChange>(changes.map((change) => [change.InstanceId, change]));

    return instanceIds.map((instanceId): HandlerResult => {
      const change = byId.get(instanceId);
      const previousState = change?.PreviousState?.Name;
      const currentState = change?.CurrentState?.Name;

      if (!change) {
        this.logger.warn({ region: this.region, instanceId, action }, 'No state change returned');
        return {
          success: false,
          action,
          resourceType: 'ec2-instance',
          resourceId: instanceId,
          region: this.region,
          message: `No state change returned for ${action}`,
          error: 'STATE_CHANGE_MISSING',
        };
      }

      this.logger.info(
        { region: this.region, instanceId, previousState, currentState },
        `Instance ${action} issued`
      );

      return {
        success: true,
        action,
        resourceType: 'ec2-instance',
        resourceId: instanceId,
        region: this.region,
        message: `Instance ${previousState ?? 'unknown'} -> ${currentState ?? 'unknown'}`,
        previousState,
        currentState,
      };
    });
  }

  private toFailures(action: PowerAction, instanceIds: string[], error: unknown): HandlerResult[] {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      { region: this.region, instanceIds, error: message },
      `Failed to ${action} instances`
    );

    return instanceIds.map(
      (instanceId): HandlerResult => ({
        success: false,
        action,
        resourceType: 'ec2-instance',
        resourceId: instanceId,
        region: this.region,
        message: `${action === 'stop' ? 'Stop' : 'Terminate'} operation failed`,
        error: message,
      })
    );
  }
}
