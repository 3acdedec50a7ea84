import type {
  ConfigRule,
  ConfigurationRecorder,
  ConfigurationRecorderStatus,
  DeliveryChannel
} from '@aws-sdk/client-config-service';
import {
  ConfigRecorderResource,
  ConfigRuleResource,
  DeliveryChannelResource,
  QuarantinedResource,
  RegionScan
} from '../types';
import { IConfigServiceClient, IResourceScanner } from '../interfaces';
import { RegionScanError, formatErrorMessage } from '../errors';
import { RetryAttemptInfo, RetryPolicy } from '../utils/RetryPolicy';

// A region holds at most 1000 rules and DescribeConfigRules returns 25 per page
export const MAX_RULE_PAGES = 40;

export interface ResourceScannerOptions {
  retryPolicy?: RetryPolicy;
  onRetry?: (region: string, info: RetryAttemptInfo) => void;
}

/**
 * Resource scanner implementation
 * Reads a region's recorder, delivery channel and Config rules and validates their shapes
 */
export class ResourceScanner implements IResourceScanner {
  private retryPolicy: RetryPolicy;
  private onRetry?: (region: string, info: RetryAttemptInfo) => void;

  constructor(options: ResourceScannerOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.onRetry = options.onRetry;
  }

  /**
   * Scan the client's region. Any provider failure after retries becomes a RegionScanError.
   */
  async scanRegion(client: IConfigServiceClient): Promise<RegionScan> {
    const region = client.region;
    const quarantined: QuarantinedResource[] = [];

    try {
      const recorders = await this.call(region, 'DescribeConfigurationRecorders',
        () => client.describeConfigurationRecorders());
      const statuses = recorders.length > 0
        ? await this.call(region, 'DescribeConfigurationRecorderStatus',
          () => client.describeConfigurationRecorderStatus())
        : [];
      const channels = await this.call(region, 'DescribeDeliveryChannels',
        () => client.describeDeliveryChannels());
      const rawRules = await this.listAllRules(client);

      return {
        region,
        recorder: this.toRecorder(recorders, statuses, quarantined),
        channel: this.toChannel(channels, quarantined),
        rules: this.toRules(rawRules, quarantined),
        quarantined
      };
    } catch (error) {
      if (error instanceof RegionScanError) {
        throw error;
      }
      throw new RegionScanError(region, `Failed to scan region ${region}: ${formatErrorMessage(error)}`, {
        cause: error
      });
    }
  }

  /**
   * Follow NextToken until every rule page is read
   */
  private async listAllRules(client: IConfigServiceClient): Promise<ConfigRule[]> {
    const rules: ConfigRule[] = [];
    const seenTokens = new Set<string>();
    let nextToken: string | undefined;
    let pages = 0;

    do {
      const token = nextToken;
      const page = await this.call(client.region, 'DescribeConfigRules', () => client.describeConfigRules(token));
      rules.push(...page.rules);
      nextToken = page.nextToken;
      pages++;

      if (nextToken !== undefined) {
        if (seenTokens.has(nextToken) || pages >= MAX_RULE_PAGES) {
          throw new RegionScanError(client.region, `Rule pagination did not terminate in ${client.region}`, {
            type: 'validation',
            code: 'PaginationLoop'
          });
        }
        seenTokens.add(nextToken);
      }
    } while (nextToken !== undefined);

    return rules;
  }

  private toRecorder(
    recorders: ConfigurationRecorder[],
    statuses: ConfigurationRecorderStatus[],
    quarantined: QuarantinedResource[]
  ): ConfigRecorderResource | null {
    let selected: ConfigRecorderResource | null = null;

    for (const recorder of recorders) {
      if (!recorder.name) {
        quarantined.push({ kind: 'recorder', identifier: recorder.roleARN ?? '<unnamed>', reason: 'missing name' });
        continue;
      }
      if (selected) {
        quarantined.push({ kind: 'recorder', identifier: recorder.name, reason: 'additional recorder' });
        continue;
      }

      const status = statuses.find(s => s.name === recorder.name);
      selected = {
        kind: 'recorder',
        name: recorder.name,
        recording: status?.recording ?? false,
        ...(recorder.roleARN ? { roleArn: recorder.roleARN } : {}),
        ...(status?.lastStatus ? { lastStatus: status.lastStatus } : {})
      };
    }

    return selected;
  }

  private toChannel(channels: DeliveryChannel[], quarantined: QuarantinedResource[]): DeliveryChannelResource | null {
    let selected: DeliveryChannelResource | null = null;

    for (const channel of channels) {
      if (!channel.name) {
        quarantined.push({ kind: 'channel', identifier: channel.s3BucketName ?? '<unnamed>', reason: 'missing name' });
        continue;
      }
      if (selected) {
        quarantined.push({ kind: 'channel', identifier: channel.name, reason: 'additional channel' });
        continue;
      }

      selected = {
        kind: 'channel',
        name: channel.name,
        ...(channel.s3BucketName ? { s3BucketName: channel.s3BucketName } : {}),
        ...(channel.s3KeyPrefix ? { s3KeyPrefix: channel.s3KeyPrefix } : {}),
        ...(channel.snsTopicARN ? { snsTopicArn: channel.snsTopicARN } : {})
      };
    }

    return selected;
  }

  /**
   * Rules without a ConfigRuleName field are quarantined. A present but empty name is kept
   * and rejected later by the planner.
   */
  private toRules(rawRules: ConfigRule[], quarantined: QuarantinedResource[]): ConfigRuleResource[] {
    const rules: ConfigRuleResource[] = [];

    for (const raw of rawRules) {
      if (typeof raw.ConfigRuleName !== 'string') {
        quarantined.push({
          kind: 'rule',
          identifier: raw.ConfigRuleArn ?? raw.ConfigRuleId ?? '<unnamed>',
          reason: 'missing name'
        });
        continue;
      }

      const rule: ConfigRuleResource = { kind: 'rule', name: raw.ConfigRuleName };
      if (raw.ConfigRuleArn) rule.arn = raw.ConfigRuleArn;
      if (raw.ConfigRuleId) rule.ruleId = raw.ConfigRuleId;
      if (raw.Source?.Owner) rule.sourceOwner = raw.Source.Owner;
      if (raw.Source?.SourceIdentifier) rule.sourceIdentifier = raw.Source.SourceIdentifier;
      if (raw.CreatedBy) rule.createdBy = raw.CreatedBy;
      if (raw.Description) rule.description = raw.Description;
      if (raw.ConfigRuleState) rule.state = raw.ConfigRuleState;

      rules.push(rule);
    }

    return rules;
  }

  private call<T>(region: string, label: string, fn: () => Promise<T>): Promise<T> {
    return this.retryPolicy.execute(fn, label, info => this.onRetry?.(region, info));
  }
}
