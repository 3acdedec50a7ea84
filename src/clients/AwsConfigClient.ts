import {
  ConfigServiceClient,
  ConfigRule,
  ConfigurationRecorder,
  ConfigurationRecorderStatus,
  DeliveryChannel,
  DeleteConfigRuleCommand,
  DeleteConfigurationRecorderCommand,
  DeleteDeliveryChannelCommand,
  DescribeConfigRulesCommand,
  DescribeConfigurationRecorderStatusCommand,
  DescribeConfigurationRecordersCommand,
  DescribeDeliveryChannelsCommand,
  StopConfigurationRecorderCommand
} from '@aws-sdk/client-config-service';
import { ConfigRulePage, IConfigServiceClient } from '../interfaces';

/**
 * AWS Config client bound to a single region.
 * The SDK's own retry loop is disabled (maxAttempts: 1); callers wrap each call in a RetryPolicy.
 */
export class AwsConfigClient implements IConfigServiceClient {
  readonly region: string;
  private client: ConfigServiceClient;

  constructor(region: string, client?: ConfigServiceClient) {
    this.region = region;
    this.client = client ?? new ConfigServiceClient({ region, maxAttempts: 1 });
  }

  async describeConfigurationRecorders(): Promise<ConfigurationRecorder[]> {
    const response = await this.client.send(new DescribeConfigurationRecordersCommand({}));
    return response.ConfigurationRecorders ?? [];
  }

  async describeConfigurationRecorderStatus(): Promise<ConfigurationRecorderStatus[]> {
    const response = await this.client.send(new DescribeConfigurationRecorderStatusCommand({}));
    return response.ConfigurationRecordersStatus ?? [];
  }

  async describeDeliveryChannels(): Promise<DeliveryChannel[]> {
    const response = await this.client.send(new DescribeDeliveryChannelsCommand({}));
    return response.DeliveryChannels ?? [];
  }

  async describeConfigRules(nextToken?: string): Promise<ConfigRulePage> {
    const response = await this.client.send(new DescribeConfigRulesCommand({
      NextToken: nextToken
    }));

    const rules: ConfigRule[] = response.ConfigRules ?? [];
    return response.NextToken ? { rules, nextToken: response.NextToken } : { rules };
  }

  async stopConfigurationRecorder(name: string): Promise<void> {
    await this.client.send(new StopConfigurationRecorderCommand({
      ConfigurationRecorderName: name
    }));
  }

  async deleteConfigRule(name: string): Promise<void> {
    await this.client.send(new DeleteConfigRuleCommand({
      ConfigRuleName: name
    }));
  }

  async deleteDeliveryChannel(name: string): Promise<void> {
    await this.client.send(new DeleteDeliveryChannelCommand({
      DeliveryChannelName: name
    }));
  }

  async deleteConfigurationRecorder(name: string): Promise<void> {
    await this.client.send(new DeleteConfigurationRecorderCommand({
      ConfigurationRecorderName: name
    }));
  }

  /**
   * Release the underlying HTTP handler
   */
  destroy(): void {
    this.client.destroy();
  }
}

export const createAwsConfigClient = (region: string): AwsConfigClient => new AwsConfigClient(region);
