import type {
  ConfigRule,
  ConfigurationRecorder,
  ConfigurationRecorderStatus,
  DeliveryChannel
} from '@aws-sdk/client-config-service';

export interface ConfigRulePage {
  rules: ConfigRule[];
  nextToken?: string;
}

/**
 * Region-bound client for the AWS Config service
 */
export interface IConfigServiceClient {
  readonly region: string;

  /**
   * Describe configuration recorders in the region
   */
  describeConfigurationRecorders(): Promise<ConfigurationRecorder[]>;

  /**
   * Describe recorder status (recording flag, last status)
   */
  describeConfigurationRecorderStatus(): Promise<ConfigurationRecorderStatus[]>;

  /**
   * Describe delivery channels in the region
   */
  describeDeliveryChannels(): Promise<DeliveryChannel[]>;

  /**
   * Fetch one page of Config rules
   */
  describeConfigRules(nextToken?: string): Promise<ConfigRulePage>;

  stopConfigurationRecorder(name: string): Promise<void>;

  deleteConfigRule(name: string): Promise<void>;

  deleteDeliveryChannel(name: string): Promise<void>;

  deleteConfigurationRecorder(name: string): Promise<void>;

  /**
   * Release network resources held by the client
   */
  destroy?(): void;
}

export type ConfigServiceClientFactory = (region: string) => IConfigServiceClient;
