import {
  ConfigServiceClient,
  DeleteConfigRuleCommand,
  DeleteConfigurationRecorderCommand,
  DeleteDeliveryChannelCommand,
  DescribeConfigRulesCommand,
  DescribeConfigurationRecorderStatusCommand,
  DescribeConfigurationRecordersCommand,
  DescribeDeliveryChannelsCommand,
  StopConfigurationRecorderCommand
} from '@aws-sdk/client-config-service';
import { AwsConfigClient } from '../AwsConfigClient';
import { awsError } from '../../__tests__/helpers/fakes';

describe('AwsConfigClient', () => {
  let sdk: ConfigServiceClient;
  let send: jest.SpyInstance;
  let client: AwsConfigClient;

  beforeEach(() => {
    sdk = new ConfigServiceClient({ region: 'eu-west-1', credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' } });
    send = jest.spyOn(sdk, 'send');
    client = new AwsConfigClient('eu-west-1', sdk);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    sdk.destroy();
  });

  it('should describe recorders, statuses and channels', async () => {
    send
      .mockResolvedValueOnce({ ConfigurationRecorders: [{ name: 'default' }] })
      .mockResolvedValueOnce({ ConfigurationRecordersStatus: [{ name: 'default', recording: true }] })
      .mockResolvedValueOnce({ DeliveryChannels: [{ name: 'default', s3BucketName: 'config-bucket' }] });

    expect(await client.describeConfigurationRecorders()).toEqual([{ name: 'default' }]);
    expect(await client.describeConfigurationRecorderStatus()).toEqual([{ name: 'default', recording: true }]);
    expect(await client.describeDeliveryChannels()).toEqual([{ name: 'default', s3BucketName: 'config-bucket' }]);

    expect(send.mock.calls[0][0]).toBeInstanceOf(DescribeConfigurationRecordersCommand);
    expect(send.mock.calls[1][0]).toBeInstanceOf(DescribeConfigurationRecorderStatusCommand);
    expect(send.mock.calls[2][0]).toBeInstanceOf(DescribeDeliveryChannelsCommand);
  });

  it('should treat missing lists as empty', async () => {
    send.mockResolvedValue({});

    expect(await client.describeConfigurationRecorders()).toEqual([]);
    expect(await client.describeConfigurationRecorderStatus()).toEqual([]);
    expect(await client.describeDeliveryChannels()).toEqual([]);
    expect(await client.describeConfigRules()).toEqual({ rules: [] });
  });

  it('should pass and return rule page tokens', async () => {
    send
      .mockResolvedValueOnce({ ConfigRules: [{ ConfigRuleName: 'rule-a' }], NextToken: 'page-2' })
      .mockResolvedValueOnce({ ConfigRules: [{ ConfigRuleName: 'rule-b' }] });

    const first = await client.describeConfigRules();
    const second = await client.describeConfigRules(first.nextToken);

    expect(first).toEqual({ rules: [{ ConfigRuleName: 'rule-a' }], nextToken: 'page-2' });
    expect(second).toEqual({ rules: [{ ConfigRuleName: 'rule-b' }] });
    expect(send.mock.calls[0][0]).toBeInstanceOf(DescribeConfigRulesCommand);
    expect(send.mock.calls[0][0].input).toEqual({ NextToken: undefined });
    expect(send.mock.calls[1][0].input).toEqual({ NextToken: 'page-2' });
  });

  it('should name the target of every mutating command', async () => {
    send.mockResolvedValue({});

    await client.stopConfigurationRecorder('default');
    await client.deleteConfigRule('rule-a');
    await client.deleteDeliveryChannel('default');
    await client.deleteConfigurationRecorder('default');

    const commands = send.mock.calls.map(call => call[0]);
    expect(commands[0]).toBeInstanceOf(StopConfigurationRecorderCommand);
    expect(commands[0].input).toEqual({ ConfigurationRecorderName: 'default' });
    expect(commands[1]).toBeInstanceOf(DeleteConfigRuleCommand);
    expect(commands[1].input).toEqual({ ConfigRuleName: 'rule-a' });
    expect(commands[2]).toBeInstanceOf(DeleteDeliveryChannelCommand);
    expect(commands[2].input).toEqual({ DeliveryChannelName: 'default' });
    expect(commands[3]).toBeInstanceOf(DeleteConfigurationRecorderCommand);
    expect(commands[3].input).toEqual({ ConfigurationRecorderName: 'default' });
  });

  it('should propagate service errors unchanged', async () => {
    const denied = awsError('AccessDeniedException', 'not authorized', 403);
    send.mockRejectedValue(denied);

    await expect(client.deleteConfigRule('rule-a')).rejects.toBe(denied);
  });

  it('should release the SDK client on destroy', () => {
    const destroy = jest.spyOn(sdk, 'destroy');

    client.destroy();

    expect(destroy).toHaveBeenCalledTimes(1);
    expect(client.region).toBe('eu-west-1');
  });
});
