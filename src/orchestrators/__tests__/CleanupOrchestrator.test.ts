import * as fc from 'fast-check';
import { BACKUP_FAILED_REASON, CleanupOrchestrator, CleanupOrchestratorOptions } from '../CleanupOrchestrator';
import { RegionEnumerator } from '../../scanners/RegionEnumerator';
import { ResourceScanner } from '../../scanners/ResourceScanner';
import { RuleClassifier } from '../../classifiers/RuleClassifier';
import { DeletionPlanner } from '../../planners/DeletionPlanner';
import { PlanExecutor } from '../../executors/PlanExecutor';
import { InventoryEmitter } from '../../reporters/InventoryEmitter';
import { DiscoveryError } from '../../errors';
import { IBackupManager } from '../../interfaces';
import { BackupResult, Region } from '../../types';
import {
  FakeConfigClient,
  FakeConfigCloud,
  FakeRegionClient,
  RecordingReporter,
  awsError,
  managedRule,
  noSleepRetryPolicy,
  securityHubRule
} from '../../__tests__/helpers/fakes';

const FIXED_NOW = new Date('2026-03-04T05:06:07.000Z');

const ALL_REGIONS: Region[] = [
  { name: 'us-east-1', enabled: true, optInStatus: 'opt-in-not-required' },
  { name: 'eu-west-1', enabled: true, optInStatus: 'opt-in-not-required' }
];

interface Harness {
  orchestrator: CleanupOrchestrator;
  reporter: RecordingReporter;
  clients: FakeConfigClient[];
}

function createHarness(
  cloud: FakeConfigCloud,
  options: Partial<CleanupOrchestratorOptions> = {},
  backupManager?: IBackupManager,
  regionClient: FakeRegionClient = new FakeRegionClient(ALL_REGIONS)
): Harness {
  const retryPolicy = noSleepRetryPolicy();
  const reporter = new RecordingReporter();
  const planner = new DeletionPlanner();
  const clients: FakeConfigClient[] = [];

  const orchestrator = new CleanupOrchestrator(
    {
      regionEnumerator: new RegionEnumerator(regionClient, retryPolicy),
      clientFactory: region => {
        const client = cloud.client(region);
        clients.push(client);
        return client;
      },
      scanner: new ResourceScanner({ retryPolicy }),
      classifier: new RuleClassifier(),
      planner,
      executor: new PlanExecutor({ retryPolicy, planner }),
      emitter: new InventoryEmitter(),
      reporter,
      backupManager
    },
    { concurrency: 4, backupEnabled: false, now: () => FIXED_NOW, ...options }
  );

  return { orchestrator, reporter, clients };
}

const tenCleanableRules = (): ReturnType<typeof managedRule>[] =>
  Array.from({ length: 10 }, (_, index) => managedRule(`custom-rule-${String(index).padStart(2, '0')}`));

class StubBackupManager implements IBackupManager {
  readonly requests: string[] = [];

  constructor(private result: BackupResult) {}

  async createBackup(scan: { region: string }): Promise<BackupResult> {
    this.requests.push(scan.region);
    return this.result;
  }

  async saveBackup(): Promise<void> {
    return undefined;
  }

  async loadBackup(): Promise<never> {
    throw new Error('not used');
  }
}

describe('CleanupOrchestrator', () => {
  let cloud: FakeConfigCloud;

  beforeEach(() => {
    cloud = new FakeConfigCloud();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('dry-run', () => {
    it('should plan ten rule deletions and preserve the Security Hub rule without mutating anything', async () => {
      cloud.seed('us-east-1', { rules: [...tenCleanableRules(), securityHubRule('securityhub-s3-bucket-ssl')] });
      const { orchestrator, reporter } = createHarness(cloud);

      const inventory = await orchestrator.run({ mode: 'dry-run', scope: { kind: 'explicit', regions: ['us-east-1'] } });

      expect(inventory.mode).toBe('dry-run');
      expect(inventory.generatedAt).toBe('2026-03-04T05:06:07.000Z');
      expect(inventory.summary).toEqual({
        regions: 1,
        regionsFailed: 0,
        discovered: 11,
        preserved: 1,
        cleaned: 10,
        failed: 0,
        simulated: 10,
        skipped: 1,
        quarantined: 0
      });

      const region = inventory.regions[0];
      expect(region.steps).toHaveLength(13);
      expect(region.steps[0]).toEqual({ kind: 'stop-recorder', target: 'default', status: 'SIMULATED' });
      expect(region.steps.slice(1, 11).map(step => step.target)).toEqual(
        Array.from({ length: 10 }, (_, index) => `custom-rule-${String(index).padStart(2, '0')}`)
      );
      expect(region.steps[11]).toEqual({ kind: 'delete-channel', target: 'default', status: 'SIMULATED' });
      expect(region.steps[12]).toEqual({ kind: 'delete-recorder', target: 'default', status: 'SIMULATED' });
      expect(region.recorder?.stopStatus).toBe('SIMULATED');

      const hubRule = region.rules.find(rule => rule.name === 'securityhub-s3-bucket-ssl');
      expect(hubRule?.classification).toBe('PRESERVE');
      expect(hubRule?.outcome).toBe('SKIPPED');

      expect(cloud.mutatingCalls()).toEqual([]);
      expect(reporter.events).toEqual([
        'run-start:dry-run:1',
        'region-start:us-east-1',
        'region-complete:us-east-1',
        'run-complete:dry-run'
      ]);
    });

    it('should produce identical inventories for repeated dry runs', async () => {
      cloud.seed('us-east-1', { rules: [...tenCleanableRules(), securityHubRule('securityhub-s3-bucket-ssl')] });
      cloud.seed('eu-west-1', { recorder: null, channel: null, rules: [managedRule('eu-rule')] });
      const { orchestrator } = createHarness(cloud);

      const first = await orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } });
      const second = await orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } });

      expect(second).toEqual(first);
      expect(first.regions.map(region => region.region)).toEqual(['eu-west-1', 'us-east-1']);
    });
  });

  describe('execute', () => {
    it('should delete everything cleanable and be idempotent on a second run', async () => {
      cloud.seed('us-east-1', { rules: [...tenCleanableRules(), securityHubRule('securityhub-s3-bucket-ssl')] });
      const { orchestrator } = createHarness(cloud);
      const request = { mode: 'execute' as const, scope: { kind: 'explicit' as const, regions: ['us-east-1'] } };

      const first = await orchestrator.run(request);

      expect(first.summary.cleaned).toBe(10);
      expect(first.summary.failed).toBe(0);
      expect(first.regions[0].recorder?.outcome).toBe('DELETED');
      expect(first.regions[0].channel?.outcome).toBe('DELETED');
      expect(cloud.state('us-east-1')).toEqual({
        recorders: [],
        statuses: [],
        channels: [],
        rules: [securityHubRule('securityhub-s3-bucket-ssl')]
      });

      const second = await orchestrator.run(request);

      expect(second.summary).toEqual({
        regions: 1,
        regionsFailed: 0,
        discovered: 1,
        preserved: 1,
        cleaned: 0,
        failed: 0,
        simulated: 0,
        skipped: 1,
        quarantined: 0
      });
      expect(second.regions[0].recorder).toBeNull();
      expect(second.regions[0].steps).toEqual([]);
    });

    it('should never delete a preserved rule', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.uniqueArray(fc.stringMatching(/^[a-z][a-z0-9-]{0,15}$/), { minLength: 1, maxLength: 12 }),
          fc.array(fc.boolean(), { minLength: 12, maxLength: 12 }),
          async (names, hubFlags) => {
            const propertyCloud = new FakeConfigCloud();
            propertyCloud.seed('us-east-1', {
              rules: names.map((name, index) => (hubFlags[index] ? securityHubRule(name) : managedRule(name)))
            });
            const { orchestrator } = createHarness(propertyCloud);

            const inventory = await orchestrator.run({ mode: 'execute', scope: { kind: 'explicit', regions: ['us-east-1'] } });
            const remaining = propertyCloud.state('us-east-1').rules.map(rule => rule.ConfigRuleName);

            for (const rule of inventory.regions[0].rules) {
              if (rule.classification === 'PRESERVE') {
                expect(rule.outcome).not.toBe('DELETED');
                expect(remaining).toContain(rule.name);
              } else {
                expect(rule.outcome).toBe('DELETED');
              }
            }
            names.forEach((name, index) => {
              if (hubFlags[index]) {
                expect(remaining).toContain(name);
              }
            });
          }
        ),
        { numRuns: 25 }
      );
    });

    it('should back up a region before deleting and record the backup path', async () => {
      cloud.seed('us-east-1', { rules: [managedRule('rule-a')] });
      const backupManager = new StubBackupManager({ success: true, backupPath: 'backups/us-east-1.json' });
      const { orchestrator, reporter } = createHarness(cloud, { backupEnabled: true }, backupManager);

      const inventory = await orchestrator.run({ mode: 'execute', scope: { kind: 'explicit', regions: ['us-east-1'] } });

      expect(backupManager.requests).toEqual(['us-east-1']);
      expect(inventory.regions[0].backupPath).toBe('backups/us-east-1.json');
      expect(reporter.events).toContain('backup:us-east-1:ok');
      expect(inventory.summary.cleaned).toBe(1);
    });

    it('should skip every step of a region whose backup failed', async () => {
      cloud.seed('us-east-1', { rules: [...tenCleanableRules(), securityHubRule('securityhub-s3-bucket-ssl')] });
      const backupManager = new StubBackupManager({ success: false, backupPath: '', error: 'disk full' });
      const { orchestrator, reporter } = createHarness(cloud, { backupEnabled: true }, backupManager);

      const inventory = await orchestrator.run({ mode: 'execute', scope: { kind: 'explicit', regions: ['us-east-1'] } });
      const region = inventory.regions[0];

      expect(region.steps).toHaveLength(13);
      expect(region.steps.every(step => step.status === 'SKIPPED' && step.reason === BACKUP_FAILED_REASON)).toBe(true);
      expect(region.backupPath).toBeUndefined();
      expect(inventory.summary.cleaned).toBe(0);
      expect(inventory.summary.skipped).toBe(11);
      expect(cloud.mutatingCalls()).toEqual([]);
      expect(reporter.events).toContain('backup:us-east-1:failed');
      expect(reporter.steps).toHaveLength(13);
    });

    it('should not back up in dry-run or when nothing is planned', async () => {
      cloud.seed('us-east-1', { recorder: null, channel: null, rules: [securityHubRule('securityhub-only')] });
      const backupManager = new StubBackupManager({ success: true, backupPath: 'unused.json' });
      const { orchestrator } = createHarness(cloud, { backupEnabled: true }, backupManager);

      await orchestrator.run({ mode: 'dry-run', scope: { kind: 'explicit', regions: ['us-east-1'] } });
      await orchestrator.run({ mode: 'execute', scope: { kind: 'explicit', regions: ['us-east-1'] } });

      expect(backupManager.requests).toEqual([]);
    });
  });

  describe('failure isolation', () => {
    it('should record a failing region and still process the others', async () => {
      cloud.seed('us-east-1', { rules: [managedRule('rule-a')] });
      cloud.seed('eu-west-1', { rules: [managedRule('rule-b')] });
      cloud.failOn('DescribeConfigRules', awsError('AccessDeniedException', 'not authorized', 403), { region: 'eu-west-1' });
      const { orchestrator } = createHarness(cloud);

      const inventory = await orchestrator.run({
        mode: 'dry-run',
        scope: { kind: 'explicit', regions: ['us-east-1', 'eu-west-1'] }
      });

      expect(inventory.regions.map(region => region.region)).toEqual(['us-east-1', 'eu-west-1']);
      expect(inventory.regions[0].error).toBeUndefined();
      expect(inventory.regions[0].rules[0].outcome).toBe('SIMULATED');
      expect(inventory.regions[1].error).toEqual({
        errorClass: 'RegionScanError',
        type: 'permission',
        code: 'AccessDeniedException',
        message: 'Failed to scan region eu-west-1: not authorized',
        retryable: false
      });
      expect(inventory.summary.regionsFailed).toBe(1);
      expect(inventory.summary.discovered).toBe(1);
    });

    it('should wrap unexpected failures from a region in a RegionScanError', async () => {
      cloud.seed('us-east-1');
      const { orchestrator } = createHarness(cloud);
      jest.spyOn(RuleClassifier.prototype, 'classifyAll').mockImplementationOnce(() => {
        throw new TypeError('classifier exploded');
      });

      const inventory = await orchestrator.run({ mode: 'dry-run', scope: { kind: 'explicit', regions: ['us-east-1'] } });

      expect(inventory.regions[0].error).toEqual({
        errorClass: 'RegionScanError',
        type: 'unknown',
        code: 'TypeError',
        message: 'Unexpected failure in us-east-1: classifier exploded',
        retryable: false
      });
    });

    it('should reject with DiscoveryError when regions cannot be listed', async () => {
      const { orchestrator, reporter } = createHarness(
        cloud,
        {},
        undefined,
        new FakeRegionClient(awsError('AuthFailure', 'credentials rejected', 401))
      );

      await expect(orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } })).rejects.toBeInstanceOf(DiscoveryError);
      expect(reporter.events).toEqual([]);
    });

    it('should release every region client', async () => {
      cloud.seed('us-east-1');
      cloud.seed('eu-west-1');
      cloud.failOn('DescribeDeliveryChannels', awsError('AccessDeniedException', 'not authorized', 403), { region: 'eu-west-1' });
      const { orchestrator, clients } = createHarness(cloud);

      await orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } });

      expect(clients).toHaveLength(2);
      expect(clients.every(client => client.destroyed)).toBe(true);
    });
  });

  describe('region fan-out', () => {
    it('should record a region whose client cannot be created and keep the others', async () => {
      cloud.seed('us-east-1', { rules: [managedRule('rule-a')] });
      cloud.seed('eu-west-1', { rules: [managedRule('rule-b')] });
      const createClient = cloud.client.bind(cloud);
      jest.spyOn(cloud, 'client').mockImplementation(region => {
        if (region === 'eu-west-1') {
          throw new Error('bad endpoint');
        }
        return createClient(region);
      });
      const { orchestrator, reporter } = createHarness(cloud);

      const inventory = await orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } });

      expect(inventory.regions.map(region => region.region)).toEqual(['eu-west-1', 'us-east-1']);
      expect(inventory.regions[0].error).toEqual({
        errorClass: 'RegionScanError',
        type: 'unknown',
        message: 'Unexpected failure in eu-west-1: bad endpoint',
        retryable: false
      });
      expect(inventory.regions[1].error).toBeUndefined();
      expect(inventory.summary.regionsFailed).toBe(1);
      expect(inventory.summary.simulated).toBe(1);
      expect(reporter.events).toContain('region-complete:eu-west-1');
    });

    it('should report a client creation failure from discover as a region error', async () => {
      cloud.seed('us-east-1');
      cloud.seed('eu-west-1');
      const createClient = cloud.client.bind(cloud);
      jest.spyOn(cloud, 'client').mockImplementation(region => {
        if (region === 'us-east-1') {
          throw new Error('bad endpoint');
        }
        return createClient(region);
      });
      const { orchestrator } = createHarness(cloud);

      const discoveries = await orchestrator.discover({ kind: 'all' });

      expect(discoveries.map(discovery => discovery.region)).toEqual(['eu-west-1', 'us-east-1']);
      expect(discoveries[0].error).toBeUndefined();
      expect(discoveries[1].error?.message).toBe('Unexpected failure in us-east-1: bad endpoint');
    });

    it('should keep scope order when regions finish out of order', async () => {
      cloud.seed('us-east-1', { rules: ['r1', 'r2', 'r3', 'r4', 'r5'].map(name => managedRule(name)) });
      cloud.seed('eu-west-1');
      cloud.pageSize = 1;
      cloud.latencyMs = 2;
      const { orchestrator, reporter } = createHarness(cloud);

      const inventory = await orchestrator.run({
        mode: 'dry-run',
        scope: { kind: 'explicit', regions: ['us-east-1', 'eu-west-1'] }
      });

      expect(inventory.regions.map(region => region.region)).toEqual(['us-east-1', 'eu-west-1']);
      expect(reporter.events.indexOf('region-complete:eu-west-1'))
        .toBeLessThan(reporter.events.indexOf('region-complete:us-east-1'));
    });

    it('should process one region at a time with a concurrency of one', async () => {
      cloud.seed('us-east-1');
      cloud.seed('eu-west-1');
      cloud.latencyMs = 1;
      const { orchestrator, reporter } = createHarness(cloud, { concurrency: 1 });

      await orchestrator.run({ mode: 'dry-run', scope: { kind: 'all' } });

      expect(reporter.events).toEqual([
        'run-start:dry-run:2',
        'region-start:eu-west-1',
        'region-complete:eu-west-1',
        'region-start:us-east-1',
        'region-complete:us-east-1',
        'run-complete:dry-run'
      ]);
    });

    it('should refuse a plan that targets a preserved rule', async () => {
      cloud.seed('us-east-1', { recorder: null, channel: null, rules: [securityHubRule('securityhub-s3-bucket-ssl')] });
      jest.spyOn(DeletionPlanner.prototype, 'plan').mockReturnValue({
        region: 'us-east-1',
        steps: [{ kind: 'delete-rule', target: 'securityhub-s3-bucket-ssl' }],
        skipped: [],
        errors: []
      });
      const { orchestrator } = createHarness(cloud);

      const inventory = await orchestrator.run({ mode: 'execute', scope: { kind: 'explicit', regions: ['us-east-1'] } });

      expect(inventory.regions[0].steps[0].status).toBe('FAILED');
      expect(inventory.regions[0].rules[0].outcome).toBe('SKIPPED');
      expect(cloud.mutatingCalls()).toEqual([]);
      expect(cloud.state('us-east-1').rules).toHaveLength(1);
    });
  });

  describe('timeout', () => {
    it('should skip remaining steps and mark unstarted regions as timed out', async () => {
      cloud.seed('us-east-1', { rules: [managedRule('rule-a')] });
      cloud.seed('eu-west-1', { rules: [managedRule('rule-b')] });
      cloud.latencyMs = 20;
      const { orchestrator } = createHarness(cloud, { timeoutMs: 0, concurrency: 1 });

      const inventory = await orchestrator.run({
        mode: 'dry-run',
        scope: { kind: 'explicit', regions: ['us-east-1', 'eu-west-1'] }
      });

      const [started, unstarted] = inventory.regions;
      expect(started.timedOut).toBe(true);
      expect(started.steps.every(step => step.status === 'SKIPPED')).toBe(true);
      expect(unstarted.timedOut).toBe(true);
      expect(unstarted.error).toEqual({
        errorClass: 'RegionScanError',
        type: 'timeout',
        message: 'Run timed out before eu-west-1 was scanned',
        retryable: false
      });
      expect(cloud.calls.some(call => call.startsWith('eu-west-1:'))).toBe(false);
    });
  });

  describe('discover', () => {
    it('should scan and classify each region without planning', async () => {
      cloud.seed('us-east-1', { rules: [managedRule('rule-a'), securityHubRule('securityhub-x')] });
      cloud.seed('eu-west-1');
      cloud.failOn('DescribeConfigurationRecorders', awsError('AccessDeniedException', 'not authorized', 403), { region: 'eu-west-1' });
      const { orchestrator, clients } = createHarness(cloud);

      const discoveries = await orchestrator.discover({ kind: 'explicit', regions: ['us-east-1', 'eu-west-1'] });

      expect(discoveries[0].region).toBe('us-east-1');
      expect(discoveries[0].classified.map(entry => [entry.rule.name, entry.classification])).toEqual([
        ['rule-a', 'CLEANABLE'],
        ['securityhub-x', 'PRESERVE']
      ]);
      expect(discoveries[0].scan?.recorder?.name).toBe('default');
      expect(discoveries[1]).toEqual({
        region: 'eu-west-1',
        classified: [],
        error: {
          errorClass: 'RegionScanError',
          type: 'permission',
          code: 'AccessDeniedException',
          message: 'Failed to scan region eu-west-1: not authorized',
          retryable: false
        }
      });
      expect(cloud.mutatingCalls()).toEqual([]);
      expect(clients.every(client => client.destroyed)).toBe(true);
    });
  });
});
