import { PromisePool } from '@supercharge/promise-pool';
import {
  DeletionPlan,
  Inventory,
  Region,
  RegionResult,
  RegionScope,
  RunMode,
  StepOutcome
} from '../types';
import {
  ConfigServiceClientFactory,
  IBackupManager,
  ICleanupOrchestrator,
  IConfigServiceClient,
  IDeletionPlanner,
  IInventoryEmitter,
  IPlanExecutor,
  IRegionEnumerator,
  IReporter,
  IResourceScanner,
  IRuleClassifier,
  RegionDiscovery,
  RunRequest
} from '../interfaces';
import { RegionScanError, formatErrorMessage } from '../errors';
import { buildFailedRegionResult, buildRegionResult } from '../reporters/InventoryEmitter';

export const BACKUP_FAILED_REASON = 'backup failed';

function toRegionScanError(region: string, error: unknown): RegionScanError {
  if (error instanceof RegionScanError) {
    return error;
  }
  return new RegionScanError(region, `Unexpected failure in ${region}: ${formatErrorMessage(error)}`, { cause: error });
}

export interface CleanupOrchestratorDependencies {
  regionEnumerator: IRegionEnumerator;
  clientFactory: ConfigServiceClientFactory;
  scanner: IResourceScanner;
  classifier: IRuleClassifier;
  planner: IDeletionPlanner;
  executor: IPlanExecutor;
  emitter: IInventoryEmitter;
  reporter: IReporter;
  backupManager?: IBackupManager;
}

export interface CleanupOrchestratorOptions {
  concurrency: number;
  timeoutMs?: number;
  backupEnabled: boolean;
  now?: () => Date;
}

/**
 * Main orchestrator that coordinates the per-region scan, classify, plan and execute pipeline
 */
export class CleanupOrchestrator implements ICleanupOrchestrator {
  private deps: CleanupOrchestratorDependencies;
  private options: CleanupOrchestratorOptions;
  private now: () => Date;

  constructor(deps: CleanupOrchestratorDependencies, options: CleanupOrchestratorOptions) {
    this.deps = deps;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute the complete workflow. Only a DiscoveryError rejects; every region-level
   * failure is recorded in the returned inventory.
   */
  async run(request: RunRequest): Promise<Inventory> {
    const { mode, scope } = request;
    const regions = await this.deps.regionEnumerator.resolve(scope);

    this.deps.reporter.logRunStart(mode, regions.length);

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    if (this.options.timeoutMs !== undefined) {
      timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
      timer.unref();
    }

    const byRegion = new Map<string, RegionResult>();
    try {
      await PromisePool.for(regions)
        .withConcurrency(this.options.concurrency)
        .handleError(async (error, region) => {
          byRegion.set(region.name, buildFailedRegionResult(region.name, toRegionScanError(region.name, error).toDetail()));
        })
        .process(async region => {
          byRegion.set(region.name, await this.processRegion(region, mode, controller.signal));
        });
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }

    const results = regions.map(region => byRegion.get(region.name) ?? buildFailedRegionResult(
      region.name,
      new RegionScanError(region.name, `${region.name} was not processed`).toDetail()
    ));

    const inventory = this.deps.emitter.emit(mode, results, this.now());
    this.deps.reporter.logRunComplete(inventory);

    return inventory;
  }

  async discover(scope: RegionScope): Promise<RegionDiscovery[]> {
    const regions = await this.deps.regionEnumerator.resolve(scope);

    const byRegion = new Map<string, RegionDiscovery>();
    await PromisePool.for(regions)
      .withConcurrency(this.options.concurrency)
      .handleError(async (error, region) => {
        byRegion.set(region.name, { region: region.name, classified: [], error: toRegionScanError(region.name, error).toDetail() });
      })
      .process(async region => {
        byRegion.set(region.name, await this.discoverRegion(region));
      });

    return regions.map(region => byRegion.get(region.name) ?? {
      region: region.name,
      classified: [],
      error: new RegionScanError(region.name, `${region.name} was not processed`).toDetail()
    });
  }

  private async discoverRegion(region: Region): Promise<RegionDiscovery> {
    let client: IConfigServiceClient | undefined;
    try {
      client = this.deps.clientFactory(region.name);
      const scan = await this.deps.scanner.scanRegion(client);
      return { region: region.name, scan, classified: this.deps.classifier.classifyAll(scan.rules) };
    } catch (error) {
      return { region: region.name, classified: [], error: toRegionScanError(region.name, error).toDetail() };
    } finally {
      client?.destroy?.();
    }
  }

  /**
   * Run one region's pipeline; phases are strictly sequential
   */
  private async processRegion(region: Region, mode: RunMode, signal: AbortSignal): Promise<RegionResult> {
    if (signal.aborted) {
      const error = new RegionScanError(region.name, `Run timed out before ${region.name} was scanned`, {
        type: 'timeout'
      });
      const result = buildFailedRegionResult(region.name, error.toDetail(), true);
      this.deps.reporter.logRegionComplete(result);
      return result;
    }

    this.deps.reporter.logRegionStart(region.name, mode);

    let client: IConfigServiceClient | undefined;
    let result: RegionResult;
    try {
      client = this.deps.clientFactory(region.name);
      result = await this.runPipeline(region, mode, signal, client);
    } catch (error) {
      result = buildFailedRegionResult(region.name, toRegionScanError(region.name, error).toDetail());
    } finally {
      client?.destroy?.();
    }

    this.deps.reporter.logRegionComplete(result);
    return result;
  }

  private async runPipeline(
    region: Region,
    mode: RunMode,
    signal: AbortSignal,
    client: IConfigServiceClient
  ): Promise<RegionResult> {
    const scan = await this.deps.scanner.scanRegion(client);
    const classified = this.deps.classifier.classifyAll(scan.rules);
    const plan = this.deps.planner.plan(scan, classified);

    let backupPath: string | undefined;
    if (mode === 'execute' && this.options.backupEnabled && this.deps.backupManager && this.hasWork(plan)) {
      const backup = await this.deps.backupManager.createBackup(scan, classified);
      this.deps.reporter.logBackupOperation(region.name, backup.backupPath, backup.success, backup.error);

      if (!backup.success) {
        const outcomes = this.skipAll(plan, BACKUP_FAILED_REASON);
        outcomes.forEach(outcome => this.deps.reporter.logStepOutcome(region.name, outcome));
        return buildRegionResult({ scan, classified, plan, outcomes });
      }
      backupPath = backup.backupPath;
    }

    const outcomes = await this.deps.executor.execute(plan, { mode, client, scan, classified, signal });
    return buildRegionResult({ scan, classified, plan, outcomes, backupPath });
  }

  private hasWork(plan: DeletionPlan): boolean {
    return plan.stopRecorder !== undefined || plan.steps.length > 0;
  }

  private skipAll(plan: DeletionPlan, reason: string): StepOutcome[] {
    const steps = plan.stopRecorder ? [plan.stopRecorder, ...plan.steps] : plan.steps;
    return steps.map((step): StepOutcome => ({ kind: step.kind, target: step.target, status: 'SKIPPED', reason }));
  }
}
