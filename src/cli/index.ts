#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { CleanupOrchestrator } from '../orchestrators/CleanupOrchestrator';
import { createAwsConfigClient } from '../clients/AwsConfigClient';
import { AwsRegionClient } from '../clients/AwsRegionClient';
import { RegionEnumerator } from '../scanners/RegionEnumerator';
import { ResourceScanner } from '../scanners/ResourceScanner';
import { RuleClassifier } from '../classifiers/RuleClassifier';
import { DeletionPlanner } from '../planners/DeletionPlanner';
import { PlanExecutor } from '../executors/PlanExecutor';
import { InventoryEmitter } from '../reporters/InventoryEmitter';
import { BackupManager } from '../managers/BackupManager';
import { Reporter } from '../reporters/Reporter';
import { RetryPolicy } from '../utils/RetryPolicy';
import { CliOptions, ConfigValidationError, loadConfig, toRegionScope } from '../config/ConfigLoader';
import { ConfigServiceClientFactory, IRegionClient, RegionDiscovery } from '../interfaces';
import { DiscoveryError, formatErrorMessage } from '../errors';
import { CleanupConfig, Inventory } from '../types';

export const EXIT_OK = 0;
export const EXIT_DISCOVERY_FAILED = 1;
export const EXIT_INVALID_INVOCATION = 2;

/**
 * Provider seams; defaults talk to AWS through the SDK
 */
export interface CliDependencies {
  configClientFactory?: ConfigServiceClientFactory;
  regionClientFactory?: () => IRegionClient;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * CLI interface for the AWS Config cleanup tool
 */
class ConfigCleanupCLI {
  private program: Command;
  private deps: CliDependencies;
  private exitCode: number = EXIT_OK;

  constructor(deps: CliDependencies = {}) {
    this.deps = deps;
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('aws-config-cleanup')
      .description('Discover and remove AWS Config recorders, delivery channels and rules while preserving Security Hub rules')
      .version('1.0.0')
      .exitOverride();

    // Main cleanup command
    this.program
      .command('run')
      .description('Plan and apply cleanup of AWS Config resources (dry-run unless --execute)')
      .option('-r, --regions <regions>', 'Comma-separated list of regions to process')
      .option('-a, --all-regions', 'Process every enabled region (default)')
      .option('-x, --execute', 'Perform deletions; without it nothing is changed')
      .option('-p, --protect <patterns>', 'Comma-separated preserve patterns (wildcards, arn: and source: prefixes supported)')
      .option('-i, --include <patterns>', 'Only clean rules matching these patterns')
      .option('--security-principals <principals>', 'Comma-separated service principals whose rules are preserved')
      .option('--no-preserve-service-linked', 'Allow cleanup of service-linked rules')
      .option('--concurrency <n>', 'Maximum regions processed in parallel')
      .option('--timeout <ms>', 'Overall run timeout in milliseconds')
      .option('--no-backup', 'Disable backup creation before deletions')
      .option('--backup-path <path>', 'Custom backup directory path')
      .option('-o, --output <path>', 'Directory for the inventory file')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Custom log directory path')
      .action(async (options: CliOptions) => {
        this.exitCode = await this.guard('Cleanup', () => this.executeRun(options));
      });

    // Discovery only
    this.program
      .command('scan')
      .description('Discover and classify Config resources per region without planning deletions')
      .option('-r, --regions <regions>', 'Comma-separated list of regions to scan')
      .option('-a, --all-regions', 'Scan every enabled region (default)')
      .option('-p, --protect <patterns>', 'Comma-separated preserve patterns')
      .option('-i, --include <patterns>', 'Only count rules matching these patterns as cleanable')
      .option('--security-principals <principals>', 'Comma-separated service principals whose rules are preserved')
      .option('--no-preserve-service-linked', 'Count service-linked rules as cleanable')
      .option('--concurrency <n>', 'Maximum regions scanned in parallel')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Custom log directory path')
      .action(async (options: CliOptions) => {
        this.exitCode = await this.guard('Scan', () => this.executeScan(options));
      });

    // Backup listing command
    this.program
      .command('backups')
      .description('List region backups, most recent first')
      .option('--backup-path <path>', 'Custom backup directory path')
      .option('-c, --config <path>', 'Path to configuration file')
      .action(async (options: CliOptions) => {
        this.exitCode = await this.guard('Backup listing', async () => this.listBackups(options));
      });

    // Config validation command
    this.program
      .command('validate-config')
      .description('Validate configuration file')
      .option('-c, --config <path>', 'Path to configuration file', './config.json')
      .action(async (options: CliOptions) => {
        this.exitCode = await this.guard('Config validation', async () => this.validateConfig(options));
      });
  }

  /**
   * Map failures onto exit codes
   */
  private async guard(label: string, action: () => Promise<void>): Promise<number> {
    try {
      await action();
      return EXIT_OK;
    } catch (error) {
      console.error(`❌ ${label} failed:`, formatErrorMessage(error));
      if (error instanceof ConfigValidationError) {
        return EXIT_INVALID_INVOCATION;
      }
      if (!(error instanceof DiscoveryError)) {
        console.error('   Run did not complete; see the log for details');
      }
      return EXIT_DISCOVERY_FAILED;
    }
  }

  /**
   * Execute a dry-run or cleanup run and write the inventory
   */
  private async executeRun(options: CliOptions): Promise<void> {
    const config = loadConfig(options);
    const mode = config.cleanup.dryRun ? 'dry-run' : 'execute';
    console.log(mode === 'dry-run' ? '🔍 Starting dry-run preview...\n' : '🚀 Starting AWS Config cleanup...\n');

    const reporter = this.createReporter(config);
    const regionClient = this.createRegionClient();
    try {
      const orchestrator = this.createOrchestrator(config, reporter, regionClient);
      const inventory = await orchestrator.run({ mode, scope: toRegionScope(config) });
      const inventoryPath = await reporter.saveInventory(inventory);
      this.displayInventory(inventory, inventoryPath);
    } finally {
      regionClient.destroy?.();
      reporter.close();
    }
  }

  /**
   * Discover and classify without planning
   */
  private async executeScan(options: CliOptions): Promise<void> {
    const config = loadConfig({ ...options, execute: false });
    console.log('📋 Scanning AWS Config resources...\n');

    const reporter = this.createReporter(config);
    const regionClient = this.createRegionClient();
    try {
      const orchestrator = this.createOrchestrator(config, reporter, regionClient);
      const discoveries = await orchestrator.discover(toRegionScope(config));
      this.displayDiscoveries(discoveries);
    } finally {
      regionClient.destroy?.();
      reporter.close();
    }
  }

  /**
   * Validate configuration file
   */
  private validateConfig(options: CliOptions): void {
    console.log('✅ Validating configuration...\n');
    const config = loadConfig({ config: options.config });
    const scope = config.scope.allRegions ? 'all enabled regions' : config.scope.regions.join(', ');
    console.log(`🌍 Scope: ${scope}`);
    console.log(`🛡️ Preserve patterns: ${config.classification.preservePatterns.join(', ') || '(none)'}`);
    console.log('\n🎉 Configuration is valid!');
  }

  /**
   * List backup files in the configured backup directory
   */
  private async listBackups(options: CliOptions): Promise<void> {
    const config = loadConfig({ config: options.config, backupPath: options.backupPath });
    const backupManager = new BackupManager(config.cleanup.backupPath);
    const backups = await backupManager.listBackups();

    console.log(`💾 Backups in ${backupManager.getBackupDirectory()}: ${backups.length}`);
    backups.forEach(name => console.log(`   • ${name}`));
  }

  private createReporter(config: CleanupConfig): Reporter {
    return new Reporter(config.reporting.logPath, {
      verbose: config.reporting.verbose,
      outputPath: config.reporting.outputPath
    });
  }

  private createRegionClient(): IRegionClient {
    return this.deps.regionClientFactory ? this.deps.regionClientFactory() : new AwsRegionClient();
  }

  /**
   * Create orchestrator with all dependencies
   */
  private createOrchestrator(config: CleanupConfig, reporter: Reporter, regionClient: IRegionClient): CleanupOrchestrator {
    const retryPolicy = new RetryPolicy({ ...config.retry, sleep: this.deps.sleep });
    const onRetry = reporter.logRetry.bind(reporter);
    const planner = new DeletionPlanner();

    return new CleanupOrchestrator(
      {
        regionEnumerator: new RegionEnumerator(regionClient, retryPolicy),
        clientFactory: this.deps.configClientFactory ?? createAwsConfigClient,
        scanner: new ResourceScanner({ retryPolicy, onRetry }),
        classifier: new RuleClassifier(config.classification),
        planner,
        executor: new PlanExecutor({
          retryPolicy,
          planner,
          onRetry,
          onStep: reporter.logStepOutcome.bind(reporter)
        }),
        emitter: new InventoryEmitter(),
        reporter,
        backupManager: new BackupManager(config.cleanup.backupPath)
      },
      {
        concurrency: config.cleanup.concurrency,
        timeoutMs: config.cleanup.timeoutMs,
        backupEnabled: config.cleanup.backupEnabled,
        now: this.deps.now
      }
    );
  }

  /**
   * Display run summary
   */
  private displayInventory(inventory: Inventory, inventoryPath: string): void {
    const isDryRun = inventory.mode === 'dry-run';
    const { summary } = inventory;

    console.log(`\n${isDryRun ? '🔍 DRY-RUN' : '🧹 CLEANUP'} INVENTORY`);
    console.log('='.repeat(50));
    console.log(`🌍 Regions: ${summary.regions}${summary.regionsFailed > 0 ? ` (${summary.regionsFailed} failed)` : ''}`);
    console.log(`📊 Rules discovered: ${summary.discovered}`);
    console.log(`🛡️ Rules preserved: ${summary.preserved}`);
    console.log(`🗑️ Rules ${isDryRun ? 'that would be ' : ''}cleaned: ${summary.cleaned}`);

    if (summary.failed > 0) {
      console.log(`❌ Rules failed: ${summary.failed}`);
    }
    if (summary.quarantined > 0) {
      console.log(`⚠️ Resources quarantined: ${summary.quarantined}`);
    }

    for (const region of inventory.regions) {
      if (region.error) {
        console.log(`   • ${region.region}: ${region.error.message}`);
      }
    }

    console.log('\n' + '='.repeat(50));
    console.log(`📄 Inventory written to ${inventoryPath}`);

    if (isDryRun) {
      console.log('💡 This was a dry-run. No resources were changed.');
      console.log('💡 Run with --execute to perform the cleanup.');
    }
  }

  private displayDiscoveries(discoveries: RegionDiscovery[]): void {
    let total = 0;
    for (const discovery of discoveries) {
      if (discovery.error) {
        console.log(`❌ ${discovery.region}: ${discovery.error.message}`);
        continue;
      }
      const preserved = discovery.classified.filter(entry => entry.classification === 'PRESERVE').length;
      const cleanable = discovery.classified.length - preserved;
      total += discovery.classified.length;
      console.log(
        `${discovery.region}: ${discovery.classified.length} rules (${cleanable} cleanable, ${preserved} preserved), ` +
        `recorder: ${discovery.scan?.recorder?.name ?? 'none'}, channel: ${discovery.scan?.channel?.name ?? 'none'}`
      );
    }
    console.log(`\n📊 Total rules: ${total} across ${discoveries.length} regions`);
  }

  /**
   * Run the CLI and resolve with the process exit code
   */
  public async run(argv: string[] = process.argv): Promise<number> {
    this.exitCode = EXIT_OK;
    try {
      await this.program.parseAsync(argv);
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID_INVOCATION;
      }
      throw error;
    }
    return this.exitCode;
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new ConfigCleanupCLI();
  cli.run()
    .then(code => process.exit(code))
    .catch(error => {
      console.error('❌ CLI Error:', formatErrorMessage(error));
      process.exit(EXIT_DISCOVERY_FAILED);
    });
}

export { ConfigCleanupCLI };
