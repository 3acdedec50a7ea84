import { Inventory, RegionResult, RunMode, StepOutcome } from '../types';
import { IReporter } from '../interfaces';
import { RetryAttemptInfo } from '../utils/RetryPolicy';
import { formatErrorMessage } from '../errors';
import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';

export interface ReporterOptions {
  verbose?: boolean;
  outputPath?: string;
}

/**
 * Reporter for run logs and the inventory artifact
 */
export class Reporter implements IReporter {
  private logger: winston.Logger;
  private logPath: string;
  private outputPath: string;
  private verbose: boolean;

  constructor(logPath: string = './logs', options: ReporterOptions = {}) {
    this.logPath = logPath;
    this.outputPath = options.outputPath ?? './inventory';
    this.verbose = options.verbose ?? false;
    this.logger = this.setupLogger();
  }

  /**
   * Log run start
   */
  logRunStart(mode: RunMode, regionCount: number): void {
    this.logger.info(`Starting ${mode} run`, {
      mode,
      regionCount,
      timestamp: new Date().toISOString()
    });
  }

  /**
   * Log run completion
   */
  logRunComplete(inventory: Inventory): void {
    this.logger.info(`${inventory.mode} run completed`, {
      mode: inventory.mode,
      ...inventory.summary,
      timestamp: inventory.generatedAt
    });
  }

  logRegionStart(region: string, mode: RunMode): void {
    this.logger.info(`Processing region ${region}`, { region, mode });
  }

  logRegionComplete(result: RegionResult): void {
    if (result.error) {
      this.logger.error(`Region ${result.region} failed: ${result.error.message}`, {
        region: result.region,
        errorClass: result.error.errorClass,
        errorType: result.error.type,
        code: result.error.code,
        timedOut: result.timedOut
      });
      return;
    }

    const preserved = result.rules.filter(rule => rule.classification === 'PRESERVE').length;
    const failed = result.rules.filter(rule => rule.outcome === 'FAILED').length;
    this.logger.info(`Region ${result.region} completed`, {
      region: result.region,
      rules: result.rules.length,
      preserved,
      failed,
      recorder: result.recorder?.outcome ?? 'absent',
      channel: result.channel?.outcome ?? 'absent',
      quarantined: result.quarantined.length,
      timedOut: result.timedOut
    });
  }

  /**
   * Log a single step outcome at a level matching its status
   */
  logStepOutcome(region: string, outcome: StepOutcome): void {
    const meta = {
      region,
      step: outcome.kind,
      target: outcome.target,
      status: outcome.status,
      ...(outcome.alreadyAbsent ? { alreadyAbsent: true } : {}),
      ...(outcome.reason ? { reason: outcome.reason } : {})
    };

    switch (outcome.status) {
    case 'FAILED':
      this.logger.error(`Failed ${outcome.kind} ${outcome.target}`, {
        ...meta,
        error: outcome.error?.message ?? 'Unknown error',
        code: outcome.error?.code
      });
      break;
    case 'SKIPPED':
      this.logger.warn(`Skipped ${outcome.kind} ${outcome.target}`, meta);
      break;
    default:
      if (outcome.warning) {
        this.logger.warn(`${outcome.kind} ${outcome.target}: ${outcome.warning}`, meta);
      } else {
        this.logger.info(`${outcome.status === 'SIMULATED' ? 'Would run' : 'Completed'} ${outcome.kind} ${outcome.target}`, meta);
      }
    }
  }

  logRetry(region: string, info: RetryAttemptInfo): void {
    this.logger.warn(`Retrying ${info.label ?? 'call'} in ${region}`, {
      region,
      attempt: info.attempt,
      maxAttempts: info.maxAttempts,
      delayMs: info.delayMs,
      error: formatErrorMessage(info.error)
    });
  }

  /**
   * Log backup operation
   */
  logBackupOperation(region: string, backupPath: string, success: boolean, error?: string): void {
    if (success) {
      this.logger.info('Backup created successfully', {
        region,
        backupPath,
        timestamp: new Date().toISOString()
      });
    } else {
      this.logger.error('Backup creation failed', {
        region,
        backupPath,
        error: error || 'Unknown error',
        timestamp: new Date().toISOString()
      });
    }
  }

  /**
   * Save inventory to file
   */
  async saveInventory(inventory: Inventory, filename?: string): Promise<string> {
    await fs.promises.mkdir(this.outputPath, { recursive: true });

    if (!filename) {
      const timestamp = inventory.generatedAt.replace(/[:.]/g, '-');
      filename = `inventory-${inventory.mode}-${timestamp}.json`;
    }

    const filePath = path.join(this.outputPath, filename);

    try {
      await fs.promises.writeFile(filePath, JSON.stringify(inventory, null, 2), 'utf8');
      this.logger.info(`Inventory saved to ${filePath}`);
      return filePath;
    } catch (error) {
      const errorMessage = `Failed to save inventory: ${formatErrorMessage(error)}`;
      this.logger.error(errorMessage);
      throw new Error(errorMessage, { cause: error });
    }
  }

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger {
    return this.logger;
  }

  /**
   * Close file transports so the process can exit
   */
  close(): void {
    this.logger.close();
  }

  /**
   * Setup Winston logger with file and console transports
   */
  private setupLogger(): winston.Logger {
    fs.mkdirSync(this.logPath, { recursive: true });

    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const consoleFormat = winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    );

    const level = this.verbose ? 'debug' : 'info';

    return winston.createLogger({
      level,
      format: logFormat,
      transports: [
        new winston.transports.File({
          filename: path.join(this.logPath, 'cleanup.log'),
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.File({
          filename: path.join(this.logPath, 'cleanup-error.log'),
          level: 'error',
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.Console({
          format: consoleFormat,
          level: process.env.NODE_ENV === 'test' ? 'error' : level
        })
      ]
    });
  }
}
