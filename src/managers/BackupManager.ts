import * as fs from 'fs/promises';
import * as path from 'path';
import { Backup, BackupResult, ClassifiedRule, RegionScan } from '../types';
import { IBackupManager } from '../interfaces';
import { formatErrorMessage } from '../errors';

/**
 * Backup manager implementation
 * Snapshots a region's discovered Config resources before anything is deleted
 */
export class BackupManager implements IBackupManager {
  private backupDirectory: string;

  constructor(backupDirectory: string = './backups') {
    this.backupDirectory = backupDirectory;
  }

  /**
   * Create a backup of a region's scan and classification
   */
  async createBackup(scan: RegionScan, classified: ClassifiedRule[]): Promise<BackupResult> {
    try {
      await this.ensureBackupDirectory();

      const backup: Backup = {
        timestamp: new Date(),
        region: scan.region,
        scan,
        classified,
        metadata: {
          ruleCount: scan.rules.length,
          cleanableCount: classified.filter(entry => entry.classification === 'CLEANABLE').length
        }
      };

      const backupPath = path.join(this.backupDirectory, this.generateBackupFilename(scan.region));
      await this.saveBackup(backup, backupPath);

      return {
        success: true,
        backupPath
      };
    } catch (error) {
      return {
        success: false,
        backupPath: '',
        error: `Failed to create backup: ${formatErrorMessage(error)}`
      };
    }
  }

  /**
   * Save backup to file
   */
  async saveBackup(backup: Backup, filePath: string): Promise<void> {
    try {
      await fs.writeFile(filePath, JSON.stringify(backup, null, 2), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to save backup to ${filePath}: ${formatErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Load backup from file
   */
  async loadBackup(filePath: string): Promise<Backup> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load backup from ${filePath}: ${formatErrorMessage(error)}`, { cause: error });
    }

    if (!BackupManager.isBackupShape(parsed)) {
      throw new Error(`Failed to load backup from ${filePath}: unexpected file structure`);
    }

    return { ...parsed, timestamp: new Date(parsed.timestamp) };
  }

  /**
   * List all backups in the backup directory, most recent first
   */
  async listBackups(): Promise<string[]> {
    try {
      await this.ensureBackupDirectory();
      const files = await fs.readdir(this.backupDirectory);
      return files
        .filter(f => f.endsWith('.backup.json'))
        .sort()
        .reverse();
    } catch (error) {
      throw new Error(`Failed to list backups: ${formatErrorMessage(error)}`, { cause: error });
    }
  }

  getBackupDirectory(): string {
    return this.backupDirectory;
  }

  private static isBackupShape(value: unknown): value is Omit<Backup, 'timestamp'> & { timestamp: string } {
    if (!value || typeof value !== 'object') {
      return false;
    }
    return 'timestamp' in value && typeof value.timestamp === 'string'
      && 'region' in value && typeof value.region === 'string'
      && 'scan' in value && typeof value.scan === 'object' && value.scan !== null
      && 'classified' in value && Array.isArray(value.classified)
      && 'metadata' in value && typeof value.metadata === 'object' && value.metadata !== null;
  }

  /**
   * Ensure backup directory exists
   */
  private async ensureBackupDirectory(): Promise<void> {
    await fs.mkdir(this.backupDirectory, { recursive: true });
  }

  /**
   * Generate backup filename with region and timestamp
   */
  private generateBackupFilename(region: string): string {
    const timestamp = new Date()
      .toISOString()
      .replace(/\.\d+Z$/, '')
      .replace(/:/g, '-')
      .replace('T', '_');
    return `${region}_${timestamp}.backup.json`;
  }
}
