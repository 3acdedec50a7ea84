import { Backup, BackupResult, ClassifiedRule, RegionScan } from '../types';

/**
 * Interface for backup management operations
 */
export interface IBackupManager {
  /**
   * Create a backup of a region's discovered resources
   */
  createBackup(scan: RegionScan, classified: ClassifiedRule[]): Promise<BackupResult>;

  /**
   * Save backup to file
   */
  saveBackup(backup: Backup, path: string): Promise<void>;

  /**
   * Load backup from file
   */
  loadBackup(path: string): Promise<Backup>;
}
