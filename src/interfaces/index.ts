export * from './IConfigServiceClient';
export * from './IRegionClient';
export * from './IRegionEnumerator';
export * from './IResourceScanner';
export * from './IRuleClassifier';
export * from './IDeletionPlanner';
export * from './IPlanExecutor';
export * from './IInventoryEmitter';
export * from './IBackupManager';
export * from './IReporter';
export * from './ICleanupOrchestrator';
