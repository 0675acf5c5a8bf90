// Core module exports for debsnap

// Errors
export { DebsnapError, CommandError, EXIT_CODES, isDebsnapError, errorMessage } from './errors';
export type { DebsnapErrorCode, DebsnapErrorOptions } from './errors';

// Builder
export { BuilderPipeline } from './builder/builder-pipeline';
export type { BuildOptions, BuildReport, BuildStage, BuilderEvents, BuilderDeps } from './builder/builder-pipeline';
export { ReconciliationEngine, buildPoolIndex, summarize } from './builder/reconciliation-engine';
export type { ReconciliationOptions, ReconciliationEvents, ExistingMatch, PoolIndex } from './builder/reconciliation-engine';
export { DpkgRepacker } from './builder/repacker';
export type { Repacker, RepackOutcome } from './builder/repacker';
export { queryInstalledPackages, parseInstalledList, sortRecords, recordKey } from './builder/host-packages';
export { harvestCache } from './builder/cache-harvester';
export type { HarvestResult } from './builder/cache-harvester';
export { fetchUpdates } from './builder/update-fetcher';
export { generateIndex, countIndexEntries } from './builder/index-generator';
export type { IndexResult } from './builder/index-generator';
export {
  auditInventory,
  verifyInventory,
  parseInventory,
  INVENTORY_FILENAME,
  INVENTORY_HEADER,
} from './builder/inventory-auditor';
export type { InventoryReport, InventoryVerification, HashMismatch } from './builder/inventory-auditor';
export { registerRepo, REGISTERED_LIST_NAME } from './builder/repo-registrar';

// Installer
export { InstallerPipeline } from './installer/installer-pipeline';
export type { InstallOptions, InstallReport, InstallStage, InstallerEvents, InstallerDeps } from './installer/installer-pipeline';
export { discoverRepo, findRepoCandidates, rankCandidates, isFlatRepo } from './installer/repo-discoverer';
export type { DiscoveryResult } from './installer/repo-discoverer';
export { stageRepo, verifyStagedRepo } from './installer/repo-stager';
export type { StageResult } from './installer/repo-stager';
export { SourceSwitch } from './installer/source-switch';
export type { SourceSwitchOptions, QuarantineResult } from './installer/source-switch';
export { UpgradeDriver } from './installer/upgrade-driver';
export type { UpgradeStep, UpgradeOptions } from './installer/upgrade-driver';
export { buildUpgradeReport, parseKernelImages } from './installer/post-upgrade-reporter';
export type { UpgradeReport, KernelImage } from './installer/post-upgrade-reporter';
export { formatSourceLine, readSourceSet, parseSourceFile, entryReferences } from './installer/sources';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey } from './config';

// Shared utilities
export { SpawnCommandRunner, runChecked, requireTools } from './shared/command-runner';
export type { CommandRunner, CommandResult, RunOptions } from './shared/command-runner';
export { DpkgDebInspector, canonicalDebFilenames, identityMatches } from './shared/deb-control';
export type { DebInspector } from './shared/deb-control';
export { resolveJobs, runBounded } from './shared/worker-pool';

export * from '../types';
