// Core module exports for pypi-snapshot

// Snapshot
export { PypiSnapshotSource } from './snapshot/pypiSource';
export type { PypiSourceDependencies } from './snapshot/pypiSource';
export { SnapshotProgress } from './snapshot/snapshotProgress';
export type { SnapshotProgressEvents } from './snapshot/snapshotProgress';
export { scanPackage, packagePageUrl } from './snapshot/packageScanner';
export type { ScanOptions } from './snapshot/packageScanner';
export { scanAllPackages } from './snapshot/scanCoordinator';
export type { CoordinatorOptions, PackageScanFn } from './snapshot/scanCoordinator';
export { truncateToRecent } from './snapshot/retentionFilter';
export { assembleSnapshot } from './snapshot/snapshotAssembler';
export { resolveTransferUrl } from './snapshot/transferResolver';

// Discovery
export { discoverPackages, DiscoveryError, DEBUG_INDEX_LENGTH } from './discovery/discovery';
export {
  acquireQueryExecutor,
  BigQueryExecutor,
  resolveCredentialProvider,
  resolveProjectId,
  projectNamesFromRows,
  POPULAR_PACKAGES_QUERY,
} from './discovery/bigquery';
export type { AcquireQueryExecutor } from './discovery/bigquery';

// Config
export { ConfigManager, getConfigManager, resolveSnapshotConfig, DEFAULT_SETTINGS } from './config';
export type { Settings, SettingsOverrides, SnapshotConfig } from './config';

// Shared utilities
export * from './shared';
