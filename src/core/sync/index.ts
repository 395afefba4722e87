/**
 * Repository Sync Module
 * yum/dnf 저장소 미러 동기화
 */

export * from './types';
export { MetadataClient, decompress, detectCompression, verifyContent } from './metadata-client';
export type {
  ExpectedContent,
  FetchAndDecompressOptions,
  MetadataClientOptions,
} from './metadata-client';
export { parseRepomd, PRIMARY_TYPE, REPOMD_PATH } from './repomd-parser';
export { parsePrimary } from './primary-parser';
export { LocalStore } from './local-store';
export {
  SyncPlanner,
  buildPlan,
  buildChecksumIndex,
  bucketPartitioner,
  hashPartitioner,
} from './sync-planner';
export type { Partitioner, PlanDecision, PlanReason, SyncPlannerOptions } from './sync-planner';
export { DownloadScheduler, DEFAULT_WORKERS } from './download-scheduler';
export type { DownloadSchedulerOptions, DownloadSchedulerEvents } from './download-scheduler';
export { SyncContext } from './sync-context';
export type { SyncContextEvents } from './sync-context';
export { SyncOrchestrator, PRIMARY_LOCAL_FILE } from './orchestrator';
export type { SyncOptions, SyncOrchestratorOptions, SyncOrchestratorEvents } from './orchestrator';
