/**
 * 동기화 오케스트레이터
 *
 * init → manifest-fetched → index-parsed → planned → downloading → done
 * 치명적 오류(repomd.xml/primary 조회·파싱 실패)는 어느 단계에서든 failed로 끝납니다.
 */

import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import { LocalIOError, NetworkError, errorMessage } from '../errors';
import type { Logger } from '../../utils/logger';
import { MetadataClient, verifyContent } from './metadata-client';
import { LocalStore } from './local-store';
import { parseRepomd, REPOMD_PATH } from './repomd-parser';
import { parsePrimary } from './primary-parser';
import {
  SyncPlanner,
  buildChecksumIndex,
  buildPlan,
  bucketPartitioner,
  type Partitioner,
  type PlanReason,
} from './sync-planner';
import { DownloadScheduler, DEFAULT_WORKERS } from './download-scheduler';
import { SyncContext } from './sync-context';
import type {
  RecordFailure,
  RepoIndex,
  RepositoryTarget,
  SyncSummary,
  UpdateCheckResult,
} from './types';

// 압축 해제된 primary.xml 로컬 사본 파일명
export const PRIMARY_LOCAL_FILE = 'primary.xml';

export interface SyncOrchestratorOptions {
  target: RepositoryTarget;
  logger: Logger;
  client?: MetadataClient;
  workers?: number;
  retries?: number;
  retryDelay?: number;
  partitioner?: Partitioner;
  signal?: AbortSignal;
}

export interface SyncOptions {
  /** 체크섬/크기 비교 없이 모두 다시 받기 */
  force?: boolean;
  /** 외부에서 상태를 구독할 컨텍스트 (없으면 새로 생성) */
  context?: SyncContext;
}

// 이벤트 타입
export interface SyncOrchestratorEvents {
  planned: (packages: number, partitions: number) => void;
  recordDownloaded: (location: string, bytes: number, worker: string) => void;
  recordSkipped: (location: string, reason: PlanReason, worker: string) => void;
  recordFailed: (location: string, error: Error, worker: string) => void;
}

interface MetadataMirrorResult {
  files: number;
  failed: RecordFailure[];
}

export class SyncOrchestrator extends EventEmitter<SyncOrchestratorEvents> {
  readonly target: RepositoryTarget;
  private logger: Logger;
  private client: MetadataClient;
  private store: LocalStore;
  private options: SyncOrchestratorOptions;

  constructor(options: SyncOrchestratorOptions) {
    super();
    this.options = options;
    this.target = options.target;
    this.logger = options.logger;
    this.client = options.client ?? new MetadataClient();
    this.store = new LocalStore(options.target);
  }

  /**
   * 저장소 동기화 (한 번의 선형 실행)
   */
  async sync(options: SyncOptions = {}): Promise<SyncSummary> {
    const context = options.context ?? new SyncContext(this.logger);
    const { signal } = this.options;
    const startTime = Date.now();

    this.logger.info(`저장소 동기화 시작: ${this.target.name}`, {
      baseUrl: this.target.baseUrl,
      localDir: this.store.localDir,
      force: options.force ?? false,
    });

    try {
      // 1. repomd.xml
      const manifestUrl = this.store.urlFor(REPOMD_PATH);
      this.logger.info(`repomd.xml 다운로드: ${manifestUrl}`);
      const manifest = await this.client.fetch(manifestUrl, signal);
      context.setState('manifest-fetched');

      const repoIndex = parseRepomd(manifest, this.logger);

      // 2. primary.xml (압축 해제 사본 보관)
      const primaryUrl = this.store.urlFor(repoIndex.primary.href);
      this.logger.info(`primary 메타데이터 다운로드: ${primaryUrl}`);
      const primary = await this.client.fetchAndDecompress(primaryUrl, {
        signal,
        compression: repoIndex.primary.compression,
        checksum: repoIndex.primary.checksum,
        size: repoIndex.primary.size,
      });
      await this.store.write(path.join(this.store.localDir, PRIMARY_LOCAL_FILE), primary);

      const packageIndex = parsePrimary(primary, this.logger);
      context.setState('index-parsed');

      // 3. 계획
      const plan = buildPlan(packageIndex.records, this.options.partitioner ?? bucketPartitioner);
      const checksums = buildChecksumIndex(packageIndex.records);
      context.setState('planned');
      this.logger.info('다운로드 계획 완료', {
        packages: packageIndex.records.length,
        partitions: plan.size,
        withChecksum: checksums.size,
        malformed: packageIndex.skipped,
      });
      this.emit('planned', packageIndex.records.length, plan.size);

      // 4. 패키지 다운로드
      const planner = new SyncPlanner({
        store: this.store,
        client: this.client,
        checksums,
        force: options.force,
        logger: this.logger,
      });
      const scheduler = new DownloadScheduler({
        client: this.client,
        store: this.store,
        planner,
        context,
        workers: this.options.workers ?? DEFAULT_WORKERS,
        retries: this.options.retries,
        retryDelay: this.options.retryDelay,
        signal,
      });
      scheduler.on('recordDownloaded', (location, bytes, worker) =>
        this.emit('recordDownloaded', location, bytes, worker)
      );
      scheduler.on('recordSkipped', (location, reason, worker) =>
        this.emit('recordSkipped', location, reason, worker)
      );
      scheduler.on('recordFailed', (location, error, worker) =>
        this.emit('recordFailed', location, error, worker)
      );

      context.setState('downloading');
      const results = await scheduler.run(plan);

      // 5. 보조 메타데이터, 마지막으로 repomd.xml
      const metadata = await this.mirrorMetadata(repoIndex, signal);
      const failed = results.flatMap((r) => r.failed).concat(metadata.failed);

      let metadataFiles = metadata.files;
      if (failed.length === 0) {
        await this.store.write(this.store.pathFor(REPOMD_PATH), manifest);
        metadataFiles++;
      } else {
        this.logger.warn('실패한 파일이 있어 로컬 repomd.xml을 갱신하지 않습니다', {
          failed: failed.length,
        });
      }

      const totalBytes = await this.store.totalSize();

      const summary: SyncSummary = {
        target: this.target,
        revision: repoIndex.revision,
        elapsedMs: Date.now() - startTime,
        totalBytes,
        bytesDownloaded: results.reduce((sum, r) => sum + r.bytes, 0),
        packages: packageIndex.records.length,
        downloaded: results.reduce((sum, r) => sum + r.downloaded, 0),
        skipped: results.reduce((sum, r) => sum + r.skipped, 0),
        failed,
        metadataFiles,
        malformedEntries: packageIndex.skipped,
      };

      context.setState('done');

      this.logger.info(
        `Downloaded repo from ${this.target.baseUrl} in ${(summary.elapsedMs / 1000).toFixed(2)} seconds.`
      );
      this.logger.info(
        `Total space used by the repo: ${(summary.totalBytes / (1024 * 1024)).toFixed(2)} MB`
      );

      return summary;
    } catch (error) {
      context.setState('failed');
      this.logger.error(`저장소 동기화 실패: ${this.target.name}`, { error: errorMessage(error) });
      throw error;
    }
  }

  /**
   * 로컬/원격 repomd.xml 리비전 비교 (미러는 변경하지 않음)
   * 로컬 repomd.xml이 없으면 먼저 전체 동기화를 실행합니다.
   */
  async checkForUpdates(options: SyncOptions = {}): Promise<UpdateCheckResult> {
    const localManifest = this.store.pathFor(REPOMD_PATH);

    if (!(await this.store.exists(localManifest))) {
      this.logger.info('로컬 repomd.xml이 없어 전체 동기화를 먼저 실행합니다', {
        target: this.target.name,
      });
      const summary = await this.sync(options);
      return { status: 'synced', summary };
    }

    const local = parseRepomd(await this.store.read(localManifest), this.logger);
    const remote = parseRepomd(
      await this.client.fetch(this.store.urlFor(REPOMD_PATH), this.options.signal),
      this.logger
    );

    // revision이 없으면 항상 updates-available
    const status =
      local.revision !== '' && local.revision === remote.revision
        ? 'up-to-date'
        : 'updates-available';
    if (status === 'updates-available') {
      this.logger.info('업데이트가 있습니다. 동기화를 다시 실행하세요.', {
        target: this.target.name,
        localRevision: local.revision,
        remoteRevision: remote.revision,
      });
    } else {
      this.logger.info('업데이트가 없습니다.', { target: this.target.name });
    }

    return { status, localRevision: local.revision, remoteRevision: remote.revision };
  }

  /**
   * repomd.xml의 모든 data 항목을 미러링 (항상 다시 받고, 적힌 크기/체크섬으로 검증)
   * 개별 실패는 기록만 하고 계속 진행합니다.
   */
  private async mirrorMetadata(
    repoIndex: RepoIndex,
    signal?: AbortSignal
  ): Promise<MetadataMirrorResult> {
    const result: MetadataMirrorResult = { files: 0, failed: [] };

    for (const descriptor of repoIndex.descriptors) {
      try {
        const url = this.store.urlFor(descriptor.href);
        const data = await this.client.fetch(url, signal);
        verifyContent(data, descriptor, url);
        await this.store.write(this.store.pathFor(descriptor.href), data);
        result.files++;
        this.logger.debug('메타데이터 저장', { type: descriptor.type, href: descriptor.href });
      } catch (error) {
        if (!(error instanceof NetworkError || error instanceof LocalIOError)) throw error;
        result.failed.push({ location: descriptor.href, error: error.message });
        this.logger.warn('메타데이터 다운로드 실패', {
          type: descriptor.type,
          href: descriptor.href,
          error: error.message,
        });
      }
    }

    return result;
  }
}
