/**
 * 다운로드 스케줄러
 * 파티션 단위로 고정 크기 워커 풀에서 실행하고, 파티션 내부는 순차 처리합니다.
 */

import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import { LocalIOError, NetworkError } from '../errors';
import type { LocalStore } from './local-store';
import { verifyContent, type MetadataClient } from './metadata-client';
import type { PlanReason, SyncPlanner } from './sync-planner';
import type { SyncContext } from './sync-context';
import type { DownloadPlan, PackageRecord, PartitionKey, PartitionResult } from './types';

export const DEFAULT_WORKERS = 6;

export interface DownloadSchedulerOptions {
  client: MetadataClient;
  store: LocalStore;
  planner: SyncPlanner;
  context: SyncContext;
  /** 워커 수 (기본 6) */
  workers?: number;
  /** 실패한 전송의 재시도 횟수 (기본 0) */
  retries?: number;
  /** 재시도 간격 (ms, 시도 횟수만큼 증가) */
  retryDelay?: number;
  /** 중단 신호 (처리 중인 레코드 이후 새 레코드를 시작하지 않음) */
  signal?: AbortSignal;
}

// 이벤트 타입
export interface DownloadSchedulerEvents {
  recordDownloaded: (location: string, bytes: number, worker: string) => void;
  recordSkipped: (location: string, reason: PlanReason, worker: string) => void;
  recordFailed: (location: string, error: Error, worker: string) => void;
  partitionComplete: (result: PartitionResult) => void;
}

export class DownloadScheduler extends EventEmitter<DownloadSchedulerEvents> {
  private options: DownloadSchedulerOptions;

  constructor(options: DownloadSchedulerOptions) {
    super();
    this.options = options;
  }

  get workers(): number {
    return this.options.workers ?? DEFAULT_WORKERS;
  }

  /**
   * 계획 실행
   * 레코드별 네트워크/파일 오류는 결과에 기록하고 계속 진행합니다.
   */
  async run(plan: DownloadPlan): Promise<PartitionResult[]> {
    const workerCount = this.workers;
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new RangeError(`워커 수는 1 이상의 정수여야 합니다: ${workerCount}`);
    }

    const queue = new PQueue({ concurrency: workerCount });
    const idleWorkers = Array.from({ length: workerCount }, (_, i) => `worker-${i + 1}`);
    const { logger } = this.options.context;

    logger.info('패키지 다운로드 시작', { partitions: plan.size, workers: workerCount });

    const tasks = Array.from(plan, ([partition, records]) =>
      queue.add(async () => {
        const worker = idleWorkers.shift() ?? `worker-${workerCount + 1}`;
        try {
          return await this.processPartition(partition, records, worker);
        } finally {
          idleWorkers.push(worker);
        }
      })
    );

    // 하나가 실패해도 나머지 파티션이 끝날 때까지 기다림
    const settled = await Promise.allSettled(tasks);
    const results: PartitionResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      if (outcome.value) results.push(outcome.value);
    }

    return results;
  }

  /**
   * 파티션 하나를 순서대로 처리
   */
  private async processPartition(
    partition: PartitionKey,
    records: readonly PackageRecord[],
    worker: string
  ): Promise<PartitionResult> {
    const { context, planner, signal } = this.options;
    const result: PartitionResult = {
      partition,
      worker,
      downloaded: 0,
      skipped: 0,
      failed: [],
      bytes: 0,
    };

    context.logger.info(`${worker}: 파티션 '${partition}' 처리 시작 (${records.length}개)`);

    for (const record of records) {
      if (signal?.aborted) {
        result.failed.push({ location: record.location, error: '취소됨' });
        continue;
      }

      context.setWorkerStatus(worker, `checking ${record.location}`);
      try {
        const decision = await planner.decide(record, signal);
        if (!decision.download) {
          result.skipped++;
          context.logger.debug('최신 상태, 다운로드 생략', {
            location: record.location,
            reason: decision.reason,
          });
          this.emit('recordSkipped', record.location, decision.reason, worker);
          continue;
        }

        context.setWorkerStatus(worker, `downloading ${record.location}`);
        const bytes = await this.transferWithRetry(record, signal);
        result.downloaded++;
        result.bytes += bytes;
        context.logger.debug('패키지 다운로드 완료', {
          location: record.location,
          reason: decision.reason,
          bytes,
        });
        this.emit('recordDownloaded', record.location, bytes, worker);
      } catch (error) {
        if (!(error instanceof NetworkError || error instanceof LocalIOError)) {
          throw error;
        }
        result.failed.push({ location: record.location, error: error.message });
        context.logger.warn('패키지 다운로드 실패', {
          location: record.location,
          error: error.message,
        });
        this.emit('recordFailed', record.location, error, worker);
      }
    }

    context.setWorkerStatus(worker, `idle (finished ${partition})`);
    context.logger.info(`${worker}: 파티션 '${partition}' 처리 완료`, {
      downloaded: result.downloaded,
      skipped: result.skipped,
      failed: result.failed.length,
    });
    this.emit('partitionComplete', result);

    return result;
  }

  /**
   * 전송 (네트워크 오류만 재시도, 매번 처음부터)
   */
  private async transferWithRetry(record: PackageRecord, signal?: AbortSignal): Promise<number> {
    const retries = this.options.retries ?? 0;
    const retryDelay = this.options.retryDelay ?? 1000;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.transfer(record, signal);
      } catch (error) {
        if (!(error instanceof NetworkError) || attempt >= retries || signal?.aborted) {
          throw error;
        }
        this.options.context.logger.debug('다운로드 재시도', {
          location: record.location,
          attempt: attempt + 1,
          error: error.message,
        });
        await new Promise((resolve) => setTimeout(resolve, retryDelay * (attempt + 1)));
      }
    }
  }

  /**
   * 받아서 (크기/체크섬이 있으면 검증 후) 파일 전체를 씁니다.
   */
  private async transfer(record: PackageRecord, signal?: AbortSignal): Promise<number> {
    const { client, store } = this.options;
    const url = store.urlFor(record.location);
    const data = await client.fetch(url, signal);
    verifyContent(data, record, url);

    await store.write(store.pathFor(record.location), data);
    return data.length;
  }
}
