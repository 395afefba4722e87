/**
 * 동기화 계획
 * 레코드 파티션 분할, 체크섬 인덱스 생성, 파일별 다운로드 필요 여부 판단
 */

import * as crypto from 'crypto';
import type { Logger } from '../../utils/logger';
import type { LocalStore } from './local-store';
import type { MetadataClient } from './metadata-client';
import type { DownloadPlan, PackageRecord, PartitionKey } from './types';

export type Partitioner = (location: string) => PartitionKey;

/**
 * 버킷 디렉토리 기준 파티션 (Packages/a/foo.rpm → a)
 * 단일 문자 버킷 디렉토리 관례를 가정한 부하 분산용 휴리스틱입니다.
 */
export const bucketPartitioner: Partitioner = (location) => {
  const segments = location.split('/').filter((s) => s.length > 0);
  if (segments.length >= 3) return segments[1];
  if (segments.length === 2) return segments[0];
  return '.';
};

/**
 * 해시 기반 파티션 (디렉토리 구조와 무관하게 고르게 분산)
 */
export function hashPartitioner(buckets: number): Partitioner {
  if (!Number.isInteger(buckets) || buckets < 1) {
    throw new RangeError(`buckets는 1 이상의 정수여야 합니다: ${buckets}`);
  }
  return (location) => {
    const digest = crypto.createHash('md5').update(location).digest();
    return `bucket-${digest.readUInt32BE(0) % buckets}`;
  };
}

/**
 * 다운로드 계획 생성 (파티션 내 순서는 인덱스 순서 유지)
 */
export function buildPlan(
  records: readonly PackageRecord[],
  partitioner: Partitioner = bucketPartitioner
): DownloadPlan {
  const plan = new Map<PartitionKey, PackageRecord[]>();
  for (const record of records) {
    const key = partitioner(record.location);
    const partition = plan.get(key);
    if (partition) {
      partition.push(record);
    } else {
      plan.set(key, [record]);
    }
  }
  return plan;
}

/**
 * location → sha256 인덱스
 */
export function buildChecksumIndex(records: readonly PackageRecord[]): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const record of records) {
    if (record.checksum) index.set(record.location, record.checksum);
  }
  return index;
}

// 판단 사유
export type PlanReason =
  | 'force'
  | 'missing'
  | 'checksum-mismatch'
  | 'checksum-match'
  | 'size-mismatch'
  | 'size-match'
  | 'size-unknown';

export interface PlanDecision {
  download: boolean;
  reason: PlanReason;
}

export interface SyncPlannerOptions {
  store: LocalStore;
  client: MetadataClient;
  checksums: ReadonlyMap<string, string>;
  /** 비교 없이 모두 다운로드 */
  force?: boolean;
  logger?: Pick<Logger, 'debug'>;
}

export class SyncPlanner {
  private options: SyncPlannerOptions;

  constructor(options: SyncPlannerOptions) {
    this.options = options;
  }

  /**
   * 다운로드 여부 판단
   *
   * 1. force → 다운로드
   * 2. 로컬 파일 없음 → 다운로드
   * 3. 원격 체크섬 있음 → 로컬 sha256과 비교
   * 4. 체크섬 없음 → 크기 비교 (인덱스의 size, 없으면 HEAD content-length)
   */
  async decide(record: PackageRecord, signal?: AbortSignal): Promise<PlanDecision> {
    const { store, client, checksums, force } = this.options;

    if (force) {
      return { download: true, reason: 'force' };
    }

    const localPath = store.pathFor(record.location);
    const localSize = await store.size(localPath);
    if (localSize === undefined) {
      return { download: true, reason: 'missing' };
    }

    const remoteChecksum = checksums.get(record.location);
    if (remoteChecksum) {
      const localChecksum = await store.sha256(localPath);
      return localChecksum === remoteChecksum
        ? { download: false, reason: 'checksum-match' }
        : { download: true, reason: 'checksum-mismatch' };
    }

    const remoteSize = record.size ?? (await client.contentLength(store.urlFor(record.location), signal));
    if (remoteSize === undefined) {
      this.options.logger?.debug('원격 크기를 알 수 없어 기존 파일 유지', {
        location: record.location,
      });
      return { download: false, reason: 'size-unknown' };
    }

    return localSize === remoteSize
      ? { download: false, reason: 'size-match' }
      : { download: true, reason: 'size-mismatch' };
  }

  async needsDownload(record: PackageRecord, signal?: AbortSignal): Promise<boolean> {
    const decision = await this.decide(record, signal);
    return decision.download;
  }
}
