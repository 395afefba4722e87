/**
 * Repository Sync Types
 * yum/dnf 저장소 미러 동기화를 위한 공통 타입 정의
 */

// 메타데이터 압축 형식
export type Compression = 'gz' | 'zst';

// 동기화 진행 상태
export type SyncState =
  | 'init'
  | 'manifest-fetched'
  | 'index-parsed'
  | 'planned'
  | 'downloading'
  | 'done'
  | 'failed';

// 파티션 키 (작업 분배용, 의미상 그룹 아님)
export type PartitionKey = string;

/**
 * 동기화 대상 저장소
 */
export interface RepositoryTarget {
  /** 설정 섹션 이름 */
  name: string;
  /** 원격 저장소 베이스 URL */
  baseUrl: string;
  /** 로컬 미러 디렉토리 */
  localDir: string;
}

/**
 * repomd.xml의 data 항목
 */
export interface MetadataDescriptor {
  /** 메타데이터 타입 (primary, filelists, other ...) */
  type: string;
  /** baseUrl 기준 상대 경로 */
  href: string;
  /** 압축 형식 (href 확장자 기준) */
  compression?: Compression;
  /** sha256 체크섬 */
  checksum?: string;
  /** 압축 크기 */
  size?: number;
}

/**
 * repomd.xml 파싱 결과
 */
export interface RepoIndex {
  /** 저장소 리비전 (동등 비교 전용) */
  revision: string;
  descriptors: MetadataDescriptor[];
  /** type === 'primary' 항목 */
  primary: MetadataDescriptor;
}

/**
 * primary.xml의 패키지 항목
 */
export interface PackageRecord {
  /** baseUrl 기준 상대 경로 (실행 내 고유) */
  location: string;
  /** sha256 체크섬 (없으면 크기 비교로 대체) */
  checksum?: string;
  /** 패키지 크기 (bytes) */
  size?: number;
}

/**
 * primary.xml 파싱 결과
 */
export interface PackageIndex {
  records: PackageRecord[];
  /** location 누락 등으로 건너뛴 항목 수 */
  skipped: number;
}

// 파티션 키 → 순서가 보존된 레코드 목록
export type DownloadPlan = ReadonlyMap<PartitionKey, readonly PackageRecord[]>;

/**
 * 워커 상태
 */
export interface WorkerStatus {
  status: string;
  ts: Date;
}

/**
 * 동기화 상태 스냅샷
 */
export interface SyncStatus {
  state: SyncState;
  workers: Record<string, WorkerStatus>;
}

/**
 * 레코드별 다운로드 실패
 */
export interface RecordFailure {
  location: string;
  error: string;
}

/**
 * 파티션 처리 결과
 */
export interface PartitionResult {
  partition: PartitionKey;
  worker: string;
  downloaded: number;
  skipped: number;
  failed: RecordFailure[];
  bytes: number;
}

/**
 * 동기화 결과 요약
 */
export interface SyncSummary {
  target: RepositoryTarget;
  revision: string;
  /** 소요 시간 (ms) */
  elapsedMs: number;
  /** 로컬 미러 전체 크기 (bytes) */
  totalBytes: number;
  /** 이번 실행에서 받은 바이트 */
  bytesDownloaded: number;
  packages: number;
  downloaded: number;
  skipped: number;
  failed: RecordFailure[];
  /** 미러링한 메타데이터 파일 수 (repomd.xml 포함) */
  metadataFiles: number;
  /** primary.xml에서 건너뛴 항목 수 */
  malformedEntries: number;
}

/**
 * 업데이트 확인 결과
 */
export type UpdateCheckResult =
  | { status: 'synced'; summary: SyncSummary }
  | { status: 'up-to-date' | 'updates-available'; localRevision: string; remoteRevision: string };
