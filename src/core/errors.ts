/**
 * 동기화 에러 분류
 *
 * - NetworkError: 원격 리소스 요청 실패 (연결, 상태 코드, 타임아웃, 잘린 응답)
 * - MalformedMetadataError: repomd.xml / primary.xml 구조 오류
 * - LocalIOError: 로컬 파일시스템 읽기/쓰기 실패
 */

/**
 * 모든 동기화 에러의 기본 클래스
 */
export class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SyncError';
  }
}

export class NetworkError extends SyncError {
  readonly url: string;
  /** HTTP 상태 코드 (응답을 받은 경우) */
  readonly status?: number;

  constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause);
    this.name = 'NetworkError';
    this.url = url;
    this.status = options.status;
  }
}

export class MalformedMetadataError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'MalformedMetadataError';
  }
}

export class LocalIOError extends SyncError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, cause);
    this.name = 'LocalIOError';
    this.path = path;
  }
}

/**
 * unknown 에러에서 메시지 추출
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 설정 파일 오류 (동기화 시작 전)
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
