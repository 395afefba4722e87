/**
 * 원격 메타데이터/패키지 HTTP 클라이언트
 * 재시도는 하지 않습니다. 재시도 정책은 호출자가 정합니다.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { gunzipSync } from 'zlib';
import * as crypto from 'crypto';
import * as fzstd from 'fzstd';
import { NetworkError, errorMessage } from '../errors';
import type { Compression } from './types';

const GZIP_MAGIC = [0x1f, 0x8b];
const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];

export interface MetadataClientOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  /** 미리 구성된 axios 인스턴스 (테스트, 프록시 설정 등) */
  http?: AxiosInstance;
}

/**
 * href 확장자로 압축 형식 판별
 */
export function detectCompression(href: string): Compression | undefined {
  const pathname = href.split(/[?#]/)[0];
  if (pathname.endsWith('.gz')) return 'gz';
  if (pathname.endsWith('.zst')) return 'zst';
  return undefined;
}

function startsWith(data: Buffer, magic: number[]): boolean {
  return data.length >= magic.length && magic.every((byte, i) => data[i] === byte);
}

/**
 * 압축 해제
 * 형식을 지정하지 않으면 매직 바이트로 판별하고, 압축되지 않은 데이터는 그대로 반환합니다.
 */
export function decompress(data: Buffer, compression?: Compression): Buffer {
  const format =
    compression ??
    (startsWith(data, GZIP_MAGIC) ? 'gz' : startsWith(data, ZSTD_MAGIC) ? 'zst' : undefined);

  switch (format) {
    case 'gz':
      return gunzipSync(data);
    case 'zst':
      return Buffer.from(fzstd.decompress(data));
    case undefined:
      return data;
  }
}

// 기대하는 원격 파일 내용 (repomd.xml/primary.xml에 적힌 값)
export interface ExpectedContent {
  checksum?: string;
  size?: number;
}

/**
 * 받은 데이터를 크기/sha256과 비교 (불일치는 NetworkError)
 */
export function verifyContent(data: Buffer, expected: ExpectedContent, url: string): void {
  if (expected.size !== undefined && data.length !== expected.size) {
    throw new NetworkError(
      `크기 불일치: ${url} (expected ${expected.size}, got ${data.length})`,
      url
    );
  }
  if (expected.checksum) {
    const actual = crypto.createHash('sha256').update(data).digest('hex');
    if (actual !== expected.checksum) {
      throw new NetworkError(
        `체크섬 불일치: ${url} (expected ${expected.checksum}, got ${actual})`,
        url
      );
    }
  }
}

export interface FetchAndDecompressOptions extends ExpectedContent {
  signal?: AbortSignal;
  /** 압축 형식 (기본: URL 확장자, 확장자가 없으면 매직 바이트) */
  compression?: Compression;
}

export class MetadataClient {
  private client: AxiosInstance;

  constructor(options: MetadataClientOptions = {}) {
    this.client =
      options.http ??
      axios.create({
        timeout: options.timeout ?? 60000,
        headers: {
          Accept: '*/*',
          'User-Agent': 'repomirror/1.0',
        },
      });
  }

  /**
   * 원격 파일 전체를 가져옵니다.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.request<ArrayBuffer>('get', url, signal);
    const data = Buffer.from(response.data);

    // 잘린 응답 확인
    const expected = this.parseContentLength(response);
    if (expected !== undefined && data.length < expected) {
      throw new NetworkError(
        `응답이 잘렸습니다: ${url} (${data.length}/${expected} bytes)`,
        url,
        { status: response.status }
      );
    }

    return data;
  }

  /**
   * 원격 파일을 가져와 압축을 해제합니다 (gzip, zstd).
   * checksum/size가 주어지면 압축된 원본을 먼저 검증합니다.
   */
  async fetchAndDecompress(
    url: string,
    options: FetchAndDecompressOptions = {}
  ): Promise<Buffer> {
    const data = await this.fetch(url, options.signal);
    verifyContent(data, options, url);
    try {
      return decompress(data, options.compression ?? detectCompression(url));
    } catch (error) {
      throw new NetworkError(`압축 해제 실패: ${url} (${errorMessage(error)})`, url, {
        cause: error,
      });
    }
  }

  /**
   * HEAD 요청으로 원격 파일 크기 조회 (content-length 없으면 undefined)
   */
  async contentLength(url: string, signal?: AbortSignal): Promise<number | undefined> {
    const response = await this.request<unknown>('head', url, signal);
    return this.parseContentLength(response);
  }

  private async request<T>(
    method: 'get' | 'head',
    url: string,
    signal?: AbortSignal
  ): Promise<AxiosResponse<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await this.client.request<T>({
        method,
        url,
        responseType: 'arraybuffer',
        validateStatus: () => true,
        signal,
      });
    } catch (error) {
      throw new NetworkError(`요청 실패: ${url} (${errorMessage(error)})`, url, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(`HTTP ${response.status}: ${url}`, url, { status: response.status });
    }

    return response;
  }

  private parseContentLength(response: AxiosResponse<unknown>): number | undefined {
    const header: unknown = response.headers['content-length'];
    if (header === undefined || header === null) return undefined;
    const length = parseInt(String(header), 10);
    return isNaN(length) ? undefined : length;
  }
}
