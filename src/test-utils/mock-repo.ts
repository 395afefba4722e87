/**
 * 동기화 테스트 유틸리티
 * 네트워크 없이 원격 저장소를 흉내내는 axios 어댑터와 메타데이터 픽스처 생성기
 */

import axios, { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import * as crypto from 'crypto';
import { gzipSync } from 'zlib';
import { MetadataClient } from '../core/sync/metadata-client';

export interface MockResponse {
  status?: number;
  body?: Buffer | string;
  headers?: Record<string, string>;
  /** 연결 오류 코드 (예: ECONNRESET) */
  error?: string;
  /** 응답 지연 (ms) */
  delayMs?: number;
}

export interface RecordedRequest {
  method: string;
  url: string;
}

/**
 * 메모리 기반 원격 저장소
 */
export class MockRemote {
  readonly baseUrl: string;
  readonly requests: RecordedRequest[] = [];
  /** 동시에 처리 중이던 요청 수의 최댓값 */
  maxInFlight = 0;
  private inFlight = 0;
  private routes = new Map<string, MockResponse>();

  constructor(baseUrl = 'http://mirror.test/repo') {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * 상대 경로에 응답 등록
   */
  set(relativePath: string, response: MockResponse | Buffer | string): this {
    const entry =
      typeof response === 'string' || Buffer.isBuffer(response) ? { body: response } : response;
    this.routes.set(this.urlFor(relativePath), entry);
    return this;
  }

  remove(relativePath: string): this {
    this.routes.delete(this.urlFor(relativePath));
    return this;
  }

  urlFor(relativePath: string): string {
    return `${this.baseUrl}/${relativePath.replace(/^\/+/, '')}`;
  }

  /**
   * GET 요청 수 (상대 경로 지정 시 해당 경로만)
   */
  getCount(relativePath?: string): number {
    const url = relativePath === undefined ? undefined : this.urlFor(relativePath);
    return this.requests.filter((r) => r.method === 'get' && (url === undefined || r.url === url))
      .length;
  }

  resetRequests(): void {
    this.requests.length = 0;
    this.maxInFlight = 0;
  }

  createClient(): MetadataClient {
    return new MetadataClient({ http: axios.create({ adapter: this.adapter }) });
  }

  private adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? 'get').toLowerCase();
    const url = config.url ?? '';
    this.requests.push({ method, url });

    const route = this.routes.get(url);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (route?.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, route.delayMs));
      }
    } finally {
      this.inFlight--;
    }

    if (route?.error) {
      throw new AxiosError(`connect ${route.error}`, route.error, config);
    }

    const body = route?.body === undefined ? Buffer.alloc(0) : Buffer.from(route.body);
    const status = route ? (route.status ?? 200) : 404;

    const response: AxiosResponse<Buffer> = {
      data: method === 'head' ? Buffer.alloc(0) : body,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      headers: { 'content-length': String(body.length), ...route?.headers },
      config,
    };
    return response;
  };
}

export function sha256(data: Buffer | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

export function gzip(data: Buffer | string): Buffer {
  return gzipSync(data);
}

export interface RepomdEntry {
  type: string;
  href?: string;
  checksum?: string;
  size?: number;
}

/**
 * repomd.xml 생성
 */
export function repomdXml(revision: string | undefined, entries: RepomdEntry[]): string {
  const data = entries
    .map((entry) => {
      const checksum = entry.checksum
        ? `\n    <checksum type="sha256">${entry.checksum}</checksum>`
        : '';
      const location = entry.href ? `\n    <location href="${entry.href}"/>` : '';
      const size = entry.size === undefined ? '' : `\n    <size>${entry.size}</size>`;
      return `  <data type="${entry.type}">${checksum}${location}${size}\n  </data>`;
    })
    .join('\n');
  const revisionEl = revision === undefined ? '' : `  <revision>${revision}</revision>\n`;

  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<repomd xmlns="http://linux.duke.edu/metadata/repo" xmlns:rpm="http://linux.duke.edu/metadata/rpm">\n' +
    revisionEl +
    data +
    '\n</repomd>\n'
  );
}

export interface PrimaryEntry {
  name: string;
  location?: string;
  checksum?: string;
  checksumType?: string;
  size?: number;
}

/**
 * primary.xml 생성
 */
export function primaryXml(packages: PrimaryEntry[]): string {
  const body = packages
    .map((pkg) => {
      const lines = [`<package type="rpm">`, `  <name>${pkg.name}</name>`, `  <arch>x86_64</arch>`];
      if (pkg.checksum) {
        lines.push(
          `  <checksum type="${pkg.checksumType ?? 'sha256'}" pkgid="YES">${pkg.checksum}</checksum>`
        );
      }
      if (pkg.size !== undefined) {
        lines.push(`  <size package="${pkg.size}" installed="${pkg.size * 3}" archive="${pkg.size * 3}"/>`);
      }
      if (pkg.location) {
        lines.push(`  <location href="${pkg.location}"/>`);
      }
      lines.push('</package>');
      return lines.join('\n');
    })
    .join('\n');

  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    `<metadata xmlns="http://linux.duke.edu/metadata/common" xmlns:rpm="http://linux.duke.edu/metadata/rpm" packages="${packages.length}">\n` +
    body +
    '\n</metadata>\n'
  );
}

/**
 * 임시 디렉토리 생성
 */
export async function makeTempDir(prefix = 'repomirror-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
