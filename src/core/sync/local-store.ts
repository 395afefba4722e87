/**
 * 로컬 미러 저장소
 * 원격 URL → 로컬 경로 매핑, 존재/크기/해시 확인, 파일 쓰기를 담당합니다.
 */

import fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import { LocalIOError, errorMessage } from '../errors';
import type { RepositoryTarget } from './types';

export class LocalStore {
  readonly baseUrl: string;
  readonly localDir: string;

  constructor(target: Pick<RepositoryTarget, 'baseUrl' | 'localDir'>) {
    this.baseUrl = target.baseUrl.replace(/\/+$/, '');
    this.localDir = path.resolve(target.localDir);
  }

  /**
   * 상대 경로 → 원격 URL
   */
  urlFor(relativePath: string): string {
    return `${this.baseUrl}/${relativePath.replace(/^\/+/, '')}`;
  }

  /**
   * 원격 URL → 로컬 경로 (baseUrl 접두사를 떼고 localDir에 붙임)
   */
  localPathFor(url: string): string {
    const prefix = `${this.baseUrl}/`;
    if (!url.startsWith(prefix)) {
      throw new LocalIOError(`저장소 밖의 URL입니다: ${url}`, this.localDir);
    }

    const relativePath = url.slice(prefix.length).replace(/^\/+/, '');
    const localPath = path.resolve(this.localDir, relativePath);

    // ../ 등으로 미러 디렉토리를 벗어나는 경로 차단
    if (!localPath.startsWith(this.localDir + path.sep)) {
      throw new LocalIOError(`미러 디렉토리를 벗어나는 경로입니다: ${relativePath}`, localPath);
    }

    return localPath;
  }

  /**
   * 상대 경로 → 로컬 경로
   */
  pathFor(relativePath: string): string {
    return this.localPathFor(this.urlFor(relativePath));
  }

  async exists(localPath: string): Promise<boolean> {
    return fs.pathExists(localPath);
  }

  /**
   * 파일 크기 (없으면 undefined)
   */
  async size(localPath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(localPath);
      return stats.isFile() ? stats.size : undefined;
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new LocalIOError(`파일 정보 조회 실패: ${errorMessage(error)}`, localPath, error);
    }
  }

  /**
   * 로컬 파일 sha256 (스트리밍)
   */
  async sha256(localPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash('sha256');
      const stream = fs.createReadStream(localPath);

      stream.on('data', (chunk) => hash.update(chunk));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', (error) =>
        reject(new LocalIOError(`체크섬 계산 실패: ${error.message}`, localPath, error))
      );
    });
  }

  async read(localPath: string): Promise<Buffer> {
    try {
      return await fs.readFile(localPath);
    } catch (error) {
      throw new LocalIOError(`파일 읽기 실패: ${errorMessage(error)}`, localPath, error);
    }
  }

  /**
   * 파일 전체 쓰기
   * 임시 파일에 쓴 뒤 이름을 바꾸므로 중단되어도 반쯤 쓰인 파일이 남지 않습니다.
   */
  async write(localPath: string, data: Buffer): Promise<void> {
    const tempPath = `${localPath}.part`;
    try {
      await fs.outputFile(tempPath, data);
      await fs.rename(tempPath, localPath);
    } catch (error) {
      // 원래 에러를 우선 보고
      await fs.remove(tempPath).catch(() => undefined);
      throw new LocalIOError(`파일 쓰기 실패: ${errorMessage(error)}`, localPath, error);
    }
  }

  /**
   * 미러 디렉토리 전체 크기 (bytes)
   * 심볼릭 링크는 따라가지 않고, 세는 도중 사라진 항목은 건너뜁니다.
   */
  async totalSize(dirPath: string = this.localDir): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(dirPath);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw new LocalIOError(`디렉토리 읽기 실패: ${errorMessage(error)}`, dirPath, error);
    }

    let size = 0;
    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry);
      const stats = await fs.lstat(entryPath).catch((error: unknown) => {
        if (isNotFound(error)) return undefined;
        throw new LocalIOError(`파일 정보 조회 실패: ${errorMessage(error)}`, entryPath, error);
      });

      if (!stats) continue;
      if (stats.isDirectory()) {
        size += await this.totalSize(entryPath);
      } else if (stats.isFile()) {
        size += stats.size;
      }
    }

    return size;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
