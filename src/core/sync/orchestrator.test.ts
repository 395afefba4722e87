/**
 * SyncOrchestrator 통합 테스트
 *
 * 메모리 원격 저장소와 임시 디렉토리로 전체 동기화 흐름을 확인합니다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import { SyncOrchestrator, PRIMARY_LOCAL_FILE } from './orchestrator';
import { SyncContext } from './sync-context';
import { MalformedMetadataError, NetworkError } from '../errors';
import { createSilentLogger } from '../../utils/logger';
import {
  MockRemote,
  gzip,
  makeTempDir,
  primaryXml,
  repomdXml,
  sha256,
} from '../../test-utils/mock-repo';

const FOO = 'Packages/a/foo-1.0.rpm';
const BAR = 'Packages/b/bar-2.0.rpm';
const PRIMARY_HREF = 'repodata/abc-primary.xml.gz';
const FILELISTS_HREF = 'repodata/def-filelists.xml.gz';

describe('SyncOrchestrator', () => {
  let localDir: string;
  let remote: MockRemote;
  const fooBody = Buffer.from('foo package contents');
  const barBody = Buffer.from('bar package contents, a bit longer');

  const publish = (revision: string | undefined): void => {
    remote.set(
      'repodata/repomd.xml',
      repomdXml(revision, [
        { type: 'primary', href: PRIMARY_HREF },
        { type: 'filelists', href: FILELISTS_HREF },
      ])
    );
    remote.set(
      PRIMARY_HREF,
      gzip(
        primaryXml([
          { name: 'foo', location: FOO, checksum: sha256(fooBody) },
          { name: 'bar', location: BAR, size: barBody.length },
        ])
      )
    );
    remote.set(FILELISTS_HREF, gzip('<filelists/>'));
    remote.set(FOO, fooBody);
    remote.set(BAR, barBody);
  };

  const createOrchestrator = (): SyncOrchestrator =>
    new SyncOrchestrator({
      target: { name: 'test', baseUrl: remote.baseUrl, localDir },
      logger: createSilentLogger(),
      client: remote.createClient(),
      workers: 2,
    });

  beforeEach(async () => {
    localDir = await makeTempDir();
    remote = new MockRemote();
    publish('R1');
  });

  afterEach(async () => {
    await fs.remove(localDir);
  });

  describe('sync', () => {
    it('패키지, 메타데이터, repomd.xml을 원격과 같은 경로에 미러링', async () => {
      const summary = await createOrchestrator().sync();

      expect(summary.revision).toBe('R1');
      expect(summary.packages).toBe(2);
      expect(summary.downloaded).toBe(2);
      expect(summary.skipped).toBe(0);
      expect(summary.failed).toEqual([]);
      expect(summary.metadataFiles).toBe(3);
      expect(summary.bytesDownloaded).toBe(fooBody.length + barBody.length);

      expect(await fs.readFile(path.join(localDir, FOO))).toEqual(fooBody);
      expect(await fs.readFile(path.join(localDir, BAR))).toEqual(barBody);
      expect(await fs.pathExists(path.join(localDir, FILELISTS_HREF))).toBe(true);
      expect(await fs.pathExists(path.join(localDir, PRIMARY_HREF))).toBe(true);
      expect(await fs.readFile(path.join(localDir, PRIMARY_LOCAL_FILE), 'utf-8')).toContain(
        '<name>foo</name>'
      );
      expect(await fs.readFile(path.join(localDir, 'repodata/repomd.xml'), 'utf-8')).toContain(
        '<revision>R1</revision>'
      );
    });

    it('상태가 순서대로 전이되고 done으로 끝남', async () => {
      const context = new SyncContext(createSilentLogger());
      const states: string[] = [];
      context.on('state', (state) => states.push(state));

      await createOrchestrator().sync({ context });

      expect(states).toEqual(['manifest-fetched', 'index-parsed', 'planned', 'downloading', 'done']);
      expect(context.state).toBe('done');
    });

    it('planned 이벤트에 패키지 수와 파티션 수 전달', async () => {
      const orchestrator = createOrchestrator();
      const planned = vi.fn();
      orchestrator.on('planned', planned);

      await orchestrator.sync();

      expect(planned).toHaveBeenCalledWith(2, 2);
    });

    it('변경이 없으면 두 번째 실행은 패키지를 다시 받지 않음', async () => {
      await createOrchestrator().sync();
      remote.resetRequests();

      const summary = await createOrchestrator().sync();

      expect(summary.downloaded).toBe(0);
      expect(summary.skipped).toBe(2);
      expect(remote.getCount(FOO)).toBe(0);
      expect(remote.getCount(BAR)).toBe(0);
    });

    it('force는 기존 파일이 있어도 모두 다시 받음', async () => {
      await createOrchestrator().sync();
      remote.resetRequests();

      const summary = await createOrchestrator().sync({ force: true });

      expect(summary.downloaded).toBe(2);
      expect(remote.getCount(FOO)).toBe(1);
      expect(remote.getCount(BAR)).toBe(1);
    });

    it('로컬 파일이 손상되면 체크섬 비교로 다시 받음', async () => {
      await createOrchestrator().sync();
      await fs.writeFile(path.join(localDir, FOO), 'tampered');

      const summary = await createOrchestrator().sync();

      expect(summary.downloaded).toBe(1);
      expect(await fs.readFile(path.join(localDir, FOO))).toEqual(fooBody);
    });

    it('패키지 실패는 치명적이지 않지만 repomd.xml을 쓰지 않음', async () => {
      remote.remove(BAR);

      const summary = await createOrchestrator().sync();

      expect(summary.downloaded).toBe(1);
      expect(summary.failed.map((f) => f.location)).toEqual([BAR]);
      expect(summary.metadataFiles).toBe(2);
      expect(await fs.pathExists(path.join(localDir, 'repodata/repomd.xml'))).toBe(false);
    });

    it('보조 메타데이터 실패도 기록만 하고 계속 진행', async () => {
      remote.remove(FILELISTS_HREF);

      const summary = await createOrchestrator().sync();

      expect(summary.downloaded).toBe(2);
      expect(summary.failed.map((f) => f.location)).toEqual([FILELISTS_HREF]);
    });

    it('repomd.xml 조회 실패는 NetworkError로 중단', async () => {
      remote.remove('repodata/repomd.xml');
      const context = new SyncContext(createSilentLogger());

      const error = await createOrchestrator()
        .sync({ context })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error instanceof NetworkError && error.status).toBe(404);
      expect(context.state).toBe('failed');
      expect(remote.getCount(FOO)).toBe(0);
    });

    it('primary 항목이 없으면 MalformedMetadataError로 중단', async () => {
      remote.set('repodata/repomd.xml', repomdXml('R1', [{ type: 'filelists', href: FILELISTS_HREF }]));
      const context = new SyncContext(createSilentLogger());

      await expect(createOrchestrator().sync({ context })).rejects.toThrow(MalformedMetadataError);
      expect(context.state).toBe('failed');
    });

    it('미러 디렉토리의 끊어진 심볼릭 링크는 완료된 실행을 실패시키지 않음', async () => {
      await fs.symlink(path.join(localDir, 'gone'), path.join(localDir, 'stale-link'));
      const context = new SyncContext(createSilentLogger());
      const states: string[] = [];
      context.on('state', (state) => states.push(state));

      const summary = await createOrchestrator().sync({ context });

      expect(summary.failed).toEqual([]);
      expect(states).toEqual(['manifest-fetched', 'index-parsed', 'planned', 'downloading', 'done']);
      expect(await fs.pathExists(path.join(localDir, 'repodata/repomd.xml'))).toBe(true);
    });

    it('보조 메타데이터가 repomd.xml의 체크섬과 다르면 쓰지 않고 실패 처리', async () => {
      remote.set(
        'repodata/repomd.xml',
        repomdXml('R1', [
          { type: 'primary', href: PRIMARY_HREF },
          { type: 'filelists', href: FILELISTS_HREF, checksum: sha256(gzip('<filelists/>')) },
        ])
      );
      remote.set(FILELISTS_HREF, 'garbage');

      const summary = await createOrchestrator().sync();

      expect(summary.failed).toHaveLength(1);
      expect(summary.failed[0].location).toBe(FILELISTS_HREF);
      expect(summary.failed[0].error).toContain('체크섬 불일치');
      expect(await fs.pathExists(path.join(localDir, FILELISTS_HREF))).toBe(false);
      expect(await fs.pathExists(path.join(localDir, 'repodata/repomd.xml'))).toBe(false);
    });

    it('보조 메타데이터 크기가 repomd.xml과 다르면 실패 처리', async () => {
      remote.set(
        'repodata/repomd.xml',
        repomdXml('R1', [
          { type: 'primary', href: PRIMARY_HREF },
          { type: 'filelists', href: FILELISTS_HREF, size: 1 },
        ])
      );

      const summary = await createOrchestrator().sync();

      expect(summary.failed.map((f) => f.location)).toEqual([FILELISTS_HREF]);
      expect(summary.failed[0].error).toContain('크기 불일치');
    });

    it('primary가 repomd.xml의 체크섬과 다르면 NetworkError로 중단', async () => {
      remote.set(
        'repodata/repomd.xml',
        repomdXml('R1', [{ type: 'primary', href: PRIMARY_HREF, checksum: sha256('not this') }])
      );
      const context = new SyncContext(createSilentLogger());

      await expect(createOrchestrator().sync({ context })).rejects.toThrow('체크섬 불일치');
      expect(context.state).toBe('failed');
      expect(remote.getCount(FOO)).toBe(0);
    });

    it('primary gzip이 잘려 있으면 NetworkError로 중단', async () => {
      remote.set(PRIMARY_HREF, gzip(primaryXml([{ name: 'foo', location: FOO }])).subarray(0, 16));

      await expect(createOrchestrator().sync()).rejects.toThrow(NetworkError);
      expect(remote.getCount(FOO)).toBe(0);
    });
  });

  describe('checkForUpdates', () => {
    it('로컬 repomd.xml이 없으면 전체 동기화', async () => {
      const result = await createOrchestrator().checkForUpdates();

      expect(result.status).toBe('synced');
      expect(result.status === 'synced' && result.summary.downloaded).toBe(2);
    });

    it('리비전이 같으면 up-to-date, 패키지는 건드리지 않음', async () => {
      await createOrchestrator().sync();
      remote.resetRequests();

      const result = await createOrchestrator().checkForUpdates();

      expect(result).toEqual({ status: 'up-to-date', localRevision: 'R1', remoteRevision: 'R1' });
      expect(remote.getCount()).toBe(1);
    });

    it('revision이 없는 저장소는 up-to-date로 보지 않음', async () => {
      publish(undefined);
      await createOrchestrator().sync();

      const result = await createOrchestrator().checkForUpdates();

      expect(result).toEqual({
        status: 'updates-available',
        localRevision: '',
        remoteRevision: '',
      });
    });

    it('리비전이 바뀌면 updates-available', async () => {
      await createOrchestrator().sync();
      publish('R2');

      const result = await createOrchestrator().checkForUpdates();

      expect(result).toEqual({
        status: 'updates-available',
        localRevision: 'R1',
        remoteRevision: 'R2',
      });
    });
  });
});
