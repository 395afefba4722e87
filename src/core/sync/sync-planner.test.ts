/**
 * 다운로드 계획 테스트
 *
 * 파티션 분할과 레코드별 다운로드 판단(체크섬, 크기, HEAD 폴백)을 확인합니다.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import {
  SyncPlanner,
  buildChecksumIndex,
  buildPlan,
  bucketPartitioner,
  hashPartitioner,
} from './sync-planner';
import { LocalStore } from './local-store';
import type { PackageRecord } from './types';
import { MockRemote, makeTempDir, sha256 } from '../../test-utils/mock-repo';

describe('partitioners', () => {
  it('bucketPartitioner - 최상위 디렉토리 다음 세그먼트', () => {
    expect(bucketPartitioner('Packages/a/foo-1.0.rpm')).toBe('a');
    expect(bucketPartitioner('packages/b/bar-2.0.rpm')).toBe('b');
    expect(bucketPartitioner('/Packages/z/zsh.rpm')).toBe('z');
  });

  it('bucketPartitioner - 얕은 경로', () => {
    expect(bucketPartitioner('Packages/foo.rpm')).toBe('Packages');
    expect(bucketPartitioner('foo.rpm')).toBe('.');
  });

  it('hashPartitioner - 같은 입력은 같은 버킷, 범위 내', () => {
    const partition = hashPartitioner(4);
    const key = partition('Packages/a/foo.rpm');

    expect(partition('Packages/a/foo.rpm')).toBe(key);
    expect(['bucket-0', 'bucket-1', 'bucket-2', 'bucket-3']).toContain(key);
  });

  it('hashPartitioner - 잘못된 버킷 수', () => {
    expect(() => hashPartitioner(0)).toThrow(RangeError);
  });
});

describe('buildPlan', () => {
  const records: PackageRecord[] = [
    { location: 'Packages/a/a1.rpm' },
    { location: 'Packages/b/b1.rpm' },
    { location: 'Packages/a/a2.rpm' },
    { location: 'Packages/c/c1.rpm' },
    { location: 'Packages/a/a3.rpm' },
  ];

  it('파티션 내 순서는 인덱스 순서', () => {
    const plan = buildPlan(records);

    expect([...plan.keys()]).toEqual(['a', 'b', 'c']);
    expect(plan.get('a')?.map((r) => r.location)).toEqual([
      'Packages/a/a1.rpm',
      'Packages/a/a2.rpm',
      'Packages/a/a3.rpm',
    ]);
  });

  it.each([
    ['bucket', bucketPartitioner],
    ['hash', hashPartitioner(3)],
  ])('파티션은 서로소이고 합집합은 전체 (%s)', (_name, partitioner) => {
    const plan = buildPlan(records, partitioner);
    const all = [...plan.values()].flat();

    expect(all).toHaveLength(records.length);
    expect(new Set(all.map((r) => r.location))).toEqual(new Set(records.map((r) => r.location)));
  });

  it('빈 레코드', () => {
    expect(buildPlan([]).size).toBe(0);
  });
});

describe('buildChecksumIndex', () => {
  it('체크섬 있는 레코드만 포함', () => {
    const index = buildChecksumIndex([
      { location: 'a.rpm', checksum: 'aa' },
      { location: 'b.rpm' },
    ]);

    expect([...index]).toEqual([['a.rpm', 'aa']]);
  });
});

describe('SyncPlanner', () => {
  let localDir: string;
  let remote: MockRemote;
  let store: LocalStore;

  const content = Buffer.from('rpm payload');
  const withChecksum: PackageRecord = {
    location: 'Packages/a/foo-1.0.rpm',
    checksum: sha256(content),
    size: content.length,
  };
  const withoutChecksum: PackageRecord = { location: 'Packages/b/bar-2.0.rpm', size: 1000 };

  const createPlanner = (force = false) =>
    new SyncPlanner({
      store,
      client: remote.createClient(),
      checksums: buildChecksumIndex([withChecksum, withoutChecksum]),
      force,
    });

  beforeEach(async () => {
    localDir = await makeTempDir();
    remote = new MockRemote();
    store = new LocalStore({ baseUrl: remote.baseUrl, localDir });
  });

  afterEach(async () => {
    await fs.remove(localDir);
  });

  it('로컬 파일이 없으면 다운로드', async () => {
    await expect(createPlanner().decide(withChecksum)).resolves.toEqual({
      download: true,
      reason: 'missing',
    });
    await expect(createPlanner().decide(withoutChecksum)).resolves.toEqual({
      download: true,
      reason: 'missing',
    });
  });

  it('체크섬이 같으면 건너뜀', async () => {
    await store.write(store.pathFor(withChecksum.location), content);

    await expect(createPlanner().needsDownload(withChecksum)).resolves.toBe(false);
  });

  it('크기가 같아도 체크섬이 다르면 다운로드', async () => {
    const sameSize = Buffer.alloc(content.length, 0x41);
    await store.write(store.pathFor(withChecksum.location), sameSize);

    await expect(createPlanner().decide(withChecksum)).resolves.toEqual({
      download: true,
      reason: 'checksum-mismatch',
    });
  });

  it('force면 내용이 같아도 다운로드', async () => {
    await store.write(store.pathFor(withChecksum.location), content);

    await expect(createPlanner(true).decide(withChecksum)).resolves.toEqual({
      download: true,
      reason: 'force',
    });
  });

  it('체크섬이 없으면 인덱스의 크기로 비교', async () => {
    const target = store.pathFor(withoutChecksum.location);

    await store.write(target, Buffer.alloc(1000));
    await expect(createPlanner().decide(withoutChecksum)).resolves.toEqual({
      download: false,
      reason: 'size-match',
    });

    await store.write(target, Buffer.alloc(999));
    await expect(createPlanner().decide(withoutChecksum)).resolves.toEqual({
      download: true,
      reason: 'size-mismatch',
    });
    expect(remote.requests).toEqual([]);
  });

  it('인덱스에 크기도 없으면 HEAD content-length로 비교', async () => {
    const record: PackageRecord = { location: 'Packages/c/baz.rpm' };
    remote.set(record.location, Buffer.alloc(500));
    await store.write(store.pathFor(record.location), Buffer.alloc(400));

    await expect(createPlanner().decide(record)).resolves.toEqual({
      download: true,
      reason: 'size-mismatch',
    });
    expect(remote.requests).toEqual([{ method: 'head', url: remote.urlFor(record.location) }]);
  });

  it('원격 크기를 알 수 없으면 기존 파일 유지', async () => {
    const record: PackageRecord = { location: 'Packages/c/baz.rpm' };
    remote.set(record.location, { body: 'x', headers: { 'content-length': 'unknown' } });
    await store.write(store.pathFor(record.location), Buffer.alloc(400));

    await expect(createPlanner().decide(record)).resolves.toEqual({
      download: false,
      reason: 'size-unknown',
    });
  });
});
