/**
 * primary.xml 파서 테스트
 */

import { describe, it, expect, vi } from 'vitest';
import { parsePrimary } from './primary-parser';
import { MalformedMetadataError } from '../errors';
import { primaryXml } from '../../test-utils/mock-repo';

describe('parsePrimary', () => {
  it('location, sha256, size 추출 (인덱스 순서 유지)', () => {
    const xml = primaryXml([
      { name: 'foo', location: 'Packages/f/foo-1.0.rpm', checksum: 'AA11', size: 1234 },
      { name: 'bar', location: 'Packages/b/bar-2.0.rpm' },
    ]);

    const result = parsePrimary(xml);

    expect(result.skipped).toBe(0);
    expect(result.records).toEqual([
      { location: 'Packages/f/foo-1.0.rpm', checksum: 'aa11', size: 1234 },
      { location: 'Packages/b/bar-2.0.rpm' },
    ]);
  });

  it('패키지가 하나여도 배열로 처리', () => {
    const xml = primaryXml([{ name: 'solo', location: 'Packages/s/solo.rpm' }]);
    expect(parsePrimary(xml).records).toEqual([{ location: 'Packages/s/solo.rpm' }]);
  });

  it('sha256이 아닌 체크섬은 무시', () => {
    const xml = primaryXml([
      { name: 'old', location: 'Packages/o/old.rpm', checksum: 'deadbeef', checksumType: 'sha1' },
    ]);
    expect(parsePrimary(xml).records[0].checksum).toBeUndefined();
  });

  it('location이 없는 항목은 경고 후 건너뛰고 나머지는 계속', () => {
    const warn = vi.fn();
    const xml = primaryXml([
      { name: 'broken' },
      { name: 'ok', location: 'Packages/o/ok.rpm' },
    ]);

    const result = parsePrimary(xml, { warn });

    expect(result.records).toEqual([{ location: 'Packages/o/ok.rpm' }]);
    expect(result.skipped).toBe(1);
    expect(warn).toHaveBeenCalledWith('primary.xml: 1번째 패키지에 location이 없습니다', {
      name: 'broken',
    });
  });

  it('중복 location은 첫 항목만 사용', () => {
    const warn = vi.fn();
    const xml = primaryXml([
      { name: 'a', location: 'Packages/a/a.rpm', checksum: '01' },
      { name: 'a', location: 'Packages/a/a.rpm', checksum: '02' },
    ]);

    const result = parsePrimary(xml, { warn });

    expect(result.records).toEqual([{ location: 'Packages/a/a.rpm', checksum: '01' }]);
    expect(warn).toHaveBeenCalledOnce();
  });

  it('패키지가 없는 인덱스', () => {
    const result = parsePrimary(primaryXml([]));
    expect(result.records).toEqual([]);
    expect(result.skipped).toBe(0);
  });

  it('metadata 루트가 없으면 MalformedMetadataError', () => {
    expect(() => parsePrimary('<repomd></repomd>')).toThrow(MalformedMetadataError);
  });
});
