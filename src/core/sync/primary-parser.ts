/**
 * primary.xml 파서
 * 패키지별 위치, sha256 체크섬, 크기를 추출합니다.
 */

import { MalformedMetadataError } from '../errors';
import type { Logger } from '../../utils/logger';
import { asNode, asNodes, attrOf, parseXml, textOf, type XmlNode } from './xml';
import type { PackageIndex, PackageRecord } from './types';

/**
 * 압축 해제된 primary.xml 파싱
 *
 * location이 없는 항목은 경고 후 건너뛰며, 전체 파싱을 중단하지 않습니다.
 */
export function parsePrimary(data: Buffer | string, logger?: Pick<Logger, 'warn'>): PackageIndex {
  const doc = parseXml(data, ['package', 'checksum'], 'primary.xml');
  if (!('metadata' in doc)) {
    throw new MalformedMetadataError('primary.xml: metadata 루트 요소가 없습니다');
  }
  // 빈 <metadata/>는 문자열로 파싱됨
  const metadata: XmlNode = asNode(doc.metadata) ?? {};

  const records: PackageRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  asNodes(metadata.package).forEach((pkgEl, index) => {
    try {
      const record = parsePackageElement(pkgEl, index);
      if (seen.has(record.location)) {
        logger?.warn('중복된 패키지 위치, 첫 항목만 사용', { location: record.location });
        return;
      }
      seen.add(record.location);
      records.push(record);
    } catch (error) {
      if (!(error instanceof MalformedMetadataError)) throw error;
      skipped++;
      logger?.warn(error.message, { name: textOf(pkgEl.name) });
    }
  });

  return { records, skipped };
}

/**
 * package 요소 파싱
 */
function parsePackageElement(pkgEl: XmlNode, index: number): PackageRecord {
  const location = attrOf(asNode(pkgEl.location), 'href');
  if (!location) {
    throw new MalformedMetadataError(`primary.xml: ${index + 1}번째 패키지에 location이 없습니다`);
  }

  const record: PackageRecord = { location };

  // sha256 체크섬만 사용 (sha1, md5 등은 무시)
  const sha256 = asNodes(pkgEl.checksum).find((el) => attrOf(el, 'type') === 'sha256');
  const checksum = textOf(sha256);
  if (checksum) record.checksum = checksum.toLowerCase();

  const size = parseInt(attrOf(asNode(pkgEl.size), 'package') ?? '', 10);
  if (!isNaN(size)) record.size = size;

  return record;
}
