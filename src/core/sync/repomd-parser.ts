/**
 * repomd.xml 파서
 * 보조 메타데이터 목록과 저장소 리비전을 추출합니다.
 */

import { MalformedMetadataError } from '../errors';
import type { Logger } from '../../utils/logger';
import { detectCompression } from './metadata-client';
import { asNode, asNodes, attrOf, parseXml, textOf, type XmlNode } from './xml';
import type { MetadataDescriptor, RepoIndex } from './types';

// 패키지 목록을 담은 메타데이터 타입
export const PRIMARY_TYPE = 'primary';

export const REPOMD_PATH = 'repodata/repomd.xml';

/**
 * repomd.xml 파싱
 *
 * primary 항목이 정확히 하나 있어야 하며, 그 외 타입은 미러링 대상으로만 보존합니다.
 */
export function parseRepomd(data: Buffer | string, logger?: Pick<Logger, 'warn'>): RepoIndex {
  const doc = parseXml(data, ['data'], 'repomd.xml');
  const repomd = asNode(doc.repomd);
  if (!repomd) {
    throw new MalformedMetadataError('repomd.xml: repomd 루트 요소가 없습니다');
  }

  const revision = textOf(repomd.revision);
  if (revision === undefined) {
    logger?.warn('repomd.xml에 revision이 없습니다');
  }

  const descriptors: MetadataDescriptor[] = [];
  for (const dataEl of asNodes(repomd.data)) {
    const descriptor = parseDataElement(dataEl);
    if (!descriptor) {
      logger?.warn('location이 없는 data 항목 건너뜀', { type: attrOf(dataEl, 'type') });
      continue;
    }
    descriptors.push(descriptor);
  }

  const primaries = descriptors.filter((d) => d.type === PRIMARY_TYPE);
  if (primaries.length === 0) {
    throw new MalformedMetadataError('repomd.xml: primary 메타데이터 항목이 없습니다');
  }
  if (primaries.length > 1) {
    throw new MalformedMetadataError(
      `repomd.xml: primary 메타데이터 항목이 ${primaries.length}개입니다`
    );
  }

  return {
    revision: revision ?? '',
    descriptors,
    primary: primaries[0],
  };
}

/**
 * data 요소 파싱 (type 또는 location이 없으면 undefined)
 */
function parseDataElement(dataEl: XmlNode): MetadataDescriptor | undefined {
  const type = attrOf(dataEl, 'type');
  const href = attrOf(asNode(dataEl.location), 'href');
  if (!type || !href) return undefined;

  const descriptor: MetadataDescriptor = { type, href };

  const compression = detectCompression(href);
  if (compression) descriptor.compression = compression;

  const checksumEl = asNode(dataEl.checksum);
  const checksum = textOf(checksumEl);
  if (checksum && attrOf(checksumEl, 'type') === 'sha256') {
    descriptor.checksum = checksum.toLowerCase();
  }

  const size = parseInt(textOf(dataEl.size) ?? '', 10);
  if (!isNaN(size)) descriptor.size = size;

  return descriptor;
}
