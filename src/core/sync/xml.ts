/**
 * fast-xml-parser 결과 탐색 헬퍼
 * 파서 결과는 unknown으로 받아 필요한 필드만 좁혀서 사용합니다.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedMetadataError } from '../errors';

export type XmlNode = Record<string, unknown>;

/**
 * 메타데이터 XML 파싱 (네임스페이스 접두사 제거, 값은 문자열 유지)
 */
export function parseXml(data: Buffer | string, repeated: readonly string[], label: string): XmlNode {
  const xml = typeof data === 'string' ? data : data.toString('utf-8');

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedMetadataError(`${label}: XML 형식 오류 (line ${line}: ${msg})`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && repeated.includes(name),
  });

  const parsed: unknown = parser.parse(xml);
  const root = asNode(parsed);
  if (!root) {
    throw new MalformedMetadataError(`${label}: 빈 문서`);
  }
  return root;
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asNode(value: unknown): XmlNode | undefined {
  return isNode(value) ? value : undefined;
}

/**
 * 단일/배열 요소를 배열로 정규화
 */
export function asNodes(value: unknown): XmlNode[] {
  const list: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  const nodes: XmlNode[] = [];
  for (const item of list) {
    const node = asNode(item);
    if (node) nodes.push(node);
  }
  return nodes;
}

/**
 * 요소의 텍스트 내용
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  const node = asNode(value);
  if (node) return textOf(node['#text']);
  return undefined;
}

/**
 * 속성값 (문자열)
 */
export function attrOf(node: XmlNode | undefined, name: string): string | undefined {
  const value = node?.[`@_${name}`];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}
