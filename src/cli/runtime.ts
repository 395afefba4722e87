/**
 * CLI 공통 실행 환경
 * 설정 로드, 로거 생성, 대상 저장소 선택
 */

import * as path from 'path';
import { getConfigManager, loadRepositoryTargets, type Settings } from '../core/config';
import { ConfigError } from '../core/errors';
import { MetadataClient } from '../core/sync';
import type { RepositoryTarget } from '../core/sync';
import { Logger } from '../utils/logger';

export interface RuntimeOptions {
  debug?: boolean;
  config?: string;
  workers?: string;
  retries?: string;
}

export interface Runtime {
  settings: Settings;
  logger: Logger;
  client: MetadataClient;
  targets: RepositoryTarget[];
}

/**
 * 정수 옵션 파싱
 */
function parseCount(value: string | undefined, name: string, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name}는 ${min} 이상의 정수여야 합니다: ${value}`);
  }
  return parsed;
}

export async function createRuntime(sections: string[], options: RuntimeOptions): Promise<Runtime> {
  const configManager = getConfigManager();
  const settings = await configManager.loadSettings();

  settings.workers = parseCount(options.workers, '--workers', 1) ?? settings.workers;
  settings.retries = parseCount(options.retries, '--retries', 0) ?? settings.retries;
  if (options.config) settings.configFile = options.config;
  if (options.debug) settings.logLevel = 'debug';

  // 콘솔 로그는 --debug일 때만 (진행률 표시와 겹치지 않도록)
  const logger = new Logger({ level: settings.logLevel, console: options.debug === true });
  if (settings.fileLogging) {
    await logger.enableFileLogging(configManager.getLogsDir());
  }

  const allTargets = await loadRepositoryTargets(path.resolve(settings.configFile));
  let targets = allTargets;
  if (sections.length > 0) {
    const unknown = sections.filter((s) => !allTargets.some((t) => t.name === s));
    if (unknown.length > 0) {
      throw new ConfigError(`설정에 없는 섹션: ${unknown.join(', ')}`);
    }
    targets = allTargets.filter((t) => sections.includes(t.name));
  }

  if (targets.length === 0) {
    throw new ConfigError(`동기화할 저장소가 없습니다: ${settings.configFile}`);
  }

  const client = new MetadataClient({ timeout: settings.timeoutMs });

  return { settings, logger, client, targets };
}
