import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, DEFAULT_SETTINGS, type Settings } from '../../core/config';
import { errorMessage } from '../../core/errors';

const descriptions: Record<keyof Settings, string> = {
  workers: '동시 워커 수',
  timeoutMs: 'HTTP 타임아웃 (ms)',
  retries: '패키지 재시도 횟수',
  logLevel: '로그 레벨',
  configFile: '저장소 ini 파일',
  fileLogging: '파일 로깅 여부',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  try {
    const settings = await getConfigManager().loadSettings();

    if (key) {
      const entry = Object.entries(settings).find(([name]) => name === key);
      if (entry) {
        console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(entry[1])));
      } else {
        console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
      }
    } else {
      console.log(chalk.cyan('\n현재 설정:'));
      console.log(JSON.stringify(settings, null, 2));
    }
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const settings = await getConfigManager().setValue(key, value);
    const saved = Object.entries(settings).find(([name]) => name === key);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(saved?.[1])}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();

  try {
    const settings = await configManager.loadSettings();

    const table = new Table({
      head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('기본값'), chalk.cyan('설명')],
      colWidths: [15, 25, 20, 25],
    });

    for (const [key, value] of Object.entries(settings)) {
      const defaultEntry = Object.entries(DEFAULT_SETTINGS).find(([name]) => name === key);
      const description = Object.entries(descriptions).find(([name]) => name === key);
      table.push([key, String(value), String(defaultEntry?.[1] ?? '-'), description?.[1] ?? '-']);
    }

    console.log(chalk.cyan(`\n설정 목록 (${configManager.getSettingsPath()}):\n`));
    console.log(table.toString());
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    await getConfigManager().resetToDefaults();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}
