import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { SyncOrchestrator, type RepositoryTarget, type SyncSummary } from '../../core/sync';
import { errorMessage } from '../../core/errors';
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime';
import { formatBytes, formatDuration } from '../format';

// sync 옵션
export interface SyncCommandOptions extends RuntimeOptions {
  force?: boolean;
  check?: boolean;
}

/**
 * sync 명령어 핸들러
 * 설정의 각 섹션을 차례로 동기화합니다. 한 저장소가 실패해도 나머지는 계속 진행합니다.
 */
export async function syncCommand(sections: string[], options: SyncCommandOptions): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = await createRuntime(sections, options);
  } catch (error) {
    console.error(chalk.red(`오류: ${errorMessage(error)}`));
    process.exitCode = 1;
    return;
  }

  const { logger } = runtime;
  let failures = 0;

  for (const target of runtime.targets) {
    console.log(chalk.cyan(`\n[${target.name}] ${target.baseUrl}`));
    console.log(chalk.gray(`  → ${target.localDir}`));

    try {
      const summary = await syncTarget(target, runtime, options);
      printSummary(summary);
      if (summary.failed.length > 0) failures++;
    } catch (error) {
      failures++;
      console.error(chalk.red(`✗ 동기화 실패: ${errorMessage(error)}`));
    }
  }

  await logger.close();

  if (failures > 0) {
    process.exitCode = 1;
  }
}

async function syncTarget(
  target: RepositoryTarget,
  runtime: Runtime,
  options: SyncCommandOptions
): Promise<SyncSummary> {
  const { settings, logger, client } = runtime;
  const orchestrator = new SyncOrchestrator({
    target,
    logger,
    client,
    workers: settings.workers,
    retries: settings.retries,
  });

  // 진행률 바 (--debug에서는 콘솔 로그와 겹치므로 생략)
  const progressBar = options.debug
    ? null
    : new cliProgress.SingleBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: '  {bar} | {value}/{total} | 받음 {downloaded} | 실패 {failed}',
        },
        cliProgress.Presets.shades_classic
      );
  let downloaded = 0;
  let failed = 0;

  orchestrator.on('planned', (packages) => {
    progressBar?.start(packages, 0, { downloaded, failed });
  });
  orchestrator.on('recordDownloaded', () => {
    downloaded++;
    progressBar?.increment(1, { downloaded, failed });
  });
  orchestrator.on('recordSkipped', () => {
    progressBar?.increment(1, { downloaded, failed });
  });
  orchestrator.on('recordFailed', () => {
    failed++;
    progressBar?.increment(1, { downloaded, failed });
  });

  try {
    if (options.check !== false) {
      const check = await orchestrator.checkForUpdates({ force: options.force });
      if (check.status === 'synced') {
        return check.summary;
      }
      const message =
        check.status === 'up-to-date'
          ? `  리비전 변경 없음 (${check.localRevision})`
          : `  새 리비전: ${check.localRevision} → ${check.remoteRevision}`;
      console.log(chalk.gray(message));
    }

    return await orchestrator.sync({ force: options.force });
  } finally {
    progressBar?.stop();
  }
}

function printSummary(summary: SyncSummary): void {
  if (summary.failed.length === 0) {
    console.log(chalk.green('✓ 동기화 완료!'));
  } else {
    console.log(chalk.yellow('⚠ 동기화 완료 (일부 실패)'));
  }

  console.log(chalk.gray(`  리비전: ${summary.revision}`));
  console.log(chalk.gray(`  패키지: ${summary.packages}개 (받음 ${summary.downloaded}, 최신 ${summary.skipped})`));
  console.log(chalk.gray(`  메타데이터: ${summary.metadataFiles}개`));
  console.log(chalk.gray(`  받은 크기: ${formatBytes(summary.bytesDownloaded)}`));
  console.log(chalk.gray(`  미러 전체 크기: ${formatBytes(summary.totalBytes)}`));
  console.log(chalk.gray(`  소요 시간: ${formatDuration(summary.elapsedMs)}`));

  if (summary.malformedEntries > 0) {
    console.log(chalk.yellow(`  잘못된 인덱스 항목: ${summary.malformedEntries}개 (건너뜀)`));
  }

  if (summary.failed.length > 0) {
    console.log(chalk.red(`\n실패한 파일 (${summary.failed.length}개):`));
    for (const item of summary.failed) {
      console.log(chalk.red(`  - ${item.location}: ${item.error}`));
    }
  }
}
