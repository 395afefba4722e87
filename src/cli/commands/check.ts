import chalk from 'chalk';
import Table from 'cli-table3';
import { SyncOrchestrator } from '../../core/sync';
import { errorMessage } from '../../core/errors';
import { createRuntime, type RuntimeOptions } from '../runtime';

/**
 * check 명령어 핸들러
 * 로컬/원격 repomd.xml 리비전을 비교합니다. 로컬 미러가 없으면 먼저 동기화합니다.
 */
export async function checkCommand(sections: string[], options: RuntimeOptions): Promise<void> {
  try {
    const { settings, logger, client, targets } = await createRuntime(sections, options);

    const table = new Table({
      head: [chalk.cyan('저장소'), chalk.cyan('상태'), chalk.cyan('로컬'), chalk.cyan('원격')],
    });

    let failures = 0;
    for (const target of targets) {
      const orchestrator = new SyncOrchestrator({
        target,
        logger,
        client,
        workers: settings.workers,
        retries: settings.retries,
      });

      try {
        const result = await orchestrator.checkForUpdates();
        if (result.status === 'synced') {
          table.push([target.name, chalk.green('동기화함'), result.summary.revision, result.summary.revision]);
        } else if (result.status === 'up-to-date') {
          table.push([target.name, chalk.green('최신'), result.localRevision, result.remoteRevision]);
        } else {
          table.push([target.name, chalk.yellow('업데이트 있음'), result.localRevision, result.remoteRevision]);
        }
      } catch (error) {
        failures++;
        table.push([target.name, chalk.red('실패'), '-', errorMessage(error)]);
      }
    }

    console.log(table.toString());
    await logger.close();

    if (failures > 0) process.exitCode = 1;
  } catch (error) {
    console.error(chalk.red(`오류: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}
