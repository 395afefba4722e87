#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import type { SyncCommandOptions } from './commands/sync';
import type { RuntimeOptions } from './runtime';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('repomirror')
  .description(chalk.cyan('repomirror - yum/dnf 저장소 미러 동기화 도구'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// sync 명령어
program
  .command('sync')
  .description('저장소 동기화 (섹션을 지정하지 않으면 전체)')
  .argument('[sections...]', 'ini 파일의 섹션 이름')
  .option('-f, --force', '체크섬/크기 비교 없이 모두 다시 받기')
  .option('-d, --debug', '디버그 로그 출력')
  .option('-c, --config <file>', '저장소 ini 파일')
  .option('-w, --workers <num>', '동시 워커 수')
  .option('--retries <num>', '패키지 전송 재시도 횟수')
  .option('--no-check', '동기화 전 리비전 확인 생략')
  .action(async (sections: string[], options: SyncCommandOptions) => {
    const { syncCommand } = await import('./commands/sync');
    await syncCommand(sections, options);
  });

// check 명령어
program
  .command('check')
  .description('로컬/원격 리비전 비교')
  .argument('[sections...]', 'ini 파일의 섹션 이름')
  .option('-d, --debug', '디버그 로그 출력')
  .option('-c, --config <file>', '저장소 ini 파일')
  .action(async (sections: string[], options: RuntimeOptions) => {
    const { checkCommand } = await import('./commands/check');
    await checkCommand(sections, options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  repomirror - yum/dnf 저장소 미러 동기화 도구\n'));
  console.log('  사용법: repomirror <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    sync        저장소 동기화');
  console.log('    check       업데이트 확인');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    repomirror sync -c ./config.ini'));
  console.log(chalk.gray('    repomirror sync epel9 --force'));
  console.log(chalk.gray('    repomirror check'));
  console.log('\n  자세한 내용: repomirror --help\n');
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
