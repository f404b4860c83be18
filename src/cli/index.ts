#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('pypi-snapshot')
  .description(chalk.cyan('pypi-snapshot - PyPI 미러 동기화용 스냅샷 생성기'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// snapshot 명령어
program
  .command('snapshot')
  .description('패키지 인덱스를 스캔해서 스냅샷 항목을 stdout으로 출력')
  .option('--simple-base <url>', 'Simple 인덱스 기본 URL')
  .option('--package-base <url>', '패키지 파일 기본 URL')
  .option('--bq-query', 'BigQuery로 다운로드 상위 1000개 패키지만 선택 (PROJECT_ID 필요)')
  .option('--keep-recent <num>', '패키지별 최근 N개 버전만 유지')
  .option('--debug', '인덱스 앞부분만 스캔 (운영 미러에서는 삭제 없이 동기화할 것)')
  .option('--concurrency <num>', '패키지 페이지 동시 조회 수')
  .action(async (options) => {
    const { snapshotCommand } = await import('./commands/snapshot');
    await snapshotCommand(options);
  });

// resolve 명령어
program
  .command('resolve')
  .description('스냅샷 항목을 다운로드 URL로 변환')
  .argument('<entries...>', '스냅샷 항목 (packageBase 기준 상대 경로)')
  .option('--package-base <url>', '패키지 파일 기본 URL')
  .action(async (entries: string[], options) => {
    const { resolveCommand } = await import('./commands/resolve');
    await resolveCommand(entries, options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
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
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
