import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { getConfigManager, resolveSnapshotConfig, SettingsOverrides } from '../../core/config';
import { PypiSnapshotSource } from '../../core/snapshot/pypiSource';
import { SnapshotProgress } from '../../core/snapshot/snapshotProgress';
import { collectProxies, createHttpClient } from '../../core/shared/http-client';
import logger from '../../utils/logger';

// snapshot 옵션 (commander가 넘겨주는 값)
export interface SnapshotCommandOptions {
  simpleBase?: string;
  packageBase?: string;
  bqQuery?: boolean;
  keepRecent?: string;
  debug?: boolean;
  concurrency?: string;
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name}은(는) 정수여야 합니다: ${value}`);
  }
  return parsed;
}

/**
 * CLI 옵션을 설정 덮어쓰기 값으로 변환
 */
export function toOverrides(options: SnapshotCommandOptions): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (options.simpleBase !== undefined) overrides.simpleBase = options.simpleBase;
  if (options.packageBase !== undefined) overrides.packageBase = options.packageBase;
  if (options.bqQuery) overrides.bqQuery = true;
  if (options.debug) overrides.debug = true;
  if (options.keepRecent !== undefined) {
    overrides.keepRecent = parseInteger('--keep-recent', options.keepRecent);
  }
  if (options.concurrency !== undefined) {
    overrides.concurrentResolve = parseInteger('--concurrency', options.concurrency);
  }
  return overrides;
}

/**
 * 진행률 이벤트를 cli-progress 바에 연결 (stderr 출력)
 */
function attachProgressBar(progress: SnapshotProgress): cliProgress.SingleBar {
  const bar = new cliProgress.SingleBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: ' {bar} | {value}/{total} | {package}',
    },
    cliProgress.Presets.shades_classic
  );

  progress.on('start', (total) => bar.start(total, 0, { package: '' }));
  progress.on('message', (message) => bar.update({ package: message }));
  progress.on('increment', (completed) => bar.update(completed));
  progress.on('finish', (message) => {
    bar.update({ package: message });
    bar.stop();
  });

  return bar;
}

/**
 * snapshot 명령어 핸들러
 * 스냅샷 항목을 한 줄에 하나씩 stdout으로 출력한다.
 */
export async function snapshotCommand(options: SnapshotCommandOptions): Promise<void> {
  const progress = new SnapshotProgress();
  let bar: cliProgress.SingleBar | null = null;

  try {
    await logger.initialize();

    const configManager = getConfigManager();
    const config = resolveSnapshotConfig(configManager.getSettings(), toOverrides(options));
    const client = createHttpClient({
      timeout: config.requestTimeout,
      proxies: collectProxies(),
    });

    const source = new PypiSnapshotSource(config);
    logger.info('snapshot source', { info: source.info() });

    bar = attachProgressBar(progress);
    const snapshot = await source.snapshot({ logger, progress, client });

    for (const entry of snapshot) {
      process.stdout.write(`${entry}\n`);
    }
    console.error(chalk.green(`✓ 스냅샷 완료: ${snapshot.length}개 항목`));
  } catch (error) {
    bar?.stop();
    console.error(chalk.red('✗ 스냅샷 생성 실패'));
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
