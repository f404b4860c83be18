import chalk from 'chalk';
import { getConfigManager } from '../../core/config';
import { resolveTransferUrl } from '../../core/snapshot/transferResolver';

// resolve 옵션
export interface ResolveCommandOptions {
  packageBase?: string;
}

/**
 * resolve 명령어 핸들러
 * 스냅샷 항목마다 다운로드 URL을 한 줄씩 출력한다.
 */
export async function resolveCommand(entries: string[], options: ResolveCommandOptions): Promise<void> {
  const packageBase = options.packageBase ?? getConfigManager().getSettings().packageBase;

  if (entries.length === 0) {
    console.error(chalk.yellow('스냅샷 항목을 하나 이상 지정하세요'));
    process.exit(1);
  }

  for (const entry of entries) {
    process.stdout.write(`${resolveTransferUrl(entry, packageBase)}\n`);
  }
}
