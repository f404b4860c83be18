import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, SETTING_DESCRIPTIONS } from '../../core/config';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const settings = getConfigManager().getSettings();

  if (key) {
    const value = Object.entries(settings).find(([name]) => name === key)?.[1];
    if (value !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(value)));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(settings, null, 2));
  }
}

/**
 * 문자열 값을 숫자, 불리언, 문자열 중 하나로 해석
 */
export function parseSettingValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const parsedValue = parseSettingValue(value);
    getConfigManager().set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const settings = getConfigManager().getSettings();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [20, 60, 30],
  });

  for (const [key, description] of Object.entries(SETTING_DESCRIPTIONS)) {
    const value = Object.entries(settings).find(([name]) => name === key)?.[1];
    table.push([key, value === undefined ? '-' : String(value), description]);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}
