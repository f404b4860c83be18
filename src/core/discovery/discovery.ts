import {
  DiscoveryStrategy,
  FullIndexStrategy,
  PopularityStrategy,
  SnapshotContext,
} from '../../types';
import { parseIndexPage } from '../shared/pip-simple-api';
import {
  acquireQueryExecutor,
  AcquireQueryExecutor,
  POPULAR_PACKAGES_QUERY,
  projectNamesFromRows,
} from './bigquery';

/** 디버그 모드에서 파싱할 인덱스 문서 길이 */
export const DEBUG_INDEX_LENGTH = 1000;

/**
 * 패키지 목록 조회 실패 (실행 전체가 중단됨)
 */
export class DiscoveryError extends Error {
  constructor(
    public readonly strategy: DiscoveryStrategy['kind'],
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 루트 인덱스에서 전체 패키지명 조회
 * 디버그 모드에서는 파싱 전에 원본 문서를 앞 1000자로 자른다.
 * 태그 중간에서 잘리면 마지막 항목은 빠진다.
 */
async function discoverFromIndex(
  strategy: FullIndexStrategy,
  context: SnapshotContext
): Promise<string[]> {
  context.logger.info('downloading pypi index...', { simpleBase: strategy.simpleBase });

  let index: unknown;
  try {
    const response = await context.client.get(`${strategy.simpleBase}/`, { responseType: 'text' });
    index = response.data;
  } catch (error) {
    throw new DiscoveryError('full-index', `인덱스 다운로드 실패: ${errorMessage(error)}`, { cause: error });
  }
  if (typeof index !== 'string') {
    throw new DiscoveryError('full-index', '인덱스 응답이 텍스트가 아닙니다');
  }

  context.logger.info('parsing index...');
  return parseIndexPage(strategy.debug ? index.slice(0, DEBUG_INDEX_LENGTH) : index);
}

/**
 * BigQuery 다운로드 통계로 인기 패키지 조회
 */
async function discoverFromPopularity(
  strategy: PopularityStrategy,
  context: SnapshotContext,
  acquire: AcquireQueryExecutor
): Promise<string[]> {
  if (strategy.debug) {
    context.logger.warn('debug mode is ignored in popularity query mode');
  }
  context.logger.info('executing bigquery query...', { projectId: strategy.projectId });

  try {
    const executor = await acquire(strategy.credentials, strategy.projectId);
    const rows = await executor.query(POPULAR_PACKAGES_QUERY);
    return projectNamesFromRows(rows);
  } catch (error) {
    throw new DiscoveryError('popularity', `BigQuery 조회 실패: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * 설정된 전략으로 스캔할 패키지명 목록 생성
 * @throws DiscoveryError 조회나 파싱에 실패한 경우
 */
export async function discoverPackages(
  strategy: DiscoveryStrategy,
  context: SnapshotContext,
  acquire: AcquireQueryExecutor = acquireQueryExecutor
): Promise<string[]> {
  switch (strategy.kind) {
    case 'full-index':
      return discoverFromIndex(strategy, context);
    case 'popularity':
      return discoverFromPopularity(strategy, context, acquire);
  }
}
