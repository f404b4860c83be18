import axios from 'axios';
import { ListingEntry, RetentionBudget, SnapshotContext } from '../../types';
import { parseListingPage } from '../shared/pip-simple-api';
import { truncateToRecent } from './retentionFilter';

export interface ScanOptions {
  /** Simple 인덱스 기본 URL (끝 슬래시 없음) */
  simpleBase: string;
  retention?: RetentionBudget;
}

/**
 * 패키지 페이지 URL
 */
export function packagePageUrl(simpleBase: string, packageName: string): string {
  return `${simpleBase}/${packageName}/`;
}

async function fetchListing(
  packageName: string,
  options: ScanOptions,
  context: SnapshotContext
): Promise<ListingEntry[]> {
  const url = packagePageUrl(options.simpleBase, packageName);
  const response = await context.client.get(url, { responseType: 'text' });
  if (typeof response.data !== 'string') {
    throw new Error('패키지 페이지 응답이 텍스트가 아닙니다');
  }
  const entries = parseListingPage(response.data, url);

  if (!options.retention) return entries;
  return truncateToRecent(packageName, entries, options.retention, context.logger);
}

/**
 * 패키지 하나의 파일 목록 조회
 *
 * 실패해도 예외를 던지지 않고 경고만 남긴 뒤 빈 목록을 반환한다.
 * 한 패키지의 실패가 전체 스냅샷을 중단시키지 않는다.
 */
export async function scanPackage(
  packageName: string,
  options: ScanOptions,
  context: SnapshotContext
): Promise<ListingEntry[]> {
  context.progress.setMessage(packageName);
  try {
    return await fetchListing(packageName, options, context);
  } catch (error) {
    context.logger.warn('failed to fetch index', {
      packageName,
      status: axios.isAxiosError(error) ? error.response?.status : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  } finally {
    context.progress.inc(1);
  }
}
