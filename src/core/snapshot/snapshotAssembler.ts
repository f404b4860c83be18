import { ListingEntry, SnapshotEntry, SnapshotLogger } from '../../types';
import { withTrailingSlash } from '../shared/url-utils';

/**
 * 패키지별 조회 결과를 하나의 스냅샷으로 합친다.
 *
 * packageBase로 시작하는 URL만 접두사를 떼어 상대 경로로 남기고,
 * 다른 곳에 저장된 파일은 경고 후 제외한다. 중복은 제거하지 않는다.
 */
export function assembleSnapshot(
  results: ListingEntry[][],
  packageBase: string,
  logger: SnapshotLogger
): SnapshotEntry[] {
  const base = withTrailingSlash(packageBase);
  const snapshot: SnapshotEntry[] = [];

  for (const { url } of results.flat()) {
    if (url.startsWith(base)) {
      snapshot.push(url.slice(base.length));
    } else {
      logger.warn("package isn't stored on base", { url, packageBase: base });
    }
  }

  return snapshot;
}
