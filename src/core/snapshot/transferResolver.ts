import { SnapshotEntry, TransferTarget } from '../../types';
import { withTrailingSlash } from '../shared/url-utils';

/**
 * 스냅샷 항목을 다운로드 URL로 변환
 * assembleSnapshot이 떼어낸 접두사를 그대로 다시 붙인다.
 */
export function resolveTransferUrl(entry: SnapshotEntry, packageBase: string): TransferTarget {
  return withTrailingSlash(packageBase) + entry;
}
