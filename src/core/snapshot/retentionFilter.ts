import { ListingEntry, RetentionBudget, SnapshotLogger } from '../../types';
import { versionFromFilename } from '../shared/pip-simple-api';
import {
  comparePythonVersions,
  isSameVersion,
  isStableVersion,
  PythonVersion,
} from '../shared/python-version';

interface VersionedEntry {
  entry: ListingEntry;
  version: PythonVersion;
}

/**
 * 패키지별로 최근 keepRecent개 버전만 남긴다.
 *
 * - 최신 버전부터 내려가며 선택하고, 프리릴리스는 최대 keepRecent / 2 개까지만 선택
 * - 이미 선택된 버전의 다른 파일(sdist + wheel 등)은 개수와 상관없이 함께 선택
 * - 파일명 하나라도 버전을 알 수 없으면 이 패키지는 걸러내지 않고 그대로 반환
 *
 * @returns 선택된 항목 (최신 버전 순)
 */
export function truncateToRecent(
  packageName: string,
  entries: ListingEntry[],
  budget: RetentionBudget,
  logger: SnapshotLogger
): ListingEntry[] {
  const candidates: VersionedEntry[] = [];
  let parseFailed = false;

  for (const entry of entries) {
    const version = versionFromFilename(entry.filename);
    if (version) {
      candidates.push({ entry, version });
    } else {
      logger.debug('failed to parse version from filename', { packageName, filename: entry.filename });
      parseFailed = true;
    }
  }

  if (parseFailed) {
    logger.warn('give up keep_recent for package', { packageName });
    return entries;
  }

  // Array.prototype.sort는 안정 정렬
  candidates.sort((a, b) => comparePythonVersions(a.version, b.version));

  const { keepRecent } = budget;
  const atMostUnstable = Math.floor(keepRecent / 2);
  const result: ListingEntry[] = [];
  let selectedCount = 0;
  let selectedUnstableCount = 0;
  let previous: PythonVersion | null = null;

  for (let i = candidates.length - 1; i >= 0; i--) {
    const { entry, version } = candidates[i];

    // 이미 선택된 버전의 다른 파일
    if (previous && isSameVersion(previous, version)) {
      result.push(entry);
      continue;
    }

    if (selectedCount >= keepRecent) break;

    if (!isStableVersion(version)) {
      if (selectedUnstableCount >= atMostUnstable) continue;
      selectedUnstableCount++;
    }
    result.push(entry);
    previous = version;
    selectedCount++;
  }

  return result;
}
