import pLimit from 'p-limit';
import { ListingEntry, SnapshotContext } from '../../types';
import { scanPackage, ScanOptions } from './packageScanner';

export interface CoordinatorOptions extends ScanOptions {
  /** 동시에 조회할 패키지 수 */
  concurrency: number;
}

/** 패키지 하나를 조회하는 함수 (테스트에서 교체 가능) */
export type PackageScanFn = (
  packageName: string,
  options: ScanOptions,
  context: SnapshotContext
) => Promise<ListingEntry[]>;

/**
 * 모든 패키지의 파일 목록을 최대 concurrency개씩 병렬 조회
 *
 * 결과는 완료 순서와 상관없이 입력 순서대로 반환된다.
 * scanPackage가 자체적으로 실패를 격리하므로 여기서는 실패하지 않는다.
 */
export async function scanAllPackages(
  packageNames: string[],
  options: CoordinatorOptions,
  context: SnapshotContext,
  scan: PackageScanFn = scanPackage
): Promise<ListingEntry[][]> {
  const { concurrency, ...scanOptions } = options;
  const limit = pLimit(concurrency);
  const startTime = Date.now();

  context.logger.info('downloading package index...', {
    packageCount: packageNames.length,
    concurrency,
  });
  context.progress.setLength(packageNames.length);

  const results = await Promise.all(
    packageNames.map((name) => limit(() => scan(name, scanOptions, context)))
  );

  context.logger.debug('package index download finished', {
    packageCount: packageNames.length,
    elapsed: Date.now() - startTime,
  });

  return results;
}
