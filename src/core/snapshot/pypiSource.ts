import { SnapshotContext, SnapshotEntry, TransferTarget } from '../../types';
import { SnapshotConfig } from '../config';
import { discoverPackages } from '../discovery/discovery';
import { AcquireQueryExecutor, acquireQueryExecutor } from '../discovery/bigquery';
import { scanPackage } from './packageScanner';
import { scanAllPackages, PackageScanFn } from './scanCoordinator';
import { assembleSnapshot } from './snapshotAssembler';
import { resolveTransferUrl } from './transferResolver';

export interface PypiSourceDependencies {
  acquireExecutor?: AcquireQueryExecutor;
  scan?: PackageScanFn;
}

/**
 * PyPI 미러 스냅샷 소스
 *
 * 1. 패키지명 목록 조회 (인덱스 전체 또는 BigQuery 인기 패키지)
 * 2. 패키지 페이지 병렬 조회 (+ 최근 버전만 유지)
 * 3. packageBase 기준 상대 경로로 변환
 *
 * URL의 체크섬은 스냅샷에서 제거된다.
 */
export class PypiSnapshotSource {
  private readonly acquireExecutor: AcquireQueryExecutor;
  private readonly scan: PackageScanFn;

  constructor(
    private readonly config: SnapshotConfig,
    dependencies: PypiSourceDependencies = {}
  ) {
    this.acquireExecutor = dependencies.acquireExecutor ?? acquireQueryExecutor;
    this.scan = dependencies.scan ?? scanPackage;
  }

  /**
   * 스냅샷 생성
   * @throws DiscoveryError 패키지 목록 조회에 실패한 경우
   */
  async snapshot(context: SnapshotContext): Promise<SnapshotEntry[]> {
    const { config } = this;

    // 패키지 목록이 모두 준비된 뒤에 개별 조회를 시작한다
    const packageNames = await discoverPackages(config.strategy, context, this.acquireExecutor);

    const results = await scanAllPackages(
      packageNames,
      {
        simpleBase: config.simpleBase,
        retention: config.retention,
        concurrency: config.concurrentResolve,
      },
      context,
      this.scan
    );

    const snapshot = assembleSnapshot(results, config.packageBase, context.logger);
    context.progress.finish('done');
    context.logger.info('snapshot generated', {
      packageCount: packageNames.length,
      entryCount: snapshot.length,
    });

    return snapshot;
  }

  /**
   * 스냅샷 항목의 다운로드 URL
   */
  getObject(entry: SnapshotEntry): TransferTarget {
    return resolveTransferUrl(entry, this.config.packageBase);
  }

  info(): string {
    const { config } = this;
    const retention = config.retention ? `keep_recent=${config.retention.keepRecent}` : 'keep_recent=all';
    const mode =
      config.strategy.kind === 'popularity'
        ? `bigquery(project=${config.strategy.projectId})`
        : `index${config.strategy.debug ? '(debug)' : ''}`;
    return `pypi, simple_base=${config.simpleBase}, package_base=${config.packageBase}, ${mode}, ${retention}, concurrency=${config.concurrentResolve}`;
  }
}
