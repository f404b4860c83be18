import { describe, it, expect, vi } from 'vitest';
import { QueryExecutor, QueryRow } from '../../types';
import { createTestContext } from '../../test-utils/context';
import { discoverPackages, DiscoveryError, DEBUG_INDEX_LENGTH } from './discovery';
import { POPULAR_PACKAGES_QUERY } from './bigquery';

const SIMPLE_BASE = 'https://mirror.example/simple';

function indexPage(names: string[]): string {
  const links = names.map((name) => `<a href="/simple/${name}/">${name}</a>`).join('\n');
  return `<!DOCTYPE html>\n<html><body>\n${links}\n</body></html>`;
}

// 인메모리 쿼리 실행기
function fakeExecutor(rows: QueryRow[] | Error) {
  const query = vi.fn(async (_sql: string): Promise<QueryRow[]> => {
    if (rows instanceof Error) throw rows;
    return rows;
  });
  const executor: QueryExecutor = { query };
  const acquire = vi.fn(async () => executor);
  return { query, acquire };
}

describe('discoverPackages', () => {
  describe('full-index', () => {
    it('루트 인덱스의 링크 텍스트를 문서 순서대로 반환해야 함', async () => {
      const { context, client } = createTestContext({
        [`${SIMPLE_BASE}/`]: indexPage(['requests', 'numpy', 'zope.interface']),
      });

      const names = await discoverPackages({ kind: 'full-index', simpleBase: SIMPLE_BASE, debug: false }, context);

      expect(client.get).toHaveBeenCalledWith(`${SIMPLE_BASE}/`, { responseType: 'text' });
      expect(names).toEqual(['requests', 'numpy', 'zope.interface']);
    });

    it('디버그 모드에서는 문서 앞 1000자만 파싱해야 함', async () => {
      const all = Array.from({ length: 100 }, (_, i) => `pkg${String(i).padStart(3, '0')}`);
      const html = indexPage(all);
      const { context } = createTestContext({ [`${SIMPLE_BASE}/`]: html });

      const names = await discoverPackages({ kind: 'full-index', simpleBase: SIMPLE_BASE, debug: true }, context);

      // 잘린 문서에서 완전한 태그만 남는다
      const expected = all.filter((name) => {
        const tag = `<a href="/simple/${name}/">${name}</a>`;
        return html.indexOf(tag) + tag.length <= DEBUG_INDEX_LENGTH;
      });
      expect(names).toEqual(expected);
      expect(names.length).toBeGreaterThan(0);
      expect(names.length).toBeLessThan(all.length);
    });

    it('인덱스 다운로드 실패는 DiscoveryError', async () => {
      const { context } = createTestContext({ [`${SIMPLE_BASE}/`]: new Error('timeout of 30000ms exceeded') });

      await expect(
        discoverPackages({ kind: 'full-index', simpleBase: SIMPLE_BASE, debug: false }, context)
      ).rejects.toThrow(DiscoveryError);
    });
  });

  describe('popularity', () => {
    const strategy = {
      kind: 'popularity' as const,
      projectId: 'test-project',
      credentials: { kind: 'instance-metadata' as const },
      debug: false,
    };

    it('쿼리 결과의 project 컬럼만 순서대로 반환해야 함', async () => {
      const { context, client } = createTestContext();
      const { query, acquire } = fakeExecutor([
        { project: 'boto3', num_downloads: 900 },
        { project: 'urllib3', num_downloads: 800 },
        { project: 'requests', num_downloads: 700 },
      ]);

      const names = await discoverPackages(strategy, context, acquire);

      expect(names).toEqual(['boto3', 'urllib3', 'requests']);
      expect(acquire).toHaveBeenCalledWith({ kind: 'instance-metadata' }, 'test-project');
      expect(query).toHaveBeenCalledWith(POPULAR_PACKAGES_QUERY);
      expect(client.get).not.toHaveBeenCalled();
    });

    it('디버그 모드는 경고 후 무시해야 함', async () => {
      const { context, logger } = createTestContext();
      const { acquire } = fakeExecutor([{ project: 'boto3', num_downloads: 1 }]);

      const names = await discoverPackages({ ...strategy, debug: true }, context, acquire);

      expect(names).toEqual(['boto3']);
      expect(logger.warn).toHaveBeenCalledWith('debug mode is ignored in popularity query mode');
    });

    it('쿼리 실패는 DiscoveryError', async () => {
      const { context } = createTestContext();
      const { acquire } = fakeExecutor(new Error('Access Denied'));

      await expect(discoverPackages(strategy, context, acquire)).rejects.toThrow(
        'BigQuery 조회 실패: Access Denied'
      );
    });

    it('인증 실패는 DiscoveryError', async () => {
      const { context } = createTestContext();
      const acquire = vi.fn(async (): Promise<QueryExecutor> => {
        throw new Error('Could not load the default credentials');
      });

      await expect(discoverPackages(strategy, context, acquire)).rejects.toBeInstanceOf(DiscoveryError);
    });

    it('project 값이 문자열이 아니면 DiscoveryError', async () => {
      const { context } = createTestContext();
      const { acquire } = fakeExecutor([{ project: 'boto3' }, { project: null }]);

      await expect(discoverPackages(strategy, context, acquire)).rejects.toBeInstanceOf(DiscoveryError);
    });
  });
});
