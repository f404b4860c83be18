import { describe, it, expect } from 'vitest';
import { ListingEntry } from '../../types';
import { createTestContext } from '../../test-utils/context';
import { scanAllPackages, PackageScanFn } from './scanCoordinator';

const SIMPLE_BASE = 'https://mirror.example/simple';

function page(name: string): string {
  return `<a href="/packages/${name}-1.0.tar.gz#sha256=00">${name}-1.0.tar.gz</a>`;
}

// 지연 시간을 직접 제어하는 조회 함수
function deferredScan() {
  const pending = new Map<string, (entries: ListingEntry[]) => void>();
  let inFlight = 0;
  let maxInFlight = 0;

  const scan: PackageScanFn = (name) => {
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    return new Promise((resolve) => {
      pending.set(name, (entries) => {
        inFlight--;
        resolve(entries);
      });
    });
  };

  return {
    scan,
    pending,
    getMaxInFlight: () => maxInFlight,
  };
}

async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

describe('scanAllPackages', () => {
  it('완료 순서와 상관없이 입력 순서대로 결과를 반환해야 함', async () => {
    const { context } = createTestContext();
    const deferred = deferredScan();

    const run = scanAllPackages(
      ['a', 'b', 'c'],
      { simpleBase: SIMPLE_BASE, concurrency: 3 },
      context,
      deferred.scan
    );
    await flush();

    deferred.pending.get('c')?.([{ url: 'u-c', filename: 'c' }]);
    deferred.pending.get('a')?.([{ url: 'u-a', filename: 'a' }]);
    deferred.pending.get('b')?.([]);

    expect(await run).toEqual([[{ url: 'u-a', filename: 'a' }], [], [{ url: 'u-c', filename: 'c' }]]);
  });

  it('동시 실행 수를 concurrency 이하로 제한해야 함', async () => {
    const { context } = createTestContext();
    const deferred = deferredScan();
    const names = ['p1', 'p2', 'p3', 'p4', 'p5'];

    const run = scanAllPackages(names, { simpleBase: SIMPLE_BASE, concurrency: 2 }, context, deferred.scan);

    for (const name of names) {
      await flush();
      expect(deferred.pending.size).toBeLessThanOrEqual(2);
      deferred.pending.get(name)?.([]);
      deferred.pending.delete(name);
    }

    expect(await run).toHaveLength(5);
    expect(deferred.getMaxInFlight()).toBe(2);
  });

  it('한 패키지가 실패해도 나머지 결과는 영향받지 않아야 함', async () => {
    const { context, logger, progress } = createTestContext({
      [`${SIMPLE_BASE}/foo/`]: page('foo'),
      [`${SIMPLE_BASE}/bar/`]: new Error('503 Service Unavailable'),
      [`${SIMPLE_BASE}/baz/`]: page('baz'),
    });

    const results = await scanAllPackages(
      ['foo', 'bar', 'baz'],
      { simpleBase: SIMPLE_BASE, concurrency: 2 },
      context
    );

    expect(results).toEqual([
      [{ url: 'https://mirror.example/packages/foo-1.0.tar.gz', filename: 'foo-1.0.tar.gz' }],
      [],
      [{ url: 'https://mirror.example/packages/baz-1.0.tar.gz', filename: 'baz-1.0.tar.gz' }],
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(progress.getTotal()).toBe(3);
    expect(progress.getCompleted()).toBe(3);
  });

  it('진행률 이벤트를 패키지마다 한 번씩 발생시켜야 함', async () => {
    const { context, progress } = createTestContext({
      [`${SIMPLE_BASE}/foo/`]: page('foo'),
      [`${SIMPLE_BASE}/baz/`]: page('baz'),
    });
    const events: string[] = [];
    progress.on('start', (total) => events.push(`start:${total}`));
    progress.on('increment', (completed, total) => events.push(`inc:${completed}/${total}`));

    await scanAllPackages(['foo', 'baz'], { simpleBase: SIMPLE_BASE, concurrency: 1 }, context);

    expect(events).toEqual(['start:2', 'inc:1/2', 'inc:2/2']);
  });

  it('패키지가 없으면 빈 결과', async () => {
    const { context } = createTestContext();

    expect(await scanAllPackages([], { simpleBase: SIMPLE_BASE, concurrency: 4 }, context)).toEqual([]);
  });
});
