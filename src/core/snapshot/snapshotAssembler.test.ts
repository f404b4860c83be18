import { describe, it, expect, vi } from 'vitest';
import { assembleSnapshot } from './snapshotAssembler';
import { resolveTransferUrl } from './transferResolver';

function createLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

const PACKAGE_BASE = 'https://mirror.example/pypi/web/packages';

describe('assembleSnapshot', () => {
  it('packageBase 접두사를 떼어낸 상대 경로를 순서대로 반환해야 함', () => {
    const results = [
      [
        { url: `${PACKAGE_BASE}/aa/bb/foo-1.0.tar.gz`, filename: 'foo-1.0.tar.gz' },
        { url: `${PACKAGE_BASE}/cc/dd/foo-1.0-py3-none-any.whl`, filename: 'foo-1.0-py3-none-any.whl' },
      ],
      [],
      [{ url: `${PACKAGE_BASE}/ee/ff/bar-2.0.zip`, filename: 'bar-2.0.zip' }],
    ];

    expect(assembleSnapshot(results, PACKAGE_BASE, createLogger())).toEqual([
      'aa/bb/foo-1.0.tar.gz',
      'cc/dd/foo-1.0-py3-none-any.whl',
      'ee/ff/bar-2.0.zip',
    ]);
  });

  it('끝에 슬래시가 있는 packageBase도 같은 결과', () => {
    const results = [[{ url: `${PACKAGE_BASE}/aa/foo-1.0.tar.gz`, filename: 'foo-1.0.tar.gz' }]];

    expect(assembleSnapshot(results, `${PACKAGE_BASE}/`, createLogger())).toEqual(['aa/foo-1.0.tar.gz']);
  });

  it('다른 곳에 저장된 파일은 경고 후 제외해야 함', () => {
    const logger = createLogger();
    const results = [
      [
        { url: 'https://files.example/packages/aa/foo-1.0.tar.gz', filename: 'foo-1.0.tar.gz' },
        { url: `${PACKAGE_BASE}/bb/foo-1.1.tar.gz`, filename: 'foo-1.1.tar.gz' },
        // 접두사만 같고 경계가 다른 경우
        { url: `${PACKAGE_BASE}-old/cc/foo-0.9.tar.gz`, filename: 'foo-0.9.tar.gz' },
      ],
    ];

    expect(assembleSnapshot(results, PACKAGE_BASE, logger)).toEqual(['bb/foo-1.1.tar.gz']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith("package isn't stored on base", {
      url: 'https://files.example/packages/aa/foo-1.0.tar.gz',
      packageBase: `${PACKAGE_BASE}/`,
    });
  });

  it('중복 항목은 제거하지 않음', () => {
    const duplicated = { url: `${PACKAGE_BASE}/aa/foo-1.0.tar.gz`, filename: 'foo-1.0.tar.gz' };

    expect(assembleSnapshot([[duplicated], [duplicated]], PACKAGE_BASE, createLogger())).toEqual([
      'aa/foo-1.0.tar.gz',
      'aa/foo-1.0.tar.gz',
    ]);
  });
});

describe('resolveTransferUrl', () => {
  it('packageBase + 항목', () => {
    expect(resolveTransferUrl('aa/bb/foo-1.0.tar.gz', `${PACKAGE_BASE}/`)).toBe(
      `${PACKAGE_BASE}/aa/bb/foo-1.0.tar.gz`
    );
  });

  it('packageBase에 슬래시가 없어도 원래 URL을 복원해야 함', () => {
    expect(resolveTransferUrl('aa/bb/foo-1.0.tar.gz', PACKAGE_BASE)).toBe(
      `${PACKAGE_BASE}/aa/bb/foo-1.0.tar.gz`
    );
  });

  it('assembleSnapshot 결과를 관찰된 URL로 되돌려야 함', () => {
    const urls = [
      `${PACKAGE_BASE}/aa/bb/foo-1.0.tar.gz`,
      `${PACKAGE_BASE}/cc/dd/foo-1.0-py3-none-any.whl`,
    ];
    const results = [urls.map((url) => ({ url, filename: url.split('/').pop() ?? '' }))];

    for (const base of [PACKAGE_BASE, `${PACKAGE_BASE}/`]) {
      const snapshot = assembleSnapshot(results, base, createLogger());
      expect(snapshot.map((entry) => resolveTransferUrl(entry, base))).toEqual(urls);
    }
  });
});
