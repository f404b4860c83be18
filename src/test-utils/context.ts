/// <reference types="vitest/globals" />

/**
 * 스냅샷 테스트용 컨텍스트
 * 네트워크 없이 URL별로 미리 정한 HTML을 돌려주는 가짜 HTTP 클라이언트를 사용합니다.
 */

import { vi } from 'vitest';
import { SnapshotContext } from '../types';
import { SnapshotProgress } from '../core/snapshot/snapshotProgress';

/** URL별 응답 (Error면 요청 실패) */
export type FakePages = Record<string, string | Error>;

/**
 * 가짜 HTTP 클라이언트
 * 등록되지 않은 URL은 404 에러로 처리
 */
export function createFakeClient(pages: FakePages) {
  const get = vi.fn(async (url: string) => {
    const page = pages[url];
    if (page === undefined) {
      throw new Error(`404 Not Found: ${url}`);
    }
    if (page instanceof Error) {
      throw page;
    }
    return { data: page, status: 200 };
  });
  return { get };
}

/**
 * 로거 호출을 기록하는 테스트 컨텍스트 생성
 */
export function createTestContext(pages: FakePages = {}) {
  const logger = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  };
  const client = createFakeClient(pages);
  const progress = new SnapshotProgress();
  const context: SnapshotContext = { logger, progress, client };
  return { context, logger, client, progress };
}
