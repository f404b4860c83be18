import type { AxiosRequestConfig } from 'axios';
import type { SnapshotProgress } from '../core/snapshot/snapshotProgress';

// ============================================
// 스냅샷 관련 타입
// ============================================

/** 패키지 목록 페이지의 아티팩트 한 건 (URL, 파일명) */
export interface ListingEntry {
  url: string;
  filename: string;
}

/** 패키지 기본 URL 기준 상대 경로 */
export type SnapshotEntry = string;

/** 다운로드 단계에서 사용할 절대 URL */
export type TransferTarget = string;

/** 패키지별 보관 버전 수 */
export interface RetentionBudget {
  keepRecent: number;
}

// ============================================
// 패키지 탐색 전략
// ============================================

/** 인덱스 전체 스캔 */
export interface FullIndexStrategy {
  kind: 'full-index';
  simpleBase: string;
  debug: boolean;
}

/** BigQuery 다운로드 통계 기반 인기 패키지 조회 */
export interface PopularityStrategy {
  kind: 'popularity';
  projectId: string;
  credentials: CredentialProvider;
  /** 이 모드에서는 무시되며 경고만 남긴다 */
  debug: boolean;
}

/**
 * Google 인증 방식
 * 시작 시 환경 변수를 한 번 확인해서 결정한다
 */
export type CredentialProvider =
  | { kind: 'service-account'; keyFilename: string }
  | { kind: 'instance-metadata' };

/** 쿼리 결과 한 행 */
export type QueryRow = Record<string, unknown>;

/** 분석 쿼리 실행기 */
export interface QueryExecutor {
  query(sql: string): Promise<QueryRow[]>;
}

export type DiscoveryStrategy = FullIndexStrategy | PopularityStrategy;

// ============================================
// 실행 컨텍스트
// ============================================

/** 컴포넌트가 사용하는 로거 */
export interface SnapshotLogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * 공유 HTTP 클라이언트 (생성 후 읽기 전용)
 * createHttpClient가 만든 axios 인스턴스가 이 형태를 만족한다.
 */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

/**
 * 한 번의 실행 동안 모든 컴포넌트에 전달되는 컨텍스트
 */
export interface SnapshotContext {
  logger: SnapshotLogger;
  progress: SnapshotProgress;
  client: HttpClient;
}
