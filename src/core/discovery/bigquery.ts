/**
 * BigQuery 기반 인기 패키지 조회
 *
 * 공개 데이터셋 bigquery-public-data.pypi.file_downloads에서
 * 어제~오늘 pip 다운로드 수 상위 1000개 패키지를 가져온다.
 */

import { BigQuery } from '@google-cloud/bigquery';
import { CredentialProvider, QueryExecutor, QueryRow } from '../../types';

export const POPULAR_PACKAGES_QUERY = `
    SELECT file.project, COUNT(*) AS num_downloads
    FROM \`bigquery-public-data.pypi.file_downloads\`
    WHERE
      details.installer.name = 'pip'
      AND
      DATE(timestamp)
        BETWEEN DATE_SUB(CURRENT_DATE(), INTERVAL 1 DAY)
        AND CURRENT_DATE()
    GROUP BY file.project
    ORDER BY num_downloads DESC
    LIMIT 1000;
    `;

/**
 * 환경 변수로 인증 방식 결정
 * GOOGLE_APPLICATION_CREDENTIALS가 있으면 서비스 계정 키 파일, 없으면 인스턴스 메타데이터 서버
 */
export function resolveCredentialProvider(env: NodeJS.ProcessEnv = process.env): CredentialProvider {
  const keyFilename = env.GOOGLE_APPLICATION_CREDENTIALS;
  if (keyFilename) {
    return { kind: 'service-account', keyFilename };
  }
  return { kind: 'instance-metadata' };
}

/**
 * 쿼리 비용을 청구할 GCP 프로젝트 ID
 * @throws PROJECT_ID가 없는 경우
 */
export function resolveProjectId(env: NodeJS.ProcessEnv = process.env): string {
  const projectId = env.PROJECT_ID;
  if (!projectId) {
    throw new Error('환경 변수 PROJECT_ID가 필요합니다 (BigQuery 모드)');
  }
  return projectId;
}

/**
 * @google-cloud/bigquery 기반 쿼리 실행기
 */
export class BigQueryExecutor implements QueryExecutor {
  constructor(private readonly client: BigQuery) {}

  async query(sql: string): Promise<QueryRow[]> {
    const [rows] = await this.client.query({ query: sql, useLegacySql: false });
    return rows.filter(isQueryRow);
  }
}

function isQueryRow(row: unknown): row is QueryRow {
  return typeof row === 'object' && row !== null;
}

/** 쿼리 실행기 획득 함수 (테스트에서 교체 가능) */
export type AcquireQueryExecutor = (
  credentials: CredentialProvider,
  projectId: string
) => Promise<QueryExecutor>;

/**
 * 인증 방식에 맞는 쿼리 실행기 생성
 */
export const acquireQueryExecutor: AcquireQueryExecutor = async (credentials, projectId) => {
  switch (credentials.kind) {
    case 'service-account':
      return new BigQueryExecutor(new BigQuery({ projectId, keyFilename: credentials.keyFilename }));
    case 'instance-metadata':
      // keyFilename 없이 생성하면 google-auth-library가 메타데이터 서버에서 토큰을 받는다
      return new BigQueryExecutor(new BigQuery({ projectId }));
  }
};

/**
 * 결과 행에서 패키지명(project 컬럼)만 추출
 * @throws 패키지명이 문자열이 아닌 행이 있는 경우
 */
export function projectNamesFromRows(rows: QueryRow[]): string[] {
  return rows.map((row, index) => {
    const project = row.project;
    if (typeof project !== 'string') {
      throw new Error(`잘못된 패키지명 (행 ${index}): ${JSON.stringify(project)}`);
    }
    return project;
  });
}
