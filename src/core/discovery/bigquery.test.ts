import { describe, it, expect } from 'vitest';
import {
  resolveCredentialProvider,
  resolveProjectId,
  projectNamesFromRows,
  POPULAR_PACKAGES_QUERY,
} from './bigquery';

describe('bigquery', () => {
  describe('resolveCredentialProvider', () => {
    it('GOOGLE_APPLICATION_CREDENTIALS가 있으면 서비스 계정', () => {
      expect(resolveCredentialProvider({ GOOGLE_APPLICATION_CREDENTIALS: '/secrets/sa.json' })).toEqual({
        kind: 'service-account',
        keyFilename: '/secrets/sa.json',
      });
    });

    it('없으면 인스턴스 메타데이터', () => {
      expect(resolveCredentialProvider({})).toEqual({ kind: 'instance-metadata' });
    });
  });

  describe('resolveProjectId', () => {
    it('PROJECT_ID를 반환해야 함', () => {
      expect(resolveProjectId({ PROJECT_ID: 'test-project' })).toBe('test-project');
    });

    it('없으면 예외', () => {
      expect(() => resolveProjectId({})).toThrow('PROJECT_ID');
      expect(() => resolveProjectId({ PROJECT_ID: '' })).toThrow('PROJECT_ID');
    });
  });

  describe('projectNamesFromRows', () => {
    it('다운로드 수는 버리고 순서는 유지', () => {
      expect(projectNamesFromRows([{ project: 'b', num_downloads: 2 }, { project: 'a', num_downloads: 1 }])).toEqual([
        'b',
        'a',
      ]);
    });

    it('잘못된 행이면 예외', () => {
      expect(() => projectNamesFromRows([{ num_downloads: 1 }])).toThrow('잘못된 패키지명 (행 0)');
    });
  });

  describe('POPULAR_PACKAGES_QUERY', () => {
    it('pip 설치, 최근 하루, 상위 1000개', () => {
      expect(POPULAR_PACKAGES_QUERY).toContain('`bigquery-public-data.pypi.file_downloads`');
      expect(POPULAR_PACKAGES_QUERY).toContain("details.installer.name = 'pip'");
      expect(POPULAR_PACKAGES_QUERY).toContain('DATE_SUB(CURRENT_DATE(), INTERVAL 1 DAY)');
      expect(POPULAR_PACKAGES_QUERY).toContain('ORDER BY num_downloads DESC');
      expect(POPULAR_PACKAGES_QUERY).toContain('LIMIT 1000');
    });
  });
});
