// 공통 모듈 진입점

// URL 유틸리티
export { cleanArtifactUrl, withTrailingSlash, decodeHtmlEntities } from './url-utils';

// PEP 440 버전
export {
  parsePythonVersion,
  comparePythonVersions,
  isStableVersion,
  isSameVersion,
} from './python-version';
export type { PythonVersion, PreReleaseLabel } from './python-version';

// PEP 503 Simple API 파싱
export {
  parseAnchors,
  parseIndexPage,
  parseListingPage,
  versionFromFilename,
} from './pip-simple-api';
export type { Anchor } from './pip-simple-api';

// HTTP 클라이언트 / 프록시
export {
  createHttpClient,
  collectProxies,
  selectProxy,
  toAxiosProxy,
  ProxyConfigError,
} from './http-client';
export type { ProxyRule, ProxyIntercept, HttpClientOptions } from './http-client';
