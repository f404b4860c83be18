/**
 * 공유 HTTP 클라이언트와 환경 변수 기반 프록시 선택
 *
 * 우선순위: http_proxy, HTTP_PROXY (HTTP 대상) → https_proxy, HTTPS_PROXY (HTTPS 대상)
 *          → all_proxy, ALL_PROXY (모든 대상)
 * 대상 URL의 scheme에 맞는 첫 번째 프록시를 사용한다.
 */

import axios, { AxiosInstance, AxiosProxyConfig, InternalAxiosRequestConfig } from 'axios';

/** 프록시가 가로챌 대상 */
export type ProxyIntercept = 'http' | 'https' | 'all';

export interface ProxyRule {
  intercept: ProxyIntercept;
  url: URL;
  /** 값을 읽어온 환경 변수 이름 */
  source: string;
}

/**
 * 프록시 환경 변수 값이 올바르지 않을 때 (실행 시작 단계에서 치명적)
 */
export class ProxyConfigError extends Error {
  constructor(
    public readonly variable: string,
    public readonly value: string
  ) {
    super(`프록시 설정이 올바르지 않습니다: ${variable}=${value}`);
    this.name = 'ProxyConfigError';
  }
}

const PROXY_VARIABLES: ReadonlyArray<[string, ProxyIntercept]> = [
  ['http_proxy', 'http'],
  ['HTTP_PROXY', 'http'],
  ['https_proxy', 'https'],
  ['HTTPS_PROXY', 'https'],
  ['all_proxy', 'all'],
  ['ALL_PROXY', 'all'],
];

// scheme 없이 host:port만 적은 값은 http 프록시로 본다 (curl, pip와 동일)
function parseProxyUrl(variable: string, value: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(value.includes('://') ? value : `http://${value}`);
  } catch {
    throw new ProxyConfigError(variable, value);
  }
  if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || !parsed.hostname) {
    throw new ProxyConfigError(variable, value);
  }
  return parsed;
}

/**
 * 환경 변수에서 프록시 목록을 우선순위 순으로 수집
 * @throws ProxyConfigError 값이 http(s) URL이 아닌 경우
 */
export function collectProxies(env: NodeJS.ProcessEnv = process.env): ProxyRule[] {
  const proxies: ProxyRule[] = [];
  for (const [variable, intercept] of PROXY_VARIABLES) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    proxies.push({ intercept, url: parseProxyUrl(variable, value), source: variable });
  }
  return proxies;
}

/**
 * 대상 URL에 적용할 프록시 선택
 */
export function selectProxy(target: URL, proxies: ProxyRule[]): ProxyRule | null {
  const scheme = target.protocol.replace(/:$/, '');
  return proxies.find((proxy) => proxy.intercept === 'all' || proxy.intercept === scheme) ?? null;
}

/**
 * axios 프록시 설정으로 변환
 */
export function toAxiosProxy(proxy: URL): AxiosProxyConfig {
  const protocol = proxy.protocol.replace(/:$/, '');
  const config: AxiosProxyConfig = {
    protocol,
    host: proxy.hostname,
    port: proxy.port ? parseInt(proxy.port, 10) : protocol === 'https' ? 443 : 80,
  };
  if (proxy.username) {
    config.auth = {
      username: decodeURIComponent(proxy.username),
      password: decodeURIComponent(proxy.password),
    };
  }
  return config;
}

function requestTarget(config: InternalAxiosRequestConfig): URL | null {
  if (!config.url) return null;
  try {
    return new URL(config.url, config.baseURL);
  } catch {
    return null;
  }
}

export interface HttpClientOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  userAgent?: string;
  proxies?: ProxyRule[];
}

/**
 * 모든 패키지 조회가 공유하는 axios 인스턴스 생성
 * 요청마다 대상 scheme에 맞는 프록시를 적용한다.
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const { timeout = 30000, userAgent = 'pypi-snapshot/1.0', proxies = collectProxies() } = options;

  const client = axios.create({
    timeout,
    responseType: 'text',
    headers: {
      'User-Agent': userAgent,
      Accept: 'text/html',
    },
  });

  client.interceptors.request.use((config) => {
    const target = requestTarget(config);
    const proxy = target ? selectProxy(target, proxies) : null;
    // axios 자체의 환경 변수 프록시 처리는 끄고 위 우선순위만 사용
    config.proxy = proxy ? toAxiosProxy(proxy.url) : false;
    return config;
  });

  return client;
}
