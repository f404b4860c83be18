/**
 * Python 패키지 버전 파싱 및 비교
 * PEP 440 (Version Identification) 구현
 * https://peps.python.org/pep-0440/
 *
 * version-utils.ts의 compareVersions는 프리릴리스 태그를 버리고 숫자만 비교하므로
 * 보관 정책처럼 rc/dev 순서가 중요한 곳에서는 이 모듈을 사용한다.
 */

/** 프리릴리스 구분자 (정규화 후) */
export type PreReleaseLabel = 'a' | 'b' | 'rc';

/**
 * 파싱된 PEP 440 버전
 */
export interface PythonVersion {
  /** 원본 문자열 */
  raw: string;
  epoch: number;
  release: number[];
  pre?: { label: PreReleaseLabel; number: number };
  post?: number;
  dev?: number;
  local?: (number | string)[];
}

// PEP 440 Appendix B의 정규식
const VERSION_PATTERN = new RegExp(
  '^\\s*v?' +
    '(?:(\\d+)!)?' + // epoch
    '(\\d+(?:\\.\\d+)*)' + // release
    '(?:[-_.]?(alpha|a|beta|b|preview|pre|c|rc)[-_.]?(\\d+)?)?' + // pre
    '(?:(?:-(\\d+))|(?:[-_.]?(post|rev|r)[-_.]?(\\d+)?))?' + // post
    '(?:[-_.]?(dev)[-_.]?(\\d+)?)?' + // dev
    '(?:\\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?' + // local
    '\\s*$',
  'i'
);

const PRE_RELEASE_ALIASES: Record<string, PreReleaseLabel> = {
  alpha: 'a',
  a: 'a',
  beta: 'b',
  b: 'b',
  c: 'rc',
  pre: 'rc',
  preview: 'rc',
  rc: 'rc',
};

const PRE_RELEASE_RANK: Record<PreReleaseLabel, number> = { a: 0, b: 1, rc: 2 };

function toNumber(text: string | undefined): number {
  return text ? parseInt(text, 10) : 0;
}

/**
 * 버전 문자열 파싱
 * @returns PEP 440 형식이 아니면 null
 */
export function parsePythonVersion(text: string): PythonVersion | null {
  const match = VERSION_PATTERN.exec(text);
  if (!match) return null;

  const [, epoch, release, preLabel, preNumber, postImplicit, postLabel, postNumber, devLabel, devNumber, local] =
    match;

  const version: PythonVersion = {
    raw: text,
    epoch: toNumber(epoch),
    release: release.split('.').map((part) => parseInt(part, 10)),
  };

  if (preLabel) {
    version.pre = {
      label: PRE_RELEASE_ALIASES[preLabel.toLowerCase()],
      number: toNumber(preNumber),
    };
  }
  if (postImplicit !== undefined) {
    version.post = toNumber(postImplicit);
  } else if (postLabel) {
    version.post = toNumber(postNumber);
  }
  if (devLabel) {
    version.dev = toNumber(devNumber);
  }
  if (local) {
    version.local = local
      .toLowerCase()
      .split(/[-_.]/)
      .map((part) => (/^\d+$/.test(part) ? parseInt(part, 10) : part));
  }

  return version;
}

/**
 * 프리릴리스/개발 버전이 아니면 안정 버전 (post 릴리스는 안정 버전)
 */
export function isStableVersion(version: PythonVersion): boolean {
  return version.pre === undefined && version.dev === undefined;
}

function compareNumbers(a: number, b: number): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareNumberArrays(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    if (i >= a.length) return -1;
    if (i >= b.length) return 1;
    const diff = compareNumbers(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return 0;
}

// 1.0 == 1.0.0 이므로 끝의 0은 비교에서 제외
function trimTrailingZeros(release: number[]): number[] {
  let end = release.length;
  while (end > 1 && release[end - 1] === 0) end--;
  return release.slice(0, end);
}

// 1.0.dev0 < 1.0a0 < 1.0 순서가 되도록 정렬 키 생성
function preKey(version: PythonVersion): number[] {
  if (version.pre === undefined && version.post === undefined && version.dev !== undefined) {
    return [-Infinity];
  }
  if (version.pre === undefined) {
    return [Infinity];
  }
  return [PRE_RELEASE_RANK[version.pre.label], version.pre.number];
}

function compareLocal(a: PythonVersion['local'], b: PythonVersion['local']): number {
  if (a === undefined || b === undefined) {
    if (a === b) return 0;
    return a === undefined ? -1 : 1;
  }
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    if (i >= a.length) return -1;
    if (i >= b.length) return 1;
    const partA = a[i];
    const partB = b[i];
    // 숫자 세그먼트가 문자 세그먼트보다 크다
    if (typeof partA === 'number' && typeof partB === 'number') {
      const diff = compareNumbers(partA, partB);
      if (diff !== 0) return diff;
    } else if (typeof partA === 'number') {
      return 1;
    } else if (typeof partB === 'number') {
      return -1;
    } else if (partA !== partB) {
      return partA < partB ? -1 : 1;
    }
  }
  return 0;
}

/**
 * PEP 440 순서로 비교
 * @returns a > b면 양수, a < b면 음수, 같으면 0
 */
export function comparePythonVersions(a: PythonVersion, b: PythonVersion): number {
  return (
    compareNumbers(a.epoch, b.epoch) ||
    compareNumberArrays(trimTrailingZeros(a.release), trimTrailingZeros(b.release)) ||
    compareNumberArrays(preKey(a), preKey(b)) ||
    compareNumbers(a.post ?? -Infinity, b.post ?? -Infinity) ||
    compareNumbers(a.dev ?? Infinity, b.dev ?? Infinity) ||
    compareLocal(a.local, b.local)
  );
}

/**
 * 두 버전이 같은 릴리스인지 확인 (1.0 과 1.0.0 은 같다)
 */
export function isSameVersion(a: PythonVersion, b: PythonVersion): boolean {
  return comparePythonVersions(a, b) === 0;
}
