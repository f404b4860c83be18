/**
 * PyPI Simple API 파싱 유틸리티
 * PEP 503 (Simple Repository API) 구현
 * https://peps.python.org/pep-0503/
 *
 * - 루트 인덱스: 패키지마다 <a href="/simple/{name}/">{name}</a>
 * - 패키지 페이지: 파일마다 <a href="url#sha256=...">{filename}</a>
 */

import { ListingEntry } from '../../types';
import { cleanArtifactUrl, decodeHtmlEntities } from './url-utils';
import { parsePythonVersion, PythonVersion } from './python-version';

/**
 * HTML에서 파싱한 <a> 태그
 */
export interface Anchor {
  href: string;
  text: string;
}

// <a> 태그 파싱
// 예: <a href="../../packages/ab/cd/requests-2.28.0.tar.gz#sha256=abc123" data-requires-python="&gt;=3.7">requests-2.28.0.tar.gz</a>
// 따옴표 안의 속성값은 통째로 건너뛰므로 data-requires-python=">=3.7" 같은 이스케이프 안 된 '>'도 허용
const ANCHOR_PATTERN =
  /<a\s+(?:[^>"']|"[^"]*"|'[^']*')*?href="([^"]*)"(?:[^>"']|"[^"]*"|'[^']*')*>([^<]+)<\/a>/gi;

// 보관 정책이 인식하는 배포 파일 확장자
const DIST_FILE_PATTERN = /^(.+)\.(tar\.gz|tar\.bz2|tar\.xz|zip|whl|exe|egg)$/i;

/**
 * HTML 문서의 모든 <a> 태그를 문서 순서대로 반환
 */
export function parseAnchors(html: string): Anchor[] {
  const anchors: Anchor[] = [];
  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    anchors.push({
      href: decodeHtmlEntities(match[1]),
      text: decodeHtmlEntities(match[2].trim()),
    });
  }
  return anchors;
}

/**
 * 루트 인덱스 HTML에서 패키지명 목록 추출
 */
export function parseIndexPage(html: string): string[] {
  return parseAnchors(html)
    .map((anchor) => anchor.text)
    .filter((name) => name.length > 0);
}

/**
 * 패키지 페이지 HTML에서 아티팩트 목록 추출
 * 상대 href는 페이지 URL 기준으로 해석하고 체크섬은 제거한다.
 *
 * @param pageUrl 패키지 페이지 URL (예: https://host/simple/requests/)
 * @throws href를 URL로 해석할 수 없는 경우
 */
export function parseListingPage(html: string, pageUrl: string): ListingEntry[] {
  return parseAnchors(html).map((anchor) => ({
    url: cleanArtifactUrl(new URL(anchor.href, pageUrl).toString()),
    filename: anchor.text,
  }));
}

/**
 * 배포 파일명에서 버전 추출
 * 형식: {name}-{version}{suffix}.{ext}
 * 예: requests-2.28.0.tar.gz -> 2.28.0
 * 예: requests-2.28.0-py3-none-any.whl -> 2.28.0
 * 예: jinja2-time-0.2.0.tar.gz -> 0.2.0
 *
 * 패키지명에 하이픈이 있을 수 있으므로 하이픈 위치를 차례로 시도해서
 * 처음으로 PEP 440 버전이 되는 구간을 사용한다.
 * - sdist: 오른쪽 하이픈부터, 하이픈 뒤 전체가 후보 (pkg-2-3.tar.gz -> 3)
 * - wheel, egg, exe: 왼쪽 하이픈부터, 다음 하이픈까지가 후보 (이름의 하이픈은 '_'로 정규화됨)
 *
 * @returns 형식에 맞지 않으면 null
 */
export function versionFromFilename(filename: string): PythonVersion | null {
  const match = DIST_FILE_PATTERN.exec(filename);
  if (!match) return null;

  const stem = match[1];
  const extension = match[2].toLowerCase();
  const isSdist = extension.startsWith('tar.') || extension === 'zip';

  const hyphens: number[] = [];
  for (let hyphen = stem.indexOf('-'); hyphen > 0; hyphen = stem.indexOf('-', hyphen + 1)) {
    hyphens.push(hyphen);
  }
  if (isSdist) hyphens.reverse();

  for (const hyphen of hyphens) {
    const rest = stem.slice(hyphen + 1);
    const candidate = isSdist ? rest : rest.split('-')[0];
    if (!candidate) continue;

    const version = parsePythonVersion(candidate);
    if (version) return version;
  }

  return null;
}
