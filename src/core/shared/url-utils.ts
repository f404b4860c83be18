/**
 * 아티팩트 URL 정규화 유틸리티
 *
 * 미러는 URL에 체크섬을 쿼리(?sha256=...)나 프래그먼트(#sha256=...)로 붙여서 제공한다.
 * 같은 파일이 다시 업로드되어 체크섬이 바뀌어도 스냅샷에서는 같은 항목으로 보이도록
 * scheme + host + path 만 남긴다.
 */

/**
 * 쿼리 문자열과 프래그먼트 제거
 * 예: https://host/pkg/x-1.0.tar.gz?sha256=abcd#frag -> https://host/pkg/x-1.0.tar.gz
 *
 * @throws 절대 URL이 아닌 경우
 */
export function cleanArtifactUrl(url: string): string {
  const parsed = new URL(url);
  parsed.search = '';
  parsed.hash = '';
  return parsed.toString();
}

/**
 * 끝에 슬래시가 없으면 붙여서 반환
 */
export function withTrailingSlash(base: string): string {
  return base.endsWith('/') ? base : `${base}/`;
}

/**
 * HTML 속성/텍스트의 기본 엔티티 디코딩
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}
