/**
 * ベースURLとパスセグメントを連結する
 *
 * 各区切りはちょうど1つの "/" になる。
 * urlJoin('https://example.com/a/b/', 'update') と
 * urlJoin('https://example.com/a/b', '/update') はどちらも
 * 'https://example.com/a/b/update' を返す。
 */
export function urlJoin(base: string, ...segments: string[]): string {
  const head = base.replace(/\/+$/, '');
  const tail = segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0);
  return [head, ...tail].join('/');
}
