/**
 * Collapse repeated separators and drop one trailing separator, keeping a
 * lone "/" intact. Works on the string only; the path does not need to exist.
 *
 * @example
 *   normalizePath("music//albums/")  // "music/albums"
 *   normalizePath("///")             // "/"
 */
export const normalizePath = (path: string): string => {
  const collapsed = path.replace(/\/{2,}/g, "/");
  return collapsed.length > 1 && collapsed.endsWith("/") ? collapsed.slice(0, -1) : collapsed;
};

export const joinPath = (parent: string, child: string): string =>
  normalizePath(`${parent}/${child}`);
