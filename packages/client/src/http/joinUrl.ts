/**
 * Resolves `path` below `base`, keeping any path prefix the base carries:
 * `https://host/api` + `/groups/g1` gives `https://host/api/groups/g1`.
 */
export const joinUrl = (base: string, path: string): URL =>
  new URL(path.replace(/^\/+/, ''), base.endsWith('/') ? base : `${base}/`);
