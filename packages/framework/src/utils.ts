export const IS_PROD = process.env.NODE_ENV === 'production';

/**
 * Normalize URL path
 * Ensures a leading slash and removes any trailing slash
 */
export function normalizePath(urlPath: string): string {
  let path = urlPath.trim();

  if (!path.startsWith('/')) {
    path = '/' + path;
  }

  while (path.length > 1 && path.endsWith('/')) {
    path = path.substring(0, path.length - 1);
  }

  return path;
}
