/**
 * URL helpers
 */

/**
 * Whether the URL points at a gzip file (as opposed to gzip transfer encoding)
 */
export const isGzipUrl = (url: string): boolean => /\.gz($|\?)/i.test(url);

/**
 * Absolute http(s) URL containing the recipe path marker
 */
export function isRecipeUrl(loc: string, pathMarker: string): boolean {
  if (!loc.includes(pathMarker)) return false;
  try {
    const { protocol } = new URL(loc);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}
