/**
 * Path conventions shared by every resource provider.
 *
 * Static resources always live under STATIC_PREFIX so they never collide with
 * app resources, which are served from the root ("/manifest.webmanifest",
 * "/app-worker.js", ...).
 */

export const STATIC_PREFIX = '/web'

export const WASM_FILE = 'app.wasm'
export const ROBOTS_TXT = 'robots.txt'
export const ADS_TXT = 'ads.txt'

/** `root + "/web/" + file` */
export function staticResourceUrl(root: string, file: string): string {
  return `${root}${STATIC_PREFIX}/${file}`
}

export function hasStaticPrefix(path: string): boolean {
  return path === STATIC_PREFIX || path.startsWith(`${STATIC_PREFIX}/`)
}

export function stripStaticPrefix(path: string): string {
  if (!hasStaticPrefix(path)) return path
  const rest = path.slice(STATIC_PREFIX.length)
  return rest === '' ? '/' : rest
}
