import { relative, resolve } from 'node:path'
import { stat } from 'node:fs/promises'
import { Hono, type Context, type MiddlewareHandler } from 'hono'
import { etag } from 'hono/etag'
import { serveStatic } from '@hono/node-server/serve-static'
import { STATIC_PREFIX, stripStaticPrefix } from '../../core/resources/conventions.js'

/**
 * Serves files from `dir` for requests under "/web/", with the prefix
 * stripped. GET and HEAD only; anything else falls through to the host app.
 *
 * serveStatic resolves `root` against the working directory, so the
 * directory is handed over in cwd-relative form ("." for the cwd itself:
 * an empty root would resolve against "/").
 */
export function createStaticFileHandler(dir: string): Hono {
  const root = relative(process.cwd(), resolve(dir)) || '.'
  const serve = serveStatic({
    root,
    rewriteRequestPath: stripStaticPrefix,
    onFound: setValidators,
  })

  const handler = new Hono()
  // etag() answers If-None-Match from the ETag set below without hashing the body.
  handler.use(`${STATIC_PREFIX}/*`, etag())
  handler.use(`${STATIC_PREFIX}/*`, notModifiedSince())
  handler.get(`${STATIC_PREFIX}/*`, async (c) => {
    const res = await serve(c, async () => {})
    return res ?? c.notFound()
  })
  return handler
}

/** Validators derived from file stats, identical for full, ranged and HEAD responses. */
async function setValidators(path: string, c: Context): Promise<void> {
  const stats = await stat(path)
  c.header('ETag', `W/"${stats.size.toString(16)}-${Math.trunc(stats.mtimeMs).toString(16)}"`)
  c.header('Last-Modified', stats.mtime.toUTCString())
}

/** If-Modified-Since → 304. Ignored when If-None-Match is present. */
function notModifiedSince(): MiddlewareHandler {
  return async (c, next) => {
    await next()
    const since = c.req.header('If-Modified-Since')
    const lastModified = c.res.headers.get('Last-Modified')
    if (!since || !lastModified || c.req.header('If-None-Match') !== undefined) return
    if (c.res.status !== 200 && c.res.status !== 206) return

    const sinceMs = Date.parse(since)
    const modifiedMs = Date.parse(lastModified)
    if (Number.isNaN(sinceMs) || Number.isNaN(modifiedMs) || modifiedMs > sinceMs) return

    const headers = new Headers({ 'Last-Modified': lastModified })
    const tag = c.res.headers.get('ETag')
    if (tag) headers.set('ETag', tag)
    c.res = new Response(null, { status: 304, headers })
  }
}
