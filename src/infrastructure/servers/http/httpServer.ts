/**
 * HTTP surface — Hono routes around a ResourceProvider.
 *
 * Design:
 * - Single `createHttpApp()` factory builds the full Hono app.
 * - Root-level crawler files redirect to wherever the provider puts them.
 * - Providers that carry a request handler get it mounted as-is.
 */

import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { describeResources, type ResourceProvider } from '../../../core/ports/resourceProvider.js'
import type { TelemetrySink } from '../../../core/ports/telemetry.js'
import { ADS_TXT, ROBOTS_TXT } from '../../../core/resources/conventions.js'
import { isServingProvider } from '../../resources/index.js'

// ============================================================================
// Dependencies
// ============================================================================

export interface HttpAppDeps {
  resources: ResourceProvider
  telemetry: TelemetrySink
}

// ============================================================================
// App Factory
// ============================================================================

export function createHttpApp(deps: HttpAppDeps): Hono {
  const app = new Hono()

  // ── Error handling ──
  app.onError((err, c) => {
    if (err instanceof HTTPException && err.status < 500) {
      return err.getResponse()
    }
    console.error('[httpServer] Internal error:', err.stack ?? err.message)
    return c.json({ error: 'Internal server error' }, 500)
  })

  // ── Request telemetry ──
  app.use('*', async (c, next) => {
    const startedAt = performance.now()
    await next()
    deps.telemetry.emit({
      type: 'request_served',
      payload: {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
    })
  })

  // ── Health ──
  app.get('/api/health', (c) =>
    c.json({
      status: 'ok',
      pid: process.pid,
      uptime: process.uptime(),
    }),
  )

  // ── Resource locations ──
  app.get('/api/resources', (c) => {
    c.header('Cache-Control', 'no-store')
    return c.json(describeResources(deps.resources))
  })

  // ── Crawler files ──
  app.get(`/${ROBOTS_TXT}`, (c) => c.redirect(deps.resources.robotsTxt(), 302))
  app.get(`/${ADS_TXT}`, (c) => c.redirect(deps.resources.adsTxt(), 302))

  // ── Static resources ──
  if (isServingProvider(deps.resources)) {
    app.route('/', deps.resources.handler)
  }

  return app
}

