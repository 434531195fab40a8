/**
 * Tests for HTTP routes: health, resource locations, crawler redirects, static serving.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { HTTPException } from 'hono/http-exception'
import { createHttpApp } from '../../src/infrastructure/servers/http/httpServer.js'
import { gitHubPages, localDir, remoteBucket } from '../../src/infrastructure/resources/index.js'
import type { ResourceProvider } from '../../src/core/ports/resourceProvider.js'
import { RecordingTelemetrySink } from '../helpers/recordingTelemetrySink.js'

function createTestApp(resources: ResourceProvider) {
  const telemetry = new RecordingTelemetrySink()
  return { app: createHttpApp({ resources, telemetry }), telemetry }
}

describe('HTTP API', () => {
  describe('with a local directory', () => {
    let app: ReturnType<typeof createHttpApp>
    let telemetry: RecordingTelemetrySink

    beforeEach(() => {
      const t = createTestApp(localDir('tests/fixtures/static'))
      app = t.app
      telemetry = t.telemetry
    })

    it('returns health', async () => {
      const res = await app.request('/api/health')
      expect(res.status).toBe(200)
      const body = await res.json() as { status: string; pid: number }
      expect(body.status).toBe('ok')
      expect(body.pid).toBe(process.pid)
    })

    it('describes resource locations', async () => {
      const res = await app.request('/api/resources')
      expect(res.status).toBe(200)
      expect(res.headers.get('Cache-Control')).toBe('no-store')
      expect(await res.json()).toEqual({
        appResources: '',
        staticResources: '',
        appWasm: '/web/app.wasm',
        robotsTxt: '/web/robots.txt',
        adsTxt: '/web/ads.txt',
      })
    })

    it('serves static files under /web', async () => {
      const res = await app.request('/web/ads.txt')
      expect(res.status).toBe(200)
      expect(await res.text()).toBe('example.com, pub-0000000000000000, DIRECT\n')
    })

    it('does not serve static files from the root', async () => {
      const res = await app.request('/app.wasm')
      expect(res.status).toBe(404)
    })

    it('redirects root crawler files into /web', async () => {
      const robots = await app.request('/robots.txt')
      expect(robots.status).toBe(302)
      expect(robots.headers.get('Location')).toBe('/web/robots.txt')

      const ads = await app.request('/ads.txt')
      expect(ads.status).toBe(302)
      expect(ads.headers.get('Location')).toBe('/web/ads.txt')
    })

    it('reports each request to telemetry', async () => {
      await app.request('/web/missing.txt')
      expect(telemetry.events).toHaveLength(1)
      const [event] = telemetry.events
      expect(event?.type).toBe('request_served')
      if (event?.type !== 'request_served') return
      expect(event.payload.method).toBe('GET')
      expect(event.payload.path).toBe('/web/missing.txt')
      expect(event.payload.status).toBe(404)
    })
  })

  describe('with a remote bucket', () => {
    const { app } = createTestApp(remoteBucket('https://s3.example.com/myapp/web'))

    it('redirects crawler files to the bucket', async () => {
      const res = await app.request('/robots.txt')
      expect(res.status).toBe(302)
      expect(res.headers.get('Location')).toBe('https://s3.example.com/myapp/web/robots.txt')
    })

    it('does not serve /web itself', async () => {
      const res = await app.request('/web/app.wasm')
      expect(res.status).toBe(404)
    })

    it('describes the bucket locations', async () => {
      const res = await app.request('/api/resources')
      const body = await res.json() as { staticResources: string; appWasm: string }
      expect(body.staticResources).toBe('https://s3.example.com/myapp')
      expect(body.appWasm).toBe('https://s3.example.com/myapp/web/app.wasm')
    })
  })

  describe('with a hosting subpath', () => {
    const { app } = createTestApp(gitHubPages('my-repo'))

    it('describes the subpath locations', async () => {
      const res = await app.request('/api/resources')
      const body = await res.json() as { appResources: string; adsTxt: string }
      expect(body.appResources).toBe('/my-repo')
      expect(body.adsTxt).toBe('/my-repo/web/ads.txt')
    })
  })

  describe('errors', () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    it('keeps the status of client-side HTTP exceptions', async () => {
      const { app } = createTestApp(remoteBucket('https://cdn.example.com'))
      app.get('/range', () => {
        throw new HTTPException(416, { message: 'Range Not Satisfiable' })
      })
      const res = await app.request('/range')
      expect(res.status).toBe(416)
      expect(await res.text()).toBe('Range Not Satisfiable')
    })

    it('hides unexpected errors behind a 500', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      const { app } = createTestApp(remoteBucket('https://cdn.example.com'))
      app.get('/boom', () => {
        throw new Error('disk on fire')
      })
      const res = await app.request('/boom')
      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: 'Internal server error' })
      expect(error).toHaveBeenCalledTimes(1)
    })
  })
})
