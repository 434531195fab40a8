/**
 * Resource Server — binds the Hono app to a Node HTTP server.
 *
 * Usage:
 *   const server = new ResourceServer(app, { port: 0 })
 *   await server.start()        // binds to host:port
 *   console.log(server.address) // { host, port }
 *   await server.stop()
 */

import { createServer, type Server } from 'node:http'
import { getRequestListener } from '@hono/node-server'
import { createHttpApp } from './http/httpServer.js'
import type { App } from '../../interfaces/app/createApp.js'
import { DEFAULT_PORT } from '../../config/appConfig.js'

export { DEFAULT_PORT }

export interface ServerOptions {
  port?: number
  host?: string
}

export class ResourceServer {
  readonly #app: App
  readonly #opts: Required<ServerOptions>
  #httpServer: Server | undefined
  #actualPort: number | undefined

  constructor(app: App, opts: ServerOptions = {}) {
    this.#app = app
    this.#opts = {
      port: opts.port ?? DEFAULT_PORT,
      host: opts.host ?? '127.0.0.1',
    }
  }

  async start(): Promise<void> {
    const honoApp = createHttpApp({
      resources: this.#app.resources,
      telemetry: this.#app.telemetry,
    })
    const httpServer = createServer(getRequestListener(honoApp.fetch))
    this.#httpServer = httpServer

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject)
      httpServer.listen(this.#opts.port, this.#opts.host, () => {
        httpServer.off('error', reject)
        const addr = httpServer.address()
        if (addr && typeof addr === 'object') {
          this.#actualPort = addr.port
        }
        resolve()
      })
    })

    this.#app.telemetry.emit({
      type: 'server_started',
      payload: {
        host: this.#opts.host,
        port: this.#actualPort ?? this.#opts.port,
        appResources: this.#app.resources.appResources(),
        staticResources: this.#app.resources.staticResources(),
      },
    })
  }

  async stop(): Promise<void> {
    const httpServer = this.#httpServer
    if (!httpServer) return
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()))
    })
    this.#app.telemetry.emit({
      type: 'server_stopped',
      payload: { host: this.#opts.host, port: this.#actualPort ?? this.#opts.port },
    })
    this.#httpServer = undefined
    this.#actualPort = undefined
  }

  get address(): { host: string; port: number } | undefined {
    if (this.#actualPort === undefined) return undefined
    return { host: this.#opts.host, port: this.#actualPort }
  }

  get isRunning(): boolean {
    return this.#httpServer?.listening ?? false
  }
}
