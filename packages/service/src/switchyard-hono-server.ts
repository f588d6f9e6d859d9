import { createAdaptorServer } from '@hono/node-server'
import type { ServerType } from '@hono/node-server'
import { getLogger } from '@switchyard/telemetry'
import { Hono } from 'hono'

import type { ManagedService } from './types.js'

export interface SwitchyardHonoServerOptions {
  /** Port to listen on. Defaults to 3000. */
  port?: number
  /** Hostname to bind to. Defaults to '0.0.0.0'. */
  hostname?: string
  /** Services whose shutdown() will be called on stop. */
  services?: ManagedService[]
}

/**
 * Hono server wrapper with standard lifecycle management: a `/health`
 * endpoint, `@hono/node-server` binding and graceful shutdown on
 * SIGTERM/SIGINT.
 *
 * @example
 * ```ts
 * await switchyardHonoServer(reconciler.handler, {
 *   services: [reconciler],
 *   port: config.port,
 * }).start()
 * ```
 */
export class SwitchyardHonoServer {
  /** The composed application: `/health` plus the mounted handler. */
  readonly app: Hono
  private readonly _options: SwitchyardHonoServerOptions
  private _server: ServerType | undefined
  private _shutdownHandlers: (() => Promise<void>)[] = []
  private readonly _logger = getLogger(['switchyard', 'hono-server'])

  constructor(handler: Hono, options?: SwitchyardHonoServerOptions) {
    this._options = options ?? {}

    const serviceNames = this._options.services?.map((s) => s.info.name) ?? []
    this.app = new Hono()
    this.app.get('/health', (c) => c.json({ status: 'ok', services: serviceNames }))
    this.app.route('/', handler)
  }

  /** Start listening. Resolves once the server is bound. */
  async start(): Promise<this> {
    if (this._server) {
      throw new Error('Server is already running. Call stop() before starting again.')
    }

    const port = this._options.port ?? 3000
    const hostname = this._options.hostname ?? '0.0.0.0'

    const server = createAdaptorServer({ fetch: this.app.fetch, hostname })
    this._server = server

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        this._logger.error`Port ${port} is already in use`
        process.exit(1)
      }
      throw err
    })

    await new Promise<void>((resolve) => {
      server.listen(port, hostname, () => resolve())
    })

    const shutdownHandler = async () => {
      await this.stop()
      process.exit(0)
    }
    this._shutdownHandlers.push(shutdownHandler)
    process.on('SIGTERM', shutdownHandler)
    process.on('SIGINT', shutdownHandler)

    const names = this._options.services?.map((s) => s.info.name) ?? []
    const suffix = names.length > 0 ? ` [${names.join(', ')}]` : ''
    this._logger.info`Switchyard server${suffix} listening on ${hostname}:${port}`

    return this
  }

  /** The port the server is listening on. Only valid after start(). */
  get port(): number {
    if (!this._server) throw new Error('Server is not running')
    const addr = this._server.address()
    if (typeof addr === 'string' || !addr) throw new Error('Cannot determine port')
    return addr.port
  }

  /** Close the HTTP server, then shut the registered services down. */
  async stop(): Promise<void> {
    if (this._server) {
      const server = this._server
      this._server = undefined
      await new Promise<void>((resolve) => {
        server.close(() => resolve())
      })
    }

    if (this._options.services) {
      const results = await Promise.allSettled(this._options.services.map((s) => s.shutdown()))
      for (const result of results) {
        if (result.status === 'rejected') {
          this._logger.error`Service shutdown failed: ${result.reason}`
        }
      }
    }

    for (const handler of this._shutdownHandlers) {
      process.removeListener('SIGTERM', handler)
      process.removeListener('SIGINT', handler)
    }
    this._shutdownHandlers = []
  }
}

export function switchyardHonoServer(
  handler: Hono,
  options?: SwitchyardHonoServerOptions
): SwitchyardHonoServer {
  return new SwitchyardHonoServer(handler, options)
}
