import yargs, { type Argv } from 'yargs'
import { createApp, type App } from '../app/createApp.js'
import type { IO } from './io.js'
import { ResourceServer } from '../../infrastructure/servers/server.js'
import { describeResources, type ResourceLocations } from '../../core/ports/resourceProvider.js'

const RESOURCE_KINDS = ['local', 'bucket', 'pages'] as const

/**
 * CLI adapter: parse commands → build the App from env + flags → act on it.
 *
 * Flags win over RELOC_* environment variables; both go through the same
 * config validation.
 */
export async function runCli(opts: {
  argv: string[]
  env: NodeJS.ProcessEnv
  io: IO
  /** Resolves when `serve` should shut down. Defaults to SIGINT/SIGTERM. */
  untilShutdown?: () => Promise<void>
}): Promise<number> {
  const { argv, env, io } = opts
  const untilShutdown = opts.untilShutdown ?? waitForSignal

  const withResourceOptions = <T>(y: Argv<T>) =>
    y
      .option('resources', { alias: 'r', type: 'string', choices: RESOURCE_KINDS, describe: 'Resource backend' })
      .option('location', { alias: 'l', type: 'string', describe: 'Directory, bucket URL or repository name' })

  const parser = yargs(argv)
    .scriptName('reloc')
    .strict()
    .demandCommand(1)
    .help()
    .fail((msg, err) => {
      throw err ?? new Error(msg)
    })

  parser.command(
    'urls',
    'Print where app and static resources are located',
    (y) => withResourceOptions(y).option('json', { type: 'boolean', default: false }),
    (args) => {
      const app = createApp({ env: overrideEnv(env, { resources: args.resources, location: args.location }) })
      const locations = describeResources(app.resources)
      io.stdout(args.json ? `${JSON.stringify(locations, null, 2)}\n` : formatLocations(locations))
    },
  )

  parser.command(
    'serve',
    'Serve static resources from the configured backend',
    (y) =>
      withResourceOptions(y)
        .option('host', { type: 'string' })
        .option('port', { type: 'number' }),
    async (args) => {
      const app = createApp({
        env: overrideEnv(env, {
          resources: args.resources,
          location: args.location,
          host: args.host,
          port: args.port,
        }),
      })
      assertServable(app)

      const server = new ResourceServer(app, app.config.server)
      await server.start()
      const addr = server.address
      if (addr) io.stdout(`Serving on http://${addr.host}:${addr.port}\n`)
      io.stdout(formatLocations(describeResources(app.resources)))
      io.stdout(`Press Ctrl+C to stop.\n`)

      await untilShutdown()
      await server.stop()
    },
  )

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

function overrideEnv(
  env: NodeJS.ProcessEnv,
  flags: { resources?: string; location?: string; host?: string; port?: number },
): NodeJS.ProcessEnv {
  const next: NodeJS.ProcessEnv = { ...env }
  if (flags.resources !== undefined) next.RELOC_RESOURCES = flags.resources
  if (flags.location !== undefined) next.RELOC_RESOURCES_LOCATION = flags.location
  if (flags.host !== undefined) next.RELOC_HOST = flags.host
  if (flags.port !== undefined) next.RELOC_PORT = String(flags.port)
  return next
}

function assertServable(app: App): void {
  if (app.config.resources.kind === 'pages') {
    throw new Error('pages resources only apply to statically generated sites and cannot be served')
  }
}

export function formatLocations(locations: ResourceLocations): string {
  return [
    `App resources:    ${locations.appResources || '/'}`,
    `Static resources: ${locations.staticResources || '/'}`,
    `app.wasm:         ${locations.appWasm}`,
    `robots.txt:       ${locations.robotsTxt}`,
    `ads.txt:          ${locations.adsTxt}`,
  ].join('\n') + '\n'
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve())
    process.once('SIGTERM', () => resolve())
  })
}
