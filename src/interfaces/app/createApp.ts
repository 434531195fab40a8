import type { ResourceProvider } from '../../core/ports/resourceProvider.js'
import { ConsoleTelemetrySink, NoopTelemetrySink, type TelemetrySink } from '../../core/ports/telemetry.js'
import { createResourceProvider } from '../../infrastructure/resources/index.js'
import { loadAppConfig, type AppConfig } from '../../config/appConfig.js'

// ============================================================================
// App Container
// ============================================================================

/**
 * App container: the resource provider chosen by configuration, plus the
 * telemetry sink everything reports to. Built once at startup.
 */
export interface App {
  config: AppConfig
  resources: ResourceProvider
  telemetry: TelemetrySink
}

export function createApp(opts: { env?: NodeJS.ProcessEnv; config?: AppConfig } = {}): App {
  const config = opts.config ?? loadAppConfig(opts.env ?? process.env)
  const telemetry: TelemetrySink = config.telemetry.sink === 'console'
    ? new ConsoleTelemetrySink()
    : new NoopTelemetrySink()

  return {
    config,
    resources: createResourceProvider(config.resources),
    telemetry,
  }
}
