import type { Hono } from 'hono'
import type { ResourceProvider } from '../../core/ports/resourceProvider.js'
import {
  ADS_TXT,
  ROBOTS_TXT,
  WASM_FILE,
  staticResourceUrl,
} from '../../core/resources/conventions.js'
import { createStaticFileHandler } from './staticFileHandler.js'

/** A provider that also answers HTTP requests for its static resources. */
export interface ServingResourceProvider extends ResourceProvider {
  readonly handler: Hono
}

export function isServingProvider(provider: ResourceProvider): provider is ServingResourceProvider {
  return 'handler' in provider
}

/**
 * Static resources served from a local directory. Both roots are empty: app
 * resources come from "/" and static resources from "/web" on the same host.
 */
export class LocalDirResourceProvider implements ServingResourceProvider {
  readonly path: string
  readonly handler: Hono

  constructor(path: string) {
    this.path = path
    this.handler = createStaticFileHandler(path)
  }

  appResources(): string {
    return ''
  }

  staticResources(): string {
    return ''
  }

  appWasm(): string {
    return staticResourceUrl(this.staticResources(), WASM_FILE)
  }

  robotsTxt(): string {
    return staticResourceUrl(this.staticResources(), ROBOTS_TXT)
  }

  adsTxt(): string {
    return staticResourceUrl(this.staticResources(), ADS_TXT)
  }
}

export function localDir(path: string): LocalDirResourceProvider {
  return new LocalDirResourceProvider(path)
}
