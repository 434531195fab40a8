/**
 * ResourceProvider — where app resources and static resources live.
 *
 * App resources are the files the runtime requires at fixed paths (manifest,
 * loader script, worker). Static resources are the application's own assets
 * (app.wasm, styles, images) and are always addressed under "/web".
 *
 * Every query is pure and synchronous. The three derived URLs must match
 * `staticResources() + "/web/<file>"`.
 */
export interface ResourceProvider {
  /** Root-relative path under which app resources are reachable. */
  appResources(): string

  /** Path or URL of the location holding the "/web" directory. */
  staticResources(): string

  appWasm(): string

  robotsTxt(): string

  adsTxt(): string
}

export type ResourceLocations = {
  appResources: string
  staticResources: string
  appWasm: string
  robotsTxt: string
  adsTxt: string
}

export function describeResources(provider: ResourceProvider): ResourceLocations {
  return {
    appResources: provider.appResources(),
    staticResources: provider.staticResources(),
    appWasm: provider.appWasm(),
    robotsTxt: provider.robotsTxt(),
    adsTxt: provider.adsTxt(),
  }
}
