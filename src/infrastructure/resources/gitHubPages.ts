import type { ResourceProvider } from '../../core/ports/resourceProvider.js'
import {
  ADS_TXT,
  ROBOTS_TXT,
  WASM_FILE,
  staticResourceUrl,
} from '../../core/resources/conventions.js'

/**
 * Resources hosted under a project subpath ("/<repo>") on a static hosting
 * platform. Everything, app resources included, lives under that subpath.
 *
 * Only meaningful for pre-rendered static sites: nothing here can answer a
 * request at runtime.
 */
export class GitHubPagesResourceProvider implements ResourceProvider {
  readonly repo: string

  constructor(repoName: string) {
    this.repo = repoName.startsWith('/') ? repoName : `/${repoName}`
  }

  appResources(): string {
    return this.repo
  }

  staticResources(): string {
    return this.repo
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

export function gitHubPages(repoName: string): GitHubPagesResourceProvider {
  return new GitHubPagesResourceProvider(repoName)
}
