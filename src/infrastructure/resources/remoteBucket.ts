import type { ResourceProvider } from '../../core/ports/resourceProvider.js'
import {
  ADS_TXT,
  ROBOTS_TXT,
  STATIC_PREFIX,
  WASM_FILE,
  staticResourceUrl,
} from '../../core/resources/conventions.js'

/**
 * Static resources hosted on a remote bucket (S3, GCS, a CDN origin).
 * Accepts either the bucket root or its "/web" subpath.
 */
export class RemoteBucketResourceProvider implements ResourceProvider {
  readonly url: string

  constructor(url: string) {
    this.url = normalizeBucketUrl(url)
  }

  appResources(): string {
    return ''
  }

  staticResources(): string {
    return this.url
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

export function normalizeBucketUrl(url: string): string {
  let normalized = url.endsWith('/') ? url.slice(0, -1) : url
  if (normalized.endsWith(STATIC_PREFIX)) {
    normalized = normalized.slice(0, -STATIC_PREFIX.length)
  }
  return normalized
}

export function remoteBucket(url: string): RemoteBucketResourceProvider {
  return new RemoteBucketResourceProvider(url)
}
