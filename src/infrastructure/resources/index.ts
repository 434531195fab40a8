import type { ResourceProvider } from '../../core/ports/resourceProvider.js'
import { localDir } from './localDir.js'
import { remoteBucket } from './remoteBucket.js'
import { gitHubPages } from './gitHubPages.js'

export { localDir, isServingProvider, LocalDirResourceProvider, type ServingResourceProvider } from './localDir.js'
export { remoteBucket, normalizeBucketUrl, RemoteBucketResourceProvider } from './remoteBucket.js'
export { gitHubPages, GitHubPagesResourceProvider } from './gitHubPages.js'

export type ResourceKind = 'local' | 'bucket' | 'pages'

export function createResourceProvider(opts: { kind: ResourceKind; location: string }): ResourceProvider {
  switch (opts.kind) {
    case 'local': return localDir(opts.location)
    case 'bucket': return remoteBucket(opts.location)
    case 'pages': return gitHubPages(opts.location)
  }
}
