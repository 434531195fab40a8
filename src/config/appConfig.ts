import { z } from 'zod'
import type { ResourceKind } from '../infrastructure/resources/index.js'

export type AppConfig = {
  telemetry: {
    sink: 'none' | 'console'
  }
  resources: {
    kind: ResourceKind
    /** Local directory, bucket URL or repository name, depending on `kind`. */
    location: string
  }
  server: {
    host: string
    port: number
  }
}

/** Default port for `reloc serve`. */
export const DEFAULT_PORT = 7300

const HTTP_URL = /^https?:\/\/[^/]+/

const EnvSchema = z.object({
  RELOC_TELEMETRY_SINK: z.enum(['none', 'console']).default('none'),

  // Resources
  RELOC_RESOURCES: z.enum(['local', 'bucket', 'pages']).default('local'),
  RELOC_RESOURCES_LOCATION: z.string().min(1).default('web'),

  // Server
  RELOC_HOST: z.string().min(1).default('127.0.0.1'),
  RELOC_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
}).superRefine((env, ctx) => {
  if (env.RELOC_RESOURCES === 'bucket' && !HTTP_URL.test(env.RELOC_RESOURCES_LOCATION)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['RELOC_RESOURCES_LOCATION'],
      message: 'bucket resources require an absolute http(s) URL',
    })
  }
})

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    telemetry: {
      sink: parsed.RELOC_TELEMETRY_SINK,
    },
    resources: {
      kind: parsed.RELOC_RESOURCES,
      location: parsed.RELOC_RESOURCES_LOCATION,
    },
    server: {
      host: parsed.RELOC_HOST,
      port: parsed.RELOC_PORT,
    },
  }
}
