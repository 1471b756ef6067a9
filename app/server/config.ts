import { z } from 'zod'

const serverEnvSchema = z.object({
  TAXOTAGGER_API_URL: z.string().url().default('http://localhost:8000'),
})

export interface ServerConfig {
  taxotaggerApiUrl: string
}

export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse({
    TAXOTAGGER_API_URL: env.TAXOTAGGER_API_URL || undefined,
  })
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid server configuration: ${details}`)
  }
  return { taxotaggerApiUrl: parsed.data.TAXOTAGGER_API_URL }
}
