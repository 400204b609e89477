import nodeConfig from 'config';
import { z } from 'zod';

// Shape of config/default.json after node-config has merged the
// environment file and config/custom-environment-variables.json.
const configSchema = z.object({
  port: z.coerce.number().int().positive(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  upstream: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.coerce.number().int().min(1000).max(120_000),
    userAgent: z.string().min(1)
  }),
  search: z.object({
    engine: z.string().min(1),
    defaultSize: z.number().int().min(1).max(100),
    dictionarySize: z.number().int().min(1).max(100)
  }),
  manuscript: z.object({
    maxBytes: z.number().int().positive(),
    timeoutMs: z.coerce.number().int().min(1000).max(120_000),
    maxAttempts: z.number().int().min(1).max(10),
    initialScale: z.number().gt(0).lt(1)
  })
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(source: unknown = nodeConfig.util.toObject(nodeConfig)): AppConfig {
  const parsed = configSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const cfg = parsed.data;
  return { ...cfg, upstream: { ...cfg.upstream, baseUrl: cfg.upstream.baseUrl.replace(/\/+$/, '') } };
}

export const config: Readonly<AppConfig> = Object.freeze(loadConfig());
