import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32),
});

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(z.array(JwtKeySchema).min(1)),
  JWT_ISSUER: z.string().min(1).default('tandem'),
});

export type JwtConfig = z.infer<typeof JwtConfigSchema>;

export const GatewayConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(JwtConfigSchema)
  .extend({
    GATEWAY_HOST: z.string().default('0.0.0.0'),
    GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(4000),
    WS_PATH: z.string().startsWith('/').default('/ws'),
    MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(65536),
    RATE_LIMIT_PER_SECOND: z.coerce.number().int().positive().default(30),
    OUTBOUND_CHANNEL_CAPACITY: z.coerce.number().int().positive().default(1000),
    INBOUND_QUEUE_CAPACITY: z.coerce.number().int().positive().default(256),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
    IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  })
  .refine((cfg) => cfg.IDLE_TIMEOUT_MS > cfg.HEARTBEAT_INTERVAL_MS, {
    message: 'IDLE_TIMEOUT_MS must be greater than HEARTBEAT_INTERVAL_MS',
    path: ['IDLE_TIMEOUT_MS'],
  });

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
