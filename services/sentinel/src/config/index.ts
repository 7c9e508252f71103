import { z } from 'zod';

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean)
    );

export const ConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    HTTP_HOST: z.string().default('127.0.0.1'),
    HTTP_PORT: z.coerce.number().int().nonnegative().default(8090),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    POSTGRES_URL: z.string().optional(),
    SCAN_INTERFACE: z.string().default('eth0'),
    SCAN_COMMAND: z.string().default('arp-scan'),
    // Space separated; `{interface}` is replaced with SCAN_INTERFACE.
    SCAN_ARGS: z
      .string()
      .default('--interface {interface} --localnet --quiet')
      .transform((value) => value.split(/\s+/).filter(Boolean)),
    SCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
    DRIFT_CHECK_EVERY: z.coerce.number().int().positive().default(3),
    GATEWAY_URLS: list('http://mafreebox.freebox.fr,http://192.168.1.254'),
    GATEWAY_APP_ID: z.string().min(1).default('lanwarden.sentinel'),
    GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    CREDENTIAL_PATHS: list('/var/lib/lanwarden/credentials.json,./credentials.json'),
    BLOCK_COMMENT: z.string().default('blocked by lanwarden')
  })
  .superRefine((cfg, ctx) => {
    if (cfg.STORAGE_DRIVER === 'postgres' && !cfg.POSTGRES_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['POSTGRES_URL'],
        message: 'POSTGRES_URL is required when STORAGE_DRIVER=postgres'
      });
    }
    if (cfg.GATEWAY_URLS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GATEWAY_URLS'],
        message: 'at least one gateway URL is required'
      });
    }
    if (cfg.CREDENTIAL_PATHS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CREDENTIAL_PATHS'],
        message: 'at least one credential path is required'
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | undefined;

export const loadConfig = (): Config => {
  if (!config) {
    config = ConfigSchema.parse(process.env);
  }
  return config;
};

export const resetConfigForTests = () => {
  config = undefined;
};
