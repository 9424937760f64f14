import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() ? val.trim() : undefined));

export const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Solvers
  CAPTCHA_API_KEY: optionalString,
  CAPSOLVER_API_KEY: optionalString,
  FLARESOLVERR_URL: optionalString,

  // Proxy
  PROXY_SERVER: optionalString,
  PROXY_USER: optionalString,
  PROXY_PASS: optionalString,

  // Browser
  PUPPETEER_EXECUTABLE_PATH: optionalString,
  BROWSER_HEADLESS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((val) => val === 'true'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
