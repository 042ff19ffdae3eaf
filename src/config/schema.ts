import { z } from 'zod';

export const scraperConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(20_000),
  browser_timeout_ms: z.number().int().positive().default(90_000),
  retries: z.number().int().min(0).default(3),
  backoff_ms: z.number().int().min(0).default(600),
  max_delay_seconds: z.number().min(0).default(10),
  headless: z.boolean().default(true),
  history_size: z.number().int().positive().default(50),
});

export const buildConfigSchema = z.object({
  manifest: z.string().default('build.manifest'),
  context: z.string().default('.'),
  cache_dir: z.string().default('.provision'),
  install_browser: z.boolean().default(true),
});

export const runtimeConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(5000),
  scraper: scraperConfigSchema.default({}),
  build: buildConfigSchema.default({}),
});

export type ScraperConfig = z.infer<typeof scraperConfigSchema>;
export type BuildConfig = z.infer<typeof buildConfigSchema>;
export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
