import { z } from 'zod';

export const MAX_TOP_N = 100;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().nonnegative().max(65535),
    host: z.string().min(1),
  }),
  crawl: z.object({
    urlsFile: z.string().min(1),
    politenessDelayMs: z.number().int().nonnegative(),
  }),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    backoffStepMs: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
    referer: z.string().min(1),
  }),
  search: z.object({
    defaultTopN: z.number().int().min(1).max(MAX_TOP_N),
  }),
  persistence: z.object({
    snapshotFile: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  search: {
    defaultTopN: number;
    maxTopN: number;
  };
  snapshotName: string;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  search: {
    defaultTopN: config.search.defaultTopN,
    maxTopN: MAX_TOP_N,
  },
  snapshotName: config.persistence.snapshotFile.split(/[\\/]/).pop() ?? config.persistence.snapshotFile,
});
