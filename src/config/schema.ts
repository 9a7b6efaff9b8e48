/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const pluginsConfigSchema = z.object({
  /** Directories searched for dynamic plugins, in order */
  paths: z.array(z.string().min(1)).default([]),
  /** 'all', or the names of the dynamic plugins to activate */
  activate: z.union([z.literal('all'), z.array(z.string().min(1))]).default('all'),
  /** API version the host claims to provide */
  apiVersion: z.number().int().positive().optional(),
});

export const hooksConfigSchema = z.object({
  /** Register the built-in hook tracer */
  trace: z.boolean().default(false),
  traceFile: z.string().min(1).optional(),
  tracePriority: z.number().int().default(0),
  isolateErrors: z.boolean().default(true),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const hooklineConfigSchema = z.object({
  plugins: pluginsConfigSchema.default({}),
  hooks: hooksConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type HooklineConfig = z.infer<typeof hooklineConfigSchema>;

export function validateConfig(
  data: unknown
): { success: true; data: HooklineConfig } | { success: false; error: string } {
  const result = hooklineConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '),
  };
}
