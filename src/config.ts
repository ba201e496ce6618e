import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import deepmerge from 'deepmerge';
import { z } from 'zod';
import { ConfigError, toDecodeIssues } from './error.js';

export const AppConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  environment: z.enum(['dev', 'staging', 'prod']),
});

export const CodecConfigSchema = z
  .object({
    unknown_fields: z.enum(['strip', 'reject']).default('strip'),
  })
  .default({});

export const ObservabilityConfigSchema = z
  .object({
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        format: z.enum(['json', 'text']).default('json'),
      })
      .default({}),
  })
  .default({});

export const ConfigSchema = z.object({
  app: AppConfigSchema,
  codec: CodecConfigSchema,
  observability: ObservabilityConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type CodecConfig = z.infer<typeof CodecConfigSchema>;

/**
 * YAML を読み込み Config を返す。envPath があればマージする。
 * スキーマに合わない場合は ConfigError を投げる。
 */
export function load(basePath: string, envPath?: string): Config {
  let config: unknown = parse(readFileSync(basePath, 'utf-8'));

  if (envPath) {
    const envConfig: unknown = parse(readFileSync(envPath, 'utf-8'));
    config = deepmerge(toObject(config), toObject(envConfig));
  }

  return validate(config);
}

/** 設定値をスキーマでパースし、既定値を補った Config を返す。 */
export function validate(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = toDecodeIssues(result.error.issues);
    throw new ConfigError(
      `invalid config: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}

function toObject(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}
