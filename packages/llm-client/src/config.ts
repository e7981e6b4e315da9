import fs from 'node:fs';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import type { ModelFamily } from '@streamnorm/stream-core';

import { LlmClientError } from './errors';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

const ModelFamilySchema: z.ZodType<ModelFamily> = z.enum([
  'base',
  'glm',
  'deepseek',
  'think-tags',
  'plain',
]);

export const ModelConfigSchema = z.object({
  /** Name callers use to pick the model. */
  callName: NonEmptyTrimmedStringSchema,
  /** Model id sent to the provider. */
  name: NonEmptyTrimmedStringSchema,
  apiBase: NonEmptyTrimmedStringSchema,
  apiKey: z.string().trim().optional(),
  /** Overrides the adapter picked from the model name. */
  adapter: ModelFamilySchema.optional(),
  maxTokens: z.number().int().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  headers: z.record(z.string(), z.string()).optional(),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

export const ModelsConfigSchema = z
  .object({
    defaultModel: NonEmptyTrimmedStringSchema.optional(),
    models: z.array(ModelConfigSchema).min(1),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    for (const model of value.models) {
      if (seen.has(model.callName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['models'],
          message: `Duplicate model callName "${model.callName}"`,
        });
      }
      seen.add(model.callName);
    }

    if (value.defaultModel !== undefined && !seen.has(value.defaultModel)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultModel'],
        message: `defaultModel "${value.defaultModel}" does not name a configured model`,
      });
    }
  });

export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;

function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, name: string) => env[name] ?? '');
}

/**
 * Recursively walk a value and substitute environment variables in all strings.
 */
function deepSubstitute(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => deepSubstitute(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = deepSubstitute(val, env);
    }
    return result;
  }

  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates an already-parsed configuration object, substituting `${VAR}`
 * references first.
 */
export function parseModelsConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = 'configuration',
): ModelsConfig {
  const result = ModelsConfigSchema.safeParse(deepSubstitute(raw, env));
  if (!result.success) {
    throw new LlmClientError(
      'config_error',
      `Invalid ${source}: ${formatIssues(result.error)}`,
      result.error.issues,
    );
  }
  return result.data;
}

export function loadModelsConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): ModelsConfig {
  const resolvedPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new LlmClientError('config_error', `Configuration file not found at ${resolvedPath}`);
    }
    throw new LlmClientError(
      'config_error',
      `Failed to read configuration file at ${resolvedPath}: ${String(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = resolvedPath.endsWith('.json') ? JSON.parse(raw) : yaml.parse(raw);
  } catch (err) {
    throw new LlmClientError(
      'config_error',
      `Configuration file at ${resolvedPath} could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseModelsConfig(parsed, env, `configuration file at ${resolvedPath}`);
}
