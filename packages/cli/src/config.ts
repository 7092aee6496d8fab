import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { formatZodError } from '@relscout/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const postgresConnection = {
  type: z.literal('postgresql'),
  id: z.string().min(1).optional(),
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  ssl: sslSchema.optional(),
  schema: z.string().min(1).default('public'),
  connectionTimeoutMs: z.number().int().min(1).max(300_000).optional(),
};

const jsonSchemaSource = z
  .object({
    type: z.literal('json'),
    path: z.string().min(1),
  })
  .strict();

const postgresSchemaSource = z
  .object({
    ...postgresConnection,
    tables: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

const csvSampleSource = z
  .object({
    type: z.literal('csv'),
    directory: z.string().min(1),
    delimiter: z.string().min(1).optional(),
  })
  .strict();

const postgresSampleSource = z.object(postgresConnection).strict();

export const schemaSourceSchema = z.discriminatedUnion('type', [jsonSchemaSource, postgresSchemaSource]);
export const sampleSourceSchema = z.discriminatedUnion('type', [csvSampleSource, postgresSampleSource]);

export const diagramFormatSchema = z.enum(['mermaid', 'plantuml']);

export const cliConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    schema: schemaSourceSchema,
    samples: sampleSourceSchema.optional(),
    patterns: z.string().min(1).optional(),
    customRules: z.string().min(1).optional(),
    stateDir: z.string().min(1).default('./.relscout'),
    pipeline: z
      .object({
        incremental: z.boolean().optional(),
        parallel: z.boolean().optional(),
        grouping: z.enum(['type', 'size']).optional(),
        validate: z.boolean().optional(),
        useCache: z.boolean().optional(),
        timeoutMs: z.number().int().min(1).optional(),
      })
      .strict()
      .default({}),
    output: z
      .object({
        format: diagramFormatSchema.default('mermaid'),
        path: z.string().min(1).optional(),
        title: z.string().min(1).optional(),
        showColumnTypes: z.boolean().default(true),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const entries = [
      ['schema', value.schema],
      ['samples', value.samples],
    ] as const;
    for (const [key, entry] of entries) {
      if (entry?.type === 'postgresql' && !entry.connectionString && !entry.database) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'PostgreSQL source needs connectionString or database',
          path: [key],
        });
      }
    }
  });

export type CliConfig = z.infer<typeof cliConfigSchema>;
export type SchemaSourceEntry = z.infer<typeof schemaSourceSchema>;
export type SampleSourceEntry = z.infer<typeof sampleSourceSchema>;
export type DiagramFormat = z.infer<typeof diagramFormatSchema>;

/**
 * Validate an already-parsed config document after env expansion
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): CliConfig {
  const expanded = expandEnvVars(raw, options);
  const result = cliConfigSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError('Invalid relscout config', result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<CliConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch {
    throw new ConfigError(`Cannot read config file: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfig(parsed, options);
}
