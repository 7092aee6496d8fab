/**
 * Command runner: wires the configured sources into the relationship
 * pipeline and writes the rendered diagram.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger, SampleSource, SchemaSource } from '@relscout/core';
import { createRelationshipPipeline, formatQualityReport } from '@relscout/inference';
import {
  CsvSampleSource,
  JsonSchemaSource,
  PostgresClient,
  PostgresSampleSource,
  PostgresSchemaSource,
} from '@relscout/sources';
import { ConfigError, diagramFormatSchema } from './config.js';
import type { CliConfig, DiagramFormat, SampleSourceEntry, SchemaSourceEntry } from './config.js';
import { renderDiagram } from './render/index.js';

export const DEFAULT_CONFIG_PATH = './relscout.config.json';

export const USAGE = `Usage: relscout [--config <relscout.config.json>] [options]

Options:
  --config <path>        Config file (default: ${DEFAULT_CONFIG_PATH})
  --format <format>      Diagram format: mermaid | plantuml
  --output <path>        Write the diagram to a file instead of stdout
  --full                 Reprocess every table and rewrite the incremental state
  --no-validate          Skip sample-based validation
  --report               Print the relationship report to stderr
  --stats                Print cache and incremental state statistics
  --clear-cache [table]  Clear cached relationships, optionally for one table pattern
  --help                 Show this message`;

export interface CliArgs {
  configPath: string;
  format?: DiagramFormat;
  outputPath?: string;
  full: boolean;
  noValidate: boolean;
  report: boolean;
  stats: boolean;
  /** Present when --clear-cache was given; `pattern` narrows it */
  clearCache?: { pattern?: string };
  help: boolean;
}

function optionValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    configPath: DEFAULT_CONFIG_PATH,
    full: false,
    noValidate: false,
    report: false,
    stats: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        parsed.configPath = optionValue(args, i, arg);
        i++;
        break;
      case '--format': {
        const result = diagramFormatSchema.safeParse(optionValue(args, i, arg));
        if (!result.success) {
          throw new ConfigError(`Unsupported format: ${args[i + 1]} (expected mermaid or plantuml)`);
        }
        parsed.format = result.data;
        i++;
        break;
      }
      case '--output':
        parsed.outputPath = optionValue(args, i, arg);
        i++;
        break;
      case '--full':
        parsed.full = true;
        break;
      case '--no-validate':
        parsed.noValidate = true;
        break;
      case '--report':
        parsed.report = true;
        break;
      case '--stats':
        parsed.stats = true;
        break;
      case '--clear-cache': {
        const next = args[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
          parsed.clearCache = { pattern: next };
          i++;
        } else {
          parsed.clearCache = {};
        }
        break;
      }
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${String(arg)}`);
    }
  }

  return parsed;
}

export interface Sources {
  schema: SchemaSource;
  samples?: SampleSource;
  close(): Promise<void>;
}

function createPostgresClient(entry: Extract<SchemaSourceEntry | SampleSourceEntry, { type: 'postgresql' }>) {
  return new PostgresClient({
    id: entry.id,
    connectionString: entry.connectionString,
    host: entry.host,
    port: entry.port,
    database: entry.database,
    user: entry.user,
    password: entry.password,
    ssl: entry.ssl,
    connectionTimeoutMs: entry.connectionTimeoutMs,
  });
}

/**
 * Instantiate the configured schema and sample sources, connecting any
 * database clients. `close()` releases them.
 */
export async function createSources(config: CliConfig): Promise<Sources> {
  const clients: PostgresClient[] = [];
  const close = async () => {
    await Promise.all(clients.map((client) => client.disconnect()));
  };

  try {
    let schema: SchemaSource;
    const schemaEntry = config.schema;
    switch (schemaEntry.type) {
      case 'json':
        schema = new JsonSchemaSource({ path: resolve(process.cwd(), schemaEntry.path) });
        break;
      case 'postgresql': {
        const client = createPostgresClient(schemaEntry);
        clients.push(client);
        await client.connect();
        schema = new PostgresSchemaSource(client, { schema: schemaEntry.schema, tables: schemaEntry.tables });
        break;
      }
      default: {
        const exhaustive: never = schemaEntry;
        throw new ConfigError(`Unknown schema source: ${JSON.stringify(exhaustive)}`);
      }
    }

    let samples: SampleSource | undefined;
    const sampleEntry = config.samples;
    if (sampleEntry) {
      switch (sampleEntry.type) {
        case 'csv':
          samples = new CsvSampleSource({
            directory: resolve(process.cwd(), sampleEntry.directory),
            delimiter: sampleEntry.delimiter,
          });
          break;
        case 'postgresql': {
          const client = createPostgresClient(sampleEntry);
          clients.push(client);
          await client.connect();
          samples = new PostgresSampleSource(client, sampleEntry.schema);
          break;
        }
        default: {
          const exhaustive: never = sampleEntry;
          throw new ConfigError(`Unknown sample source: ${JSON.stringify(exhaustive)}`);
        }
      }
    }

    return { schema, samples, close };
  } catch (error) {
    await close();
    throw error;
  }
}

export interface CommandIo {
  /** Receives one block of output, without the trailing newline */
  stdout(text: string): void;
  stderr(text: string): void;
  logger: Logger;
}

export async function runCommand(args: CliArgs, config: CliConfig, io: CommandIo): Promise<void> {
  const { logger } = io;
  const factoryOptions = {
    patternsPath: config.patterns ? resolve(process.cwd(), config.patterns) : undefined,
    customRulesPath: config.customRules ? resolve(process.cwd(), config.customRules) : undefined,
    stateDir: resolve(process.cwd(), config.stateDir),
    logger,
  };

  if (args.clearCache) {
    const pipeline = await createRelationshipPipeline(factoryOptions);
    const cleared = await pipeline.clearCache(args.clearCache.pattern);
    io.stdout(`Cleared ${cleared.cacheEntries} cached relationships and ${cleared.stateTables} table states`);
    return;
  }

  if (args.stats) {
    const pipeline = await createRelationshipPipeline(factoryOptions);
    io.stdout(JSON.stringify(await pipeline.processingStats(), null, 2));
    return;
  }

  const sources = await createSources(config);
  try {
    const pipeline = await createRelationshipPipeline({ ...factoryOptions, sampleSource: sources.samples });
    const tables = await sources.schema.listTables();
    logger.info('Loaded schema', { source: sources.schema.id, tables: tables.length });

    const result = await pipeline.run(tables, {
      ...config.pipeline,
      force: args.full,
      validate: args.noValidate ? false : config.pipeline.validate,
    });

    const format = args.format ?? config.output.format;
    const diagram = renderDiagram(
      format,
      { tables, relationships: result.relationships },
      { title: config.output.title, showColumnTypes: config.output.showColumnTypes }
    );

    const outputPath = args.outputPath ?? config.output.path;
    if (outputPath) {
      const target = resolve(process.cwd(), outputPath);
      await writeFile(target, `${diagram}\n`, 'utf-8');
      logger.info('Diagram written', { path: target, format });
    } else {
      io.stdout(diagram);
    }

    if (args.report) {
      io.stderr(formatQualityReport(result.report, result));
    }
  } finally {
    await sources.close();
  }
}
