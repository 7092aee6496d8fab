#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   relscout --config ./relscout.config.json --format plantuml
 */
import { SourceError, Logger } from '@relscout/core';
import { ConfigError, loadConfig } from './config.js';
import { USAGE, parseArgs, runCommand } from './app.js';
import type { CliArgs } from './app.js';

async function main(): Promise<void> {
  let logger = new Logger();

  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error('');
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  try {
    const config = await loadConfig(args.configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    await runCommand(args, config, {
      stdout: (text) => process.stdout.write(`${text}\n`),
      stderr: (text) => process.stderr.write(`${text}\n`),
      logger,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else if (error instanceof SourceError) {
      logger.error(error.toActionableMessage(), { code: error.code, source: error.sourceId });
    } else {
      logger.error('relscout failed', { error });
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
