/**
 * @relscout/cli
 *
 * Config loading, diagram rendering and the command runner behind `relscout`.
 */

export * from './config.js';
export * from './render/index.js';
export { DEFAULT_CONFIG_PATH, USAGE, createSources, parseArgs, runCommand } from './app.js';
export type { CliArgs, CommandIo, Sources } from './app.js';
