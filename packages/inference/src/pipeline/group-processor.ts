/**
 * Group Processor
 *
 * Runs one task per table group on a bounded worker pool. A group that
 * fails or times out contributes nothing and leaves a warning; the other
 * groups are unaffected. Output keeps group order.
 *
 * Generators are synchronous, so a group holds the thread until it is done.
 * Each group therefore yields to the event loop before it starts, checks
 * the abort signal and the run deadline, and is measured against its own
 * timeout once it returns.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { AbortedError, Mutex, Semaphore, withTimeout } from '@relscout/core';
import type { Logger, Table } from '@relscout/core';
import { InferenceError, describeError } from '../errors/index.js';
import type { PatternRules } from '../patterns/index.js';

export type GroupingStrategy = 'type' | 'size';

export interface TableGroup {
  name: string;
  tables: Table[];
}

export interface GroupRunResult<T> {
  results: T[];
  completed: TableGroup[];
  failed: TableGroup[];
  skipped: TableGroup[];
  warnings: string[];
}

export interface GroupProcessorOptions {
  maxWorkers: number;
  /** Per-group timeout; 0 or undefined disables it */
  timeoutMs?: number;
  /** Groups not started by this time (per `now`) are skipped */
  deadline?: number;
  now?: () => number;
  logger?: Logger;
}

export type GroupTask<T> = (group: TableGroup, signal?: AbortSignal) => Promise<T[]>;

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Split tables into work groups, by naming-convention type or by fixed size.
 * Type groups larger than `batchSize` are split further.
 */
export function groupTables(
  tables: Table[],
  strategy: GroupingStrategy,
  rules: PatternRules,
  batchSize: number
): TableGroup[] {
  switch (strategy) {
    case 'size':
      return chunk(tables, batchSize).map((batch, i) => ({ name: `batch-${i + 1}`, tables: batch }));

    case 'type': {
      const byType = new Map<string, Table[]>();
      for (const table of tables) {
        const type = rules.classifyTable(table.id);
        const group = byType.get(type) ?? [];
        group.push(table);
        byType.set(type, group);
      }

      const groups: TableGroup[] = [];
      for (const [type, members] of byType) {
        const batches = chunk(members, batchSize);
        batches.forEach((batch, i) => {
          groups.push({ name: batches.length > 1 ? `${type}-${i + 1}` : type, tables: batch });
        });
      }
      return groups;
    }

    default: {
      const exhaustive: never = strategy;
      throw new Error(`Unknown grouping strategy: ${String(exhaustive)}`);
    }
  }
}

export class GroupProcessor {
  constructor(private readonly options: GroupProcessorOptions) {}

  async process<T>(groups: TableGroup[], task: GroupTask<T>, signal?: AbortSignal): Promise<GroupRunResult<T>> {
    const pool = new Semaphore(this.options.maxWorkers);
    const resultsLock = new Mutex();
    const outputs: Array<T[] | undefined> = new Array(groups.length);
    const completed: TableGroup[] = [];
    const failed: TableGroup[] = [];
    const skipped: TableGroup[] = [];
    const warnings: string[] = [];
    const { logger, timeoutMs, deadline } = this.options;
    const now = this.options.now ?? Date.now;
    const timedOut = (group: TableGroup) =>
      new InferenceError({
        code: 'GROUP_TIMEOUT',
        message: `group ${group.name} timed out after ${timeoutMs}ms`,
        context: { group: group.name, tables: group.tables.length },
      });

    await Promise.all(
      groups.map((group, index) =>
        pool.run(async () => {
          await yieldToEventLoop();

          const skipReason = signal?.aborted
            ? 'run aborted'
            : deadline !== undefined && now() >= deadline
              ? 'run timed out'
              : undefined;
          if (skipReason) {
            await resultsLock.run(() => {
              skipped.push(group);
              warnings.push(`group ${group.name} skipped: ${skipReason}`);
            });
            return;
          }

          const startedAt = now();
          try {
            const output = await withTimeout(task(group, signal), timeoutMs, () => timedOut(group), signal);
            if (timeoutMs !== undefined && timeoutMs > 0 && now() - startedAt > timeoutMs) {
              throw timedOut(group);
            }
            await resultsLock.run(() => {
              outputs[index] = output;
              completed.push(group);
            });
            logger?.debug('Processed table group', { group: group.name, results: output.length });
          } catch (err) {
            const reason = err instanceof AbortedError ? 'run aborted' : describeError(err);
            const warning = `group ${group.name} dropped: ${reason}`;
            logger?.warn(warning, { tables: group.tables.map((t) => t.id) });
            await resultsLock.run(() => {
              failed.push(group);
              warnings.push(warning);
            });
          }
        })
      )
    );

    const results = outputs.flatMap((output) => output ?? []);
    return { results, completed, failed, skipped, warnings };
  }
}
