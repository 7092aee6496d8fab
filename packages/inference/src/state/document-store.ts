/**
 * Document Stores
 *
 * Persist whole JSON documents by key. The file store keeps one file per key.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { DocumentStore } from '@relscout/core';
import { InferenceError } from '../errors/index.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Stores documents as JSON files under a base directory.
 */
export class JsonFileStore implements DocumentStore {
  constructor(private readonly baseDir: string = './.relscout') {}

  /**
   * Get the file path for a document key
   */
  filePath(key: string): string {
    // Sanitize key to prevent directory traversal
    const sanitized = key.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.baseDir, `${sanitized}.json`);
  }

  private async ensureDir(): Promise<void> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
    } catch (err) {
      throw new InferenceError({
        code: 'STORE_ERROR',
        message: `Failed to create state directory: ${this.baseDir}`,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  async read(key: string): Promise<unknown> {
    const filePath = this.filePath(key);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new InferenceError({
        code: 'STORE_ERROR',
        message: `Failed to read '${key}'`,
        context: { key, filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new InferenceError({
        code: 'STATE_CORRUPT',
        message: `Failed to parse '${key}'`,
        context: { key, filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  /**
   * Write through a temporary file so readers never see a partial document
   */
  async write(key: string, document: unknown): Promise<void> {
    await this.ensureDir();

    const filePath = this.filePath(key);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (err) {
      throw new InferenceError({
        code: 'STORE_ERROR',
        message: `Failed to save '${key}'`,
        context: { key, filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.filePath(key));
    } catch (err) {
      if (isNotFound(err)) return;
      throw new InferenceError({
        code: 'STORE_ERROR',
        message: `Failed to delete '${key}'`,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}

/**
 * In-process store; documents are deep-copied on the way in and out.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.documents.get(key);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  async write(key: string, document: unknown): Promise<void> {
    this.documents.set(key, JSON.stringify(document));
  }

  async delete(key: string): Promise<void> {
    this.documents.delete(key);
  }

  /** Store a raw string, e.g. to simulate a corrupted document */
  writeRaw(key: string, raw: string): void {
    this.documents.set(key, raw);
  }

  has(key: string): boolean {
    return this.documents.has(key);
  }
}
