/**
 * TransactionalFileSystemAdapter
 *
 * Stages generated outputs in memory and writes them only on commit, each
 * through a temp file + rename. A run that fails before commit leaves the
 * output directory untouched.
 */

import { randomUUID } from "crypto";

import type { FileSystemAdapter, IOLogger } from "./types";
import { noopLogger } from "./types";

export class TransactionalFileSystemAdapter implements FileSystemAdapter {
  private readonly base: FileSystemAdapter;
  private readonly log: IOLogger;
  private inTransaction = false;
  private pending = new Map<string, string>();

  constructor(base: FileSystemAdapter, logger: IOLogger = noopLogger) {
    this.base = base;
    this.log = logger;
  }

  beginTransaction(): void {
    this.inTransaction = true;
  }

  /** Paths staged so far, in staging order. */
  stagedPaths(): string[] {
    return Array.from(this.pending.keys());
  }

  async commitTransaction(): Promise<string[]> {
    if (!this.inTransaction) return [];
    const entries = Array.from(this.pending.entries());
    this.pending.clear();
    this.inTransaction = false;
    await this.commitEntries(entries);
    return entries.map(([filePath]) => filePath);
  }

  rollbackTransaction(): void {
    if (this.pending.size > 0) {
      this.log.debug(`Discarding ${this.pending.size} staged output(s)`);
    }
    this.pending.clear();
    this.inTransaction = false;
  }

  isInTransaction(): boolean {
    return this.inTransaction;
  }

  // ---------------------------------------------------------------------------
  // FileSystemAdapter implementation
  // ---------------------------------------------------------------------------

  async readFile(filePath: string): Promise<string> {
    const staged = this.inTransaction ? this.pending.get(filePath) : undefined;
    if (staged !== undefined) return staged;
    return this.base.readFile(filePath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    if (this.inTransaction) {
      this.pending.set(filePath, content);
      return;
    }
    await this.base.writeFile(filePath, content);
  }

  async unlink(filePath: string): Promise<void> {
    this.pending.delete(filePath);
    await this.base.unlink(filePath);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const staged = this.inTransaction ? this.pending.get(oldPath) : undefined;
    if (staged !== undefined) {
      this.pending.delete(oldPath);
      this.pending.set(newPath, staged);
      return;
    }
    await this.base.rename(oldPath, newPath);
  }

  async exists(filePath: string): Promise<boolean> {
    if (this.inTransaction && this.pending.has(filePath)) return true;
    return this.base.exists(filePath);
  }

  listDirectories(dirPath: string): Promise<string[]> {
    return this.base.listDirectories(dirPath);
  }

  dirname(filePath: string): string {
    return this.base.dirname(filePath);
  }

  basename(filePath: string, ext?: string): string {
    return this.base.basename(filePath, ext);
  }

  join(...segments: string[]): string {
    return this.base.join(...segments);
  }

  // ---------------------------------------------------------------------------
  // Commit logic
  // ---------------------------------------------------------------------------

  private buildTempPath(filePath: string): string {
    const dir = this.base.dirname(filePath);
    const base = this.base.basename(filePath);
    return this.base.join(dir, `.tmp-${randomUUID()}-${base}`);
  }

  private async cleanupTempFiles(tempFiles: Iterable<string>): Promise<void> {
    for (const tempPath of tempFiles) {
      try {
        await this.base.unlink(tempPath);
      } catch (err) {
        this.log.warn(`Could not remove temp file ${tempPath}: ${String(err)}`);
      }
    }
  }

  private async commitEntries(entries: Array<[string, string]>): Promise<void> {
    if (entries.length === 0) return;

    const tempFiles = new Map<string, string>();
    try {
      // 1) Write every output to a temp file next to its target.
      for (const [filePath, content] of entries) {
        const tempPath = this.buildTempPath(filePath);
        await this.base.writeFile(tempPath, content);
        tempFiles.set(filePath, tempPath);
      }

      // 2) Move temp files into place.
      for (const [filePath] of entries) {
        const tempPath = tempFiles.get(filePath);
        if (!tempPath) {
          throw new Error(`Missing temp file for ${filePath}`);
        }
        await this.base.rename(tempPath, filePath);
        tempFiles.delete(filePath);
        this.log.debug(`Wrote ${filePath}`);
      }
    } catch (err) {
      await this.cleanupTempFiles(tempFiles.values());
      throw err;
    }
  }
}
