import fs from 'node:fs';
import { logger } from '../utils/logger.js';

/** Swaps instrumented code into source files and puts the originals back. */
export class FileManager {
  private backups = new Map<string, string>();

  backup(filePath: string): void {
    const content = fs.readFileSync(filePath, 'utf-8');
    this.backups.set(filePath, content);
  }

  write(filePath: string, instrumentedContent: string): void {
    if (!this.backups.has(filePath)) {
      throw new Error(`No backup exists for ${filePath}. Call backup() first.`);
    }
    fs.writeFileSync(filePath, instrumentedContent, 'utf-8');
  }

  restore(filePath: string): void {
    const original = this.backups.get(filePath);
    if (original === undefined) {
      throw new Error(`No backup exists for ${filePath}`);
    }
    fs.writeFileSync(filePath, original, 'utf-8');
    this.backups.delete(filePath);
  }

  /** Restores every file it can; the ones that fail are logged and kept for a retry. */
  restoreAll(): string[] {
    const failed: string[] = [];
    for (const [filePath, content] of this.backups) {
      try {
        fs.writeFileSync(filePath, content, 'utf-8');
        this.backups.delete(filePath);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Failed to restore ${filePath}: ${message}`);
        failed.push(filePath);
      }
    }
    return failed;
  }
}
