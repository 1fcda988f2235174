import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { afterEach } from 'vitest';

/**
 * Create a test context with auto-cleanup.
 * Provides temp dirs, pipeline files and unique IDs.
 * All temp dirs are removed in afterEach.
 */
export function testContext() {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      try {
        rmSync(dir, { recursive: true, force: true });
      } catch {
        // EBUSY on Windows — child process may still hold locks. Ignore.
      }
    }
  });

  return {
    createTempDir(): string {
      const dir = mkdtempSync(join(tmpdir(), 'provision-test-'));
      tempDirs.push(dir);
      return dir;
    },
    writePipeline(dir: string, yaml: string, fileName = 'provision.yaml'): string {
      const path = join(dir, fileName);
      writeFileSync(path, yaml);
      return path;
    },
    uniqueId(prefix = 'test'): string {
      return `${prefix}-${randomUUID().slice(0, 8)}`;
    },
  };
}
