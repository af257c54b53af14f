/**
 * Artifact sinks
 * Write-only destinations for request and response snapshots
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface ArtifactSink {
  record(name: string, body: unknown): Promise<void>;
}

/**
 * Writes each snapshot to `<dir>/<name>.json`
 */
export class FileArtifactSink implements ArtifactSink {
  private ready: Promise<unknown> | null = null;

  constructor(readonly dir: string) {}

  async record(name: string, body: unknown): Promise<void> {
    this.ready ??= mkdir(this.dir, { recursive: true }).catch((error: unknown) => {
      this.ready = null;
      throw error;
    });
    await this.ready;
    await writeFile(join(this.dir, `${name}.json`), `${JSON.stringify(body, null, 2)}\n`, 'utf-8');
  }
}

export class MemoryArtifactSink implements ArtifactSink {
  readonly artifacts = new Map<string, unknown>();

  async record(name: string, body: unknown): Promise<void> {
    this.artifacts.set(name, structuredClone(body));
  }

  get(name: string): unknown {
    return this.artifacts.get(name);
  }

  names(): string[] {
    return [...this.artifacts.keys()];
  }
}
