import type { BuildResult } from './builder.js';

/**
 * Build results keyed by source hash. Entries are never replaced: the first
 * result stored for a hash wins.
 */
export class ProgramCache {
  private readonly entries = new Map<string, BuildResult>();

  get(sourceHash: string): BuildResult | undefined {
    return this.entries.get(sourceHash);
  }

  /** Store `result` unless its hash is present; returns the cached entry. */
  insertIfAbsent(result: BuildResult): BuildResult {
    const existing = this.entries.get(result.program.sourceHash);
    if (existing) return existing;
    this.entries.set(result.program.sourceHash, result);
    return result;
  }

  getOrCompile(sourceHash: string, build: () => BuildResult): BuildResult {
    return this.get(sourceHash) ?? this.insertIfAbsent(build());
  }

  get size(): number {
    return this.entries.size;
  }
}
