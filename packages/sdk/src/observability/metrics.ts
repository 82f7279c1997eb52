/**
 * Metrics tracking for database operations, keyed by database path
 */

export interface DatabaseMetrics {
  reads: number;
  hits: number;
  misses: number;
  saves: number;
  deletes: number;
  conflicts: number;
  saveTimeMs: number[];
  compactions: number;
}

/**
 * Point-in-time view returned by `Database.stats()`
 */
export interface MetricsSnapshot {
  reads: number;
  hitRate: number;
  saves: number;
  deletes: number;
  conflicts: number;
  compactions: number;
  p95SaveMs: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, DatabaseMetrics>();

  /**
   * Get or create metrics for a database
   */
  #getMetrics(path: string): DatabaseMetrics {
    let metrics = this.#metrics.get(path);
    if (!metrics) {
      metrics = {
        reads: 0,
        hits: 0,
        misses: 0,
        saves: 0,
        deletes: 0,
        conflicts: 0,
        saveTimeMs: [],
        compactions: 0,
      };
      this.#metrics.set(path, metrics);
    }
    return metrics;
  }

  /**
   * Record a document lookup and whether it found a live document
   */
  recordRead(path: string, found: boolean): void {
    const metrics = this.#getMetrics(path);
    metrics.reads++;
    if (found) {
      metrics.hits++;
    } else {
      metrics.misses++;
    }
  }

  recordSave(path: string, ms: number): void {
    const metrics = this.#getMetrics(path);
    metrics.saves++;
    metrics.saveTimeMs.push(ms);

    // Keep only the most recent samples to avoid unbounded memory growth
    if (metrics.saveTimeMs.length > MAX_SAMPLES) {
      metrics.saveTimeMs.shift();
    }
  }

  recordDelete(path: string): void {
    this.#getMetrics(path).deletes++;
  }

  recordConflict(path: string): void {
    this.#getMetrics(path).conflicts++;
  }

  recordCompaction(path: string): void {
    this.#getMetrics(path).compactions++;
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  snapshot(path: string): MetricsSnapshot {
    const metrics = this.#getMetrics(path);
    return {
      reads: metrics.reads,
      hitRate: metrics.reads > 0 ? metrics.hits / metrics.reads : 0,
      saves: metrics.saves,
      deletes: metrics.deletes,
      conflicts: metrics.conflicts,
      compactions: metrics.compactions,
      p95SaveMs: this.getP95(metrics.saveTimeMs),
    };
  }

  /**
   * Reset metrics for one database, or all of them
   */
  reset(path?: string): void {
    if (path) {
      this.#metrics.delete(path);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
