/**
 * Metrics collection for sync runs
 */

import { SyncDecision } from '../types/index.js';

export interface SyncMetrics {
  startTime: number;
  endTime?: number;
  duration?: number;
  filesListed: number;
  filesProcessed: number;
  filesAdded: number;
  filesUpdated: number;
  filesSkipped: number;
  filesDeleted: number;
  filesCleared: number;
  filesDegraded: number;
  sourceApiCalls: number;
  indexCalls: number;
  errors: ErrorMetric[];
  success: boolean;
}

export interface ErrorMetric {
  timestamp: number;
  errorType: string;
  errorMessage: string;
  context?: Record<string, unknown>;
}

export interface PerformanceMetrics {
  avgFileProcessingTime: number;
  filesPerSecond: number;
}

/**
 * Metrics collector for sync operations
 */
export class MetricsCollector {
  private metrics: SyncMetrics;

  constructor(private readonly now: () => number = Date.now) {
    this.metrics = this.createEmptyMetrics();
  }

  private createEmptyMetrics(): SyncMetrics {
    return {
      startTime: this.now(),
      filesListed: 0,
      filesProcessed: 0,
      filesAdded: 0,
      filesUpdated: 0,
      filesSkipped: 0,
      filesDeleted: 0,
      filesCleared: 0,
      filesDegraded: 0,
      sourceApiCalls: 0,
      indexCalls: 0,
      errors: [],
      success: false,
    };
  }

  /**
   * Start a new metrics collection session
   */
  start(): void {
    this.metrics = this.createEmptyMetrics();
  }

  /**
   * Mark the end of metrics collection
   */
  end(success: boolean): void {
    this.metrics.endTime = this.now();
    this.metrics.duration = this.metrics.endTime - this.metrics.startTime;
    this.metrics.success = success;
  }

  recordFilesListed(count: number): void {
    this.metrics.filesListed = count;
  }

  /**
   * Record a decision that was carried out successfully
   */
  recordFileProcessed(decision: SyncDecision): void {
    switch (decision) {
      case SyncDecision.IndexNew:
        this.metrics.filesProcessed++;
        this.metrics.filesAdded++;
        break;
      case SyncDecision.IndexUpdated:
        this.metrics.filesProcessed++;
        this.metrics.filesUpdated++;
        break;
      case SyncDecision.DeleteStale:
        this.metrics.filesProcessed++;
        this.metrics.filesDeleted++;
        break;
      case SyncDecision.SkipUnchanged:
        this.metrics.filesSkipped++;
        break;
    }
  }

  recordCleared(): void {
    this.metrics.filesCleared++;
  }

  recordDegraded(): void {
    this.metrics.filesDegraded++;
  }

  /**
   * Record API calls
   */
  recordSourceApiCall(): void {
    this.metrics.sourceApiCalls++;
  }

  recordIndexCall(): void {
    this.metrics.indexCalls++;
  }

  /**
   * Record an error
   */
  recordError(error: Error, context?: Record<string, unknown>): void {
    this.metrics.errors.push({
      timestamp: this.now(),
      errorType: error.name,
      errorMessage: error.message,
      context,
    });
  }

  /**
   * Get current metrics
   */
  getMetrics(): SyncMetrics {
    return { ...this.metrics, errors: [...this.metrics.errors] };
  }

  getPerformanceMetrics(): PerformanceMetrics {
    const duration = this.metrics.duration ?? this.now() - this.metrics.startTime;
    const durationSeconds = duration / 1000;

    return {
      avgFileProcessingTime:
        this.metrics.filesProcessed > 0 ? duration / this.metrics.filesProcessed : 0,
      filesPerSecond: durationSeconds > 0 ? this.metrics.filesProcessed / durationSeconds : 0,
    };
  }

  /**
   * Get a summary string for logging
   */
  getSummary(): string {
    const m = this.metrics;
    const perf = this.getPerformanceMetrics();
    return [
      `Sync ${m.success ? 'succeeded' : 'failed'}`,
      `Duration: ${m.duration ?? 0}ms`,
      `Files: ${m.filesListed} listed, ${m.filesProcessed} processed (${m.filesAdded} added, ${m.filesUpdated} updated, ${m.filesDeleted} deleted, ${m.filesSkipped} skipped, ${m.filesCleared} cleared)`,
      `Degraded: ${m.filesDegraded}`,
      `API calls: ${m.sourceApiCalls} source, ${m.indexCalls} index`,
      `Performance: ${perf.filesPerSecond.toFixed(2)} files/s`,
      `Errors: ${m.errors.length}`,
    ].join(' | ');
  }
}
