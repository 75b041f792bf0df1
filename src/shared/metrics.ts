export interface PerformanceMetrics {
  totalAnalyses: number;
  computedAnalyses: number;
  primaryHits: number;
  fallbackHits: number;
  cacheMisses: number;
  sharedResults: number;
  ruleFaults: number;
  failures: number;
  cacheHitRate: number;
  averageAnalysisTime: number;
  memoryUsage: number;
  uptime: number;
}

export type CacheHitSource = 'primary' | 'fallback';

export class MetricsCollector {
  private totalAnalyses = 0;
  private computedAnalyses = 0;
  private totalExecutionTime = 0;
  private primaryHits = 0;
  private fallbackHits = 0;
  private cacheMisses = 0;
  private sharedResults = 0;
  private ruleFaults = 0;
  private failures = 0;
  private readonly startedAt = Date.now();

  public recordAnalysis(): void {
    this.totalAnalyses++;
  }

  /** A rule pass that actually ran, with its duration. */
  public recordComputation(executionTime: number, faults: number): void {
    this.computedAnalyses++;
    this.totalExecutionTime += executionTime;
    this.ruleFaults += faults;
  }

  public recordCacheHit(source: CacheHitSource): void {
    if (source === 'primary') {
      this.primaryHits++;
    } else {
      this.fallbackHits++;
    }
  }

  public recordCacheMiss(): void {
    this.cacheMisses++;
  }

  public recordSharedResult(): void {
    this.sharedResults++;
  }

  public recordFailure(): void {
    this.failures++;
  }

  public getMetrics(): PerformanceMetrics {
    const hits = this.primaryHits + this.fallbackHits;
    const lookups = hits + this.cacheMisses;

    return {
      totalAnalyses: this.totalAnalyses,
      computedAnalyses: this.computedAnalyses,
      primaryHits: this.primaryHits,
      fallbackHits: this.fallbackHits,
      cacheMisses: this.cacheMisses,
      sharedResults: this.sharedResults,
      ruleFaults: this.ruleFaults,
      failures: this.failures,
      cacheHitRate: lookups > 0 ? hits / lookups : 0,
      averageAnalysisTime: this.computedAnalyses > 0 ? this.totalExecutionTime / this.computedAnalyses : 0,
      memoryUsage: process.memoryUsage().heapUsed / 1024 / 1024,
      uptime: Date.now() - this.startedAt
    };
  }

  public reset(): void {
    this.totalAnalyses = 0;
    this.computedAnalyses = 0;
    this.totalExecutionTime = 0;
    this.primaryHits = 0;
    this.fallbackHits = 0;
    this.cacheMisses = 0;
    this.sharedResults = 0;
    this.ruleFaults = 0;
    this.failures = 0;
  }
}
