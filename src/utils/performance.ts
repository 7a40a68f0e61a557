export interface QueryStats {
  queryCount: number;
  totalTime: number;
  slowQueryCount: number;
}

/**
 * クエリ数・実行時間・しきい値を超えたクエリ数を集計する
 */
export class QueryMonitor {
  private stats: QueryStats = {
    queryCount: 0,
    totalTime: 0,
    slowQueryCount: 0,
  };
  private readonly startTime: number = Date.now();

  constructor(private readonly slowQueryMs: number) {}

  /**
   * @returns 遅いクエリだった場合 true
   */
  recordQuery(duration: number): boolean {
    this.stats.queryCount++;
    this.stats.totalTime += duration;

    if (duration < this.slowQueryMs) {
      return false;
    }

    this.stats.slowQueryCount++;
    return true;
  }

  getStats(): QueryStats & { elapsedTime: number } {
    return {
      ...this.stats,
      elapsedTime: Date.now() - this.startTime,
    };
  }

  printSummary(label: string) {
    const stats = this.getStats();
    const average =
      stats.queryCount === 0 ? 0 : stats.totalTime / stats.queryCount;

    console.log(`${label}:`);
    console.log(`  queries: ${stats.queryCount}`);
    console.log(`  total query time: ${formatDuration(stats.totalTime)}`);
    console.log(`  average query time: ${formatDuration(average)}`);
    console.log(`  slow queries: ${stats.slowQueryCount}`);
    console.log(`  uptime: ${formatDuration(stats.elapsedTime)}`);
  }
}

export function truncateSql(sql: string): string {
  const compact = sql.replace(/\s+/g, " ").trim();
  return compact.substring(0, 100) + (compact.length > 100 ? "..." : "");
}

export function formatDuration(ms: number): string {
  if (ms < 1) {
    return `${(ms * 1000).toFixed(2)}μs`;
  } else if (ms < 1000) {
    return `${ms.toFixed(2)}ms`;
  } else {
    return `${(ms / 1000).toFixed(2)}s`;
  }
}
