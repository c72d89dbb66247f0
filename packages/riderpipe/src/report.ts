export type FeedStatus = 'ingested' | 'absent' | 'failed';

export interface FeedOutcome {
  feed: string;
  source: string;
  status: FeedStatus;
  rowsSeen: number;
  rowsLoaded: number;
  rowsSkipped: number;
  error?: string;
}

export interface LoadReport {
  totalRowsSeen: number;
  rowsLoaded: number;
  rowsSkipped: number;
  skipReasons: Record<string, number>;
  feeds: FeedOutcome[];
}

/** Accumulates row and feed outcomes for one reconciliation run. */
export class ReportBuilder {
  private report: LoadReport = { totalRowsSeen: 0, rowsLoaded: 0, rowsSkipped: 0, skipReasons: {}, feeds: [] };
  private current: FeedOutcome | null = null;

  beginFeed(feed: string, source: string = feed): void {
    this.current = { feed, source, status: 'ingested', rowsSeen: 0, rowsLoaded: 0, rowsSkipped: 0 };
    this.report.feeds.push(this.current);
  }

  absent(feed: string, source: string = feed, error?: string): void {
    const outcome: FeedOutcome = { feed, source, status: 'absent', rowsSeen: 0, rowsLoaded: 0, rowsSkipped: 0 };
    if (error) outcome.error = error;
    this.report.feeds.push(outcome);
    this.current = null;
  }

  failed(error: string): void {
    if (!this.current) return;
    this.current.status = 'failed';
    this.current.error = error;
  }

  loaded(): void {
    this.report.totalRowsSeen++;
    this.report.rowsLoaded++;
    if (this.current) {
      this.current.rowsSeen++;
      this.current.rowsLoaded++;
    }
  }

  skipped(reason: string): void {
    this.report.totalRowsSeen++;
    this.report.rowsSkipped++;
    this.report.skipReasons[reason] = (this.report.skipReasons[reason] ?? 0) + 1;
    if (this.current) {
      this.current.rowsSeen++;
      this.current.rowsSkipped++;
    }
  }

  build(): LoadReport {
    return this.report;
  }
}

/** False when no feed contributed a single row. */
export function hasUsableData(report: LoadReport): boolean {
  return report.rowsLoaded > 0;
}
