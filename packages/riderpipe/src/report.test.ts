import { hasUsableData, ReportBuilder } from './report';

describe('ReportBuilder', () => {
  it('counts rows per feed and in total', () => {
    const report = new ReportBuilder();
    report.beginFeed('flow_profile', 'Flow Profile.csv');
    report.loaded();
    report.loaded();
    report.skipped('missing identity');
    report.absent('sleep_test');
    report.beginFeed('day1_assessments');
    report.skipped('assessment not completed');
    report.skipped('missing identity');

    const built = report.build();
    expect(built.totalRowsSeen).toBe(5);
    expect(built.rowsLoaded).toBe(2);
    expect(built.rowsSkipped).toBe(3);
    expect(built.skipReasons).toEqual({ 'missing identity': 2, 'assessment not completed': 1 });
    expect(built.feeds).toEqual([
      { feed: 'flow_profile', source: 'Flow Profile.csv', status: 'ingested', rowsSeen: 3, rowsLoaded: 2, rowsSkipped: 1 },
      { feed: 'sleep_test', source: 'sleep_test', status: 'absent', rowsSeen: 0, rowsLoaded: 0, rowsSkipped: 0 },
      { feed: 'day1_assessments', source: 'day1_assessments', status: 'ingested', rowsSeen: 2, rowsLoaded: 0, rowsSkipped: 2 },
    ]);
  });

  it('marks the current feed failed and keeps its error', () => {
    const report = new ReportBuilder();
    report.beginFeed('xperiencify');
    report.loaded();
    report.failed('boom');
    expect(report.build().feeds[0]).toMatchObject({ status: 'failed', error: 'boom', rowsLoaded: 1 });
  });

  it('records why a feed is absent', () => {
    const report = new ReportBuilder();
    report.absent('race_reviews', 'Race Weekend Review.csv', 'ENOENT');
    expect(report.build().feeds[0]).toMatchObject({ status: 'absent', error: 'ENOENT' });
  });
});

describe('hasUsableData', () => {
  it('is false when nothing loaded', () => {
    const report = new ReportBuilder();
    report.beginFeed('flow_profile');
    report.skipped('missing identity');
    expect(hasUsableData(report.build())).toBe(false);
  });
});
