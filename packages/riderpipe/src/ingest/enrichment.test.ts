import { silentLogger } from '../logger';
import { RiderRegistry } from '../registry';
import { ReportBuilder } from '../report';
import type { Row } from '../types';
import { conversationName, facebookHistoryIngestor } from './facebook-history';
import { manualEditIngestor } from './manual';
import { masterIngestor } from './master';
import { instagramUrl, riderDatabaseIngestor } from './rider-database';
import { mergeTags } from './rows';
import { scanShape, socialScanIngestor } from './social-scan';
import type { IngestContext, Ingestor } from './types';
import { stageFromTags, xperiencifyIngestor } from './xperiencify';

const NOW = new Date('2024-07-01T12:00:00.000Z');

function context(ownerName?: string): IngestContext {
  return {
    registry: new RiderRegistry(),
    report: new ReportBuilder(),
    logger: silentLogger,
    now: NOW,
    options: { ownerName },
  };
}

function run(ingestor: Ingestor, rows: Row[], ctx = context(), name = `${ingestor.key}.csv`): IngestContext {
  ctx.report.beginFeed(ingestor.key, name);
  ingestor.ingest({ key: ingestor.key, name, rows }, ctx);
  return ctx;
}

describe('xperiencify', () => {
  it('picks the most advanced course tag', () => {
    expect(stageFromTags('Blueprint Started, Day 1 Completed')).toBe('day1_complete');
    expect(stageFromTags('mission accepted')).toBe('registered');
    expect(stageFromTags('newsletter')).toBeNull();
  });

  it('merges tags and stamps the join date', () => {
    const ctx = context();
    ctx.registry.getOrCreate('jane@example.com').tags = 'vip';
    run(xperiencifyIngestor, [{ email: 'jane@example.com', tags: 'VIP, Day 2 Completed', date_joined: '2024-02-10' }], ctx);
    const rider = ctx.registry.get('jane@example.com');
    expect(rider?.tags).toBe('vip,Day 2 Completed');
    expect(rider?.stage).toBe('day2_complete');
    expect(rider?.milestones.registered).toBe(new Date(2024, 1, 10).toISOString());
    expect(rider?.milestones.outreach).toBe(new Date(2024, 1, 10).toISOString());
  });
});

describe('mergeTags', () => {
  it('keeps first-seen spelling and order', () => {
    expect(mergeTags('a, B', 'b,c,,a')).toBe('a,B,c');
  });
});

describe('rider database', () => {
  it('turns bare handles into profile links', () => {
    expect(instagramUrl('@fast_jane')).toBe('https://www.instagram.com/fast_jane/');
    expect(instagramUrl('https://instagram.com/fast_jane')).toBe('https://instagram.com/fast_jane');
    expect(instagramUrl('')).toBe('');
  });

  it('overwrites contact details and names', () => {
    const ctx = context();
    const rider = ctx.registry.getOrCreate('jane@example.com', 'Janey', '');
    rider.championship = 'Club';
    run(riderDatabaseIngestor, [
      {
        'First Name': 'Jane',
        'Last Name': 'Doe',
        Email: 'jane@example.com',
        Instagram: '@fast_jane',
        'Facebook Profile': 'https://facebook.com/jane.doe',
        Championship: 'British Superbikes',
        'Phone Number': '07700 900000',
      },
    ], ctx);
    expect(rider.firstName).toBe('Jane');
    expect(rider.lastName).toBe('Doe');
    expect(rider.instagramUrl).toBe('https://www.instagram.com/fast_jane/');
    expect(rider.facebookUrl).toBe('https://facebook.com/jane.doe');
    expect(rider.championship).toBe('British Superbikes');
    expect(rider.phone).toBe('07700 900000');
  });

  it('advances by status but overrides on the client flag', () => {
    const ctx = context();
    const rider = ctx.registry.getOrCreate('jane@example.com');
    rider.stage = 'day2_complete';
    run(riderDatabaseIngestor, [{ email: 'jane@example.com', status: 'Messaged', client: 'yes', revenue: '£3,500' }], ctx);
    expect(rider.stage).toBe('client');
    expect(rider.saleValue).toBe(3500);
    expect(rider.milestones.saleClosed).toBe(NOW.toISOString());
  });

  it('ignores a status behind the current stage', () => {
    const ctx = context();
    const rider = ctx.registry.getOrCreate('jane@example.com');
    rider.stage = 'day2_complete';
    run(riderDatabaseIngestor, [{ email: 'jane@example.com', status: 'Messaged' }], ctx);
    expect(rider.stage).toBe('day2_complete');
  });

  it('disqualifies on the not-a-fit flag', () => {
    const ctx = run(riderDatabaseIngestor, [{ name: 'Andy DiBrino', 'not a fit': 'Y' }]);
    const rider = ctx.registry.get('andy_dibrino');
    expect(rider?.stage).toBe('not_a_fit');
    expect(rider?.isDisqualified).toBe(true);
  });
});

describe('social scan', () => {
  it('needs an email column and something to harvest', () => {
    expect(scanShape('contacts.csv', ['email', 'name'])).toBeNull();
    expect(scanShape('contacts.csv', ['name', 'facebook url'])).toBeNull();
    expect(scanShape('Race Weekend Feedback.csv', ['email'])).toEqual({ socials: false, raceReview: true, seasonReview: false });
    expect(scanShape('x.csv', ['email address', 'instagram url'])).toEqual({ socials: true, raceReview: false, seasonReview: false });
  });

  it('harvests socials and review dates for rows with an email', () => {
    const ctx = run(
      socialScanIngestor,
      [
        { 'Email Address': 'jane@example.com', 'Facebook URL': 'https://facebook.com/jane', 'LinkedIn URL': 'https://linkedin.com/in/jane', 'What circuit did you race at?': 'Brands Hatch', submit_date_utc: '2024-04-14 18:00:00' },
        { 'Email Address': 'not given', 'Facebook URL': 'https://facebook.com/someone', 'What circuit did you race at?': 'Silverstone', submit_date_utc: '' },
      ],
      context(),
      'Post race.csv',
    );
    const rider = ctx.registry.get('jane@example.com');
    expect(rider?.facebookUrl).toBe('https://facebook.com/jane');
    expect(rider?.linkedinUrl).toBe('https://linkedin.com/in/jane');
    expect(rider?.milestones.raceReview).toBe(new Date(2024, 3, 14, 18, 0, 0).toISOString());
    expect(rider?.stage).toBe('contact');
    expect(ctx.report.build().skipReasons).toEqual({ 'missing email': 1 });
  });

  it('counts nothing for a file with nothing to harvest', () => {
    const ctx = run(socialScanIngestor, [{ email: 'jane@example.com', name: 'Jane' }]);
    expect(ctx.report.build().totalRowsSeen).toBe(0);
    expect(ctx.registry.size).toBe(0);
  });
});

describe('facebook history', () => {
  it('cleans conversation titles', () => {
    expect(conversationName('  Andy  DiBrino 🏍️ ')).toBe('Andy DiBrino');
  });

  it('marks each conversation partner as messaged with the earliest plausible outreach', () => {
    const ctx = context('Coach Sam');
    const existing = ctx.registry.getOrCreate('andy@example.com', 'Andy', 'DiBrino');
    run(facebookHistoryIngestor, [
      { title: 'Andy DiBrino', messages__timestamp_ms: '1710000000000' },
      { title: 'Andy DiBrino', messages__timestamp_ms: '1700000000000' },
      { title: 'Andy DiBrino', messages__timestamp_ms: '0' },
      { title: 'Maria Lopez', messages__timestamp_ms: '1705000000000' },
      { title: 'Coach Sam', messages__timestamp_ms: '1705000000000' },
      { title: 'nan', messages__timestamp_ms: '1705000000000' },
    ], ctx);

    expect(existing.stage).toBe('messaged');
    expect(existing.outreachChannel).toBe('facebook_dm');
    expect(existing.milestones.outreach).toBe('2023-11-14T22:13:20.000Z');
    expect(ctx.registry.get('maria_lopez')?.firstName).toBe('Maria');
    expect(ctx.registry.has('coach_sam')).toBe(false);
    const report = ctx.report.build();
    expect(report.rowsLoaded).toBe(4);
    expect(report.skipReasons).toEqual({ 'own conversation': 1, 'missing identity': 1 });
  });

  it('leaves riders further along where they are', () => {
    const ctx = context();
    const rider = ctx.registry.getOrCreate('maria_lopez', 'Maria', 'Lopez');
    rider.stage = 'registered';
    run(facebookHistoryIngestor, [{ title: 'Maria Lopez', messages__timestamp_ms: '1705000000000' }], ctx);
    expect(rider.stage).toBe('registered');
  });
});

describe('master records', () => {
  it('wins over local values and stages', () => {
    const ctx = context();
    const rider = ctx.registry.getOrCreate('jane@example.com', 'Jane', 'Doe');
    rider.stage = 'day2_complete';
    rider.championship = 'Club';
    rider.milestones.registered = '2024-01-01T00:00:00.000Z';
    run(masterIngestor, [
      {
        Email: 'jane@example.com',
        'Full Name': 'Jane Doe',
        Stage: 'Client',
        Championship: 'British Superbikes',
        Notes: '',
        Tags: ['vip', 'bsb'],
        'Overall Score': 81,
        'Date Blueprint Started': '2024-02-01',
      },
    ], ctx);
    expect(rider.stage).toBe('client');
    expect(rider.championship).toBe('British Superbikes');
    expect(rider.tags).toBe('vip,bsb');
    expect(rider.scores.day1).toBe(81);
    expect(rider.notes).toBeNull();
    expect(rider.milestones.registered).toBe(new Date(2024, 1, 1).toISOString());
  });
});

describe('manual edits', () => {
  it('applies valid entries oldest first and skips the rest', () => {
    const ctx = run(manualEditIngestor, [
      { key: 'jane@example.com', timestamp: '2024-05-02T00:00:00Z', field: 'stage', value: 'day1_complete' },
      { key: 'jane@example.com', timestamp: '2024-05-01T00:00:00Z', field: 'stage', value: 'day2_complete' },
      { key: 'jane@example.com', timestamp: 'whenever', field: 'stage', value: 'client' },
    ]);
    const rider = ctx.registry.get('jane@example.com');
    expect(rider?.stage).toBe('day1_complete');
    const report = ctx.report.build();
    expect(report.rowsLoaded).toBe(2);
    expect(report.skipReasons).toEqual({ 'edit log: invalid timestamp': 1 });
  });
});
