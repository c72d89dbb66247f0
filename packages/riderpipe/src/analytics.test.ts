import {
  calculateTargets,
  dailyMetrics,
  daysInStage,
  dueFollowUps,
  forecastRevenue,
  funnel,
  funnelPosition,
  matchRaceName,
  processRaceResults,
  revenueMetrics,
  stageCounts,
  stalledRiders,
} from './analytics';
import { createRider } from './registry';
import type { Stage } from './stages';
import type { Rider } from './types';

function rider(key: string, stage: Stage, patch: Partial<Rider> = {}): Rider {
  return { ...createRider(key), stage, ...patch };
}

describe('stageCounts', () => {
  it('counts every stage, including empty ones', () => {
    const counts = stageCounts([rider('a', 'client'), rider('b', 'client'), rider('c', 'messaged')]);
    expect(counts.get('client')).toBe(2);
    expect(counts.get('messaged')).toBe(1);
    expect(counts.get('replied')).toBe(0);
  });
});

describe('funnel', () => {
  it('counts riders at or beyond each step', () => {
    const steps = funnel([
      rider('a', 'contact'),
      rider('b', 'messaged'),
      rider('c', 'registered', { milestones: { outreach: '2024-04-01T00:00:00.000Z' } }),
      rider('d', 'client'),
    ]);
    expect(steps.map((s) => [s.stage, s.reached, s.pct])).toEqual([
      ['contact', 4, 100],
      ['messaged', 3, 75],
      ['replied', 2, 50],
      ['link_sent', 2, 50],
      ['registered', 2, 50],
      ['day1_complete', 1, 25],
      ['day2_complete', 1, 25],
      ['strategy_call_booked', 1, 25],
      ['client', 1, 25],
    ]);
    expect(steps[4].current).toBe(1);
  });

  it('credits disqualified riders with the milestones they reached', () => {
    const steps = funnel([rider('a', 'not_a_fit', { milestones: { registered: '2024-04-01T00:00:00.000Z' } })]);
    expect(steps.find((s) => s.stage === 'registered')?.reached).toBe(1);
    expect(steps[0].reached).toBe(0);
    expect(steps[0].pct).toBe(0);
  });
});

describe('revenueMetrics', () => {
  it('values clients at their sale or the programme price', () => {
    const metrics = revenueMetrics(
      [rider('a', 'client', { saleValue: 3500 }), rider('b', 'client'), rider('c', 'strategy_call_booked'), rider('d', 'day2_complete')],
      { monthly_revenue: 15000, programme_price: 4000 },
    );
    expect(metrics).toEqual({ target: 15000, actual: 7500, pipeline: 1000, progressPct: 50, clients: 2, callsBooked: 1 });
  });
});

describe('stalledRiders', () => {
  const now = new Date('2024-05-10T12:00:00.000Z');

  it('groups riders stuck past the threshold, longest first', () => {
    const r1 = rider('r1', 'registered', { milestones: { registered: '2024-05-01T12:00:00.000Z' } });
    const r2 = rider('r2', 'registered', { milestones: { registered: '2024-05-09T12:00:00.000Z' } });
    const r3 = rider('r3', 'day1_complete', { milestones: { day1Complete: '2024-05-05T12:00:00.000Z' } });
    const r4 = rider('r4', 'messaged');
    const r5 = rider('r5', 'messaged', { milestones: { outreach: '2024-04-30T12:00:00.000Z' } });
    const r6 = rider('r6', 'registered', { milestones: { registered: '2024-04-20T12:00:00.000Z' } });

    const stalled = stalledRiders([r1, r2, r3, r4, r5, r6], 3, now);
    expect(stalled.registered_no_day1.map((s) => [s.rider.key, s.days])).toEqual([
      ['r6', 20],
      ['r1', 9],
    ]);
    expect(stalled.day1_no_day2.map((s) => s.rider.key)).toEqual(['r3']);
    expect(stalled.day2_no_call).toEqual([]);
    expect(stalled.messaged_no_reply.map((s) => [s.rider.key, s.days])).toEqual([['r5', 10]]);
  });
});

describe('daysInStage', () => {
  it('is null when the stage has no milestone on record', () => {
    expect(daysInStage(rider('a', 'contact'), new Date())).toBeNull();
    expect(daysInStage(rider('b', 'client'), new Date())).toBeNull();
  });
});

describe('dueFollowUps', () => {
  it('returns today and overdue follow-ups, oldest first', () => {
    const now = new Date(2024, 4, 10, 9, 0, 0);
    const today = rider('today', 'messaged', { followUpDate: new Date(2024, 4, 10, 18, 0, 0).toISOString() });
    const overdue = rider('overdue', 'registered', { followUpDate: new Date(2024, 4, 8).toISOString() });
    const later = rider('later', 'registered', { followUpDate: new Date(2024, 4, 11, 0, 30).toISOString() });
    const none = rider('none', 'registered');
    expect(dueFollowUps([today, later, none, overdue], now).map((r) => r.key)).toEqual(['overdue', 'today']);
  });
});

describe('calculateTargets', () => {
  it('works back from the revenue target through each conversion rate', () => {
    expect(calculateTargets({ monthly_revenue: 15000, programme_price: 4000 })).toEqual({
      monthly: { revenue: 15000, sales: 4, strategyCalls: 17, day2Completions: 43, day1Completions: 72, registrations: 103, outreach: 1288 },
      weekly: { revenue: 3750, sales: 1, strategyCalls: 4, day2Completions: 10, day1Completions: 18, registrations: 25, outreach: 322 },
      dailyOutreach: 64,
    });
  });
});

describe('forecastRevenue', () => {
  it('projects each step from the riders waiting before it', () => {
    const rates = {
      outreach_to_registration: 0.5,
      registration_to_day1: 0.5,
      day1_to_day2: 0.5,
      day2_to_strategy_call: 0.5,
      strategy_call_to_sale: 0.5,
    };
    expect(forecastRevenue({ outreach: 10, registered: 1, day1: 0, day2: 3, calls: 1 }, 1000, rates)).toEqual({
      registrations: 5,
      day1: 3,
      day2: 1.5,
      calls: 2.25,
      sales: 1.625,
      revenue: 1625,
    });
  });
});

describe('funnelPosition', () => {
  it('groups messaged to link-sent riders as outreach', () => {
    const stages: Stage[] = [
      'contact',
      'messaged',
      'flow_profile_completed',
      'link_sent',
      'registered',
      'day2_complete',
      'strategy_call_booked',
      'client',
      'not_a_fit',
    ];
    expect(funnelPosition(stages.map((stage, i) => rider(`r${i}`, stage)))).toEqual({
      outreach: 3,
      registered: 1,
      day1: 0,
      day2: 1,
      calls: 1,
    });
  });
});

describe('dailyMetrics', () => {
  it('counts milestones stamped on the given local day', () => {
    const day = new Date(2024, 4, 10, 18, 0, 0);
    const metrics = dailyMetrics(
      [
        rider('a', 'registered', {
          milestones: {
            outreach: new Date(2024, 4, 10, 9, 0, 0).toISOString(),
            registered: new Date(2024, 4, 9, 23, 0, 0).toISOString(),
          },
        }),
        rider('b', 'client', {
          milestones: {
            day1Complete: new Date(2024, 4, 10, 0, 30, 0).toISOString(),
            saleClosed: new Date(2024, 4, 10, 23, 59, 0).toISOString(),
          },
        }),
      ],
      day,
    );
    expect(metrics).toEqual({
      date: '2024-05-10',
      outreachSent: 1,
      newRegistered: 0,
      day1Completed: 1,
      day2Completed: 0,
      callsBooked: 0,
      salesClosed: 1,
    });
  });
});

describe('matchRaceName', () => {
  const riders = [
    rider('jane@example.com', 'messaged', { firstName: 'Jane', lastName: 'Doe' }),
    rider('andy@example.com', 'registered', { firstName: 'Andy', lastName: 'DiBrino' }),
    rider('joshua_ferrer', 'contact', { firstName: 'Joshua', lastName: 'Ferrer' }),
    rider('kim', 'contact', { firstName: 'Kim' }),
  ];

  it('matches exact names regardless of case and spacing', () => {
    expect(matchRaceName(riders, ' JANE   doe ')?.key).toBe('jane@example.com');
    expect(matchRaceName(riders, 'Kim')?.key).toBe('kim');
  });

  it('swaps "Last, First" names', () => {
    expect(matchRaceName(riders, 'DiBrino, Andy')?.key).toBe('andy@example.com');
  });

  it('needs two shared words for a loose match', () => {
    expect(matchRaceName(riders, 'Ferrer Joshua')?.key).toBe('joshua_ferrer');
    expect(matchRaceName(riders, 'Joshua')).toBeNull();
    expect(matchRaceName(riders, 'Joshua Smith')).toBeNull();
    expect(matchRaceName(riders, '  ')).toBeNull();
  });
});

describe('processRaceResults', () => {
  it('classifies names and drafts an opening message for each', () => {
    const jane = rider('jane@example.com', 'race_review_completed', {
      firstName: 'Jane',
      lastName: 'Doe',
      facebookUrl: 'https://facebook.com/jane.doe',
      milestones: { raceReview: '2024-04-01T00:00:00.000Z' },
    });
    expect(processRaceResults([jane], ['Jane Doe', '', '  maria lopez  '], 'Brands Hatch')).toEqual([
      {
        name: 'Jane Doe',
        status: 'match_found',
        key: 'jane@example.com',
        stage: 'race_review_completed',
        facebookUrl: 'https://facebook.com/jane.doe',
        message:
          'Hey Jane, great to see you out at Brands Hatch! Saw you already did your review - how are you feeling about the progress since then?',
      },
      {
        name: 'maria lopez',
        status: 'new_prospect',
        key: null,
        stage: null,
        facebookUrl: null,
        message: 'Hey Maria, I see you were out at Brands Hatch at the weekend. How did it go?',
      },
    ]);
  });
});
