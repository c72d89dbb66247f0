import type { Server } from 'http';
import { defaultConfig, ReportBuilder, RiderDesk, RiderRegistry, silentLogger, storePaths, type EditEntry, type Session } from '@pitwall/riderpipe';
import { SessionHolder } from './routes';
import { createApp } from './server';

let server: Server;
let baseUrl: string;
let appended: EditEntry[];
let loads: number;

function buildSession(): Session {
  const registry = new RiderRegistry();
  registry.getOrCreate('jane@example.com', 'Jane', 'Doe').stage = 'registered';
  registry.getOrCreate('andy_dibrino', 'Andy', 'DiBrino');
  const desk = new RiderDesk(registry, { append: (entries) => appended.push(...entries) }, null, silentLogger);
  return {
    registry,
    report: new ReportBuilder().build(),
    config: defaultConfig(),
    paths: storePaths('/tmp/pitwall-test/.pitwall'),
    desk,
    records: null,
  };
}

beforeEach(async () => {
  appended = [];
  loads = 0;
  const sessions = new SessionHolder(async () => {
    loads++;
    return buildSession();
  });
  server = createApp(sessions).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  baseUrl = `http://127.0.0.1:${address.port}/api`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
});

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, json: await res.json() };
}

describe('rider API', () => {
  it('lists riders and filters by stage label', async () => {
    const all = await call('GET', '/riders');
    expect(all.status).toBe(200);
    expect(Array.isArray(all.json) && all.json.length).toBe(2);

    const registered = await call('GET', '/riders?stage=Podium%20Contenders%20Blueprint%20Started');
    expect(registered.json).toMatchObject([{ key: 'jane@example.com', stage: 'registered' }]);
  });

  it('rejects an unknown stage filter', async () => {
    expect(await call('GET', '/riders?stage=podium')).toEqual({ status: 400, json: { error: 'Unknown stage: podium' } });
  });

  it('plans activity against the revenue target', async () => {
    const res = await call('GET', '/targets');
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({
      targets: { monthly: { revenue: 15000, sales: 4, outreach: 1288 }, dailyOutreach: 64 },
      position: { outreach: 0, registered: 1, day1: 0, day2: 0, calls: 0 },
      forecast: { registrations: 0 },
    });
  });

  it('reports a day of milestones and rejects a bad date', async () => {
    expect(await call('GET', '/today?date=2024-05-10')).toEqual({
      status: 200,
      json: { date: '2024-05-10', outreachSent: 0, newRegistered: 0, day1Completed: 0, day2Completed: 0, callsBooked: 0, salesClosed: 0 },
    });
    expect(await call('GET', '/today?date=someday')).toEqual({ status: 400, json: { error: 'Invalid date: someday' } });
  });

  it('matches race results to riders', async () => {
    const res = await call('POST', '/race-results', { event: 'Donington', names: ['Doe, Jane', 'Maria Lopez'] });
    expect(res.json).toMatchObject([
      { name: 'Doe, Jane', status: 'match_found', key: 'jane@example.com', message: 'Hey Jane, I see you were out at Donington at the weekend. How did it go?' },
      { name: 'Maria Lopez', status: 'new_prospect', key: null },
    ]);
    expect(await call('POST', '/race-results', { names: [] })).toEqual({ status: 400, json: { error: 'event: Required' } });
  });

  it('returns 404 for an unknown rider', async () => {
    expect(await call('GET', '/riders/nobody')).toEqual({ status: 404, json: { error: 'Rider not found: nobody' } });
  });

  it('moves a rider and logs the edits', async () => {
    const res = await call('POST', '/riders/jane/move', { stage: 'client', saleValue: 4000 });
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ rider: { key: 'jane@example.com', stage: 'client', saleValue: 4000 }, sync: null });
    expect(appended.map((e) => [e.field, e.value])).toEqual([
      ['stage', 'client'],
      ['sale_value', '4000'],
    ]);
  });

  it('maps rejected edits to 400', async () => {
    expect(await call('POST', '/riders/jane/move', { stage: 'podium' })).toEqual({
      status: 400,
      json: { error: 'Edit rejected: unknown stage "podium"' },
    });
    expect(await call('POST', '/riders/jane/notes', { text: '' })).toEqual({
      status: 400,
      json: { error: 'text: String must contain at least 1 character(s)' },
    });
    expect(appended).toEqual([]);
  });

  it('updates a single field', async () => {
    const res = await call('PUT', '/riders/andy_dibrino', { field: 'championship', value: 'Club Cup' });
    expect(res.json).toMatchObject({ rider: { key: 'andy_dibrino', championship: 'Club Cup' } });
  });

  it('serves the funnel and revenue figures', async () => {
    const funnel = await call('GET', '/funnel');
    expect(Array.isArray(funnel.json) && funnel.json.length).toBe(9);
    const revenue = await call('GET', '/revenue');
    expect(revenue.json).toEqual({ target: 15000, actual: 0, pipeline: 0, progressPct: 0, clients: 0, callsBooked: 0 });
  });

  it('refuses to push without a records table', async () => {
    expect(await call('POST', '/riders/jane/push')).toEqual({ status: 409, json: { error: 'No records table configured' } });
  });

  it('reloads the session on demand', async () => {
    await call('GET', '/riders');
    const res = await call('POST', '/reload');
    expect(res.json).toMatchObject({ riders: 2 });
    expect(loads).toBe(2);
  });
});

describe('SessionHolder', () => {
  it('does not cache a failed load', async () => {
    let attempts = 0;
    const holder = new SessionHolder(async () => {
      attempts++;
      if (attempts === 1) throw new Error('feeds unreadable');
      return buildSession();
    });
    await expect(holder.get()).rejects.toThrow('feeds unreadable');
    await expect(holder.get()).resolves.toMatchObject({ records: null });
    expect(attempts).toBe(2);
  });
});
