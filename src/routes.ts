import { Router, type Response } from 'express';
import { z, ZodError } from 'zod';
import {
  calculateTargets,
  dailyMetrics,
  dueFollowUps,
  EDIT_FIELDS,
  EditRejectedError,
  forecastRevenue,
  funnel,
  funnelPosition,
  parseDate,
  processRaceResults,
  pushRider,
  resolveStageFilter,
  revenueMetrics,
  RiderNotFoundError,
  stalledRiders,
  type Session,
} from '@pitwall/riderpipe';

/** Holds the current reconciliation. A failed load is not cached. */
export class SessionHolder {
  private pending: Promise<Session> | null = null;

  constructor(private load: () => Promise<Session>) {}

  get(): Promise<Session> {
    return this.pending ?? this.reload();
  }

  reload(): Promise<Session> {
    const next = this.load().catch((e: unknown) => {
      if (this.pending === next) this.pending = null;
      throw e;
    });
    this.pending = next;
    return next;
  }
}

const moveBody = z.object({ stage: z.string().min(1), saleValue: z.number().nonnegative().optional() });
const fieldBody = z.object({ field: z.enum(EDIT_FIELDS), value: z.string() });
const noteBody = z.object({ text: z.string().min(1) });
const followUpBody = z.object({ date: z.string().min(1) });
const disqualifyBody = z.object({ reason: z.string().min(1) });
const raceResultsBody = z.object({ event: z.string().min(1), names: z.array(z.string()) });
const riderBody = z.object({
  email: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  facebookUrl: z.string().optional(),
  instagramUrl: z.string().optional(),
  championship: z.string().optional(),
  notes: z.string().optional(),
  followUpDate: z.string().optional(),
});

function sendError(res: Response, e: unknown): void {
  if (e instanceof RiderNotFoundError) {
    res.status(404).json({ error: e.message });
  } else if (e instanceof EditRejectedError) {
    res.status(400).json({ error: e.message });
  } else if (e instanceof ZodError) {
    const issue = e.issues[0];
    res.status(400).json({ error: `${issue.path.join('.') || 'body'}: ${issue.message}` });
  } else {
    res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
  }
}

function queryText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

export function createRiderRouter(sessions: SessionHolder): Router {
  const router = Router();

  // --- Reads ---

  router.get('/riders', async (req, res) => {
    try {
      const { registry } = await sessions.get();
      const filter = queryText(req.query.stage);
      if (!filter) return res.json(registry.all());
      const stages = resolveStageFilter(filter);
      if (!stages.ok) return res.status(400).json({ error: `Unknown stage: ${stages.unknown}` });
      res.json(registry.all().filter((r) => stages.stages.includes(r.stage)));
    } catch (e) { sendError(res, e); }
  });

  router.get('/riders/:key', async (req, res) => {
    try {
      const { desk } = await sessions.get();
      res.json(desk.get(req.params.key));
    } catch (e) { sendError(res, e); }
  });

  router.get('/report', async (_req, res) => {
    try {
      res.json((await sessions.get()).report);
    } catch (e) { sendError(res, e); }
  });

  router.get('/funnel', async (_req, res) => {
    try {
      res.json(funnel((await sessions.get()).registry.all()));
    } catch (e) { sendError(res, e); }
  });

  router.get('/revenue', async (_req, res) => {
    try {
      const { registry, config } = await sessions.get();
      res.json(revenueMetrics(registry.all(), config.targets));
    } catch (e) { sendError(res, e); }
  });

  router.get('/stale', async (req, res) => {
    try {
      const { registry, config } = await sessions.get();
      const days = Number(queryText(req.query.days)) || config.stale.days;
      res.json(stalledRiders(registry.all(), days, new Date()));
    } catch (e) { sendError(res, e); }
  });

  router.get('/due', async (_req, res) => {
    try {
      res.json(dueFollowUps((await sessions.get()).registry.all(), new Date()));
    } catch (e) { sendError(res, e); }
  });

  router.get('/targets', async (_req, res) => {
    try {
      const { registry, config } = await sessions.get();
      const rates = config.conversion_rates;
      const position = funnelPosition(registry.all());
      res.json({
        targets: calculateTargets(config.targets, rates),
        position,
        forecast: forecastRevenue(position, config.targets.programme_price, rates),
      });
    } catch (e) { sendError(res, e); }
  });

  router.get('/today', async (req, res) => {
    try {
      const raw = queryText(req.query.date);
      const day = raw ? parseDate(raw) : new Date();
      if (!day) return res.status(400).json({ error: `Invalid date: ${raw}` });
      res.json(dailyMetrics((await sessions.get()).registry.all(), day));
    } catch (e) { sendError(res, e); }
  });

  router.post('/race-results', async (req, res) => {
    try {
      const { event, names } = raceResultsBody.parse(req.body);
      res.json(processRaceResults((await sessions.get()).registry.all(), names, event));
    } catch (e) { sendError(res, e); }
  });

  router.post('/reload', async (_req, res) => {
    try {
      const session = await sessions.reload();
      res.json({ riders: session.registry.size, report: session.report });
    } catch (e) { sendError(res, e); }
  });

  // --- Writes ---

  router.post('/riders', async (req, res) => {
    try {
      const { desk } = await sessions.get();
      res.status(201).json(await desk.addRider(riderBody.parse(req.body)));
    } catch (e) { sendError(res, e); }
  });

  router.put('/riders/:key', async (req, res) => {
    try {
      const { field, value } = fieldBody.parse(req.body);
      const { desk } = await sessions.get();
      res.json(await desk.setField(req.params.key, field, value));
    } catch (e) { sendError(res, e); }
  });

  router.post('/riders/:key/move', async (req, res) => {
    try {
      const { stage, saleValue } = moveBody.parse(req.body);
      const { desk } = await sessions.get();
      res.json(await desk.move(req.params.key, stage, { saleValue }));
    } catch (e) { sendError(res, e); }
  });

  router.post('/riders/:key/notes', async (req, res) => {
    try {
      const { text } = noteBody.parse(req.body);
      const { desk } = await sessions.get();
      res.json(await desk.addNote(req.params.key, text));
    } catch (e) { sendError(res, e); }
  });

  router.post('/riders/:key/follow-up', async (req, res) => {
    try {
      const { date } = followUpBody.parse(req.body);
      const { desk } = await sessions.get();
      res.json(await desk.setFollowUp(req.params.key, date));
    } catch (e) { sendError(res, e); }
  });

  router.post('/riders/:key/disqualify', async (req, res) => {
    try {
      const { reason } = disqualifyBody.parse(req.body);
      const { desk } = await sessions.get();
      res.json(await desk.disqualify(req.params.key, reason));
    } catch (e) { sendError(res, e); }
  });

  router.post('/riders/:key/push', async (req, res) => {
    try {
      const { desk, records } = await sessions.get();
      if (!records) return res.status(409).json({ error: 'No records table configured' });
      res.json(await pushRider(records, desk.get(req.params.key)));
    } catch (e) { sendError(res, e); }
  });

  return router;
}
