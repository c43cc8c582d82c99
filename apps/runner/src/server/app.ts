import express, { type Express, type Response } from 'express';
import cors from 'cors';
import type { ZodError } from 'zod';
import { SuiteLoadError, type CatalogService } from '@courier/catalog';
import { SuiteEngine, SuiteNotFoundError } from './engine.js';
import { RunRequestBodySchema, StartRunBodySchema } from '../shared/types.js';

export function createApp(catalog: CatalogService, engine: SuiteEngine): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now(), suites: catalog.size });
  });

  // ── Catalog ────────────────────────────────────────────────────────

  app.get('/api/suites', (_req, res) => {
    res.json(catalog.listSuites());
  });

  app.get('/api/suites/:id', (req, res) => {
    const suite = catalog.getSuite(req.params.id);
    if (!suite) return res.status(404).json({ error: `Suite "${req.params.id}" not found` });
    res.json({ id: req.params.id, ...suite });
  });

  // ── Runs ───────────────────────────────────────────────────────────

  app.post('/api/runs', async (req, res) => {
    const parsed = StartRunBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    try {
      const { suiteId, ...input } = parsed.data;
      const executionId = await engine.startRun(suiteId, input);
      res.json({ executionId });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/requests/run', async (req, res) => {
    const parsed = RunRequestBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    try {
      const { path, generate, ...input } = parsed.data;
      if (generate) return res.json({ curl: engine.generateCurl(path, input) });
      res.json(await engine.runRequest(path, input));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/runs/:id/cancel', (req, res) => {
    const ok = engine.cancelRun(req.params.id);
    if (!ok) {
      const run = engine.getRun(req.params.id);
      if (!run) return res.status(404).json({ error: 'Run not found' });
      return res.status(409).json({ error: `Cannot cancel run in ${run.status} state` });
    }
    res.json({ ok: true });
  });

  app.get('/api/runs/:id', (req, res) => {
    const run = engine.getRun(req.params.id);
    if (!run) return res.status(404).json({ error: 'Run not found' });
    res.json(run);
  });

  app.get('/api/reports/:id', (req, res) => {
    const run = engine.getRun(req.params.id);
    if (!run) return res.status(404).json({ error: 'Report not found' });
    if (run.status === 'pending' || run.status === 'running') {
      return res.status(202).json(run);
    }
    res.json(run.result ?? run);
  });

  return app;
}

function badRequest(res: Response, error: ZodError) {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  res.status(400).json({ error: issues.join('; ') });
}

function sendError(res: Response, error: unknown) {
  const message = error instanceof Error ? error.message : 'Unknown error';
  let status = 500;
  if (error instanceof SuiteNotFoundError) status = 404;
  else if (error instanceof SuiteLoadError) status = 400;
  res.status(status).json({ error: message });
}
