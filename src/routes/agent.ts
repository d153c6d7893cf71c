import express, { type Request, type Response } from 'express';
import { v4 as uuid } from 'uuid';
import { dispatchMessage, getAgentDeps, getState, getSummary, resetSession } from '../dispatcher.js';

const router = express.Router();

function resolveSessionId(req: Request, res: Response): string {
  const fromBody: unknown = req.body?.sessionId;
  if (typeof fromBody === 'string' && fromBody) return fromBody;
  const fromQuery = req.query.sessionId;
  if (typeof fromQuery === 'string' && fromQuery) return fromQuery;
  const fromCookie: unknown = req.cookies?.sessionId;
  if (typeof fromCookie === 'string' && fromCookie) return fromCookie;
  const id = uuid();
  res.cookie('sessionId', id, { httpOnly: true });
  return id;
}

function fail(res: Response, label: string, error: unknown) {
  console.error(`${label} error:`, error);
  const details = error instanceof Error ? error.message : String(error);
  res.status(500).json({ error: 'Internal Server Error', details });
}

router.post('/', async (req, res) => {
  const text: unknown = req.body?.text;
  if (typeof text !== 'string' || !text.trim()) {
    res.status(400).json({ error: 'text is required' });
    return;
  }
  const sessionId = resolveSessionId(req, res);
  try {
    const result = await dispatchMessage(text, sessionId);
    res.json({ sessionId, ...result });
  } catch (error) {
    fail(res, 'Agent', error);
  }
});

router.get('/state', async (req, res) => {
  const sessionId = resolveSessionId(req, res);
  try {
    res.json({ sessionId, state: await getState(sessionId) });
  } catch (error) {
    fail(res, 'State', error);
  }
});

router.post('/summary', async (req, res) => {
  const sessionId = resolveSessionId(req, res);
  try {
    res.json({ sessionId, summary: await getSummary(sessionId) });
  } catch (error) {
    fail(res, 'Summary', error);
  }
});

router.post('/reset', async (req, res) => {
  const sessionId = resolveSessionId(req, res);
  try {
    await resetSession(sessionId);
    res.json({ sessionId, status: 'reset' });
  } catch (error) {
    fail(res, 'Reset', error);
  }
});

router.get('/health', async (_req, res) => {
  try {
    const { graph, llm } = getAgentDeps();
    const health = await llm.healthCheck();
    res.status(health.available ? 200 : 503).json({ llm: health, graph: graph.schema() });
  } catch (error) {
    fail(res, 'Health', error);
  }
});

export default router;
