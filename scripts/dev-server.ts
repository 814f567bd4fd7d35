import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { parse } from 'url';
import plannerHandler from '../apps/planner/index';
import { PLANNER_STORE } from '../packages/shared/config';
import { readRequestBody, type PlannerRequest, type PlannerResponse } from '../packages/shared/http';

function toPlannerRequest(req: IncomingMessage, body: unknown): PlannerRequest {
  const url = parse(req.url ?? '/', true);
  const query: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(url.query)) {
    if (value !== undefined) query[key] = value;
  }
  return { method: req.method, url: req.url, body, query };
}

function toPlannerResponse(res: ServerResponse): PlannerResponse {
  const wrapped: PlannerResponse = {
    setHeader(name, value) {
      res.setHeader(name, value);
      return wrapped;
    },
    status(code) {
      res.statusCode = code;
      return wrapped;
    },
    json(payload) {
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify(payload));
    },
    send(payload) {
      if (typeof payload === 'string' || Buffer.isBuffer(payload)) {
        res.end(payload);
      } else {
        wrapped.json(payload);
      }
    },
  };
  return wrapped;
}

function resolvePort() {
  const source = process.env.PORT;
  if (source) {
    const parsed = Number.parseInt(source, 10);
    if (Number.isFinite(parsed) && parsed > 0) {
      return parsed;
    }
    console.warn(`Ignoring invalid port value: ${source}`);
  }
  return 4321;
}

const PORT = resolvePort();

if (PLANNER_STORE === 'memory') {
  console.warn('PLANNER_STORE=memory: sessions are lost when the server stops.');
}

createServer(async (incoming, outgoing) => {
  const req = toPlannerRequest(incoming, await readRequestBody(incoming));
  const res = toPlannerResponse(outgoing);

  try {
    if (req.url?.startsWith('/api/planner')) {
      await plannerHandler(req, res);
      return;
    }
    res.status(404).json({ status: 'error', code: 'unknown_operation', message: `No route for ${req.url}` });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    res.status(500).send({ status: 'error', code: 'internal_error', message });
  }
}).listen(PORT, () => {
  console.log(`Study planner dev server listening on http://localhost:${PORT}`);
  console.log(`• API:     POST http://localhost:${PORT}/api/planner`);
});
