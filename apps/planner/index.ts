import {
  ALLOCATOR_PASS_FACTOR,
  ALLOCATOR_POLICY,
  PLANNER_EXPORT_DIR,
  PLANNER_MAX_TOPICS,
  PLANNER_STORE,
} from '../../packages/shared/config';
import type { PlannerRequest, PlannerResponse } from '../../packages/shared/http';
import {
  createMemorySessionStore,
  createSupabaseSessionStore,
  type SessionStore,
} from '../../packages/shared/sessionStore';
import { getSupabase } from '../../packages/shared/supabase';
import { defaultLoaderDeps } from '../segmenter/loader';
import { type ErrorCode, type OperationResult, runOperation } from './dispatcher';
import type { PlannerDeps } from './operations/index';

const ERROR_STATUS: Partial<Record<ErrorCode, number>> = {
  unknown_operation: 404,
  internal_error: 500,
};

function sendError(res: PlannerResponse, status: number, message: string) {
  res.status(status).json({ status: 'error', code: 'invalid_input', message });
}

export function statusFor(result: OperationResult): number {
  if (result.status === 'success') return 200;
  return ERROR_STATUS[result.code] ?? 400;
}

function readString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type PlannerHandlerDeps = {
  store: SessionStore;
  planner: PlannerDeps;
};

export function createPlannerHandler({ store, planner }: PlannerHandlerDeps) {
  return async function handler(req: PlannerRequest, res: PlannerResponse) {
    try {
      if (req.method !== 'POST') {
        res.setHeader('Allow', 'POST');
        res.status(405).json({ status: 'error', code: 'invalid_input', message: 'Method not allowed.' });
        return;
      }

      if (!isRecord(req.body)) {
        sendError(res, 400, 'Request body must be a JSON object.');
        return;
      }
      const body = req.body;
      const sessionId = readString(body.sessionId ?? body.session_id);
      if (!sessionId) {
        sendError(res, 400, 'sessionId is required.');
        return;
      }
      const operation = readString(body.operation);
      if (!operation) {
        sendError(res, 400, 'operation is required.');
        return;
      }
      const input = body.input ?? {};
      if (!isRecord(input)) {
        sendError(res, 400, 'input must be a JSON object.');
        return;
      }

      const result = await runOperation(store, planner, { sessionId, operation, input });
      res.status(statusFor(result)).json(result);
    } catch (err) {
      console.error('planner handler failed', err);
      const message = err instanceof Error ? err.message : 'planner_request_failed';
      res.status(500).json({ status: 'error', code: 'internal_error', message });
    }
  };
}

export function createDefaultStore(): SessionStore {
  if (PLANNER_STORE === 'supabase') {
    return createSupabaseSessionStore(getSupabase());
  }
  return createMemorySessionStore();
}

export function createDefaultPlannerDeps(): PlannerDeps {
  return {
    today: () => new Date(),
    loader: defaultLoaderDeps,
    maxTopics: PLANNER_MAX_TOPICS,
    passFactor: ALLOCATOR_PASS_FACTOR,
    defaultPolicy: ALLOCATOR_POLICY,
    exportDir: PLANNER_EXPORT_DIR,
  };
}

const defaultHandler = createPlannerHandler({
  store: createDefaultStore(),
  planner: createDefaultPlannerDeps(),
});

export default defaultHandler;

export const config = {
  api: {
    bodyParser: true,
  },
};
