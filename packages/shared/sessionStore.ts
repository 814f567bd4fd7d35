import type { SupabaseClient } from '@supabase/supabase-js';
import { PLANNER_SESSION_TTL } from './config';
import { createEmptyState, plannerStateSchema, type PlannerState } from './types';

export const SESSION_TABLE = 'planner_sessions';

export type SessionContext = {
  sessionId: string;
  state: PlannerState;
};

export interface SessionStore {
  load(sessionId: string): Promise<PlannerState>;
  save(sessionId: string, state: PlannerState): Promise<void>;
  clear(sessionId: string): Promise<void>;
  /**
   * Runs `fn` against a private copy of the session state and writes the copy
   * back only if `fn` resolves. Calls for the same session id run one at a time.
   */
  withSession<T>(sessionId: string, fn: (ctx: SessionContext) => T | Promise<T>): Promise<T>;
}

function cacheKey(sessionId: string) {
  return `session:${sessionId}`;
}

function parseState(value: unknown): PlannerState {
  if (value == null) return createEmptyState();
  const parsed = plannerStateSchema.safeParse(value);
  if (!parsed.success) {
    console.warn('Discarding malformed session state', parsed.error.flatten().fieldErrors);
    return createEmptyState();
  }
  return parsed.data;
}

function createLockedRunner(store: Pick<SessionStore, 'load' | 'save'>) {
  const tails = new Map<string, Promise<unknown>>();

  return async function withSession<T>(
    sessionId: string,
    fn: (ctx: SessionContext) => T | Promise<T>,
  ): Promise<T> {
    const previous = tails.get(sessionId) ?? Promise.resolve();
    const run = previous
      .catch(() => undefined)
      .then(async () => {
        const state = await store.load(sessionId);
        const result = await fn({ sessionId, state });
        await store.save(sessionId, state);
        return result;
      });
    tails.set(sessionId, run);
    try {
      return await run;
    } finally {
      if (tails.get(sessionId) === run) {
        tails.delete(sessionId);
      }
    }
  };
}

export function createMemorySessionStore(): SessionStore {
  const sessions = new Map<string, PlannerState>();

  const base = {
    async load(sessionId: string) {
      const stored = sessions.get(sessionId);
      return stored ? structuredClone(stored) : createEmptyState();
    },
    async save(sessionId: string, state: PlannerState) {
      sessions.set(sessionId, structuredClone(state));
    },
  };

  return {
    ...base,
    async clear(sessionId: string) {
      sessions.delete(sessionId);
    },
    withSession: createLockedRunner(base),
  };
}

export function createSupabaseSessionStore(
  client: SupabaseClient,
  ttl = PLANNER_SESSION_TTL,
): SessionStore {
  async function clear(sessionId: string) {
    const { error } = await client.from(SESSION_TABLE).delete().eq('cache_key', cacheKey(sessionId));
    if (error) {
      throw new Error(`Failed to clear session ${sessionId}: ${error.message}`);
    }
  }

  const base = {
    async load(sessionId: string): Promise<PlannerState> {
      const now = new Date();
      const { data, error } = await client
        .from(SESSION_TABLE)
        .select('value, expires_at')
        .eq('cache_key', cacheKey(sessionId))
        .limit(1)
        .maybeSingle();
      if (error) {
        throw new Error(`Failed to load session ${sessionId}: ${error.message}`);
      }
      if (!data) return createEmptyState();
      const expiresAt = data.expires_at ? new Date(data.expires_at) : null;
      if (expiresAt && expiresAt <= now) {
        await clear(sessionId);
        return createEmptyState();
      }
      return parseState(data.value);
    },

    async save(sessionId: string, state: PlannerState) {
      const expiresAt = new Date(Date.now() + ttl * 1000).toISOString();
      const { error } = await client.from(SESSION_TABLE).upsert({
        cache_key: cacheKey(sessionId),
        value: state,
        expires_at: expiresAt,
      });
      if (error) {
        throw new Error(`Failed to save session ${sessionId}: ${error.message}`);
      }
    },
  };

  return {
    ...base,
    clear,
    withSession: createLockedRunner(base),
  };
}
