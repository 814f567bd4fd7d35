import { isPlannerError, UnknownOperationError, type PlannerErrorCode } from '../../packages/shared/errors';
import type { SessionStore } from '../../packages/shared/sessionStore';
import operationHandlers, { type OperationArgs, type PlannerDeps } from './operations/index';
import type { OperationMap } from './operations/types';

export type ErrorCode = PlannerErrorCode | 'internal_error';

export type OperationResult =
  | ({ status: 'success' } & Record<string, unknown>)
  | { status: 'error'; code: ErrorCode; message: string };

export type OperationRequest = {
  sessionId: string;
  operation: string;
  input?: OperationArgs;
};

export function toErrorResult(err: unknown, operation: string): OperationResult {
  if (isPlannerError(err)) {
    return { status: 'error', code: err.code, message: err.message };
  }
  console.error(`planner operation ${operation} failed`, err);
  const message = err instanceof Error ? err.message : String(err);
  return { status: 'error', code: 'internal_error', message };
}

/**
 * Runs one operation against a session. Failed operations leave the stored
 * session untouched.
 */
export async function runOperation(
  store: SessionStore,
  deps: PlannerDeps,
  { sessionId, operation, input = {} }: OperationRequest,
  handlers: OperationMap = operationHandlers,
): Promise<OperationResult> {
  try {
    const handler = Object.prototype.hasOwnProperty.call(handlers, operation) ? handlers[operation] : undefined;
    if (!handler) {
      throw new UnknownOperationError(operation);
    }
    const result = await store.withSession(sessionId, (ctx) => handler(input, ctx, deps));
    return { ...result, status: 'success' };
  } catch (err) {
    return toErrorResult(err, operation);
  }
}
