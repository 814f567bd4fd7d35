import type { z } from 'zod';
import { ValidationError } from '../../../packages/shared/errors';
import type { SessionContext } from '../../../packages/shared/sessionStore';
import type { AllocationPolicy } from '../../../packages/shared/types';
import type { LoaderDeps } from '../../segmenter/loader';

export type OperationArgs = Record<string, unknown>;

export type PlannerDeps = {
  /** Clock used when `allocate` is called without a start date. */
  today: () => Date;
  loader: LoaderDeps;
  maxTopics: number;
  passFactor: number;
  defaultPolicy: AllocationPolicy;
  exportDir: string;
  writeFile?: (path: string, content: string) => Promise<void>;
};

export type OperationHandler = (
  args: OperationArgs,
  ctx: SessionContext,
  deps: PlannerDeps,
) => Promise<Record<string, unknown>>;

export type OperationMap = Record<string, OperationHandler>;

export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: OperationArgs): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid input: ${details}`);
  }
  return parsed.data;
}
