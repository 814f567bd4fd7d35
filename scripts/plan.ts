import { runOperation } from '../apps/planner/dispatcher';
import { createDefaultPlannerDeps } from '../apps/planner/index';
import type { OperationArgs } from '../apps/planner/operations/index';
import { createMemorySessionStore } from '../packages/shared/sessionStore';

const USAGE =
  'Usage: npx tsx scripts/plan.ts --end YYYY-MM-DD [--start YYYY-MM-DD] [--policy proportional|round_robin] [--format markdown|csv] [--write] <subject>=<file.pdf> ...';

function parseArgs() {
  const args = process.argv.slice(2);
  const options: Record<string, string | boolean> = {};
  const documents: Array<{ subject: string; filePath: string }> = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      const split = arg.indexOf('=');
      if (split <= 0 || split === arg.length - 1) {
        throw new Error(`Expected <subject>=<file.pdf>, got "${arg}"`);
      }
      documents.push({ subject: arg.slice(0, split), filePath: arg.slice(split + 1) });
      continue;
    }
    const key = arg.slice(2);
    const next = args[i + 1];
    if (next && !next.startsWith('--') && key !== 'write') {
      options[key] = next;
      i++;
    } else {
      options[key] = true;
    }
  }
  return { options, documents };
}

function optionString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

const SESSION_ID = 'cli';

async function main() {
  const { options, documents } = parseArgs();
  const endDate = optionString(options.end);
  if (!endDate || documents.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const store = createMemorySessionStore();
  const deps = createDefaultPlannerDeps();
  const run = async (operation: string, input: OperationArgs) => {
    const result = await runOperation(store, deps, { sessionId: SESSION_ID, operation, input });
    if (result.status === 'error') {
      throw new Error(`${operation} failed (${result.code}): ${result.message}`);
    }
    return result;
  };

  for (const doc of documents) {
    const segmented = await run('segment_and_weight', doc);
    console.error(`${doc.subject}: ${String(segmented.message)}`);
  }

  const allocated = await run('allocate', {
    startDate: optionString(options.start),
    endDate,
    policy: optionString(options.policy),
  });
  console.error(String(allocated.message));

  const exported = await run('export', {
    format: optionString(options.format) ?? 'markdown',
    write: options.write === true,
  });
  console.log(String(exported.content));
  if (typeof exported.file === 'string') {
    console.error(`Saved ${exported.file}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
