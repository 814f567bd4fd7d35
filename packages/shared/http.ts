/** What the planner handler reads from a request; Vercel's and the dev server's both fit. */
export type PlannerRequest = {
  method?: string;
  url?: string;
  body?: unknown;
  query: Record<string, string | string[]>;
};

/** What the planner handler writes to a response. */
export interface PlannerResponse {
  setHeader(name: string, value: string): unknown;
  status(statusCode: number): PlannerResponse;
  json(body: unknown): void;
  send(body: unknown): void;
}

/**
 * Buffers a request stream. JSON bodies are parsed, anything else is handed
 * on as text so the handler can reject it; an empty body is `undefined`.
 */
export async function readRequestBody(stream: AsyncIterable<unknown>): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
