// src/judge.ts
import { OpenAI } from 'openai';
import { z } from 'zod';
import { ModelQuotaError, errorMessage } from './errors';
import type { RuleResult, RuleSpec, Severity } from './types';

export interface ModelClient {
  readonly model: string;
  complete(userContent: string): Promise<string>;
}

type RetryOptions = {
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function failureOf(err: unknown): { status?: number; type?: string } {
  if (err instanceof OpenAI.APIError) {
    return { status: err.status, type: err.code ?? err.type };
  }
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const status = typeof err.status === 'number' ? err.status : undefined;
    const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
    return { status, type };
  }
  return {};
}

/** Retry 429 and 5xx with exponential backoff; quota errors are final. */
export async function callWithRetry<T>(
  fn: () => Promise<T>,
  { maxRetries = 3, sleep = defaultSleep }: RetryOptions = {}
): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const { status, type } = failureOf(err);
      attempt++;

      if (type === 'insufficient_quota' || status === 402) {
        throw new ModelQuotaError();
      }
      if ((status === 429 || (status && status >= 500)) && attempt < maxRetries) {
        const backoff = 300 * Math.pow(2, attempt - 1) + Math.random() * 200;
        await sleep(backoff);
        continue;
      }
      throw err;
    }
  }
}

export class OpenAIModelClient implements ModelClient {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly retry: RetryOptions = {}
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(userContent: string): Promise<string> {
    const resp = await callWithRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          temperature: 1,
          response_format: { type: 'json_object' },
          messages: [
            {
              role: 'system',
              content:
                'You are a strict, deterministic React style-guide linter. Return ONLY valid JSON that matches the requested schema.',
            },
            { role: 'user', content: userContent },
          ],
        }),
      this.retry
    );
    return resp.choices[0]?.message?.content ?? '';
  }
}

/**
 * Build a single generic prompt.
 * - Feed the ENTIRE rule Markdown (so the model sees the guideline and its bad/good examples).
 * - Feed the ENTIRE target source file.
 */
export function buildPrompt(rule: RuleSpec, filePath: string, source: string) {
  return `
You are evaluating a single React style-guide rule described in a Markdown document.
Apply ONLY the criteria specified in that rule document.
Return ONLY valid JSON with this exact schema:
{"id":"${rule.id}","pass":boolean,"rationale":string,"suggested_fixes":string[]}

--- RULE DOCUMENT (Markdown) START ---
${rule.markdown}
--- RULE DOCUMENT (Markdown) END ---

--- TARGET FILE PATH ---
${filePath}
--- TARGET FILE CONTENT START ---
${source}
--- TARGET FILE CONTENT END ---
`.trim();
}

const ModelReplySchema = z.object({
  pass: z.boolean(),
  rationale: z.string().default(''),
  suggested_fixes: z.array(z.unknown()).default([]),
});

/** Ask the model to judge one rule; failures come back as failed results, never throw. */
export async function judgeRule(
  client: ModelClient,
  rule: RuleSpec,
  filePath: string,
  source: string,
  severity: Severity = rule.severity
): Promise<RuleResult> {
  const failed = (rationale: string, fixes: string[] = []): RuleResult => ({
    id: rule.id,
    pass: false,
    severity,
    rationale,
    suggested_fixes: fixes,
    violations: [],
  });

  let reply: string;
  try {
    reply = await client.complete(buildPrompt(rule, filePath, source));
  } catch (e) {
    return failed(
      e instanceof ModelQuotaError ? e.message : `LLM call failed: ${errorMessage(e)}`,
      ['Verify API key/org; try again.']
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(reply);
  } catch {
    return failed(`Malformed model reply: ${reply.slice(0, 120)}`);
  }
  const parsed = ModelReplySchema.safeParse(json);
  if (!parsed.success) {
    return failed(`Malformed model reply: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  return {
    id: rule.id, // the model does not get to rename the rule
    pass: parsed.data.pass,
    severity,
    rationale: parsed.data.rationale,
    suggested_fixes: parsed.data.suggested_fixes.map((fx) =>
      typeof fx === 'string' ? fx : JSON.stringify(fx)
    ),
    violations: [],
  };
}
