/**
 * Strict JSON parse for model output. Markdown fences are stripped; nothing else is repaired.
 * Used by answer generation and the LLM relevance scorer.
 */

export type JsonParseOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: string; raw: string };

export function stripCodeFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;

  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

export function parseJsonOutput(raw: string): JsonParseOutcome {
  const txt = stripCodeFences(raw);
  try {
    return { ok: true, value: JSON.parse(txt) };
  } catch (err) {
    return {
      ok: false,
      error: err instanceof Error ? err.message : String(err),
      raw: txt.slice(0, 300),
    };
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
