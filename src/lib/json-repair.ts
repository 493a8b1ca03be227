/**
 * Best-effort JSON extraction from a model reply that should have been a bare
 * JSON object but may carry markdown fences, prose around the object,
 * trailing commas or single-quoted strings. Returns null when nothing parses.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  const attempts: string[] = [];

  // Strip markdown fences
  let cleaned = text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  attempts.push(cleaned);

  // Object embedded in surrounding text
  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    cleaned = cleaned.slice(firstBrace, lastBrace + 1);
    attempts.push(cleaned);
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  attempts.push(noTrailing);

  // Single-quoted keys/values and unquoted keys
  const requoted = noTrailing
    .replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"')
    .replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  attempts.push(requoted);

  for (const candidate of attempts) {
    try {
      return JSON.parse(candidate);
    } catch {
      // next candidate
    }
  }
  return null;
}
