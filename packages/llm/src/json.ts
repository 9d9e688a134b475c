// Model replies are asked to be JSON but may arrive fenced or wrapped in prose.

export class JsonCoercionError extends Error {
  readonly rawContent: string;

  constructor(message: string, rawContent: string) {
    super(message);
    this.name = 'JsonCoercionError';
    this.rawContent = rawContent;
  }
}

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function tryParseObject(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** First brace-balanced `{...}` span, ignoring braces inside strings. */
export function firstBalancedObject(content: string): string | null {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0 && start !== -1) return content.slice(start, i + 1);
    }
  }
  return null;
}

/** Raw text, then a fenced block, then the first balanced object. */
export function coerceJsonObject(raw: unknown): Record<string, unknown> {
  if (isRecord(raw)) return raw;

  const trimmed = typeof raw === 'string' ? raw.trim() : raw == null ? '' : String(raw).trim();
  const candidates: string[] = [];
  if (trimmed) candidates.push(trimmed);

  const fence = trimmed.match(CODE_FENCE);
  if (fence?.[1]) candidates.push(fence[1].trim());

  const braced = firstBalancedObject(trimmed);
  if (braced) candidates.push(braced);

  for (const c of candidates) {
    const parsed = tryParseObject(c);
    if (parsed) return parsed;
  }
  throw new JsonCoercionError('Reply is not a JSON object', trimmed);
}
