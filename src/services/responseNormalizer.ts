/**
 * Turns backend phrasing output into the sentence shown to the user. The
 * backend sometimes answers in plain text, sometimes wraps the text in one
 * or two layers of JSON, sometimes inside a code fence. Used by both the
 * chat path and the tool-result path.
 */

import { isRecord } from '../models/plan';

export const FORMAT_FALLBACK = 'I have that information, but I need to format it better. Could you ask me again?';

export const TEXT_FIELDS = ['message', 'answer', 'response', 'text', 'content', 'reply'] as const;

const MAX_DECODE_LAYERS = 2;

export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```$/, '')
    .trim();
}

type Decoded = { parsed: true; value: unknown } | { parsed: false };

/** JSON-decodes up to two layers: a JSON string holding JSON is unwrapped once more. */
function decode(text: string): Decoded {
  let current: unknown = text;
  let parsed = false;
  for (let layer = 0; layer < MAX_DECODE_LAYERS && typeof current === 'string'; layer++) {
    try {
      current = JSON.parse(current);
      parsed = true;
    } catch {
      break;
    }
  }
  return parsed ? { parsed: true, value: current } : { parsed: false };
}

function fromMapping(mapping: Record<string, unknown>): string {
  const values = Object.values(mapping);
  if (values.some((v) => Array.isArray(v) || isRecord(v))) {
    return FORMAT_FALLBACK;
  }

  for (const field of TEXT_FIELDS) {
    const candidate = mapping[field];
    if (typeof candidate === 'string' && candidate.trim()) {
      return candidate.trim();
    }
  }

  const [only] = values;
  if (values.length === 1 && typeof only === 'string') {
    return only.trim();
  }
  return FORMAT_FALLBACK;
}

export function normalizeResponse(raw: string): string {
  const text = stripCodeFence(raw);
  const decoded = decode(text);
  if (!decoded.parsed) {
    return text;
  }

  const { value } = decoded;
  if (isRecord(value)) {
    return fromMapping(value);
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  return text;
}
