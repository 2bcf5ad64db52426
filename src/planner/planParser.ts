/**
 * Pulls the plan out of free-form backend text. A ```json fence wins;
 * otherwise the first balanced `{…}` span is tried. Never throws.
 */

export interface ParsedPlan {
  value: unknown;
}

const JSON_FENCE = /```json\s*([\s\S]*?)```/i;

function tryParse(text: string): ParsedPlan | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

/** Returns the first balanced brace-delimited substring, skipping braces inside strings. */
export function firstBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

export function extractPlan(raw: string): ParsedPlan | null {
  const fenced = JSON_FENCE.exec(raw);
  if (fenced?.[1] !== undefined) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed) {
      return parsed;
    }
  }

  const candidate = firstBalancedObject(raw);
  return candidate === null ? null : tryParse(candidate);
}
