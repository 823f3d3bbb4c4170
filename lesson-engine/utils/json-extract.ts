/**
 * Tolerant JSON parsing for model output.
 * Accepts a bare object, a fenced ```json block, or prose wrapping one object.
 */

import { Err, Ok, Result } from '../shared/types.js';

/**
 * First balanced `{...}` object in the text, preferring fenced code blocks
 */
export function extractJsonObject(text: string): string | null {
  const fence = text.match(/```json[\s\S]*?```/i) || text.match(/```[\s\S]*?```/);
  const candidate = fence ? fence[0].replace(/```json|```/gi, '').trim() : text;

  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < candidate.length; i++) {
    const c = candidate[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (c === '\\') {
        escaped = true;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }

    if (c === '"') {
      inString = depth > 0;
    } else if (c === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (c === '}' && depth > 0) {
      depth--;
      if (depth === 0 && start !== -1) {
        return candidate.slice(start, i + 1);
      }
    }
  }

  return null;
}

export function parseJsonPayload(text: string): Result<unknown, string> {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return Err('empty response');
  }

  try {
    return Ok(JSON.parse(trimmed));
  } catch {
    const extracted = extractJsonObject(trimmed);
    if (!extracted) {
      return Err('no JSON object found');
    }
    try {
      return Ok(JSON.parse(extracted));
    } catch (error) {
      return Err(`malformed JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
