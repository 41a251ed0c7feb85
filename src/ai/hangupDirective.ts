export interface HangupDirectiveResult {
  spokenText: string;
  shouldHangup: boolean;
  directive: Record<string, unknown> | null;
}

const FENCED_BLOCK = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/gi;
const DANGLING_FENCE = /```(?:json)?\s*$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isHangup(directive: Record<string, unknown> | null): boolean {
  const action = directive?.action;
  return typeof action === 'string' && action.trim().toLowerCase() === 'hangup';
}

/** Index just past the brace closing the object opened at `start`, or -1. */
function matchObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

function result(spokenText: string, directive: Record<string, unknown> | null): HangupDirectiveResult {
  return { spokenText, shouldHangup: isHangup(directive), directive };
}

function extractFenced(reply: string): HangupDirectiveResult | null {
  const blocks = Array.from(reply.matchAll(FENCED_BLOCK));
  const last = blocks[blocks.length - 1];
  if (!last || last.index === undefined) {
    return null;
  }

  const directive = parseObject(last[1]?.trim() ?? '');
  if (!directive) {
    return result(reply.trim(), null);
  }

  const spoken = `${reply.slice(0, last.index)}${reply.slice(last.index + last[0].length)}`;
  return result(spoken.trim(), directive);
}

function extractBareTrailing(reply: string): HangupDirectiveResult {
  const trimmed = reply.trimEnd();
  if (!trimmed.endsWith('}')) {
    return result(reply.trim(), null);
  }

  for (let start = trimmed.indexOf('{'); start !== -1; start = trimmed.indexOf('{', start + 1)) {
    if (matchObjectEnd(trimmed, start) !== trimmed.length) {
      continue;
    }
    const directive = parseObject(trimmed.slice(start));
    if (!directive) {
      continue;
    }
    const spoken = trimmed.slice(0, start).replace(DANGLING_FENCE, '');
    return result(spoken.trim(), directive);
  }

  return result(reply.trim(), null);
}

/**
 * Splits a complete model reply into the text to speak and an optional
 * trailing control object. Fenced blocks are tried first, then a bare
 * trailing object. Anything that does not parse is spoken as-is.
 */
export function extractHangupDirective(reply: string): HangupDirectiveResult {
  return extractFenced(reply) ?? extractBareTrailing(reply);
}
