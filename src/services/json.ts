//pulls the JSON object out of model output that may carry prose or markdown fences

const FENCED = /```(?:json)?\s*([\s\S]*?)```/gi;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

//first balanced {...} span, skipping braces inside string literals
function balancedObject(text: string, from: number): string | undefined {
  let depth = 0, inString = false, escaped = false;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}' && --depth === 0) return text.slice(from, i + 1);
  }
  return undefined;
}

export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const whole = tryParse(text.trim());
  if (isObject(whole)) return whole;

  for (const match of text.matchAll(FENCED)) {
    const fenced = tryParse((match[1] ?? '').trim());
    if (isObject(fenced)) return fenced;
  }

  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const candidate = balancedObject(text, start);
    if (candidate === undefined) break;
    const parsed = tryParse(candidate);
    if (isObject(parsed)) return parsed;
  }
  return undefined;
}

export { isObject };
