const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;
const XML_RE = /<json>\s*([\s\S]*?)<\/json>/i;

function parses(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * Removes a leading ```json / ``` fence and a trailing ``` fence.
 * Text without fences is returned trimmed and otherwise unchanged.
 */
export function stripMarkdownFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice("```json".length);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Finds the JSON payload in a model response.
 *
 * Tries, in order: the whole (fence-stripped) text, a fenced block anywhere
 * in the text, a <json> tag, and finally a balanced scan from the first
 * brace or bracket. Returns null when nothing parses.
 */
export function extractJsonText(text: string): string | null {
  if (!text) return null;

  const stripped = stripMarkdownFences(text);
  if (parses(stripped)) return stripped;

  const fenceMatch = FENCE_RE.exec(text);
  if (fenceMatch?.[1]) {
    const candidate = fenceMatch[1].trim();
    if (parses(candidate)) return candidate;
  }

  const xmlMatch = XML_RE.exec(text);
  if (xmlMatch?.[1]) {
    const candidate = xmlMatch[1].trim();
    if (parses(candidate)) return candidate;
  }

  return scanBalanced(text);
}

function scanBalanced(text: string): string | null {
  const i1 = text.indexOf("{");
  const i2 = text.indexOf("[");
  const start = i1 === -1 ? i2 : i2 === -1 ? i1 : Math.min(i1, i2);
  if (start === -1) return null;

  const opening = text[start];
  const closing = opening === "{" ? "}" : "]";
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === "\\") {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === opening) depth++;
    else if (ch === closing) {
      depth--;
      if (depth === 0) {
        const candidate = text.slice(start, i + 1).trim();
        return parses(candidate) ? candidate : null;
      }
    }
  }

  return null;
}
