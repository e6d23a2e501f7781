/**
 * Prompt Template Processor with Cache Support
 *
 * Fills {placeholder} variables and splits templates with cache markers into
 * content blocks so providers with prompt caching can reuse the stable part
 * of a system prompt across requests.
 * Markers format: !___ CACHE:section-name ___! ... !___ END-CACHE ___!
 */

import { SystemMessage } from "@langchain/core/messages";

/**
 * Content block that may have cache control
 */
export type ContentBlock = {
  type: "text";
  text: string;
  cache_control?: { type: "ephemeral" };
};

/**
 * Processed template ready for LLM invocation
 */
export interface ProcessedTemplate {
  content: ContentBlock[];
  hasCacheMarkers: boolean;
}

const CACHE_MARKER_RE = /!___ CACHE:[\w-]+ ___!/;
const CACHE_SECTION_RE = /!___ CACHE:([\w-]+) ___!([\s\S]*?)!___ END-CACHE ___!/g;

/**
 * Substitute {placeholder} variables in a single pass. Placeholders without a
 * matching variable, and JSON braces, are left untouched; substituted values
 * are not scanned again.
 */
export function fillTemplate(
  template: string,
  variables: Record<string, string | number> = {}
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in variables ? String(variables[key]) : match
  );
}

/**
 * Parse template with cache markers into content blocks
 *
 * @param template - Template string with optional !___ CACHE:name ___! markers
 * @param variables - Variables to substitute in template (standard {placeholder} format)
 */
export function processCachedTemplate(
  template: string,
  variables: Record<string, string | number> = {}
): ProcessedTemplate {
  const processed = fillTemplate(template, variables);

  if (!CACHE_MARKER_RE.test(processed)) {
    return {
      content: [{ type: "text", text: processed }],
      hasCacheMarkers: false,
    };
  }

  const blocks: ContentBlock[] = [];
  let lastIndex = 0;

  for (const match of processed.matchAll(CACHE_SECTION_RE)) {
    const [fullMatch, , content] = match;
    const matchStart = match.index ?? 0;

    if (matchStart > lastIndex) {
      const beforeText = processed.slice(lastIndex, matchStart).trim();
      if (beforeText) {
        blocks.push({ type: "text", text: beforeText });
      }
    }

    blocks.push({
      type: "text",
      text: content.trim(),
      cache_control: { type: "ephemeral" },
    });

    lastIndex = matchStart + fullMatch.length;
  }

  if (lastIndex < processed.length) {
    const afterText = processed.slice(lastIndex).trim();
    if (afterText) {
      blocks.push({ type: "text", text: afterText });
    }
  }

  return {
    content: blocks,
    hasCacheMarkers: true,
  };
}

/**
 * Create a SystemMessage with cache-enabled content blocks
 */
export function createCachedSystemMessage(
  template: string,
  variables: Record<string, string | number> = {}
): SystemMessage {
  const processed = processCachedTemplate(template, variables);

  if (!processed.hasCacheMarkers) {
    return new SystemMessage(processed.content[0].text);
  }
  return new SystemMessage({ content: processed.content });
}

/**
 * Flatten a template to plain text, dropping cache markers, for providers
 * without prompt caching.
 */
export function stripCacheMarkers(
  template: string,
  variables: Record<string, string | number> = {}
): string {
  return processCachedTemplate(template, variables)
    .content.map((block) => block.text)
    .join("\n\n");
}
