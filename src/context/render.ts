/**
 * Context Rendering
 *
 * Text form of a context bundle, as placed into LLM prompts.
 *
 * @module context/render
 */

import type { ContextBundle, ContextItem } from './builder.js';

function section(title: string, items: readonly ContextItem[]): string | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return [`[${title}]`, ...items.map((item) => `${item.label}: ${item.text}`)].join('\n');
}

/**
 * Render a bundle as `[CURRENT RUN]`, `[KNOWN FACTS]` and `[PATTERN HINTS]`
 * sections. Empty sections are left out; an empty bundle renders as ''.
 */
export function renderContext(bundle: ContextBundle): string {
  return [
    section('CURRENT RUN', bundle.currentRun),
    section('KNOWN FACTS', bundle.facts),
    section('PATTERN HINTS', bundle.hints),
  ]
    .filter((part): part is string => part !== undefined)
    .join('\n\n');
}
