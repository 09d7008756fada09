import type { Annotation } from '@annotext/contracts';
import { convertLog } from '@annotext/common/debug-log';
import { ConverterInvariantError } from './errors.js';
import { getClosingTag, getOpeningTag } from './markup.js';
import { compareForClosingTags, compareForOpeningTags } from './ordering.js';
import type { SpanInfo, SpanTransition } from './types.js';

type MutableTransition = { added: SpanInfo[]; removed: SpanInfo[] };

/**
 * Collects, for every offset where a rendered annotation starts or ends, the
 * spans added and removed there.
 *
 * Annotations whose kind renders no markup are skipped. The result is ordered
 * by ascending offset and each list is already sorted for emission.
 *
 * @throws ConverterInvariantError if a kind yields an opening tag but no closing tag.
 */
export function findSpanTransitions(annotations: readonly Annotation[], densityScale: number): SpanTransition[] {
  const transitions = new Map<number, MutableTransition>();

  for (const annotation of annotations) {
    const openingTag = getOpeningTag(annotation.kind, densityScale);
    if (openingTag === undefined) {
      convertLog(`[findSpanTransitions] Annotation "${annotation.kind.type}" renders no markup, skipping`);
      continue;
    }
    const closingTag = requireClosingTag(annotation, getClosingTag(annotation.kind));

    const span: SpanInfo = { start: annotation.start, end: annotation.end, openingTag, closingTag };
    getOrCreate(transitions, span.start).added.push(span);
    getOrCreate(transitions, span.end).removed.push(span);
  }

  return [...transitions.entries()]
    .sort(([a], [b]) => a - b)
    .map(([offset, { added, removed }]) => ({
      offset,
      added: added.sort(compareForOpeningTags),
      removed: removed.sort(compareForClosingTags),
    }));
}

export function requireClosingTag(annotation: Annotation, closingTag: string | undefined): string {
  if (closingTag === undefined) {
    throw new ConverterInvariantError(
      'MISSING_CLOSING_TAG',
      `Annotation kind "${annotation.kind.type}" has an opening tag but no closing tag.`,
      { type: annotation.kind.type, start: annotation.start, end: annotation.end },
    );
  }
  return closingTag;
}

function getOrCreate(transitions: Map<number, MutableTransition>, offset: number): MutableTransition {
  let transition = transitions.get(offset);
  if (!transition) {
    transition = { added: [], removed: [] };
    transitions.set(offset, transition);
  }
  return transition;
}
