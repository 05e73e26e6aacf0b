import { logger } from '@askbridge/shared';
import type { ChannelMessage } from '../types/ask.js';

export const TRUNCATION_MARKER = '[earlier messages truncated]';

export type NameResolver = (authorId: string) => Promise<string | undefined>;

export interface FormatContextOptions {
  /** Best-effort lookup of a display name; failures fall back to the id */
  resolveName?: NameResolver;
  /** Character budget for the whole block, marker included */
  maxChars: number;
}

/**
 * Look up each distinct author once. Failed or empty lookups map the id to
 * itself.
 */
export async function resolveNames(
  authorIds: Iterable<string>,
  resolveName: NameResolver | undefined
): Promise<Map<string, string>> {
  const names = new Map<string, string>();

  for (const authorId of authorIds) {
    if (names.has(authorId)) continue;

    let name: string | undefined;
    if (resolveName) {
      try {
        name = await resolveName(authorId);
      } catch (error) {
        logger.warn(`Display name lookup failed for ${authorId}, using raw id`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    names.set(authorId, name?.trim() || authorId);
  }

  return names;
}

/**
 * Drop oldest lines until the block fits the budget. The marker line leads
 * the result, where the dropped history would have been.
 */
function truncateOldestFirst(lines: string[], maxChars: number): string {
  const full = lines.join('\n');
  if (full.length <= maxChars) return full;

  if (maxChars <= TRUNCATION_MARKER.length) {
    return TRUNCATION_MARKER.slice(0, maxChars);
  }

  const kept: string[] = [];
  let used = TRUNCATION_MARKER.length;

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    const cost = line.length + 1; // newline before it
    if (used + cost > maxChars) {
      if (kept.length === 0) {
        // Newest line alone is too long; keep its tail
        const room = maxChars - used - 1;
        if (room > 0) kept.unshift(line.slice(line.length - room));
      }
      break;
    }
    kept.unshift(line);
    used += cost;
  }

  return [TRUNCATION_MARKER, ...kept].join('\n');
}

/**
 * Turn channel history (newest-first, as Slack returns it) into prompt text,
 * one `name: text` line per message, oldest first.
 */
export async function formatContext(
  messages: readonly ChannelMessage[],
  options: FormatContextOptions
): Promise<string> {
  if (messages.length === 0) return '';

  const chronological = [...messages].reverse();
  const names = await resolveNames(
    chronological.map((message) => message.authorId),
    options.resolveName
  );

  const lines = chronological.map((message) => {
    const author = names.get(message.authorId) ?? message.authorId;
    const text = message.text.replace(/\s*\n\s*/g, ' ').trim();
    return `${author}: ${text}`;
  });

  return truncateOldestFirst(lines, options.maxChars);
}
