/**
 * Outbound Slack text helpers: escaping of control characters and splitting
 * of long answers into postable chunks.
 */

// Slack rejects text blocks above 3000 chars; keep a margin
export const SLACK_TEXT_LIMIT = 2900;

// Longest escape sequence produced by escapeSlackText (&amp;)
const MAX_ENTITY_LENGTH = 5;

// Split preference: paragraphs, then lines, then words
const SEPARATORS = ['\n\n', '\n', ' '] as const;

/**
 * Escape the three characters Slack treats as control sequences.
 * https://api.slack.com/reference/surfaces/formatting#escaping
 */
export function escapeSlackText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Cut text that has no separator left, backing off when the cut would land
 * inside an escape entity.
 */
function hardSplit(text: string, maxLength: number): string[] {
  const parts: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);

    if (end < text.length) {
      const amp = text.lastIndexOf('&', end - 1);
      if (amp > start && amp > end - MAX_ENTITY_LENGTH) {
        const semi = text.indexOf(';', amp);
        if (semi >= end && semi - amp < MAX_ENTITY_LENGTH) {
          end = amp;
        }
      }
    }

    parts.push(text.slice(start, end));
    start = end;
  }

  return parts;
}

function splitToFit(text: string, maxLength: number, separators: readonly string[]): string[] {
  if (text.length <= maxLength) return [text];

  const [separator, ...rest] = separators;
  if (separator === undefined) return hardSplit(text, maxLength);

  const pieces: string[] = [];
  let current = '';

  for (const piece of text.split(separator)) {
    if (!current) {
      if (piece.length <= maxLength) {
        current = piece;
        continue;
      }
    } else if (current.length + separator.length + piece.length <= maxLength) {
      current += separator + piece;
      continue;
    } else {
      pieces.push(current);
      current = '';
      if (piece.length <= maxLength) {
        current = piece;
        continue;
      }
    }

    // Piece alone is too long - split it with the next separator
    const parts = splitToFit(piece, maxLength, rest);
    current = parts.pop() ?? '';
    pieces.push(...parts);
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Split text into chunks of at most `maxLength` characters, in order.
 * Text that already fits is returned as a single chunk, untouched.
 */
export function chunkMessage(text: string, maxLength: number = SLACK_TEXT_LIMIT): string[] {
  if (maxLength < 1) {
    throw new RangeError(`maxLength must be positive, got ${maxLength}`);
  }
  if (text.length <= maxLength) return [text];

  const chunks = splitToFit(text, maxLength, SEPARATORS).filter((chunk) => chunk.trim().length > 0);
  return chunks.length > 0 ? chunks : [text.slice(0, maxLength)];
}

/**
 * Escape an answer and split it for posting.
 */
export function formatForSlack(text: string, maxLength: number = SLACK_TEXT_LIMIT): string[] {
  return chunkMessage(escapeSlackText(text), maxLength);
}

export interface AnswerLayout {
  answer: string;
  /** Shown as the header; long questions are cut */
  question?: string;
  model: string;
  sourceChannel?: string;
  /** Context messages read from `sourceChannel` */
  messageCount?: number;
  postedAt: Date;
}

// Longest question shown in the header, ellipsis included
const QUESTION_HEADER_LENGTH = 300;

export function truncateQuestion(question: string, maxLength: number = QUESTION_HEADER_LENGTH): string {
  return question.length > maxLength ? `${question.slice(0, maxLength - 3)}...` : question;
}

export function formatPostedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function numbering(part: number, total: number): string {
  return `*Answer ${part}/${total}*:\n`;
}

/**
 * Split an escaped answer so each numbered part fits once its prefix is
 * added. The prefix grows with the part count, so re-split until it settles.
 */
function splitNumbered(answer: string, maxLength: number): string[] {
  let total = 1;
  for (;;) {
    const budget = maxLength - numbering(total, total).length;
    if (budget < 1) {
      throw new RangeError(`maxLength ${maxLength} leaves no room for answer text`);
    }
    const parts = chunkMessage(answer, budget);
    if (String(parts.length).length <= String(total).length) return parts;
    total = parts.length;
  }
}

/**
 * Lay out an answer as Slack messages: a question header, an optional source
 * note, the answer and a model/time footer. An answer that does not fit one
 * message becomes an intro followed by numbered parts, meant to be posted as
 * replies under the intro. Every returned message is escaped and fits
 * `maxLength`.
 */
export function formatAnswerMessages(layout: AnswerLayout, maxLength: number = SLACK_TEXT_LIMIT): string[] {
  const answer = escapeSlackText(layout.answer);
  const footer = `_Model: ${escapeSlackText(layout.model)} | ${formatPostedAt(layout.postedAt)}_`;

  const header: string[] = [];
  if (layout.question) {
    header.push(`*Question*: ${escapeSlackText(truncateQuestion(layout.question))}`);
  }
  if (layout.sourceChannel && layout.messageCount) {
    header.push(`_Source: ${layout.messageCount} messages from \`${escapeSlackText(layout.sourceChannel)}\`_`);
  }
  const lead = header.length > 0 ? `${header.join('\n')}\n\n` : '';

  const single = `${lead}*Answer*:\n${answer}\n\n${footer}`;
  if (single.length <= maxLength) return [single];

  const parts = splitNumbered(answer, maxLength);
  const numbered = parts.map((part, i) => `${numbering(i + 1, parts.length)}${part}`);

  const last = numbered.length - 1;
  if (numbered[last].length + footer.length + 2 <= maxLength) {
    numbered[last] = `${numbered[last]}\n\n${footer}`;
  } else {
    numbered.push(...chunkMessage(footer, maxLength));
  }

  const intro = `${lead}*Answer*: continued in ${parts.length} replies`;
  return [...chunkMessage(intro, maxLength), ...numbered];
}

export function previewText(text: string, length = 100): string {
  return text.length > length ? `${text.substring(0, length)}...` : text;
}
