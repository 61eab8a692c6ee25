/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Text helpers shared by ranking, deduplication and answer composition
 *
 * @packageDocumentation
 */

/**
 * Lowercase word tokens of a text
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Overlap of two token sets relative to the smaller one, in [0, 1].
 * A chunk fully contained in a longer one scores 1.
 */
export function tokenOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const token of smaller) {
    if (larger.has(token)) {
      shared++;
    }
  }

  return shared / smaller.size;
}

/**
 * Split text into sentences, keeping their terminal punctuation
 */
export function splitSentences(text: string): string[] {
  const matches = text.match(/[^.!?]+(?:[.!?]+|$)/g) ?? [];
  return matches.map(sentence => sentence.trim()).filter(sentence => sentence.length > 0);
}

/**
 * Comparison key for duplicate sentence detection
 */
export function normalizeSentence(sentence: string): string {
  return tokenize(sentence).join(' ');
}

/**
 * Cut text to at most `maxLength` characters.
 * Prefers the last sentence end that fits, then the last word boundary.
 */
export function truncateAtBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const window = text.slice(0, maxLength);

  let sentenceEnd = -1;
  const sentencePattern = /[.!?](?=\s|$)/g;
  let match: RegExpExecArray | null;
  while ((match = sentencePattern.exec(text)) !== null && match.index < maxLength) {
    sentenceEnd = match.index + 1;
  }
  if (sentenceEnd > 0) {
    return window.slice(0, sentenceEnd).trimEnd();
  }

  // a word ends exactly at the cut when the next character is whitespace
  if (/\s/.test(text.charAt(maxLength))) {
    return window.trimEnd();
  }

  const lastSpace = window.search(/\s\S*$/);
  return lastSpace > 0 ? window.slice(0, lastSpace).trimEnd() : '';
}

/**
 * Short excerpt cut at a word boundary, with an ellipsis when shortened
 */
export function excerpt(text: string, maxLength: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= maxLength) {
    return clean;
  }

  const window = clean.slice(0, maxLength);
  const lastSpace = window.lastIndexOf(' ');
  return `${(lastSpace > 0 ? window.slice(0, lastSpace) : window).trimEnd()}...`;
}
