/**
 * Text helpers for document tools
 */

import type { docs_v1 } from 'googleapis';

/**
 * Plain text of the body: every paragraph text run, in order
 */
export function extractText(document: docs_v1.Schema$Document): string {
  const parts: string[] = [];
  for (const element of document.body?.content ?? []) {
    for (const run of element.paragraph?.elements ?? []) {
      const content = run.textRun?.content;
      if (content) {
        parts.push(content);
      }
    }
  }
  return parts.join('');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD` of an RFC 3339 timestamp, as Drive reports it
 */
export function formatDate(timestamp: string | undefined): string {
  return timestamp ? timestamp.slice(0, 10) : 'unknown';
}

/**
 * Local `YYYY-MM-DD HH:mm`
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Local `HH:mm`
 */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
