/**
 * User-facing text for the chat transport
 */

export const MESSAGE_CHUNK_LIMIT = 1900;

export const CONNECT_PROMPT = 'First, connect your Google account so I can access your Drive:';
export const PICKER_NOT_FOR_YOU = "This picker isn't for you.";
export const FORM_NOT_FOR_YOU = "This form isn't for you.";

export function failureReply(message: string): string {
  return `Something went wrong and I couldn't complete that: ${message}`;
}

export function formatDocumentSelection(name: string, id: string): string {
  return `[Document selected] name: ${name}, id: ${id}`;
}

export function formatFormSubmission(answers: ReadonlyArray<{ label: string; value: string }>): string {
  const lines = answers.map(answer => `${answer.label}: ${answer.value}`);
  return `[Form submitted]\n${lines.join('\n')}`;
}

/**
 * Split a reply into fixed-size chunks that fit one chat message each.
 * Sizes count code points, so a surrogate pair is never cut in half.
 */
export function splitMessage(text: string, limit: number = MESSAGE_CHUNK_LIMIT): string[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${limit}`);
  }
  const codePoints = Array.from(text);
  if (codePoints.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  for (let start = 0; start < codePoints.length; start += limit) {
    chunks.push(codePoints.slice(start, start + limit).join(''));
  }
  return chunks;
}
