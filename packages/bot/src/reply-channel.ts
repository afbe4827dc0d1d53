/**
 * Transport-neutral view of the conversation a reply goes to
 */

import type { DocumentSummary, FormDefinition } from '@docdesk/tools';

export type ReplyAttachment =
  | { type: 'connect'; url: string }
  | { type: 'document-picker'; documents: DocumentSummary[] }
  | { type: 'form'; form: FormDefinition };

export interface ReplyChannel {
  /**
   * Post one message, optionally carrying an interactive component. Picks
   * and form submissions made on the component come back as new messages
   * from the same user.
   */
  send(content: string, attachment?: ReplyAttachment): Promise<void>;

  /** Show a typing indicator while `work` runs */
  withTyping<T>(work: () => Promise<T>): Promise<T>;
}
