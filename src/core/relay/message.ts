/**
 * Text sent to a webhook in place of an artifact that was staged elsewhere
 */

export const STAGED_MESSAGE_HEADER = "autobackup";

export function buildStagedMessage(link: string, mention?: string): string {
  const header = mention ? `${STAGED_MESSAGE_HEADER} by ${mention}` : STAGED_MESSAGE_HEADER;
  return `${header}\n(${link})`;
}

export interface WebhookMessage {
  content: string;
}
