export type ConversationRole = 'system' | 'user' | 'assistant';

export interface ConversationMessage {
  role: ConversationRole;
  content: string;
}

/**
 * Content of the most recent non-empty assistant message
 */
export function findLatestAssistantMessage(
  messages: readonly ConversationMessage[],
): string | undefined {
  return messages.findLast(
    (message) => message.role === 'assistant' && message.content.trim() !== '',
  )?.content;
}
