export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

export const GREETING_USER_MESSAGE = 'Introduce yourself.';

export const HANGUP_TOOL_INSTRUCTIONS = [
  'You are speaking with a caller on a live phone call. Keep replies short and conversational.',
  'When the conversation is finished (the caller says goodbye, asks to end the call, or the goal is complete),',
  'say a brief sign-off and then end your reply with this JSON block on its own line:',
  '```json',
  '{"action": "hangup"}',
  '```',
  'Never mention the JSON block to the caller and never emit it before the conversation is over.',
].join('\n');

export interface SystemPromptParts {
  systemPrompt?: string | null;
  callGoal?: string | null;
  userId?: string | null;
  chatId?: string | null;
  includeToolInstructions?: boolean;
}

export function composeSystemPrompt(parts: SystemPromptParts): string {
  const base = parts.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT;
  const sections = [base];

  const goal = parts.callGoal?.trim();
  if (goal) {
    sections.push(`Current Call Goal: ${goal}`);
  }

  const context: string[] = [];
  if (parts.userId) context.push(`user_id=${parts.userId}`);
  if (parts.chatId) context.push(`chat_id=${parts.chatId}`);
  if (context.length > 0) {
    sections.push(`[Context: ${context.join(', ')}]`);
  }

  if (parts.includeToolInstructions !== false) {
    sections.push(HANGUP_TOOL_INSTRUCTIONS);
  }

  return sections.join('\n\n');
}
