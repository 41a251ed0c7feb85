export type CallDirection = 'inbound' | 'outbound';

export type CallSessionState = 'handshaking' | 'active' | 'terminating' | 'closed';

export type CloseReason =
  | 'handshake_failed'
  | 'handshake_timeout'
  | 'stop_event'
  | 'socket_closed'
  | 'max_duration'
  | 'hangup_directive'
  | 'shutdown'
  | 'error';

/** Everything a connecting media socket needs to know about its call. */
export interface CallContext {
  callControlId: string;
  recordId?: string;
  direction: CallDirection;
  /** Per-call goal appended to the system prompt. */
  initialPrompt?: string;
  maxDurationMs: number;
  limitMessage: string;
  /** Silence sent before the preloaded greeting. */
  initialDelayMs: number;
  /** A greeting is being generated into the preload broker for this call. */
  expectsGreeting: boolean;
  userId?: string;
  chatId?: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant' | 'system';
  content: string;
  timestamp: Date;
}
