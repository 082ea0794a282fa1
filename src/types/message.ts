/** A text message read from the Messages store. Owned by the store; never mutated here. */
export interface InboundMessage {
  /** Store row id; strictly increasing */
  id: number;
  peer: string;
  text: string;
  receivedAt: number;
  /** Set for group chats */
  room?: string;
}

export type ReplyStatus = 'pending' | 'sent' | 'failed';

export interface OutboundReply {
  peer: string;
  text: string;
  inReplyTo: number;
  sentAt?: number;
  status: ReplyStatus;
  error?: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ConversationTurn {
  role: Exclude<ChatRole, 'system'>;
  content: string;
  timestamp: number;
}
