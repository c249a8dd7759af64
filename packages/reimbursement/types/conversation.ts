// Conversation sessions: owned exclusively by the ConversationManager

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp: Date;
}

export interface ConversationSession {
  readonly sessionId: string;
  turns: ConversationTurn[];
  readonly createdAt: Date;
  lastActiveAt: Date;
}

export interface SessionStats {
  activeSessions: number;
  totalTurns: number;
}
