export type Sender = 'user' | 'counterparty' | 'agent';

export interface Message {
  sender: Sender;
  text: string;
  timestamp: string;
}

export type EntityKind = 'payment_handle' | 'phone_number' | 'url';

export interface ExtractedEntity {
  kind: EntityKind;
  value: string;
}

export type SessionStatus = 'ACTIVE' | 'COMPLETE' | 'REPORTED';

export interface SessionMetadata {
  channel?: string;
  language?: string;
  locale?: string;
}

export interface ConversationState {
  sessionId: string;
  history: Message[];
  entities: ExtractedEntity[];
  status: SessionStatus;
  createdAt: string;
  lastUpdatedAt: string;
  bankAccounts: string[];
  suspiciousKeywords: string[];
  agentNotes: string;
  metadata: SessionMetadata;
  dispatchAttempts: number;
  lastDispatchError?: string;
}

// What the model reports about the turn, unverified.
export interface ModelHints {
  paymentHandles: string[];
  phoneNumbers: string[];
  urls: string[];
  bankAccounts: string[];
  suspiciousKeywords: string[];
  agentNotes: string;
}

export interface ModelResult {
  replyText: string;
  isComplete: boolean;
  rawHints: ModelHints;
}

export interface PromptContent {
  role: 'user' | 'model';
  parts: { text: string }[];
}

export interface PromptPayload {
  systemInstruction: string;
  contents: PromptContent[];
}

export interface EngineResponse {
  sessionId: string;
  replyText: string;
  status: SessionStatus;
  degraded: boolean;
}

export interface HandleOptions {
  conversationHistory?: Message[];
  metadata?: SessionMetadata;
}

export interface ReportPayload {
  sessionId: string;
  scamDetected: true;
  totalMessagesExchanged: number;
  entities: ExtractedEntity[];
  extractedIntelligence: {
    upiIds: string[];
    phoneNumbers: string[];
    phishingLinks: string[];
    bankAccounts: string[];
    suspiciousKeywords: string[];
  };
  agentNotes: string;
  createdAt: string;
  lastUpdatedAt: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
