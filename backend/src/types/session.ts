/**
 * Live session type definitions
 * Personas, human participants, topics and the append-only message record
 */

// ============================================================================
// Participants
// ============================================================================

/**
 * AI debate participant from the persona catalog
 */
export interface Persona {
  id: string;
  name: string;
  avatar: string;                    // Single glyph shown next to the name
  color: string;                     // CSS colour for bubbles
  role: string;                      // Short label, e.g. "The Skeptic"
  personality: string;
  style: string;
}

/**
 * The two personas of a session, fixed at start
 */
export type PersonaPair = readonly [Persona, Persona];

/**
 * Human who joined the live chat
 */
export interface HumanParticipant {
  id: string;
  name: string;
  color: string;
  joinedAt: string;                  // ISO 8601
}

// ============================================================================
// Topics
// ============================================================================

export interface Topic {
  text: string;
  number: number;                    // Ordinal, starts at 1
}

// ============================================================================
// Messages
// ============================================================================

export type MessageKind = 'topic' | 'ai' | 'human' | 'system';

interface BaseMessage {
  id: string;
  seq: number;                       // Global order, 1-based
  text: string;
  timestamp: string;                 // ISO 8601
  topicNumber: number;
}

export interface TopicMessage extends BaseMessage {
  kind: 'topic';
}

export interface AiMessage extends BaseMessage {
  kind: 'ai';
  speakerId: string;
  speakerName: string;
  avatar: string;
  color: string;
  role: string;
}

export interface HumanMessage extends BaseMessage {
  kind: 'human';
  participantId: string;
  participantName: string;
  color: string;
  clientMessageId?: string;          // Echoed back so the sender can de-duplicate
}

export interface SystemMessage extends BaseMessage {
  kind: 'system';
}

export type SessionMessage = TopicMessage | AiMessage | HumanMessage | SystemMessage;

// ============================================================================
// Snapshots & summaries
// ============================================================================

/**
 * Who is currently generating an utterance
 */
export interface TypingState {
  speakerId: string;
  name: string;
  avatar: string;
  color: string;
  role: string;
}

/**
 * Point-in-time copy of the session served to new or reconnecting observers
 */
export interface SessionSnapshot {
  personas: PersonaPair;
  humans: HumanParticipant[];
  topic: Topic | null;
  typing: TypingState | null;
  messages: SessionMessage[];
  bootMs: number;
  maxUptimeMs: number;
  timeRemainingMs: number;
  viewers: number;
  ended: boolean;
}

/**
 * Final counts reported on shutdown
 */
export interface SessionSummary {
  aiMessages: number;
  humanMessages: number;
  topics: number;
  participants: number;
}
