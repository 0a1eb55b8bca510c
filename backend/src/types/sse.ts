/**
 * Server-Sent Events (SSE) type definitions
 * Event names and payloads streamed to viewers of the live session
 */

import type {
  HumanParticipant,
  HumanMessage,
  PersonaPair,
  SessionSnapshot,
  SessionSummary,
  SystemMessage,
  TopicMessage,
} from './session.js';

/**
 * SSE Event Type
 * Defines all possible event types that can be streamed to clients
 */
export type SSEEventType =
  | 'fullstate'   // Snapshot sent to a client before any incremental event
  | 'init'        // Session started: personas, first topic, timing
  | 'newtopic'    // Topic rotated
  | 'typing'      // Speaker about to produce an utterance
  | 'msgstart'    // Utterance streaming begins
  | 'word'        // One streamed word
  | 'msgdone'     // Utterance finalized and appended
  | 'usermsg'     // Human message accepted
  | 'system'      // Join/leave notices
  | 'presence'    // Roster and viewer count changed
  | 'waiting'     // Next scheduled speaker and countdown
  | 'shutdown'    // Session over, final counts
  | 'ping';       // Idle keep-alive

/**
 * SSE Event
 * Standard envelope for all SSE events sent to clients
 */
export interface SSEEvent<T = unknown> {
  /** Type of event */
  event: SSEEventType;

  /** Event payload data */
  data: T;

  /** Timestamp when event was created (ISO 8601) */
  timestamp: string;

  /** Event ID, monotonically increasing per bus */
  id?: string;
}

/**
 * Speaker identity carried by every AI-related event
 */
export interface SpeakerIdentity {
  speakerId: string;
  name: string;
  avatar: string;
  color: string;
  role: string;
}

export interface InitEventData {
  personas: PersonaPair;
  topic: string;
  topicNumber: number;
  bootMs: number;
  maxUptimeMs: number;
  timeRemainingMs: number;
}

export type NewTopicEventData = TopicMessage;

export type TypingEventData = SpeakerIdentity;

export interface MsgStartEventData extends SpeakerIdentity {
  messageId: string;
  total: number;
  timestamp: string;
}

export interface WordEventData {
  messageId: string;
  speakerId: string;
  word: string;
  index: number;
  total: number;
}

export interface MsgDoneEventData {
  messageId: string;
  seq: number;
  speakerId: string;
  name: string;
  text: string;
  timestamp: string;
}

export type UserMsgEventData = HumanMessage;

export type SystemEventData = SystemMessage;

export interface PresenceEventData {
  users: HumanParticipant[];
  viewers: number;
}

export interface WaitingEventData {
  speakerId: string;
  name: string;
  avatar: string;
  color: string;
  gapSeconds: number;
  timeRemainingMs: number;
}

export type ShutdownEventData = SessionSummary;

export interface PingEventData {
  timeRemainingMs: number;
  viewers: number;
}

export type FullStateEventData = SessionSnapshot;

/**
 * Payload type for each event name
 */
export interface SSEEventPayloads {
  fullstate: FullStateEventData;
  init: InitEventData;
  newtopic: NewTopicEventData;
  typing: TypingEventData;
  msgstart: MsgStartEventData;
  word: WordEventData;
  msgdone: MsgDoneEventData;
  usermsg: UserMsgEventData;
  system: SystemEventData;
  presence: PresenceEventData;
  waiting: WaitingEventData;
  shutdown: ShutdownEventData;
  ping: PingEventData;
}
