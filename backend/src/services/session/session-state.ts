/**
 * Session State
 *
 * Roster, current topic and the append-only message record of the live
 * session. Messages are frozen on append and never reordered; readers get
 * point-in-time snapshots.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SessionClock } from '../../utils/clock.js';
import type {
  AiMessage,
  HumanMessage,
  HumanParticipant,
  Persona,
  PersonaPair,
  SessionMessage,
  SessionSnapshot,
  SessionSummary,
  SystemMessage,
  Topic,
  TopicMessage,
  TypingState,
} from '../../types/session.js';

/**
 * Colours handed to human participants, round-robin
 */
export const USER_COLORS: readonly string[] = [
  '#ff9800', '#e91e63', '#9c27b0', '#03a9f4',
  '#4caf50', '#ff5722', '#00bcd4', '#cddc39',
  '#f44336', '#3f51b5', '#8bc34a', '#795548',
];

export interface SessionStateOptions {
  personas: PersonaPair;
  clock: SessionClock;
  maxUptimeMs: number;
  /** Trailing messages included in snapshots */
  snapshotMessages?: number;
  palette?: readonly string[];
}

export class SessionState {
  readonly personas: PersonaPair;
  readonly bootMs: number;
  readonly maxUptimeMs: number;

  private readonly clock: SessionClock;
  private readonly snapshotMessages: number;
  private readonly palette: readonly string[];

  private humans: Map<string, HumanParticipant> = new Map();
  private colorIndex = 0;
  private messages: SessionMessage[] = [];
  private topic: Topic | null = null;
  private typing: TypingState | null = null;
  private ended = false;

  constructor(options: SessionStateOptions) {
    const [a, b] = options.personas;
    if (a.id === b.id) {
      throw new Error('A session needs two distinct personas');
    }
    if (options.palette && options.palette.length === 0) {
      throw new Error('Colour palette must not be empty');
    }

    this.personas = options.personas;
    this.clock = options.clock;
    this.bootMs = options.clock.now();
    this.maxUptimeMs = options.maxUptimeMs;
    this.snapshotMessages = options.snapshotMessages ?? 120;
    this.palette = options.palette ?? USER_COLORS;
  }

  // =========================================================================
  // Clock
  // =========================================================================

  timeRemainingMs(): number {
    return Math.max(0, this.maxUptimeMs - (this.clock.now() - this.bootMs));
  }

  get isEnded(): boolean {
    return this.ended;
  }

  markEnded(): void {
    this.ended = true;
    this.typing = null;
  }

  // =========================================================================
  // Roster
  // =========================================================================

  getPersona(id: string): Persona | undefined {
    return this.personas.find((persona) => persona.id === id);
  }

  addHuman(name: string): HumanParticipant {
    const color = this.palette[this.colorIndex % this.palette.length] ?? '#ffffff';
    this.colorIndex += 1;

    const participant: HumanParticipant = Object.freeze({
      id: uuidv4().slice(0, 8),
      name,
      color,
      joinedAt: new Date(this.clock.now()).toISOString(),
    });

    this.humans.set(participant.id, participant);
    return participant;
  }

  getHuman(id: string): HumanParticipant | undefined {
    return this.humans.get(id);
  }

  listHumans(): HumanParticipant[] {
    return Array.from(this.humans.values());
  }

  // =========================================================================
  // Topic & typing
  // =========================================================================

  get currentTopic(): Topic | null {
    return this.topic;
  }

  /**
   * Advance to a new topic; the ordinal only ever increases
   */
  startTopic(text: string): Topic {
    const topic: Topic = Object.freeze({ text, number: (this.topic?.number ?? 0) + 1 });
    this.topic = topic;
    return topic;
  }

  get currentTyping(): TypingState | null {
    return this.typing;
  }

  setTyping(typing: TypingState | null): void {
    this.typing = typing;
  }

  // =========================================================================
  // Messages
  // =========================================================================

  appendTopic(topic: Topic): TopicMessage {
    return this.push({ kind: 'topic', text: topic.text, ...this.stamp(), topicNumber: topic.number });
  }

  /**
   * Append a finished AI utterance. The persona must be one of this session's.
   * `id` lets the streamed events and the stored message share an id.
   */
  appendAi(persona: Persona, text: string, id?: string): AiMessage {
    if (!this.getPersona(persona.id)) {
      throw new Error(`Unknown persona: ${persona.id}`);
    }

    return this.push({
      kind: 'ai',
      text,
      speakerId: persona.id,
      speakerName: persona.name,
      avatar: persona.avatar,
      color: persona.color,
      role: persona.role,
      ...this.stamp(),
      ...(id ? { id } : {}),
    });
  }

  appendHuman(participantId: string, text: string, clientMessageId?: string): HumanMessage {
    const participant = this.humans.get(participantId);
    if (!participant) {
      throw new Error(`Unknown participant: ${participantId}`);
    }

    return this.push({
      kind: 'human',
      text,
      participantId: participant.id,
      participantName: participant.name,
      color: participant.color,
      ...(clientMessageId ? { clientMessageId } : {}),
      ...this.stamp(),
    });
  }

  appendSystem(text: string): SystemMessage {
    return this.push({ kind: 'system', text, ...this.stamp() });
  }

  get messageCount(): number {
    return this.messages.length;
  }

  /**
   * The last `count` messages, oldest first
   */
  recentMessages(count: number): SessionMessage[] {
    return count <= 0 ? [] : this.messages.slice(-count);
  }

  /**
   * Most recent AI utterance, optionally restricted to one speaker
   */
  lastAiMessage(speakerId?: string): AiMessage | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (message?.kind === 'ai' && (!speakerId || message.speakerId === speakerId)) {
        return message;
      }
    }
    return undefined;
  }

  summary(): SessionSummary {
    let aiMessages = 0;
    let humanMessages = 0;
    for (const message of this.messages) {
      if (message.kind === 'ai') aiMessages++;
      else if (message.kind === 'human') humanMessages++;
    }

    return {
      aiMessages,
      humanMessages,
      topics: this.topic?.number ?? 0,
      participants: this.humans.size,
    };
  }

  /**
   * Immutable point-in-time copy for new or reconnecting observers
   */
  snapshot(viewers: number): SessionSnapshot {
    return Object.freeze({
      personas: this.personas,
      humans: this.listHumans(),
      topic: this.topic,
      typing: this.typing ? { ...this.typing } : null,
      messages: this.recentMessages(this.snapshotMessages),
      bootMs: this.bootMs,
      maxUptimeMs: this.maxUptimeMs,
      timeRemainingMs: this.timeRemainingMs(),
      viewers,
      ended: this.ended,
    });
  }

  private stamp(): Pick<SessionMessage, 'id' | 'seq' | 'timestamp' | 'topicNumber'> {
    return {
      id: uuidv4(),
      seq: this.messages.length + 1,
      timestamp: new Date(this.clock.now()).toISOString(),
      topicNumber: this.topic?.number ?? 0,
    };
  }

  private push<M extends SessionMessage>(message: M): M {
    this.messages.push(message);
    Object.freeze(message);
    return message;
  }
}
