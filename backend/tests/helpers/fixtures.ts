/**
 * Shared test fixtures: personas, a scripted content source and an event
 * recorder that parses the frames a bus listener receives
 */

import type { ContentRequest, ContentSource } from '../../src/services/content/content-source.js';
import type { BroadcastBus, BusListener } from '../../src/services/broadcast/broadcast-bus.js';
import type { EngineConfig } from '../../src/services/engine/session-engine.js';
import type { Persona, PersonaPair } from '../../src/types/session.js';

export const PERSONA_A: Persona = {
  id: 'alpha',
  name: 'Ada',
  avatar: 'A',
  color: '#111111',
  role: 'The Planner',
  personality: 'orderly',
  style: 'lists',
};

export const PERSONA_B: Persona = {
  id: 'beta',
  name: 'Bo',
  avatar: 'B',
  color: '#222222',
  role: 'The Improviser',
  personality: 'spontaneous',
  style: 'stories',
};

export const PERSONAS: PersonaPair = [PERSONA_A, PERSONA_B];

export const ENGINE_CONFIG: EngineConfig = {
  shutdownMarginMs: 60_000,
  aiGapMs: 25_000,
  firstTurnDelayMs: 6_000,
  topicChangeDelayMs: 5_000,
  settleMinMs: 3_000,
  settleMaxMs: 6_000,
  humanCooldownMs: 15_000,
  failureBackoffMs: 5_000,
  pollIntervalMs: 500,
  turnsPerTopicMin: 20,
  turnsPerTopicMax: 30,
  historyWindow: 16,
  historyCarryOver: 6,
  pacing: {
    targetBudgetMs: 18_000,
    minBudgetMs: 6_000,
    minWordDelayMs: 60,
    maxWordDelayMs: 500,
  },
};

export type Responder = (request: ContentRequest, call: number) => string | Promise<string>;

/**
 * Content source answering from a callback, keeping every request
 */
export class ScriptedContentSource implements ContentSource {
  readonly name: string;
  readonly requests: ContentRequest[] = [];
  private readonly respond: Responder;

  constructor(respond: Responder = () => 'I see your point but disagree', name: string = 'scripted') {
    this.respond = respond;
    this.name = name;
  }

  async generate(request: ContentRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request, this.requests.length);
  }
}

export interface RecordedEvent {
  id: string | undefined;
  event: string;
  data: Record<string, unknown>;
}

/**
 * Parse SSE frames into events
 */
export function parseFrames(frames: string[]): RecordedEvent[] {
  const events: RecordedEvent[] = [];

  for (const frame of frames) {
    let id: string | undefined;
    let event = '';
    let payload = '';

    for (const line of frame.split('\n')) {
      if (line.startsWith('id: ')) {
        id = line.substring(4);
      } else if (line.startsWith('event: ')) {
        event = line.substring(7);
      } else if (line.startsWith('data: ')) {
        payload = line.substring(6);
      }
    }

    if (event) {
      const envelope: { data: Record<string, unknown> } = JSON.parse(payload);
      events.push({ id, event, data: envelope.data });
    }
  }

  return events;
}

/**
 * Subscribe a listener and read back everything it received
 */
export function recordBus(bus: BroadcastBus): { listener: BusListener; events: () => RecordedEvent[] } {
  const listener = bus.subscribe();
  const received: RecordedEvent[] = [];

  return {
    listener,
    events: () => {
      received.push(...parseFrames(listener.drain()));
      return received;
    },
  };
}

export function ofType(events: RecordedEvent[], type: string): RecordedEvent[] {
  return events.filter((event) => event.event === type);
}
