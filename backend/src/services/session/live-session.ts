/**
 * Live Session Factory
 *
 * Wires one session: state, bus, queue, rotator, content source, engine,
 * ingress and SSE relay. The server builds exactly one at startup.
 */

import type { LLMConfig } from '../../config/llm.js';
import type { SessionConfig } from '../../config/session.js';
import { systemClock, type SessionClock } from '../../utils/clock.js';
import { createRandom, type RandomSource } from '../../utils/random.js';
import { createLogger } from '../../utils/logger.js';
import type { Persona, PersonaPair } from '../../types/session.js';
import { BroadcastBus } from '../broadcast/broadcast-bus.js';
import type { Catalog } from '../catalog/catalog-loader.js';
import { FallbackContentSource, LLMContentSource, type ContentSource } from '../content/content-source.js';
import { SessionEngine } from '../engine/index.js';
import { LLMClient } from '../llm/index.js';
import { SSEManager } from '../sse/sse-manager.js';
import { InboundQueue } from './inbound-queue.js';
import { IngressService } from './ingress-service.js';
import { SessionState } from './session-state.js';
import { TopicRotator } from './topic-rotator.js';

const logger = createLogger({ module: 'LiveSession' });

export interface LiveSession {
  state: SessionState;
  bus: BroadcastBus;
  inbound: InboundQueue;
  rotator: TopicRotator;
  engine: SessionEngine;
  ingress: IngressService;
  sse: SSEManager;
}

export interface LiveSessionOptions {
  config: SessionConfig;
  catalog: Catalog;
  /** Content source; defaults to the primary/backup chat-completions models */
  content?: ContentSource;
  llm?: LLMConfig;
  clock?: SessionClock;
  random?: RandomSource;
}

/**
 * Primary model with one backup attempt
 */
export function createContentSource(llm: LLMConfig): ContentSource {
  const client = new LLMClient(llm);
  return new FallbackContentSource(
    new LLMContentSource(client, llm.primaryModel),
    new LLMContentSource(client, llm.backupModel)
  );
}

function drawPersonas(personas: readonly Persona[], random: RandomSource): PersonaPair {
  const [a, b] = random.sample(personas, 2);
  if (!a || !b) {
    throw new Error('At least two personas are required');
  }
  return [a, b];
}

export function createLiveSession(options: LiveSessionOptions): LiveSession {
  const { config, catalog } = options;
  const clock = options.clock ?? systemClock;
  const random = options.random ?? createRandom(config.seed);

  let content = options.content;
  if (!content) {
    if (!options.llm) {
      throw new Error('Either a content source or an LLM configuration is required');
    }
    content = createContentSource(options.llm);
  }

  const state = new SessionState({
    personas: drawPersonas(catalog.personas, random),
    clock,
    maxUptimeMs: config.maxUptimeMs,
    snapshotMessages: config.snapshotMessages,
  });
  const bus = new BroadcastBus({
    listenerCapacity: config.listenerCapacity,
    // A dropped viewer's response is ended and presence refreshed
    onListenerDropped: (listener) => sse.handleListenerDropped(listener.id),
  });
  const inbound = new InboundQueue(clock);
  const rotator = new TopicRotator(catalog.topics, random);

  const ingress = new IngressService({
    state,
    bus,
    inbound,
    maxNameLength: config.maxNameLength,
    maxTextLength: config.maxTextLength,
  });
  const sse = new SSEManager({
    bus,
    state,
    pingIntervalMs: config.pingIntervalMs,
    onViewersChanged: () => ingress.publishPresence(),
  });
  const engine = new SessionEngine({ state, bus, inbound, rotator, content, clock, random, config });

  logger.info(
    {
      personas: state.personas.map((persona) => persona.name),
      topics: rotator.size,
      content: content.name,
      seeded: config.seed !== null,
    },
    'Live session created'
  );

  return { state, bus, inbound, rotator, engine, ingress, sse };
}
