/**
 * Session Engine
 *
 * Drives the live two-persona debate for the whole uptime budget: picks
 * topics, answers human messages, takes automatic turns and streams every
 * utterance word by word over the broadcast bus.
 *
 * State machine:
 *   SELECT_TOPIC -> AWAIT_EVENT -> (RESPOND_TO_HUMAN | AUTO_TURN) -> STREAM -> AWAIT_EVENT
 *   AWAIT_EVENT  -> SELECT_TOPIC once the topic's turn budget is spent
 *   any          -> SHUTDOWN once time remaining reaches the shutdown margin
 *
 * The engine is the only writer of AI messages and the only consumer of the
 * inbound queue. Nothing raised by one iteration ends the session.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../utils/logger.js';
import type { SessionClock } from '../../utils/clock.js';
import type { RandomSource } from '../../utils/random.js';
import type { SessionConfig } from '../../config/session.js';
import { TransientContentError, toError } from '../../types/errors.js';
import type {
  HumanMessage,
  Persona,
  SessionSummary,
  Topic,
} from '../../types/session.js';
import type { SpeakerIdentity } from '../../types/sse.js';
import type { BroadcastBus } from '../broadcast/broadcast-bus.js';
import type { ContentSource } from '../content/content-source.js';
import { tokenize } from '../content/utterance-cleaner.js';
import type { InboundQueue } from '../session/inbound-queue.js';
import type { SessionState } from '../session/session-state.js';
import type { TopicRotator } from '../session/topic-rotator.js';
import { ConversationHistory } from './conversation-history.js';
import { displayBudgetMs, wordDelayMs } from './pacing.js';
import {
  buildAutoTurnSystemPrompt,
  buildHumanReplyInstruction,
  buildHumanReplySystemPrompt,
  buildOpeningInstruction,
  buildRebuttalInstruction,
  formatChatLines,
  HUMAN_MENTION_PROBABILITY,
  pickDirective,
} from './prompts/turn-prompts.js';

const logger = createLogger({ module: 'SessionEngine' });

/** Messages scanned for a human remark an automatic turn may mention */
const HUMAN_MENTION_WINDOW = 6;
/** Messages scanned, and chat lines kept, for a reply to a human */
const REPLY_CONTEXT_MESSAGES = 8;
const REPLY_CHAT_LINES = 5;

export type EngineConfig = Pick<
  SessionConfig,
  | 'shutdownMarginMs'
  | 'aiGapMs'
  | 'firstTurnDelayMs'
  | 'topicChangeDelayMs'
  | 'settleMinMs'
  | 'settleMaxMs'
  | 'humanCooldownMs'
  | 'failureBackoffMs'
  | 'pollIntervalMs'
  | 'turnsPerTopicMin'
  | 'turnsPerTopicMax'
  | 'historyWindow'
  | 'historyCarryOver'
  | 'pacing'
>;

export interface SessionEngineOptions {
  state: SessionState;
  bus: BroadcastBus;
  inbound: InboundQueue;
  rotator: TopicRotator;
  content: ContentSource;
  clock: SessionClock;
  random: RandomSource;
  config: EngineConfig;
}

/**
 * Counters exposed for health reporting and tests
 */
export interface EngineStatus {
  running: boolean;
  turnsOnTopic: number;
  topicBudget: number;
  autoTurns: number;
  nextAutoAt: number;
}

interface TurnRequest {
  speaker: Persona;
  system: string;
  instruction: string;
}

function speakerIdentity(persona: Persona): SpeakerIdentity {
  return {
    speakerId: persona.id,
    name: persona.name,
    avatar: persona.avatar,
    color: persona.color,
    role: persona.role,
  };
}

export class SessionEngine {
  private readonly state: SessionState;
  private readonly bus: BroadcastBus;
  private readonly inbound: InboundQueue;
  private readonly rotator: TopicRotator;
  private readonly content: ContentSource;
  private readonly clock: SessionClock;
  private readonly random: RandomSource;
  private readonly config: EngineConfig;
  private readonly history: ConversationHistory;

  private turnsOnTopic = 0;
  private topicBudget = 0;
  private autoTurnIndex = 0;
  private nextAutoAt = 0;
  private stopRequested = false;
  private runPromise: Promise<SessionSummary> | null = null;
  private running = false;

  constructor(options: SessionEngineOptions) {
    this.state = options.state;
    this.bus = options.bus;
    this.inbound = options.inbound;
    this.rotator = options.rotator;
    this.content = options.content;
    this.clock = options.clock;
    this.random = options.random;
    this.config = options.config;
    this.history = new ConversationHistory(options.config.historyWindow);
  }

  get status(): EngineStatus {
    return {
      running: this.running,
      turnsOnTopic: this.turnsOnTopic,
      topicBudget: this.topicBudget,
      autoTurns: this.autoTurnIndex,
      nextAutoAt: this.nextAutoAt,
    };
  }

  /**
   * Start the session loop. Calling again returns the same run.
   */
  start(): Promise<SessionSummary> {
    if (!this.runPromise) {
      this.runPromise = this.run();
    }
    return this.runPromise;
  }

  /**
   * Ask the loop to shut down at the next iteration boundary
   */
  stop(): void {
    this.stopRequested = true;
  }

  private async run(): Promise<SessionSummary> {
    this.running = true;
    this.openSession();

    while (this.hasTimeForTurn()) {
      try {
        await this.iterate();
      } catch (error) {
        logger.error({ err: toError(error) }, 'Engine iteration failed');
        await this.clock.sleep(this.config.failureBackoffMs);
      }
    }

    return this.closeSession();
  }

  private hasTimeForTurn(): boolean {
    return !this.stopRequested && this.state.timeRemainingMs() > this.config.shutdownMarginMs;
  }

  private async iterate(): Promise<void> {
    if (this.turnsOnTopic >= this.topicBudget) {
      this.rotateTopic();
      return;
    }

    const first = await this.inbound.poll(this.config.pollIntervalMs);
    if (!this.hasTimeForTurn()) {
      return;
    }

    if (first) {
      await this.respondToHuman(first);
      return;
    }

    if (this.clock.now() >= this.nextAutoAt) {
      await this.autoTurn();
    }
  }

  // =========================================================================
  // Topics
  // =========================================================================

  private openSession(): void {
    const topic = this.beginTopic();

    logger.info(
      {
        personas: this.state.personas.map((persona) => persona.id),
        topic: topic.text,
        topicBudget: this.topicBudget,
        timeRemainingMs: this.state.timeRemainingMs(),
      },
      'Session started'
    );

    this.bus.publish('init', {
      personas: this.state.personas,
      topic: topic.text,
      topicNumber: topic.number,
      bootMs: this.state.bootMs,
      maxUptimeMs: this.state.maxUptimeMs,
      timeRemainingMs: this.state.timeRemainingMs(),
    });
    this.bus.publish('newtopic', this.state.appendTopic(topic));

    this.nextAutoAt = this.clock.now() + this.config.firstTurnDelayMs;
  }

  private rotateTopic(): void {
    const previousTurns = this.turnsOnTopic;
    this.history.truncate(this.config.historyCarryOver);
    const topic = this.beginTopic();

    logger.info(
      { topic: topic.text, topicNumber: topic.number, previousTurns, topicBudget: this.topicBudget },
      'Topic changed'
    );

    this.bus.publish('newtopic', this.state.appendTopic(topic));
    this.nextAutoAt = this.clock.now() + this.config.topicChangeDelayMs;
  }

  private beginTopic(): Topic {
    const topic = this.state.startTopic(this.rotator.pick());
    this.turnsOnTopic = 0;
    this.topicBudget = this.random.int(this.config.turnsPerTopicMin, this.config.turnsPerTopicMax);
    return topic;
  }

  private topicText(): string {
    return this.state.currentTopic?.text ?? '';
  }

  private opponentOf(persona: Persona): Persona {
    const [a, b] = this.state.personas;
    return persona.id === a.id ? b : a;
  }

  // =========================================================================
  // Turns
  // =========================================================================

  private async respondToHuman(first: HumanMessage): Promise<void> {
    await this.clock.sleep(this.random.uniform(this.config.settleMinMs, this.config.settleMaxMs));

    const burst = [first, ...this.inbound.drain()];
    const addressed = burst[burst.length - 1] ?? first;
    if (!this.hasTimeForTurn()) {
      logger.info({ dropped: burst.length }, 'Session closing, human messages left unanswered');
      return;
    }
    if (burst.length > 1) {
      logger.debug({ coalesced: burst.length, participantId: addressed.participantId }, 'Coalesced human messages');
    }

    const speaker = this.pickResponder();
    const opponent = this.opponentOf(speaker);
    const input = {
      speaker,
      opponent,
      topic: this.topicText(),
      humanName: addressed.participantName,
      humanText: addressed.text,
      recentChat: formatChatLines(this.state.recentMessages(REPLY_CONTEXT_MESSAGES), REPLY_CHAT_LINES),
    };

    const streamed = await this.takeTurn({
      speaker,
      system: buildHumanReplySystemPrompt(input),
      instruction: buildHumanReplyInstruction(input),
    });

    if (streamed) {
      this.turnsOnTopic += 1;
    }
    this.nextAutoAt = this.clock.now() + this.config.humanCooldownMs;
  }

  /**
   * The persona that did not produce the latest AI utterance
   */
  private pickResponder(): Persona {
    const last = this.state.lastAiMessage();
    const [a, b] = this.state.personas;
    if (!last) {
      return this.random.pick(this.state.personas);
    }
    return last.speakerId === a.id ? b : a;
  }

  private async autoTurn(): Promise<void> {
    const [a, b] = this.state.personas;
    const speaker = this.autoTurnIndex % 2 === 0 ? a : b;
    const opponent = this.opponentOf(speaker);
    const topic = this.topicText();

    const system = buildAutoTurnSystemPrompt({
      speaker,
      opponent,
      topic,
      turnOnTopic: this.turnsOnTopic,
      humansPresent: this.state.listHumans().length > 0,
    });

    const streamed = await this.takeTurn({ speaker, system, instruction: this.autoInstruction(opponent, topic) });

    if (streamed) {
      this.turnsOnTopic += 1;
      this.autoTurnIndex += 1;
      this.nextAutoAt = this.clock.now() + this.config.aiGapMs;
    } else {
      this.nextAutoAt = this.clock.now() + this.config.failureBackoffMs;
    }

    const next = this.autoTurnIndex % 2 === 0 ? a : b;
    this.bus.publish('waiting', {
      speakerId: next.id,
      name: next.name,
      avatar: next.avatar,
      color: next.color,
      gapSeconds: Math.round((this.nextAutoAt - this.clock.now()) / 1000),
      timeRemainingMs: this.state.timeRemainingMs(),
    });
  }

  private autoInstruction(opponent: Persona, topic: string): string {
    const opponentLast = this.state.lastAiMessage(opponent.id);

    if (this.turnsOnTopic === 0 || !opponentLast) {
      return buildOpeningInstruction(topic);
    }

    let humanMention: { name: string; text: string } | undefined;
    const recentHuman = this.state
      .recentMessages(HUMAN_MENTION_WINDOW)
      .filter((message) => message.kind === 'human')
      .pop();
    if (recentHuman?.kind === 'human' && this.random.next() < HUMAN_MENTION_PROBABILITY) {
      humanMention = { name: recentHuman.participantName, text: recentHuman.text };
    }

    return buildRebuttalInstruction({
      topic,
      opponent,
      opponentLastText: opponentLast.text,
      directive: pickDirective(this.random),
      humanMention,
    });
  }

  /**
   * Generate and stream one utterance. Returns false when no content could
   * be produced; nothing is appended in that case.
   */
  private async takeTurn(request: TurnRequest): Promise<boolean> {
    const { speaker } = request;
    const identity = speakerIdentity(speaker);

    this.state.setTyping(identity);
    this.bus.publish('typing', identity);

    const startedAt = this.clock.now();
    let text: string;
    try {
      text = await this.content.generate({
        persona: speaker,
        system: request.system,
        history: this.history.forPersona(speaker.id),
        instruction: request.instruction,
      });
    } catch (error) {
      this.state.setTyping(null);
      if (error instanceof TransientContentError) {
        logger.error(
          { speakerId: speaker.id, attempts: error.attempts.map((attempt) => attempt.message) },
          'Turn skipped: no content source produced an utterance'
        );
      } else {
        logger.error({ speakerId: speaker.id, err: toError(error) }, 'Turn skipped: content generation failed');
      }
      return false;
    }

    await this.stream(speaker, text, this.clock.now() - startedAt);
    return true;
  }

  private async stream(speaker: Persona, text: string, generationMs: number): Promise<void> {
    const identity = speakerIdentity(speaker);
    const words = tokenize(text);
    const messageId = uuidv4();
    const pacing = this.config.pacing;
    const delay = wordDelayMs(words.length, displayBudgetMs(generationMs, pacing), pacing);

    this.bus.publish('msgstart', {
      ...identity,
      messageId,
      total: words.length,
      timestamp: new Date(this.clock.now()).toISOString(),
    });

    for (const [index, word] of words.entries()) {
      this.bus.publish('word', { messageId, speakerId: speaker.id, word, index, total: words.length });
      await this.clock.sleep(delay);
    }

    const finalText = words.join(' ');
    this.state.setTyping(null);
    const message = this.state.appendAi(speaker, finalText, messageId);
    this.history.record(speaker.id, finalText);

    this.bus.publish('msgdone', {
      messageId,
      seq: message.seq,
      speakerId: speaker.id,
      name: speaker.name,
      text: finalText,
      timestamp: message.timestamp,
    });

    logger.debug(
      { speakerId: speaker.id, words: words.length, wordDelayMs: delay, generationMs, seq: message.seq },
      'Utterance streamed'
    );
  }

  // =========================================================================
  // Shutdown
  // =========================================================================

  private closeSession(): SessionSummary {
    this.state.markEnded();
    const summary = this.state.summary();
    this.bus.publish('shutdown', summary);
    this.running = false;

    logger.info({ ...summary, stopRequested: this.stopRequested }, 'Session ended');
    return summary;
  }
}
