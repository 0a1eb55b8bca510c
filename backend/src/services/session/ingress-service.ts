/**
 * Ingress Service
 *
 * Validates join/send/leave commands from human participants and turns
 * them into roster changes, appended messages, bus events and inbound
 * queue entries for the engine.
 */

import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import { ValidationError } from '../../types/errors.js';
import type { HumanMessage, HumanParticipant } from '../../types/session.js';
import type { BroadcastBus } from '../broadcast/broadcast-bus.js';
import type { InboundQueue } from './inbound-queue.js';
import type { SessionState } from './session-state.js';

const logger = createLogger({ module: 'IngressService' });

export interface IngressServiceOptions {
  state: SessionState;
  bus: BroadcastBus;
  inbound: InboundQueue;
  maxNameLength: number;
  maxTextLength: number;
}

const ParticipantRefSchema = z.object({
  id: z.string().min(1),
});

function cappedText(max: number, field: string) {
  return z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .transform((value) => value.slice(0, max));
}

function buildJoinSchema(maxNameLength: number) {
  return z.object({
    name: cappedText(maxNameLength, 'name'),
  });
}

function buildSendSchema(maxTextLength: number) {
  return ParticipantRefSchema.extend({
    text: cappedText(maxTextLength, 'text'),
    msgId: z.string().max(64).optional(),
  });
}

export class IngressService {
  private readonly state: SessionState;
  private readonly bus: BroadcastBus;
  private readonly inbound: InboundQueue;

  private readonly joinSchema: ReturnType<typeof buildJoinSchema>;
  private readonly sendSchema: ReturnType<typeof buildSendSchema>;

  constructor(options: IngressServiceOptions) {
    this.state = options.state;
    this.bus = options.bus;
    this.inbound = options.inbound;

    this.joinSchema = buildJoinSchema(options.maxNameLength);
    this.sendSchema = buildSendSchema(options.maxTextLength);
  }

  /**
   * Register a new participant and announce them
   */
  join(body: unknown): HumanParticipant {
    const parsed = this.joinSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('name required', 'invalid_input', parsed.error.errors);
    }

    const participant = this.state.addHuman(parsed.data.name);
    this.bus.publish('system', this.state.appendSystem(`👋 ${participant.name} joined the debate`));
    this.publishPresence();

    logger.info({ participantId: participant.id, name: participant.name }, 'Participant joined');
    return participant;
  }

  /**
   * Accept a chat message and queue it for an AI response
   */
  send(body: unknown): HumanMessage {
    const participant = this.resolveParticipant(body);

    const parsed = this.sendSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('text required', 'invalid_input', parsed.error.errors);
    }

    const message = this.state.appendHuman(participant.id, parsed.data.text, parsed.data.msgId);
    this.bus.publish('usermsg', message);
    this.inbound.enqueue(message);

    logger.info(
      { participantId: participant.id, seq: message.seq, preview: message.text.slice(0, 60) },
      'Participant message queued'
    );
    return message;
  }

  /**
   * Announce that a participant left. They stay on the roster.
   */
  leave(body: unknown): HumanParticipant {
    const participant = this.resolveParticipant(body);

    this.bus.publish('system', this.state.appendSystem(`🚪 ${participant.name} left the debate`));
    this.publishPresence();

    logger.info({ participantId: participant.id }, 'Participant left');
    return participant;
  }

  /**
   * Roster and viewer count to every listener
   */
  publishPresence(): void {
    this.bus.publish('presence', {
      users: this.state.listHumans(),
      viewers: this.bus.listenerCount,
    });
  }

  private resolveParticipant(body: unknown): HumanParticipant {
    const parsed = ParticipantRefSchema.safeParse(body);
    const participant = parsed.success ? this.state.getHuman(parsed.data.id) : undefined;
    if (!participant) {
      throw new ValidationError('not joined', 'unknown_participant', parsed.success ? [] : parsed.error.errors);
    }
    return participant;
  }
}
