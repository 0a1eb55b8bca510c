/**
 * Turn Prompts
 *
 * System prompts and turn instructions for the two debating personas.
 */

import type { Persona, SessionMessage } from '../../../types/session.js';
import type { RandomSource } from '../../../utils/random.js';
import { MAX_UTTERANCE_WORDS } from '../../content/utterance-cleaner.js';

/**
 * Rhetorical moves for follow-up turns, applied to the opponent's last point
 */
export const REBUTTAL_DIRECTIVES = [
  'direct_challenge',
  'real_world_evidence',
  'acknowledge_then_rebut',
  'probing_question',
  'expose_assumption',
  'new_angle',
  'personal_stakes',
  'agree_disagree_summary',
] as const;

export type RebuttalDirective = typeof REBUTTAL_DIRECTIVES[number];

const DIRECTIVE_TEXT: Record<RebuttalDirective, string> = {
  direct_challenge: 'Push back on their weakest point.',
  real_world_evidence: 'Give a real-world example that counters this.',
  acknowledge_then_rebut: 'Acknowledge something right, then hit harder.',
  probing_question: "Ask a sharp question they'd struggle with.",
  expose_assumption: 'Expose the assumption behind their argument.',
  new_angle: 'Bring up something nobody has mentioned yet.',
  personal_stakes: 'Why does this topic matter to someone like you?',
  agree_disagree_summary: 'Where do you both agree vs truly disagree?',
};

/** Chance that an automatic turn is offered a recent human message */
export const HUMAN_MENTION_PROBABILITY = 0.3;

function limit(): string {
  return `Under ${MAX_UTTERANCE_WORDS} words.`;
}

function personaHeader(persona: Persona): string {
  return `You are ${persona.name} — ${persona.role}.
Personality: ${persona.personality}.
Style: ${persona.style}.`;
}

/**
 * Chat lines ("Name: text") from the human and AI messages among `messages`
 */
export function formatChatLines(messages: SessionMessage[], maxLines: number): string {
  const lines: string[] = [];
  for (const message of messages) {
    if (message.kind === 'human') {
      lines.push(`${message.participantName}: ${message.text}`);
    } else if (message.kind === 'ai') {
      lines.push(`${message.speakerName}: ${message.text}`);
    }
  }
  return lines.slice(-maxLines).join('\n');
}

// ============================================================================
// Automatic turns
// ============================================================================

export interface AutoTurnPromptInput {
  speaker: Persona;
  opponent: Persona;
  topic: string;
  /** Utterances on this topic so far */
  turnOnTopic: number;
  humansPresent: boolean;
}

export function buildAutoTurnSystemPrompt(input: AutoTurnPromptInput): string {
  const lines = [
    personaHeader(input.speaker),
    `Debating "${input.topic}" with ${input.opponent.name} (${input.opponent.role}).`,
  ];
  if (input.humansPresent) {
    lines.push('There are humans watching and participating — acknowledge them occasionally.');
  }
  lines.push(
    `${limit()} Sharp, direct, conversational.`,
    "Don't start with your name. No quotes. Engage their points.",
    `Message ${input.turnOnTopic + 1} of ongoing conversation — keep it flowing.`,
    "Don't repeat yourself."
  );
  return lines.join('\n');
}

export function buildOpeningInstruction(topic: string): string {
  return `Topic: "${topic}"\nYou go first. Opening thought. ${limit()}`;
}

export interface RebuttalInstructionInput {
  topic: string;
  opponent: Persona;
  opponentLastText: string;
  directive: RebuttalDirective;
  /** Optional recent human remark the speaker may reference */
  humanMention?: { name: string; text: string };
}

export function buildRebuttalInstruction(input: RebuttalInstructionInput): string {
  const opener = input.directive === 'direct_challenge'
    ? `Respond to ${input.opponent.name}: "${input.opponentLastText}"`
    : `${input.opponent.name} said: "${input.opponentLastText}"`;

  let instruction = `Topic: "${input.topic}"\n${opener}\n${DIRECTIVE_TEXT[input.directive]}\n${limit()}`;

  if (input.humanMention) {
    instruction += `\n(Also, a human named ${input.humanMention.name} recently said: "${input.humanMention.text}" — you may briefly reference this.)`;
  }

  return instruction;
}

export function pickDirective(random: RandomSource): RebuttalDirective {
  return random.pick(REBUTTAL_DIRECTIVES);
}

// ============================================================================
// Responses to humans
// ============================================================================

export interface HumanReplyPromptInput {
  speaker: Persona;
  opponent: Persona;
  topic: string;
  humanName: string;
  humanText: string;
  recentChat: string;
}

export function buildHumanReplySystemPrompt(input: HumanReplyPromptInput): string {
  return `${personaHeader(input.speaker)}
You're in a live group debate about "${input.topic}" with ${input.opponent.name} (${input.opponent.role}) and human participants.
A human has joined and said something. Respond to them directly — use their name.
Be warm but stay in character. ${limit()} Be conversational.`;
}

export function buildHumanReplyInstruction(input: HumanReplyPromptInput): string {
  return `Topic: "${input.topic}"
Recent chat:
${input.recentChat}

${input.humanName} just said: "${input.humanText}"
Respond to ${input.humanName}'s message. ${limit()}`;
}
