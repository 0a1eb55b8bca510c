/**
 * Conversation History
 *
 * Bounded window of AI utterances. Each persona reads it from its own
 * perspective: its turns are `self`, the opponent's are `peer`.
 */

export type HistoryRole = 'self' | 'peer';

export interface HistoryEntry {
  role: HistoryRole;
  text: string;
}

interface RecordedTurn {
  speakerId: string;
  text: string;
}

export class ConversationHistory {
  private turns: RecordedTurn[] = [];
  private readonly capacity: number;

  constructor(capacity: number = 16) {
    if (capacity < 1) {
      throw new Error('History capacity must be at least 1');
    }
    this.capacity = capacity;
  }

  get length(): number {
    return this.turns.length;
  }

  record(speakerId: string, text: string): void {
    this.turns.push({ speakerId, text });
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }
  }

  /**
   * Keep only the last `keep` turns (topic change)
   */
  truncate(keep: number): void {
    this.turns = keep <= 0 ? [] : this.turns.slice(-keep);
  }

  forPersona(personaId: string): HistoryEntry[] {
    return this.turns.map((turn) => ({
      role: turn.speakerId === personaId ? 'self' : 'peer',
      text: turn.text,
    }));
  }
}
