import type { RandomSource } from '../pairing/randomSource';
import type { Pairing, Participant } from '../pairing/types';

export const PADDING_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz1234567890+/=';

const PAD_MARGIN = 5;

/**
 * Note length every assignment is padded to: the longest receiver name plus
 * a margin, so the size of a note does not give the name away.
 */
export function padLength(pairing: Pairing): number {
  let longest = 0;
  for (const receiver of pairing.values()) {
    longest = Math.max(longest, receiver.length);
  }
  return longest + PAD_MARGIN;
}

export function secretPadding(receiver: Participant, padTo: number, random: RandomSource): string {
  const count = Math.max(padTo - receiver.length - 1, 0);
  let padding = '';
  for (let i = 0; i < count; i++) {
    padding += random.pick([...PADDING_ALPHABET]);
  }
  return padding;
}

export function renderAssignmentNote(receiver: Participant, padding: string): string {
  return `${receiver}\nSecret Padding: ${padding}\n`;
}
