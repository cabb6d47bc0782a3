import { describe, expect, it } from 'vitest';
import { createRandomSource } from '../pairing/randomSource';
import { firstChoiceRandom } from '../pairing/__tests__/helpers/assertions';
import { PADDING_ALPHABET, padLength, renderAssignmentNote, secretPadding } from '../utils/secretPadding';

describe('padLength', () => {
  it('adds a margin to the longest receiver name', () => {
    const pairing = new Map([
      ['Bob', 'Alexandra'],
      ['Alexandra', 'Bob'],
    ]);

    expect(padLength(pairing)).toBe(14);
  });
});

describe('secretPadding', () => {
  it('fills the note up to the padded length', () => {
    expect(secretPadding('Bob', 14, firstChoiceRandom)).toBe('AAAAAAAAAA');
  });

  it('never goes negative', () => {
    expect(secretPadding('Alexandra', 5, firstChoiceRandom)).toBe('');
  });

  it('draws from the base64 alphabet', () => {
    const padding = secretPadding('Al', 40, createRandomSource('padding'));

    expect(padding).toHaveLength(37);
    for (const char of padding) {
      expect(PADDING_ALPHABET).toContain(char);
    }
  });

  it('makes every note the same size', () => {
    const random = createRandomSource(1);
    const notes = ['Al', 'Bea', 'Christopher'].map((receiver) =>
      renderAssignmentNote(receiver, secretPadding(receiver, 16, random))
    );

    expect(new Set(notes.map((note) => note.length))).toEqual(new Set([33]));
  });
});

describe('renderAssignmentNote', () => {
  it('puts the receiver on the first line', () => {
    expect(renderAssignmentNote('Bob', 'xyz')).toBe('Bob\nSecret Padding: xyz\n');
  });
});
