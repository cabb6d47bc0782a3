import { expect } from 'vitest';
import type { RandomSource } from '../../randomSource';
import type { ConstraintModel, Pairing, Participant } from '../../types';

/**
 * Random source that always takes the first option. Makes the search order
 * fully predictable.
 */
export const firstChoiceRandom: RandomSource = {
  next: () => 0,
  int: () => 0,
  pick: <T>(items: readonly T[]): T => {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[0];
  },
};

export function assertValidPairing(model: ConstraintModel, pairing: Pairing): void {
  expect([...pairing.keys()]).toEqual(model.names);
  expect([...pairing.values()].sort()).toEqual([...model.names].sort());

  for (const [giver, receiver] of pairing) {
    expect(receiver).not.toBe(giver);
    expect(model.block.get(giver)?.has(receiver) ?? false).toBe(false);
  }
  for (const [giver, receiver] of model.fixed) {
    expect(pairing.get(giver)).toBe(receiver);
  }
}

/**
 * Steps needed to get back to `start` following the pairing
 */
export function cycleLength(pairing: Pairing, start: Participant): number {
  let steps = 0;
  let current: Participant | undefined = start;
  do {
    current = pairing.get(current);
    steps++;
  } while (current !== undefined && current !== start && steps <= pairing.size);
  return steps;
}

export function assertSingleCycle(pairing: Pairing): void {
  for (const start of pairing.keys()) {
    expect(cycleLength(pairing, start)).toBe(pairing.size);
  }
}
