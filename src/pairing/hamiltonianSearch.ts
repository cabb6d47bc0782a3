import type { RandomSource } from './randomSource';
import type { AllowedGraph, Pairing, Participant } from './types';

export interface HamiltonianSearchOptions {
  /** Permutations to rule out before giving up. Defaults to N! (the whole space). */
  maxTries?: bigint;
}

export type HamiltonianSearchResult =
  | { found: true; pairing: Pairing; tries: bigint }
  | { found: false; tries: bigint };

export function factorial(n: number): bigint {
  let result = 1n;
  for (let i = 2; i <= n; i++) {
    result *= BigInt(i);
  }
  return result;
}

/**
 * Hamiltonian cycle search over permutations addressed in the factorial
 * number system.
 *
 * Digit i of `selections` lies in [0, N - i) and picks among the participants
 * not yet on the path, so every digit vector decodes to a distinct
 * permutation and the vectors enumerate all N! of them in rank order.
 * A rejected edge skips every permutation sharing the rejected prefix.
 */
export class HamiltonianCycleSearch {
  private names: readonly Participant[];
  private graph: AllowedGraph;
  private selections: number[];
  // weights[i] = (N - 1 - i)!, the number of permutations below one value of digit i
  private weights: bigint[];
  private path: Participant[] = [];
  private tries = 0n;

  constructor(names: readonly Participant[], graph: AllowedGraph, random: RandomSource) {
    const count = names.length;
    this.names = names;
    this.graph = graph;
    // Independent uniform digits are a uniform rank in [0, N!)
    this.selections = names.map((_, i) => random.int(count - i));
    this.weights = names.map((_, i) => factorial(count - 1 - i));
  }

  private hasEdge(from: Participant, to: Participant): boolean {
    return this.graph.get(from)?.has(to) ?? false;
  }

  /**
   * Participants not on the path yet, in names order
   */
  private remaining(): Participant[] {
    const used = new Set(this.path);
    return this.names.filter((name) => !used.has(name));
  }

  /**
   * Permutations from the current rank to the end of the block sharing the
   * prefix up to and including `position`
   */
  private skippedFrom(position: number): bigint {
    let offset = 0n;
    for (let i = position + 1; i < this.selections.length; i++) {
      offset += BigInt(this.selections[i]) * this.weights[i];
    }
    return this.weights[position] - offset;
  }

  /**
   * Reject the prefix ending at `position` and move to the first permutation
   * after it. Wraps from the last rank back to rank 0.
   */
  private reject(position: number): void {
    this.tries += this.skippedFrom(position);

    for (let i = position + 1; i < this.selections.length; i++) {
      this.selections[i] = 0;
    }

    let digit = position;
    while (digit >= 0 && this.selections[digit] + 1 >= this.names.length - digit) {
      this.selections[digit] = 0;
      digit--;
    }
    if (digit >= 0) {
      this.selections[digit]++;
    }

    this.path.length = Math.max(digit, 0);
  }

  private toPairing(): Pairing {
    const next = new Map<Participant, Participant>();
    this.path.forEach((giver, i) => {
      next.set(giver, this.path[(i + 1) % this.path.length]);
    });

    const pairing: Pairing = new Map();
    for (const name of this.names) {
      const receiver = next.get(name);
      if (receiver !== undefined) {
        pairing.set(name, receiver);
      }
    }
    return pairing;
  }

  search(options: HamiltonianSearchOptions = {}): HamiltonianSearchResult {
    const count = this.names.length;
    const budget = options.maxTries ?? factorial(count);

    if (count < 2) {
      return { found: false, tries: this.tries };
    }

    while (this.tries < budget) {
      if (this.path.length === count) {
        if (this.hasEdge(this.path[count - 1], this.path[0])) {
          return { found: true, pairing: this.toPairing(), tries: this.tries };
        }
        // The cycle does not close
        this.reject(count - 1);
        continue;
      }

      const position = this.path.length;
      const candidate = this.remaining()[this.selections[position]];
      if (position > 0 && !this.hasEdge(this.path[position - 1], candidate)) {
        this.reject(position);
        continue;
      }
      this.path.push(candidate);
    }

    return { found: false, tries: this.tries };
  }
}

export function findHamiltonianPairing(
  names: readonly Participant[],
  graph: AllowedGraph,
  random: RandomSource,
  options: HamiltonianSearchOptions = {}
): HamiltonianSearchResult {
  return new HamiltonianCycleSearch(names, graph, random).search(options);
}
