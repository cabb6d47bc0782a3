import { isBlocked } from './constraintModel';
import type { RandomSource } from './randomSource';
import type { ConstraintModel, Pairing, Participant } from './types';

/**
 * One level of the search: the giver being placed, the receiver currently
 * tried, and the receivers that already failed at this level.
 */
interface Frame {
  who: Participant;
  rejected: Set<Participant>;
  pick?: Participant;
  unpairedIndex: number;
  picksLeftIndex: number;
}

/**
 * Randomized backtracking search for a pairing that honours Fixed and Block.
 * Sub-cycles are allowed, so it succeeds whenever any valid pairing exists.
 *
 * Runs on an explicit stack. Each level removes its giver and receiver from
 * the shared lists and remembers where, so undoing a level restores the
 * lists exactly as they were.
 */
export class BacktrackingSearch {
  private model: ConstraintModel;
  private random: RandomSource;
  private unpaired: Participant[];
  private picksLeft: Participant[];
  private pairs = new Map<Participant, Participant>();

  constructor(model: ConstraintModel, random: RandomSource) {
    const fixedTargets = new Set(model.fixed.values());
    this.model = model;
    this.random = random;
    this.unpaired = [...model.names];
    this.picksLeft = model.names.filter((name) => !fixedTargets.has(name));
  }

  /**
   * Givers with a forced receiver go first so contradictions surface early
   */
  private selectWho(): Participant {
    for (const giver of this.model.fixed.keys()) {
      if (this.unpaired.includes(giver)) {
        return giver;
      }
    }
    return this.random.pick(this.unpaired);
  }

  /**
   * Receivers `who` could still take, ignoring what was already rejected
   */
  private optionsFor(who: Participant): Participant[] {
    const forced = this.model.fixed.get(who);
    if (forced !== undefined) {
      return isBlocked(this.model, who, forced) ? [] : [forced];
    }
    return this.picksLeft.filter((receiver) => receiver !== who && !isBlocked(this.model, who, receiver));
  }

  private eligibleFor(frame: Frame): Participant[] {
    return this.optionsFor(frame.who).filter((receiver) => !frame.rejected.has(receiver));
  }

  /**
   * Whether every unpaired giver can still be matched to a distinct free
   * receiver (augmenting paths). Fixed targets never sit in `picksLeft`, so
   * forced givers do not compete with anyone.
   */
  private hasCompletion(): boolean {
    const owner = new Map<Participant, Participant>();

    const augment = (giver: Participant, seen: Set<Participant>): boolean => {
      for (const receiver of this.optionsFor(giver)) {
        if (seen.has(receiver)) {
          continue;
        }
        seen.add(receiver);
        const current = owner.get(receiver);
        if (current === undefined || augment(current, seen)) {
          owner.set(receiver, giver);
          return true;
        }
      }
      return false;
    };

    return this.unpaired.every((giver) => augment(giver, new Set()));
  }

  private apply(frame: Frame, pick: Participant): void {
    frame.pick = pick;
    frame.unpairedIndex = this.unpaired.indexOf(frame.who);
    frame.picksLeftIndex = this.picksLeft.indexOf(pick);
    if (frame.unpairedIndex >= 0) {
      this.unpaired.splice(frame.unpairedIndex, 1);
    }
    if (frame.picksLeftIndex >= 0) {
      this.picksLeft.splice(frame.picksLeftIndex, 1);
    }
    this.pairs.set(frame.who, pick);
  }

  /**
   * Try the next receiver for this level. Picks that leave the remaining
   * givers without a complete matching are rejected on the spot. Returns
   * false when none is left.
   */
  private place(frame: Frame): boolean {
    for (;;) {
      const options = this.eligibleFor(frame);
      if (options.length === 0) {
        return false;
      }

      this.apply(frame, this.random.pick(options));
      if (this.hasCompletion()) {
        return true;
      }
      this.undo(frame);
    }
  }

  private undo(frame: Frame): void {
    if (frame.pick === undefined) {
      return;
    }
    this.pairs.delete(frame.who);
    if (frame.picksLeftIndex >= 0) {
      this.picksLeft.splice(frame.picksLeftIndex, 0, frame.pick);
    }
    if (frame.unpairedIndex >= 0) {
      this.unpaired.splice(frame.unpairedIndex, 0, frame.who);
    }
    frame.rejected.add(frame.pick);
    frame.pick = undefined;
  }

  private toPairing(): Pairing {
    const pairing: Pairing = new Map();
    for (const name of this.model.names) {
      const receiver = this.pairs.get(name);
      if (receiver !== undefined) {
        pairing.set(name, receiver);
      }
    }
    return pairing;
  }

  /**
   * @returns the pairing, or null when the constraints admit none
   */
  search(): Pairing | null {
    if (!this.hasCompletion()) {
      return null;
    }
    const stack: Frame[] = [];

    for (;;) {
      if (this.unpaired.length === 0) {
        return this.picksLeft.length === 0 ? this.toPairing() : null;
      }

      let frame: Frame = {
        who: this.selectWho(),
        rejected: new Set(),
        unpairedIndex: -1,
        picksLeftIndex: -1,
      };
      stack.push(frame);

      while (!this.place(frame)) {
        stack.pop();
        const parent = stack[stack.length - 1];
        if (parent === undefined) {
          return null;
        }
        // Everything below this pick failed: forbid it at the parent level only
        this.undo(parent);
        frame = parent;
      }
    }
  }
}

export function findBacktrackingPairing(model: ConstraintModel, random: RandomSource): Pairing | null {
  return new BacktrackingSearch(model, random).search();
}
