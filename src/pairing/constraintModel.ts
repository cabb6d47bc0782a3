import { ConfigurationError } from './errors';
import type { BlockMap, ConstraintModel, FixedMap, Participant } from './types';

function checkParticipant(name: Participant, members: ReadonlySet<Participant>, rule: string): void {
  if (!members.has(name)) {
    throw new ConfigurationError(`${name} in '${rule}' is not a participant`);
  }
}

/**
 * Validate and copy the three constraint structures into an immutable model.
 * Two fixed givers sharing one receiver can never form a bijection, so that
 * is rejected here rather than left for the search to discover.
 */
export function createConstraintModel(
  names: readonly Participant[],
  fixed: FixedMap,
  block: BlockMap
): ConstraintModel {
  if (names.length < 2) {
    throw new ConfigurationError('At least 2 participants are required');
  }

  const members = new Set<Participant>();
  for (const name of names) {
    if (name.length === 0) {
      throw new ConfigurationError('Participant names must not be empty');
    }
    if (members.has(name)) {
      throw new ConfigurationError(`Duplicate participant ${name}`);
    }
    members.add(name);
  }

  const fixedCopy = new Map<Participant, Participant>();
  const giverByTarget = new Map<Participant, Participant>();
  for (const [giver, receiver] of fixed) {
    checkParticipant(giver, members, 'force');
    checkParticipant(receiver, members, 'force');
    if (giver === receiver) {
      throw new ConfigurationError(`${giver} cannot be forced to give to themselves`);
    }
    const other = giverByTarget.get(receiver);
    if (other !== undefined) {
      throw new ConfigurationError(`${other} and ${giver} are both forced to give to ${receiver}`);
    }
    giverByTarget.set(receiver, giver);
    fixedCopy.set(giver, receiver);
  }

  const blockCopy = new Map<Participant, ReadonlySet<Participant>>();
  for (const [giver, blocked] of block) {
    checkParticipant(giver, members, 'block');
    for (const receiver of blocked) {
      checkParticipant(receiver, members, 'block');
    }
    blockCopy.set(giver, new Set(blocked));
  }

  return { names: [...names], fixed: fixedCopy, block: blockCopy };
}

export function isBlocked(model: ConstraintModel, from: Participant, to: Participant): boolean {
  return model.block.get(from)?.has(to) ?? false;
}

/**
 * Accumulates one-way and two-way force/block declarations, checking every
 * name as it arrives so errors point at the rule that introduced it.
 */
export class ConstraintBuilder {
  private names: Participant[];
  private members: Set<Participant>;
  private fixedEdges = new Map<Participant, Participant>();
  private blockedEdges = new Map<Participant, Set<Participant>>();

  constructor(names: readonly Participant[]) {
    this.names = [...names];
    this.members = new Set(names);
  }

  /**
   * `from` must give to `to`.
   */
  force(from: Participant, to: Participant, rule = 'force'): this {
    checkParticipant(from, this.members, rule);
    checkParticipant(to, this.members, rule);
    const existing = this.fixedEdges.get(from);
    if (existing !== undefined && existing !== to) {
      throw new ConfigurationError(`Conflicting force requirements with ${from} and ${to}`);
    }
    this.fixedEdges.set(from, to);
    return this;
  }

  /**
   * `left` and `right` give to each other.
   */
  forceBoth(left: Participant, right: Participant, rule = 'twoway_force'): this {
    checkParticipant(left, this.members, rule);
    checkParticipant(right, this.members, rule);
    const leftTarget = this.fixedEdges.get(left);
    const rightTarget = this.fixedEdges.get(right);
    if ((leftTarget !== undefined && leftTarget !== right) || (rightTarget !== undefined && rightTarget !== left)) {
      throw new ConfigurationError(`Conflicting force requirements with ${left} and ${right}`);
    }
    this.fixedEdges.set(left, right);
    this.fixedEdges.set(right, left);
    return this;
  }

  /**
   * `from` must not give to `to`. Merges with earlier blocks on `from`.
   */
  block(from: Participant, to: Participant, rule = 'block'): this {
    checkParticipant(from, this.members, rule);
    checkParticipant(to, this.members, rule);
    const blocked = this.blockedEdges.get(from);
    if (blocked) {
      blocked.add(to);
    } else {
      this.blockedEdges.set(from, new Set([to]));
    }
    return this;
  }

  blockBoth(left: Participant, right: Participant, rule = 'twoway_block'): this {
    this.block(left, right, rule);
    return this.block(right, left, rule);
  }

  build(): ConstraintModel {
    return createConstraintModel(this.names, this.fixedEdges, this.blockedEdges);
  }
}
