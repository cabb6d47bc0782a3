import { isBlocked } from './constraintModel';
import type { AllowedGraph, ConstraintModel, Participant } from './types';

/**
 * Build the directed graph of assignments the constraints still permit.
 *
 * Starts from the complete graph without self-loops and removes blocked
 * edges. A fixed giver then keeps only its fixed receiver, and that
 * receiver is removed from every other giver.
 */
export function buildAllowedGraph(model: ConstraintModel): AllowedGraph {
  const { names, fixed } = model;
  const fixedTargets = new Set(fixed.values());
  const graph = new Map<Participant, ReadonlySet<Participant>>();

  for (const giver of names) {
    const forced = fixed.get(giver);
    const targets = names.filter((receiver) => {
      if (receiver === giver || isBlocked(model, giver, receiver)) {
        return false;
      }
      if (forced !== undefined) {
        return receiver === forced;
      }
      return !fixedTargets.has(receiver);
    });
    graph.set(giver, new Set(targets));
  }

  return graph;
}

function visit(graph: AllowedGraph, start: Participant): Set<Participant> {
  const seen = new Set<Participant>();
  const stack = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) {
      continue;
    }
    seen.add(current);
    for (const next of graph.get(current) ?? []) {
      if (!seen.has(next)) {
        stack.push(next);
      }
    }
  }

  return seen;
}

/**
 * Participants that cannot be reached from the first name over allowed edges.
 */
export function listUnreachable(graph: AllowedGraph, names: readonly Participant[]): Participant[] {
  if (names.length === 0) {
    return [];
  }
  const seen = visit(graph, names[0]);
  return names.filter((name) => !seen.has(name));
}

/**
 * True iff every participant is reachable from the first one. A Hamiltonian
 * cycle needs this, but it does not guarantee one exists.
 */
export function isGloballyReachable(graph: AllowedGraph, names: readonly Participant[]): boolean {
  return listUnreachable(graph, names).length === 0;
}

export function reverseGraph(graph: AllowedGraph): AllowedGraph {
  const reversed = new Map<Participant, Set<Participant>>();
  for (const giver of graph.keys()) {
    reversed.set(giver, new Set());
  }
  for (const [giver, targets] of graph) {
    for (const receiver of targets) {
      reversed.get(receiver)?.add(giver);
    }
  }
  return reversed;
}

/**
 * Every participant reaches the first one and is reached from it. Catches a
 * giver left with no allowed receiver even when it is itself reachable.
 */
export function isStronglyConnected(graph: AllowedGraph, names: readonly Participant[]): boolean {
  return isGloballyReachable(graph, names) && isGloballyReachable(reverseGraph(graph), names);
}
