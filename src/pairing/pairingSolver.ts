import { buildAllowedGraph, isStronglyConnected } from './allowedGraph';
import { findBacktrackingPairing } from './backtrackingSearch';
import { ConfigurationError, GlobalInfeasibilityError, StructuralInfeasibilityError } from './errors';
import { findHamiltonianPairing } from './hamiltonianSearch';
import type { RandomSource } from './randomSource';
import type {
  ConstraintModel,
  Pairing,
  PairingAlgorithm,
  PairingStrategy,
  SearchMethod,
  StructuralFailure,
} from './types';

export const ALGORITHM_STRATEGIES: Readonly<Record<PairingAlgorithm, PairingStrategy>> = {
  default: 'structured-with-fallback',
  hamiltonian: 'structured-only',
  random: 'backtracking-only',
};

export const PAIRING_ALGORITHMS: readonly PairingAlgorithm[] = ['default', 'hamiltonian', 'random'];

export function isPairingAlgorithm(value: string): value is PairingAlgorithm {
  return Object.prototype.hasOwnProperty.call(ALGORITHM_STRATEGIES, value);
}

/**
 * Map an algorithm name (`default`, `hamiltonian`, `random`, any case) or a
 * strategy name to the strategy it selects.
 */
export function resolveStrategy(token: string): PairingStrategy {
  const normalized = token.trim().toLowerCase();
  if (isPairingAlgorithm(normalized)) {
    return ALGORITHM_STRATEGIES[normalized];
  }
  const strategy = Object.values(ALGORITHM_STRATEGIES).find((value) => value === normalized);
  if (strategy === undefined) {
    throw new ConfigurationError(`Invalid algorithm '${token}'`);
  }
  return strategy;
}

export interface SolveOptions {
  random: RandomSource;
  strategy?: PairingStrategy;
  /** Budget for the Hamiltonian search, N! when omitted */
  maxHamiltonianTries?: bigint;
}

export interface SolveResult {
  pairing: Pairing;
  method: SearchMethod;
  /** Set when the structured search failed and backtracking produced the pairing */
  fallbackReason?: StructuralFailure;
}

function solveStructured(model: ConstraintModel, options: SolveOptions): Pairing {
  const graph = buildAllowedGraph(model);
  if (!isStronglyConnected(graph, model.names)) {
    throw new StructuralInfeasibilityError('unreachable');
  }

  const result = findHamiltonianPairing(model.names, graph, options.random, {
    maxTries: options.maxHamiltonianTries,
  });
  if (!result.found) {
    throw new StructuralInfeasibilityError('exhausted');
  }
  return result.pairing;
}

function solveBacktracking(model: ConstraintModel, options: SolveOptions): Pairing {
  const pairing = findBacktrackingPairing(model, options.random);
  if (pairing === null) {
    throw new GlobalInfeasibilityError();
  }
  return pairing;
}

/**
 * Produce a pairing for the model with the selected strategy.
 *
 * @throws StructuralInfeasibilityError when `structured-only` finds no cycle
 * @throws GlobalInfeasibilityError when no pairing exists at all
 */
export function solvePairing(model: ConstraintModel, options: SolveOptions): SolveResult {
  const strategy = options.strategy ?? 'structured-with-fallback';

  switch (strategy) {
    case 'structured-only':
      return { pairing: solveStructured(model, options), method: 'hamiltonian' };
    case 'backtracking-only':
      return { pairing: solveBacktracking(model, options), method: 'backtracking' };
    case 'structured-with-fallback':
      try {
        return { pairing: solveStructured(model, options), method: 'hamiltonian' };
      } catch (error) {
        if (!(error instanceof StructuralInfeasibilityError)) {
          throw error;
        }
        return {
          pairing: solveBacktracking(model, options),
          method: 'backtracking',
          fallbackReason: error.reason,
        };
      }
  }
}
