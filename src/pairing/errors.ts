import type { StructuralFailure } from './types';

export class PairingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PairingError';
  }
}

/** Malformed input: unknown participants, conflicting forces, bad algorithm names */
export class ConfigurationError extends PairingError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * No single-cycle pairing exists, or none was found within the search budget.
 * Recoverable by falling back to the backtracking search.
 */
export class StructuralInfeasibilityError extends PairingError {
  readonly reason: StructuralFailure;

  constructor(reason: StructuralFailure) {
    super('Unable to find a cycle. Try changing the algorithm.');
    this.name = 'StructuralInfeasibilityError';
    this.reason = reason;
  }
}

/** The constraints admit no valid pairing at all */
export class GlobalInfeasibilityError extends PairingError {
  constructor() {
    super('Pair generation failed! Too many constraints.');
    this.name = 'GlobalInfeasibilityError';
  }
}
