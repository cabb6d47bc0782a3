export type Participant = string;

export type FixedMap = ReadonlyMap<Participant, Participant>;
export type BlockMap = ReadonlyMap<Participant, ReadonlySet<Participant>>;

/**
 * Normalized constraints for one draw. Built once from the configuration
 * and never mutated by the search engines.
 */
export interface ConstraintModel {
  readonly names: readonly Participant[];
  readonly fixed: FixedMap;
  readonly block: BlockMap;
}

/** Directed graph of assignments still permitted after Block/Fixed collapsing */
export type AllowedGraph = ReadonlyMap<Participant, ReadonlySet<Participant>>;

/** Giver -> receiver, keys in names order */
export type Pairing = Map<Participant, Participant>;

export type PairingAlgorithm = 'default' | 'hamiltonian' | 'random';

export type PairingStrategy = 'structured-with-fallback' | 'structured-only' | 'backtracking-only';

export type SearchMethod = 'hamiltonian' | 'backtracking';

export type StructuralFailure = 'unreachable' | 'exhausted';
