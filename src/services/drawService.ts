import crypto from 'crypto';
import * as z from 'zod';
import { ConfigurationError } from '../pairing/errors';
import { resolveStrategy, solvePairing } from '../pairing/pairingSolver';
import { createRandomSource, generateSeed } from '../pairing/randomSource';
import type { PairingAlgorithm, Participant, StructuralFailure } from '../pairing/types';
import type { Draw, DrawStore, NewAssignment } from '../store/types';
import { drawConfigSchemaConfig, formatIssues, toConstraintModel } from '../utils/drawConfig';
import { padLength, secretPadding } from '../utils/secretPadding';

export const MAX_DRAW_PARTICIPANTS = 100;

/** Cycle search budget for a draw when the server sets none */
export const DEFAULT_DRAW_HAMILTONIAN_MAX_TRIES = 100_000n;

export const newDrawSchema = z.object({
  ...drawConfigSchemaConfig,
  names: drawConfigSchemaConfig.names.max(
    MAX_DRAW_PARTICIPANTS,
    `a draw takes at most ${MAX_DRAW_PARTICIPANTS} participants`
  ),
  title: z.string().trim().min(1, 'title is required').max(255),
  algorithm: z.enum(['default', 'hamiltonian', 'random']).optional(),
  seed: z.union([z.string().min(1).max(100), z.number().int()]).optional(),
});

export interface DrawServiceOptions {
  defaultAlgorithm: PairingAlgorithm;
  /** Defaults to DEFAULT_DRAW_HAMILTONIAN_MAX_TRIES */
  hamiltonianMaxTries?: bigint;
}

export interface RevealLink {
  participant: Participant;
  token: string;
}

export interface CreatedDraw {
  draw: Draw;
  revealLinks: RevealLink[];
  fallbackReason?: StructuralFailure;
}

function generateRevealToken(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Validate a draw request, generate the pairing and store it with one
 * padded assignment and reveal token per giver.
 *
 * @throws ConfigurationError for malformed input
 * @throws StructuralInfeasibilityError or GlobalInfeasibilityError when no pairing can be made
 */
export async function createDraw(
  draws: DrawStore,
  organiserId: number,
  body: unknown,
  options: DrawServiceOptions
): Promise<CreatedDraw> {
  const parsed = newDrawSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid draw: ${formatIssues(parsed.error)}`);
  }

  const input = parsed.data;
  const algorithm = input.algorithm ?? options.defaultAlgorithm;
  const seed = input.seed === undefined ? generateSeed() : String(input.seed);
  const model = toConstraintModel(input);
  const random = createRandomSource(seed);

  const { pairing, method, fallbackReason } = solvePairing(model, {
    strategy: resolveStrategy(algorithm),
    random,
    maxHamiltonianTries: options.hamiltonianMaxTries ?? DEFAULT_DRAW_HAMILTONIAN_MAX_TRIES,
  });

  const padTo = padLength(pairing);
  const assignments: NewAssignment[] = [...pairing].map(([giver, receiver]) => ({
    giver,
    receiver,
    revealToken: generateRevealToken(),
    padding: secretPadding(receiver, padTo, random),
  }));

  const draw = await draws.create({ organiserId, title: input.title, algorithm, seed, method }, assignments);

  return {
    draw,
    revealLinks: assignments.map(({ giver, revealToken }) => ({ participant: giver, token: revealToken })),
    fallbackReason,
  };
}
