import { promises as fs } from 'fs';
import * as z from 'zod';
import { ConstraintBuilder } from '../pairing/constraintModel';
import { ConfigurationError } from '../pairing/errors';
import type { ConstraintModel } from '../pairing/types';

// Object keys named __proto__ never reach a parsed record
const participantName = z
  .string()
  .min(1, 'participant names must not be empty')
  .refine((name) => name !== '__proto__', '__proto__ is not allowed as a participant name');

const namePair = z.tuple([participantName, participantName]);

export const drawConfigSchemaConfig = {
  names: z.array(participantName).min(2, 'at least 2 participants are required'),
  /** giver -> receiver */
  force: z.record(participantName, participantName).default({}),
  /** giver -> receivers they must not get; a single name is accepted too */
  block: z.record(participantName, z.union([participantName, z.array(participantName)])).default({}),
  twoway_force: z.array(namePair).default([]),
  twoway_block: z.array(namePair).default([]),
};

export const drawConfigSchema = z.object(drawConfigSchemaConfig);

export type DrawConfig = z.infer<typeof drawConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseDrawConfig(input: unknown): DrawConfig {
  const result = drawConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid draw configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Apply the declarations in the order one-way force, one-way block,
 * two-way force, two-way block. Two-way forces that contradict an earlier
 * force are rejected.
 */
export function toConstraintModel(config: DrawConfig): ConstraintModel {
  const builder = new ConstraintBuilder(config.names);

  for (const [giver, receiver] of Object.entries(config.force)) {
    builder.force(giver, receiver, 'force');
  }
  for (const [giver, blocked] of Object.entries(config.block)) {
    for (const receiver of Array.isArray(blocked) ? blocked : [blocked]) {
      builder.block(giver, receiver, 'block');
    }
  }
  for (const [left, right] of config.twoway_force) {
    builder.forceBoth(left, right, 'twoway_force');
  }
  for (const [left, right] of config.twoway_block) {
    builder.blockBoth(left, right, 'twoway_block');
  }

  return builder.build();
}

export async function loadDrawConfigFile(path: string): Promise<ConstraintModel> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read ${path}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${path} is not valid JSON: ${reason}`);
  }

  return toConstraintModel(parseDrawConfig(data));
}
