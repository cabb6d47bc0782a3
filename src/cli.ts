#!/usr/bin/env node
/**
 * Command line draw.
 *
 * Reads a draw configuration, generates the pairing and writes one zip per
 * participant, named after the giver, into the output directory. Each zip
 * holds the padded note with that giver's assignment.
 *
 * Usage:
 *   secret-pairs draw.json --seed 42 --algorithm hamiltonian --out ./notes
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { PairingError } from './pairing/errors';
import { PAIRING_ALGORITHMS, resolveStrategy, solvePairing } from './pairing/pairingSolver';
import { createRandomSource, generateSeed } from './pairing/randomSource';
import { writeAssignmentFiles } from './utils/assignmentFiles';
import { loadDrawConfigFile } from './utils/drawConfig';

export interface CliArgs {
  file: string;
  dryRun: boolean;
  verbose: boolean;
  cheat: boolean;
  seed: string;
  algorithm: string;
  out: string;
  /** Cycle search budget, N! when unset */
  maxTries?: bigint;
}

function parseMaxTries(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`--max-tries must be a non-negative integer (got '${value}')`);
  }
  return BigInt(value);
}

export function parseCliArgs(args: string[]): CliArgs {
  const argv = yargs(args)
    .scriptName('secret-pairs')
    .usage(
      '$0 <file> [options]\n\nAnonymously and randomly generate pairs of people, with support for ' +
        'mandatory pairs and exclusions. Writes one zip file per participant, named after them, ' +
        'with their assignment inside.'
    )
    .option('dry-run', { alias: 'd', type: 'boolean', default: false, describe: 'generate no output files' })
    .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'log the seed and each file written' })
    .option('cheat', { alias: 'c', type: 'boolean', default: false, describe: 'show final results' })
    .option('seed', { alias: 's', type: 'string', describe: 'seed the random source with SEED' })
    .option('algorithm', {
      alias: 'a',
      type: 'string',
      default: 'default',
      describe: `pairing algorithm (${PAIRING_ALGORITHMS.join(', ')})`,
    })
    .option('out', { alias: 'o', type: 'string', default: '.', describe: 'output directory for the zip files' })
    .option('max-tries', {
      type: 'string',
      coerce: parseMaxTries,
      describe: 'give up the single-cycle search after this many permutations (default N!)',
    })
    .demandCommand(1, 'A draw configuration file is required')
    .help()
    .alias('help', 'h')
    .version(false)
    .strict()
    .parseSync();

  return {
    file: String(argv._[0]),
    dryRun: argv['dry-run'],
    verbose: argv.verbose,
    cheat: argv.cheat,
    seed: argv.seed ?? generateSeed(),
    algorithm: argv.algorithm,
    out: argv.out,
    maxTries: argv['max-tries'],
  };
}

/**
 * @returns the process exit code
 */
export async function runDraw(args: CliArgs): Promise<number> {
  const startedAt = performance.now();

  try {
    const strategy = resolveStrategy(args.algorithm);
    const model = await loadDrawConfigFile(args.file);

    if (args.verbose) {
      console.log(`RNG seed is: ${args.seed}`);
    }

    const random = createRandomSource(args.seed);
    const { pairing, method, fallbackReason } = solvePairing(model, {
      strategy,
      random,
      maxHamiltonianTries: args.maxTries,
    });

    if (args.verbose && fallbackReason) {
      console.log(`No single cycle (${fallbackReason}), used the ${method} search instead`);
    }
    if (args.cheat) {
      for (const [giver, receiver] of pairing) {
        console.log(`${giver} -> ${receiver}`);
      }
    }
    if (args.dryRun) {
      return 0;
    }

    const written = await writeAssignmentFiles(pairing, args.out, random);
    if (args.verbose) {
      written.forEach((file, i) => console.log(`Wrote result for ${model.names[i]} into ${file}`));
    }

    const seconds = (performance.now() - startedAt) / 1000;
    console.log(`Wrote results for ${written.length} participants in ${seconds.toFixed(5)}s`);
    return 0;
  } catch (error) {
    if (error instanceof PairingError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  runDraw(parseCliArgs(hideBin(process.argv)))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Draw failed:', error);
      process.exitCode = 1;
    });
}
