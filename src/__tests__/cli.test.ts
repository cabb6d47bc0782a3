import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CliArgs, parseCliArgs, runDraw } from '../cli';
import { ConfigurationError } from '../pairing/errors';
import {
  ASSIGNMENT_NOTE_NAME,
  assignmentFileName,
  checkAssignmentFileNames,
  writeAssignmentFiles,
} from '../utils/assignmentFiles';
import { createRandomSource } from '../pairing/randomSource';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'secret-pairs-'));
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

async function writeConfig(config: object): Promise<string> {
  const file = path.join(dir, 'draw.json');
  await fs.writeFile(file, JSON.stringify(config));
  return file;
}

async function readNote(file: string): Promise<string> {
  const zip = await JSZip.loadAsync(await fs.readFile(file));
  expect(Object.keys(zip.files)).toEqual([ASSIGNMENT_NOTE_NAME]);
  const note = zip.file(ASSIGNMENT_NOTE_NAME);
  if (!note) {
    throw new Error(`${file} holds no assignment`);
  }
  return note.async('string');
}

function argsFor(file: string, overrides: Partial<CliArgs> = {}): CliArgs {
  return {
    file,
    dryRun: false,
    verbose: false,
    cheat: false,
    seed: '42',
    algorithm: 'default',
    out: path.join(dir, 'out'),
    ...overrides,
  };
}

describe('assignmentFileName', () => {
  it('replaces spaces with underscores', () => {
    expect(assignmentFileName('Ann Lee')).toBe('Ann_Lee.zip');
  });
});

describe('checkAssignmentFileNames', () => {
  it('rejects names that end up as the same file', () => {
    expect(() => checkAssignmentFileNames(['Ann Lee', 'Bo', 'Ann_Lee'])).toThrow(
      'Ann Lee and Ann_Lee would both be written to Ann_Lee.zip'
    );
    expect(() => checkAssignmentFileNames(['bo', 'Bo'])).toThrow(ConfigurationError);
  });

  it('rejects path separators', () => {
    expect(() => checkAssignmentFileNames(['Ann', '../Bo'])).toThrow('../Bo cannot be used as a file name');
    expect(() => checkAssignmentFileNames(['Ann', 'a\\b'])).toThrow(ConfigurationError);
  });
});

describe('writeAssignmentFiles', () => {
  it('writes one zip per giver holding the padded note', async () => {
    const pairing = new Map([
      ['Ann Lee', 'Bo'],
      ['Bo', 'Ann Lee'],
    ]);
    const written = await writeAssignmentFiles(pairing, dir, createRandomSource(5));

    expect(written).toEqual([path.join(dir, 'Ann_Lee.zip'), path.join(dir, 'Bo.zip')]);

    const first = await readNote(written[0]);
    const second = await readNote(written[1]);
    expect(first).toMatch(/^Bo\nSecret Padding: [A-Za-z0-9+\/=]{9}\n$/);
    expect(second).toMatch(/^Ann Lee\nSecret Padding: [A-Za-z0-9+\/=]{4}\n$/);
    expect(first.length).toBe(second.length);
  });

  it('writes nothing when two givers share a file name', async () => {
    const pairing = new Map([
      ['Ann Lee', 'Ann_Lee'],
      ['Ann_Lee', 'Ann Lee'],
    ]);
    const out = path.join(dir, 'clash');

    await expect(writeAssignmentFiles(pairing, out, createRandomSource(5))).rejects.toThrow(ConfigurationError);
    await expect(fs.readdir(out)).rejects.toThrow();
  });
});

describe('parseCliArgs', () => {
  it('reads the file and every option', () => {
    const args = parseCliArgs([
      'draw.json',
      '--seed',
      '42',
      '-a',
      'random',
      '--dry-run',
      '-c',
      '-o',
      'notes',
      '--max-tries',
      '500',
    ]);

    expect(args).toEqual({
      file: 'draw.json',
      dryRun: true,
      verbose: false,
      cheat: true,
      seed: '42',
      algorithm: 'random',
      out: 'notes',
      maxTries: 500n,
    });
  });

  it('generates a seed when none is given', () => {
    const args = parseCliArgs(['draw.json']);

    expect(args.seed).toMatch(/^\d+$/);
    expect(args.algorithm).toBe('default');
    expect(args.out).toBe('.');
    expect(args.maxTries).toBeUndefined();
  });
});

describe('runDraw', () => {
  const names = ['Ann', 'Ben', 'Cat', 'Dan', 'Eve'];

  it('writes a note for every participant', async () => {
    const file = await writeConfig({ names, twoway_block: [['Ann', 'Ben']] });

    expect(await runDraw(argsFor(file))).toBe(0);

    const receivers = await Promise.all(
      names.map(async (name) => (await readNote(path.join(dir, 'out', `${name}.zip`))).split('\n')[0])
    );
    expect([...receivers].sort()).toEqual(names);
    receivers.forEach((receiver, i) => expect(receiver).not.toBe(names[i]));
    expect(receivers[0]).not.toBe('Ben');
    expect(console.log).toHaveBeenLastCalledWith(expect.stringMatching(/^Wrote results for 5 participants in /));
  });

  it('produces the same notes for the same seed', async () => {
    const file = await writeConfig({ names });
    await runDraw(argsFor(file, { out: path.join(dir, 'first') }));
    await runDraw(argsFor(file, { out: path.join(dir, 'second') }));

    for (const name of names) {
      const first = await readNote(path.join(dir, 'first', `${name}.zip`));
      const second = await readNote(path.join(dir, 'second', `${name}.zip`));
      expect(first).toBe(second);
    }
  });

  it('writes nothing on a dry run', async () => {
    const file = await writeConfig({ names });

    expect(await runDraw(argsFor(file, { dryRun: true }))).toBe(0);
    await expect(fs.readdir(path.join(dir, 'out'))).rejects.toThrow();
  });

  it('prints the pairing when cheating', async () => {
    const file = await writeConfig({ names: ['Ann', 'Ben'] });

    await runDraw(argsFor(file, { cheat: true, dryRun: true }));

    expect(console.log).toHaveBeenCalledWith('Ann -> Ben');
    expect(console.log).toHaveBeenCalledWith('Ben -> Ann');
  });

  it('suggests another algorithm when no cycle exists', async () => {
    const file = await writeConfig({ names: ['Ann', 'Ben', 'Cat', 'Dan'], twoway_force: [['Ann', 'Ben']] });

    expect(await runDraw(argsFor(file, { algorithm: 'hamiltonian' }))).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Unable to find a cycle. Try changing the algorithm.');
  });

  it('fails when the constraints admit no pairing', async () => {
    const file = await writeConfig({ names: ['Ann', 'Ben'], block: { Ann: 'Ben' } });

    expect(await runDraw(argsFor(file))).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Pair generation failed! Too many constraints.');
  });

  it('gives up the cycle search at the tries budget', async () => {
    const file = await writeConfig({ names });

    expect(await runDraw(argsFor(file, { algorithm: 'hamiltonian', maxTries: 0n }))).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Unable to find a cycle. Try changing the algorithm.');
  });

  it('refuses names that would overwrite each other', async () => {
    const file = await writeConfig({ names: ['Ann Lee', 'Ann_Lee', 'Cat'] });

    expect(await runDraw(argsFor(file))).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Ann Lee and Ann_Lee would both be written to Ann_Lee.zip');
    await expect(fs.readdir(path.join(dir, 'out'))).rejects.toThrow();
  });

  it('refuses names that leave the output directory', async () => {
    const file = await writeConfig({ names: ['Ann', '../Ben', 'Cat'] });

    expect(await runDraw(argsFor(file))).toBe(1);
    expect(console.error).toHaveBeenCalledWith('../Ben cannot be used as a file name');
    expect(await fs.readdir(dir)).toEqual(['draw.json']);
  });

  it('rejects an unknown algorithm', async () => {
    const file = await writeConfig({ names });

    expect(await runDraw(argsFor(file, { algorithm: 'greedy' }))).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Invalid algorithm 'greedy'");
  });
});
