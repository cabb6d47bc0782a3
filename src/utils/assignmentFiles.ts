import { promises as fs } from 'fs';
import path from 'path';
import JSZip from 'jszip';
import { ConfigurationError } from '../pairing/errors';
import type { RandomSource } from '../pairing/randomSource';
import type { Pairing, Participant } from '../pairing/types';
import { padLength, renderAssignmentNote, secretPadding } from './secretPadding';

/** Same name inside every archive, so an archive's contents give nothing away */
export const ASSIGNMENT_NOTE_NAME = 'Your-assignment.txt';

export function assignmentFileName(giver: Participant): string {
  return `${giver.replace(/ /g, '_')}.zip`;
}

/**
 * @throws ConfigurationError when a name holds a path separator or two names
 * map to the same file (compared case-insensitively)
 */
export function checkAssignmentFileNames(givers: Iterable<Participant>): void {
  const owners = new Map<string, Participant>();

  for (const giver of givers) {
    if (/[/\\]/.test(giver)) {
      throw new ConfigurationError(`${giver} cannot be used as a file name`);
    }
    const file = assignmentFileName(giver);
    const owner = owners.get(file.toLowerCase());
    if (owner !== undefined) {
      throw new ConfigurationError(`${owner} and ${giver} would both be written to ${file}`);
    }
    owners.set(file.toLowerCase(), giver);
  }
}

export async function packAssignmentNote(note: string): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(ASSIGNMENT_NOTE_NAME, note);
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * Write one zip per giver into `outDir`, named after the giver so it can be
 * handed to its owner unopened. Every name is checked before anything is
 * written.
 *
 * @returns paths of the written files, in pairing order
 */
export async function writeAssignmentFiles(
  pairing: Pairing,
  outDir: string,
  random: RandomSource
): Promise<string[]> {
  checkAssignmentFileNames(pairing.keys());
  const padTo = padLength(pairing);
  const written: string[] = [];

  await fs.mkdir(outDir, { recursive: true });
  for (const [giver, receiver] of pairing) {
    const filePath = path.join(outDir, assignmentFileName(giver));
    const note = renderAssignmentNote(receiver, secretPadding(receiver, padTo, random));
    await fs.writeFile(filePath, await packAssignmentNote(note));
    written.push(filePath);
  }

  return written;
}
