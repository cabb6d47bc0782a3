import dotenv from 'dotenv';
import { isPairingAlgorithm } from './pairing/pairingSolver';
import type { PairingAlgorithm } from './pairing/types';

dotenv.config();

function readAlgorithm(value: string | undefined): PairingAlgorithm {
  const algorithm = (value || 'default').toLowerCase();
  if (!isPairingAlgorithm(algorithm)) {
    throw new Error(`PAIRING_ALGORITHM must be one of default, hamiltonian, random (got '${value}')`);
  }
  return algorithm;
}

function readBigInt(name: string, value: string | undefined): bigint | undefined {
  if (!value) {
    return undefined;
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return BigInt(value);
}

export const config = {
  port: Number(process.env.PORT) || 3000,
  databaseUrl: process.env.DATABASE_URL,
  jwtSecret: process.env.JWT_SECRET || 'change-me-in-production',
  defaultAlgorithm: readAlgorithm(process.env.PAIRING_ALGORITHM),
  drawRetentionDays: Number(process.env.DRAW_RETENTION_DAYS) || 60,
  hamiltonianMaxTries: readBigInt('HAMILTONIAN_MAX_TRIES', process.env.HAMILTONIAN_MAX_TRIES),
};
