import { config } from './config';
import pool from './db';
import { PgDrawStore } from './store/pgStore';

const DAY_MS = 24 * 60 * 60 * 1000;

async function cleanup() {
  try {
    const cutoff = new Date(Date.now() - config.drawRetentionDays * DAY_MS);
    console.log(`Deleting draws created before ${cutoff.toISOString()}...`);

    // Assignments go with their draw (ON DELETE CASCADE)
    const deleted = await new PgDrawStore(pool).deleteCreatedBefore(cutoff);
    console.log(`Deleted ${deleted} draw(s)`);

    console.log('Cleanup completed successfully');
    process.exit(0);
  } catch (error) {
    console.error('Cleanup failed:', error);
    process.exit(1);
  }
}

cleanup();
