import type { Pool } from 'pg';
import { isPairingAlgorithm } from '../pairing/pairingSolver';
import type { SearchMethod } from '../pairing/types';
import type {
  Assignment,
  Draw,
  DrawStore,
  DrawSummary,
  NewAssignment,
  NewDraw,
  NewOrganiser,
  Organiser,
  OrganiserStore,
  Stores,
} from './types';

type OrganiserRow = {
  id: number;
  username: string;
  password_hash: string;
  display_name: string | null;
  created_at: Date;
};

type DrawRow = {
  id: number;
  organiser_id: number;
  title: string;
  algorithm: string;
  seed: string;
  method: string;
  created_at: Date;
};

type DrawSummaryRow = DrawRow & {
  participant_count: number;
  revealed_count: number;
};

type AssignmentRow = {
  giver: string;
  receiver: string;
  reveal_token: string;
  padding: string;
  revealed_at: Date | null;
};

const DRAW_COLUMNS = 'd.id, d.organiser_id, d.title, d.algorithm, d.seed, d.method, d.created_at';

function toOrganiser(row: OrganiserRow): Organiser {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    displayName: row.display_name,
    createdAt: row.created_at,
  };
}

function toMethod(value: string): SearchMethod {
  if (value === 'hamiltonian' || value === 'backtracking') {
    return value;
  }
  throw new Error(`Unknown search method '${value}' in draws table`);
}

function toDraw(row: DrawRow): Draw {
  if (!isPairingAlgorithm(row.algorithm)) {
    throw new Error(`Unknown algorithm '${row.algorithm}' in draws table`);
  }
  return {
    id: row.id,
    organiserId: row.organiser_id,
    title: row.title,
    algorithm: row.algorithm,
    seed: row.seed,
    method: toMethod(row.method),
    createdAt: row.created_at,
  };
}

function toAssignment(row: AssignmentRow): Assignment {
  return {
    giver: row.giver,
    receiver: row.receiver,
    revealToken: row.reveal_token,
    padding: row.padding,
    revealedAt: row.revealed_at,
  };
}

export class PgOrganiserStore implements OrganiserStore {
  constructor(private pool: Pool) {}

  async create(organiser: NewOrganiser): Promise<Organiser> {
    const result = await this.pool.query<OrganiserRow>(
      `INSERT INTO organisers (username, password_hash, display_name)
       VALUES ($1, $2, $3)
       RETURNING id, username, password_hash, display_name, created_at`,
      [organiser.username, organiser.passwordHash, organiser.displayName]
    );
    return toOrganiser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<Organiser | null> {
    const result = await this.pool.query<OrganiserRow>(
      'SELECT id, username, password_hash, display_name, created_at FROM organisers WHERE username = $1',
      [username]
    );
    return result.rows.length > 0 ? toOrganiser(result.rows[0]) : null;
  }

  async findById(id: number): Promise<Organiser | null> {
    const result = await this.pool.query<OrganiserRow>(
      'SELECT id, username, password_hash, display_name, created_at FROM organisers WHERE id = $1',
      [id]
    );
    return result.rows.length > 0 ? toOrganiser(result.rows[0]) : null;
  }
}

export class PgDrawStore implements DrawStore {
  constructor(private pool: Pool) {}

  async create(draw: NewDraw, assignments: NewAssignment[]): Promise<Draw> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const drawResult = await client.query<DrawRow>(
        `INSERT INTO draws (organiser_id, title, algorithm, seed, method)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, organiser_id, title, algorithm, seed, method, created_at`,
        [draw.organiserId, draw.title, draw.algorithm, draw.seed, draw.method]
      );
      const created = toDraw(drawResult.rows[0]);

      for (const [position, assignment] of assignments.entries()) {
        await client.query(
          `INSERT INTO assignments (draw_id, position, giver, receiver, reveal_token, padding)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [created.id, position, assignment.giver, assignment.receiver, assignment.revealToken, assignment.padding]
        );
      }

      await client.query('COMMIT');
      return created;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async listByOrganiser(organiserId: number): Promise<DrawSummary[]> {
    const result = await this.pool.query<DrawSummaryRow>(
      `SELECT ${DRAW_COLUMNS},
              COUNT(a.id)::int AS participant_count,
              COUNT(a.revealed_at)::int AS revealed_count
       FROM draws d
       LEFT JOIN assignments a ON a.draw_id = d.id
       WHERE d.organiser_id = $1
       GROUP BY d.id
       ORDER BY d.created_at DESC`,
      [organiserId]
    );
    return result.rows.map((row) => ({
      ...toDraw(row),
      participantCount: row.participant_count,
      revealedCount: row.revealed_count,
    }));
  }

  async findById(id: number): Promise<Draw | null> {
    const result = await this.pool.query<DrawRow>(`SELECT ${DRAW_COLUMNS} FROM draws d WHERE d.id = $1`, [id]);
    return result.rows.length > 0 ? toDraw(result.rows[0]) : null;
  }

  async listAssignments(drawId: number): Promise<Assignment[]> {
    const result = await this.pool.query<AssignmentRow>(
      `SELECT giver, receiver, reveal_token, padding, revealed_at
       FROM assignments
       WHERE draw_id = $1
       ORDER BY position`,
      [drawId]
    );
    return result.rows.map(toAssignment);
  }

  async findByRevealToken(token: string): Promise<{ draw: Draw; assignment: Assignment } | null> {
    const result = await this.pool.query<DrawRow & AssignmentRow>(
      `SELECT ${DRAW_COLUMNS}, a.giver, a.receiver, a.reveal_token, a.padding, a.revealed_at
       FROM assignments a
       JOIN draws d ON d.id = a.draw_id
       WHERE a.reveal_token = $1`,
      [token]
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return { draw: toDraw(row), assignment: toAssignment(row) };
  }

  async markRevealed(token: string, at: Date): Promise<void> {
    await this.pool.query(
      'UPDATE assignments SET revealed_at = $2 WHERE reveal_token = $1 AND revealed_at IS NULL',
      [token, at]
    );
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM draws WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM draws WHERE created_at < $1', [cutoff]);
    return result.rowCount ?? 0;
  }
}

export function createPgStores(pool: Pool): Stores {
  return {
    organisers: new PgOrganiserStore(pool),
    draws: new PgDrawStore(pool),
  };
}
