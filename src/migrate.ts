import pool from './db';

async function migrate() {
  try {
    // Organisers run draws; participants never need an account
    await pool.query(`
      CREATE TABLE IF NOT EXISTS organisers (
        id SERIAL PRIMARY KEY,
        username VARCHAR(50) UNIQUE NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        display_name VARCHAR(100),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS draws (
        id SERIAL PRIMARY KEY,
        organiser_id INTEGER NOT NULL REFERENCES organisers(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        algorithm VARCHAR(20) NOT NULL CHECK (algorithm IN ('default', 'hamiltonian', 'random')),
        seed VARCHAR(100) NOT NULL,
        method VARCHAR(20) NOT NULL CHECK (method IN ('hamiltonian', 'backtracking')),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS assignments (
        id SERIAL PRIMARY KEY,
        draw_id INTEGER NOT NULL REFERENCES draws(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        giver TEXT NOT NULL,
        receiver TEXT NOT NULL,
        reveal_token VARCHAR(64) UNIQUE NOT NULL,
        padding TEXT NOT NULL,
        revealed_at TIMESTAMP,
        UNIQUE(draw_id, giver),
        UNIQUE(draw_id, receiver)
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_organisers_username ON organisers(username)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_draws_organiser_id ON draws(organiser_id)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_assignments_draw_id ON assignments(draw_id)
    `);

    console.log('Migration completed successfully');
    process.exit(0);
  } catch (error) {
    console.error('Migration failed:', error);
    process.exit(1);
  }
}

migrate();
