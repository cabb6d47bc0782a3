import { Pool } from 'pg';
import { config } from './config';

const databaseUrl = config.databaseUrl;

if (!databaseUrl) {
  console.error('ERROR: DATABASE_URL environment variable is not set!');
  throw new Error('DATABASE_URL is required');
}

console.log('Database URL configured:', `${databaseUrl.split('@')[0]}@***`);

const pool = new Pool({
  connectionString: databaseUrl,
  // Hosted databases (Render) require SSL; a local PostgreSQL usually has none
  ssl: databaseUrl.includes('render.com') || process.env.NODE_ENV === 'production'
    ? { rejectUnauthorized: false }
    : false,
});

pool.on('error', (err) => {
  console.error('Unexpected error on idle client', err);
});

export default pool;
