import { createApp } from './app';
import { config } from './config';
import pool from './db';
import { createPgStores } from './store/pgStore';

const app = createApp(createPgStores(pool), {
  jwtSecret: config.jwtSecret,
  defaultAlgorithm: config.defaultAlgorithm,
  hamiltonianMaxTries: config.hamiltonianMaxTries,
});

// Start server
app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
}).on('error', (err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
