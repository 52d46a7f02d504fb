/**
 * One-time database schema setup. Runs schema/init.sql to create the
 * records table and its indexes.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@tutorlog/shared';

function findSchema(): string {
  const candidates = [
    // Sources
    path.join(__dirname, 'schema', 'init.sql'),
    // Compiled output under dist/services/jobs-api/src
    path.join(__dirname, '..', '..', '..', '..', 'services', 'jobs-api', 'src', 'schema', 'init.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) throw new Error(`init.sql not found (looked in ${candidates.join(', ')})`);
  return found;
}

async function runInitSchema(): Promise<void> {
  const pool = new Pool({ connectionString: config.databaseUrl });
  const client = await pool.connect();

  try {
    const schemaPath = findSchema();
    logger.info('Running database schema', { schemaPath });
    await client.query(fs.readFileSync(schemaPath, 'utf-8'));
    logger.info('Database schema complete');
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error('Schema init failed', error);
    process.exit(1);
  });
