/**
 * Postgres Record Store
 *
 * All collections share one `records` table; each record is a JSONB
 * document keyed by (collection, id). Updates merge the patch into the
 * stored document with `||`.
 */

import { Pool } from 'pg';
import type { CollectionName, CollectionRecords, RecordStore } from './types';
import { config } from '../config';
import { logger } from '../logger';
import { dbQueryDurationHistogram } from '../metrics';

export class PgRecordStore implements RecordStore {
  private pool: Pool | null = null;

  constructor(private readonly connectionString: string = config.databaseUrl) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
      });
      this.pool.on('error', (err) => {
        logger.error('Idle Postgres client error', err);
      });
    }
    return this.pool;
  }

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  async create<C extends CollectionName>(
    collection: C,
    record: CollectionRecords[C]
  ): Promise<CollectionRecords[C]> {
    const result = await this.timed(`create_${collection}`, () =>
      this.getPool().query<{ content: CollectionRecords[C] }>(
        `INSERT INTO records (collection, id, content)
         VALUES ($1, $2, $3::jsonb)
         RETURNING content`,
        [collection, record.id, JSON.stringify(record)]
      )
    );
    return result.rows[0].content;
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecords[C] | null> {
    const result = await this.timed(`get_${collection}`, () =>
      this.getPool().query<{ content: CollectionRecords[C] }>(
        'SELECT content FROM records WHERE collection = $1 AND id = $2',
        [collection, id]
      )
    );
    return result.rows[0]?.content ?? null;
  }

  async update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>
  ): Promise<CollectionRecords[C] | null> {
    const result = await this.timed(`update_${collection}`, () =>
      this.getPool().query<{ content: CollectionRecords[C] }>(
        `UPDATE records
            SET content = content || $3::jsonb, updated_at = NOW()
          WHERE collection = $1 AND id = $2
          RETURNING content`,
        [collection, id, JSON.stringify(patch)]
      )
    );
    return result.rows[0]?.content ?? null;
  }

  async ping(): Promise<void> {
    await this.timed('ping', () => this.getPool().query('SELECT 1'));
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
