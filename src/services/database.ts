import { Pool, PoolConfig } from 'pg';
import { env } from '../config/env';
import { createLogger } from '../utils/logger';

const log = createLogger('Database');

export function createPool(connectionString: string = env.DATABASE_URL): Pool {
    const config: PoolConfig = { connectionString };
    if (env.NODE_ENV === 'production') {
        config.ssl = { rejectUnauthorized: false };
    }

    const pool = new Pool(config);
    pool.on('error', err => {
        log.error('Idle client error:', err);
    });
    return pool;
}

export async function pingDatabase(pool: Pool): Promise<boolean> {
    try {
        await pool.query('SELECT 1');
        return true;
    } catch (error) {
        log.warn('Database ping failed:', error);
        return false;
    }
}
