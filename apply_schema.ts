import fs from 'fs';
import path from 'path';
import { env } from './src/config/env';
import { PgUserRepository } from './src/repositories/user_repository';
import { PgWeightRepository } from './src/repositories/weight_repository';
import { hashPassword } from './src/services/auth_service';
import { createPool } from './src/services/database';
import { WeightStore } from './src/services/weight_store';
import { createLogger } from './src/utils/logger';

const log = createLogger('ApplySchema');

const BOOTSTRAP_ADMIN = {
    username: 'admin',
    email: 'admin@example.com',
    full_name: 'System Administrator',
};

async function applySchema(): Promise<void> {
    const pool = createPool(env.DATABASE_URL);
    const schema = fs.readFileSync(path.resolve(__dirname, 'sql/schema.sql'), 'utf-8');

    try {
        log.info('Applying schema...');
        await pool.query(schema);

        const seeded = await new WeightStore(new PgWeightRepository(pool)).seedDefaults();
        log.info(seeded > 0 ? `Seeded ${seeded} default feature weights` : 'Feature weights already present');

        const users = new PgUserRepository(pool);
        if ((await users.countAll()) > 0) {
            log.info('Users already present, skipping superadmin bootstrap');
        } else if (!env.BOOTSTRAP_ADMIN_PASSWORD) {
            log.warn('No users and BOOTSTRAP_ADMIN_PASSWORD unset; no superadmin created');
        } else {
            await users.create({
                ...BOOTSTRAP_ADMIN,
                hashed_password: await hashPassword(env.BOOTSTRAP_ADMIN_PASSWORD),
                role: 'superadmin',
                created_by_id: null,
            });
            log.info(`Created superadmin '${BOOTSTRAP_ADMIN.username}'`);
        }

        log.info('Schema applied successfully.');
    } finally {
        await pool.end();
    }
}

applySchema().catch(error => {
    log.error('Schema execution failed:', error);
    process.exit(1);
});
