import { Pool } from 'pg';
import { z } from 'zod';
import { FeatureWeightRow } from '../types';
import { numeric, timestamp } from './sql';

export interface WeightUpdate {
    feature_name: string;
    weight: number;
    description?: string | null;
    is_active?: boolean;
}

export interface WeightRepository {
    list(): Promise<FeatureWeightRow[]>;
    upsert(update: WeightUpdate, at: Date): Promise<FeatureWeightRow>;
}

const weightRowSchema = z.object({
    feature_name: z.string(),
    weight: numeric,
    description: z.string().nullable(),
    is_active: z.boolean(),
    created_at: timestamp,
    updated_at: timestamp,
});

export class PgWeightRepository implements WeightRepository {
    constructor(private readonly pool: Pool) {}

    async list(): Promise<FeatureWeightRow[]> {
        const { rows } = await this.pool.query('SELECT * FROM feature_weights ORDER BY weight DESC, feature_name ASC');
        return rows.map(r => weightRowSchema.parse(r));
    }

    async upsert(update: WeightUpdate, at: Date): Promise<FeatureWeightRow> {
        const { rows } = await this.pool.query(
            `INSERT INTO feature_weights (feature_name, weight, description, is_active, created_at, updated_at)
             VALUES ($1, $2, $3, COALESCE($4, TRUE), $5, $5)
             ON CONFLICT (feature_name) DO UPDATE
                SET weight = EXCLUDED.weight,
                    description = COALESCE($3, feature_weights.description),
                    is_active = COALESCE($4, feature_weights.is_active),
                    updated_at = $5
             RETURNING *`,
            [update.feature_name, update.weight, update.description ?? null, update.is_active ?? null, at]
        );
        return weightRowSchema.parse(rows[0]);
    }
}
