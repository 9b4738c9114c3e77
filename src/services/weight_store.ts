import { DEFAULT_FEATURE_WEIGHTS, DEFAULT_WEIGHT_TABLE, MAX_WEIGHT, MIN_WEIGHT_EXCLUSIVE } from '../engines/prediction/default_weights';
import { WeightRepository } from '../repositories/weight_repository';
import { FeatureWeightRow, FeatureWeights } from '../types';
import { ValidationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('WeightStore');

export interface WeightStoreHealth {
    available: boolean;
    active_count: number;
}

export class WeightStore {
    constructor(private readonly repository: WeightRepository) {}

    /**
     * Weights by feature name, with deactivated features at 0.
     * Falls back to the default table when the store has no active row or is unreachable.
     */
    async getActiveWeights(): Promise<FeatureWeights> {
        try {
            const rows = await this.repository.list();
            const active = rows.filter(r => r.is_active);
            if (active.length === 0) {
                return { ...DEFAULT_FEATURE_WEIGHTS };
            }
            return Object.fromEntries(rows.map(r => [r.feature_name, r.is_active ? r.weight : 0]));
        } catch (error) {
            log.warn(`Weight store unavailable, using default weights: ${errorMessage(error)}`);
            return { ...DEFAULT_FEATURE_WEIGHTS };
        }
    }

    async listWeights(): Promise<FeatureWeightRow[]> {
        return this.repository.list();
    }

    async upsertWeight(featureName: string, weight: number, description?: string | null): Promise<FeatureWeightRow> {
        const name = featureName.trim();
        if (!name) {
            throw new ValidationError('Feature name is required');
        }
        if (!Number.isFinite(weight) || weight <= MIN_WEIGHT_EXCLUSIVE || weight > MAX_WEIGHT) {
            throw new ValidationError(`Weight must be greater than ${MIN_WEIGHT_EXCLUSIVE} and at most ${MAX_WEIGHT}`);
        }

        const row = await this.repository.upsert({ feature_name: name, weight, description }, new Date());
        log.info(`Feature weight ${name} set to ${weight}`);
        return row;
    }

    /** Writes the default table into an empty store. Returns the number of rows written. */
    async seedDefaults(): Promise<number> {
        const existing = await this.repository.list();
        if (existing.length > 0) return 0;

        const now = new Date();
        for (const w of DEFAULT_WEIGHT_TABLE) {
            await this.repository.upsert(w, now);
        }
        return DEFAULT_WEIGHT_TABLE.length;
    }

    async health(): Promise<WeightStoreHealth> {
        try {
            const rows = await this.repository.list();
            return { available: true, active_count: rows.filter(r => r.is_active).length };
        } catch (error) {
            log.warn(`Weight store health check failed: ${errorMessage(error)}`);
            return { available: false, active_count: 0 };
        }
    }
}
