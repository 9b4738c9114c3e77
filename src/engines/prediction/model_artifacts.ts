import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../../utils/logger';

const log = createLogger('ModelArtifacts');

export const modelArtifactSchema = z.object({
    model_type: z.literal('logistic_regression'),
    version: z.string(),
    trained_at: z.string(),
    intercept: z.number(),
    coefficients: z.record(z.number()),
    scaler: z.object({
        mean: z.record(z.number()),
        scale: z.record(z.number()),
    }).optional(),
    metrics: z.object({
        accuracy: z.number(),
        samples: z.number().int(),
    }).optional(),
});

export const preprocessorInfoSchema = z.object({
    feature_names: z.array(z.string()).min(1),
    feature_importance: z.record(z.number()),
    categorical_mappings: z.record(z.record(z.number())),
    feature_categories: z.record(z.array(z.string())),
});

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;
export type PreprocessorInfo = z.infer<typeof preprocessorInfoSchema>;

export interface ModelArtifacts {
    model: ModelArtifact;
    preprocessor: PreprocessorInfo;
}

export interface ArtifactPaths {
    modelPath: string;
    preprocessorPath: string;
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Reads the model and its preprocessing metadata. Resolves to null when either file is missing
 * or malformed; scoring then runs on the rule-based strategy.
 */
export async function loadModelArtifacts(paths: ArtifactPaths): Promise<ModelArtifacts | null> {
    if (!(await exists(paths.modelPath)) || !(await exists(paths.preprocessorPath))) {
        log.warn(`Model artifacts not found (${paths.modelPath}, ${paths.preprocessorPath})`);
        return null;
    }

    try {
        const [modelRaw, preprocessorRaw] = await Promise.all([
            fs.readFile(paths.modelPath, 'utf-8'),
            fs.readFile(paths.preprocessorPath, 'utf-8'),
        ]);

        return {
            model: modelArtifactSchema.parse(JSON.parse(modelRaw)),
            preprocessor: preprocessorInfoSchema.parse(JSON.parse(preprocessorRaw)),
        };
    } catch (error) {
        log.error('Failed to load model artifacts:', error);
        return null;
    }
}

export async function saveModelArtifacts(paths: ArtifactPaths, artifacts: ModelArtifacts): Promise<void> {
    await fs.mkdir(path.dirname(paths.modelPath), { recursive: true });
    await fs.mkdir(path.dirname(paths.preprocessorPath), { recursive: true });
    await fs.writeFile(paths.modelPath, JSON.stringify(artifacts.model, null, 2));
    await fs.writeFile(paths.preprocessorPath, JSON.stringify(artifacts.preprocessor, null, 2));
}
