import { existsSync, readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { IsolationForestClassifier } from './isolation-forest.js';
import { UnavailableClassifier } from './statistical-classifier.js';
import type { StatisticalClassifier } from './statistical-classifier.js';

/**
 * Load the trained anomaly model. A missing or malformed artifact yields a
 * classifier that never has an opinion; startup continues on rules alone.
 */
export function loadStatisticalClassifier(modelPath: string, validator: SchemaValidator): StatisticalClassifier {
    if (!existsSync(modelPath)) {
        logger.warn({ modelPath }, 'Model artifact not found, statistical classification disabled');
        return new UnavailableClassifier(`Model artifact not found at ${modelPath}`);
    }

    try {
        const content: unknown = JSON.parse(readFileSync(modelPath, 'utf-8'));
        const result = validator.validateModelArtifact(content);

        if (!result.valid) {
            logger.error({ modelPath, errors: result.errors }, 'Model artifact failed validation');
            return new UnavailableClassifier(`Invalid model artifact: ${result.errors}`);
        }

        const classifier = new IsolationForestClassifier(result.data);
        logger.info(
            { modelPath, trees: result.data.trees.length, trainedAt: result.data.trained_at },
            'Model loaded successfully',
        );

        return classifier;
    } catch (err) {
        logger.error({ modelPath, error: err }, 'Failed to load model artifact');
        return new UnavailableClassifier(`Failed to load model artifact: ${err}`);
    }
}
