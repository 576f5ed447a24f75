/**
 * Predictor module: default accounts for unknown postings.
 */

export { Predictor } from './predictor.js';
export type { PredictorOptions, TrainResult } from './predictor.js';
export { DecisionTreeClassifier, trainingFingerprint } from './decision-tree.js';
export type { AccountClassifier } from './decision-tree.js';
export { extractTrainingExamples } from './training.js';
export type { TrainingOptions } from './training.js';
export { sourcePostingFeatures } from './features.js';
export type { TrainingExample } from './features.js';
