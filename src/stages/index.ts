/**
 * Pipeline Stages
 *
 * @module stages
 */

export { validateStage, type ValidateStageOutput } from './validate.js';
export { normalizeStage } from './normalize.js';
export { candidatesStage } from './candidates.js';
export { scoreStage, type ScoreStageInput } from './score.js';
export { clusterStage, type ClusterStageInput } from './cluster.js';
export { evidenceStage, type EvidenceStageInput } from './evidence.js';
