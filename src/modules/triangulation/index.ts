/**
 * Triangulation module: public exports.
 */

export type { TriangulationEngine } from './triangulation-engine.js'
export type {
  EvaluationInput,
  TriangulateOptions,
  TriangulationResult,
  ViewpointConflict,
  ViewpointEvaluation,
  ViewpointEvaluator,
  ViewpointResult,
} from './types.js'
export {
  TriangulationEngineImpl,
  createTriangulationEngine,
  computeConsensus,
  detectConflicts,
} from './triangulation-engine-impl.js'
export type { TriangulationEngineOptions } from './triangulation-engine-impl.js'
export { DEFAULT_EVALUATORS } from './evaluators.js'
export { FileArtifactResolver, InMemoryArtifactResolver } from './artifact-resolver.js'
export type { ArtifactResolver } from './artifact-resolver.js'
