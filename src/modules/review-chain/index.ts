/**
 * Review chain module: public exports.
 */

export type { ReviewChain } from './review-chain.js'
export type {
  FixInstruction,
  RemediateFn,
  ReviewChainOutcome,
  ReviewContext,
  ReviewEscalation,
  ReviewGateResult,
  ReviewProgress,
  ReviewStatus,
} from './types.js'
export { ReviewChainImpl, createReviewChain, gateIssues } from './review-chain-impl.js'
export type { ReviewChainOptions } from './review-chain-impl.js'
