export {
  ConsolidationAdvisor,
  type ConsolidationAdvisorDeps,
  type ConsolidationPreview,
  type ConsolidationResult,
} from './advisor.js';
export { singleLinkage, type Cluster, type PairSimilarity } from './clustering.js';
export { mergeContent, validateDestination, type MergeSource } from './merger.js';
export { dedupeName, primaryContext, slugify, suggestName } from './naming.js';
export {
  KeywordTopicScorer,
  temporalProximity,
  WeightedSimilarity,
  type ConsolidationCandidate,
  type SimilarityScorer,
  type TopicScorer,
} from './similarity.js';
