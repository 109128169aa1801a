export { computeInsights, fileKind, insightConfidence, median } from './insights.js';
export { PatternRecognizer, type RecordSessionOptions } from './recognizer.js';
export { SQLiteSessionLog, type ISessionLog } from './storage/index.js';
export { suggestWorkflowOptimizations } from './suggestions.js';
export { deriveTuning } from './tuning.js';
