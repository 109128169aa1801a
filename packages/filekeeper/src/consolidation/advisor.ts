/**
 * Consolidation Advisor
 *
 * Finds groups of active files that belong together and merges them. A
 * scan never changes anything; applying an opportunity is all-or-nothing:
 * either every source is archived and the destination is tracked, or the
 * sources are untouched and no destination exists.
 */

import { posix } from 'node:path';

import type { IndexIngestion } from '../archive/ingestion.js';
import type { ConsolidationSettings, FilekeeperConfig } from '../config/types.js';
import { ConflictError, errorMessage, ValidationFailureError } from '../errors.js';
import type { PathLocks } from '../lifecycle/path-locks.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { RetentionScorer } from '../scoring/retention-scorer.js';
import type { ConsolidationCommit, IMetadataStore } from '../storage/interface.js';
import type {
  ArchiveRecord,
  ConsolidationLogEntry,
  ConsolidationOpportunity,
  GenerationMode,
  OpportunityKind,
  SimilarityBreakdown,
  TrackedFile,
  TuningParameters,
} from '../types/index.js';
import { GENERATION_MODES } from '../types/index.js';
import { hashContent } from '../utils/hash.js';
import { generateArchiveId, generateConsolidationId } from '../utils/id-generator.js';
import { systemClock, type Clock } from '../utils/time.js';
import type { WorkspaceFiles } from '../workspace/files.js';
import { singleLinkage, type PairSimilarity } from './clustering.js';
import { mergeContent, validateDestination } from './merger.js';
import { dedupeName, primaryContext, suggestName } from './naming.js';
import { WeightedSimilarity, type ConsolidationCandidate, type SimilarityScorer } from './similarity.js';

export interface ConsolidationPreview {
  destinationPath: string;
  content: string;
  /** Validation problems the destination would fail with */
  problems: string[];
}

export interface ConsolidationResult {
  destination: TrackedFile;
  archived: ArchiveRecord[];
  entry: ConsolidationLogEntry;
}

export interface ConsolidationAdvisorDeps {
  store: IMetadataStore;
  files: WorkspaceFiles;
  ingestion: IndexIngestion;
  locks: PathLocks;
  config: FilekeeperConfig;
  similarity?: SimilarityScorer;
  scorer?: RetentionScorer;
  logger?: Logger;
  clock?: Clock;
}

const DEFAULT_CATEGORY = 'general';

const KIND_BY_COMPONENT: Record<'tags' | 'temporal' | 'topic', OpportunityKind> = {
  tags: 'outcome',
  temporal: 'temporal',
  topic: 'topic',
};

function format(value: number): string {
  return value.toFixed(2);
}

/**
 * First source whose content names another source's file
 */
function findReference(
  members: ConsolidationCandidate[]
): { from: string; to: string } | null {
  for (const a of members) {
    for (const b of members) {
      if (a !== b && a.content.includes(posix.basename(b.path))) {
        return { from: a.path, to: b.path };
      }
    }
  }
  return null;
}

/**
 * Component with the largest mean weighted contribution; ties resolve in
 * the order tags, temporal, topic
 */
function dominantComponent(
  pairs: PairSimilarity[],
  weights: ConsolidationSettings['weights']
): { component: 'tags' | 'temporal' | 'topic'; means: Omit<SimilarityBreakdown, 'combined'> } {
  const sum = { tags: 0, temporal: 0, topic: 0 };
  for (const pair of pairs) {
    sum.tags += pair.similarity.tags;
    sum.temporal += pair.similarity.temporal;
    sum.topic += pair.similarity.topic;
  }
  const count = Math.max(1, pairs.length);
  const means = { tags: sum.tags / count, temporal: sum.temporal / count, topic: sum.topic / count };

  let component: 'tags' | 'temporal' | 'topic' = 'tags';
  let best = means.tags * weights.tags;
  if (means.temporal * weights.temporal > best) {
    component = 'temporal';
    best = means.temporal * weights.temporal;
  }
  if (means.topic * weights.topic > best) {
    component = 'topic';
  }
  return { component, means };
}

function strongestMode(files: TrackedFile[]): GenerationMode {
  let rank = 0;
  for (const file of files) {
    rank = Math.max(rank, GENERATION_MODES.indexOf(file.generationMode));
  }
  return GENERATION_MODES[rank] ?? 'professional';
}

export class ConsolidationAdvisor {
  private readonly store: IMetadataStore;
  private readonly files: WorkspaceFiles;
  private readonly ingestion: IndexIngestion;
  private readonly locks: PathLocks;
  private readonly weights: ConsolidationSettings['weights'];
  private readonly similarity: SimilarityScorer;
  private readonly scorer: RetentionScorer;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private threshold: number;

  constructor(deps: ConsolidationAdvisorDeps) {
    const settings = deps.config.consolidation;
    this.store = deps.store;
    this.files = deps.files;
    this.ingestion = deps.ingestion;
    this.locks = deps.locks;
    this.weights = settings.weights;
    this.threshold = settings.similarityThreshold;
    this.similarity = deps.similarity ?? new WeightedSimilarity(settings);
    this.scorer = deps.scorer ?? new RetentionScorer();
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
  }

  get similarityThreshold(): number {
    return this.threshold;
  }

  applyTuning(tuning: Pick<TuningParameters, 'similarityThreshold' | 'temporalWindowMinutes'>): void {
    this.threshold = tuning.similarityThreshold;
    this.similarity.setTemporalWindow?.(tuning.temporalWindowMinutes);
    this.logger.info(
      `tuning: threshold ${tuning.similarityThreshold}, window ${tuning.temporalWindowMinutes} min`
    );
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================

  /**
   * Active files with their current working-copy content. Retained files
   * and files whose working copy is missing are left out of the scan.
   */
  async loadCandidates(): Promise<ConsolidationCandidate[]> {
    const active = await this.store.listFiles({ state: 'active' });
    const candidates: ConsolidationCandidate[] = [];
    for (const file of active) {
      if (file.retained) {
        continue;
      }
      const content = await this.files.readIfExists(file.path);
      if (content === null) {
        this.logger.warn(`scan: working copy of ${file.path} is missing`);
        continue;
      }
      candidates.push({
        path: file.path,
        content,
        contentHash: file.contentHash,
        tags: file.tags,
        createdAt: file.createdAt,
        sessionId: file.sessionId,
      });
    }
    return candidates;
  }

  async listOpportunities(): Promise<ConsolidationOpportunity[]> {
    const candidates = await this.loadCandidates();
    const taken = new Set((await this.store.listFiles()).map(file => file.path));
    return this.identifyOpportunities(candidates, taken);
  }

  /**
   * Group candidates by single linkage. Opportunities come back strongest
   * first; suggested names avoid every path in `taken`.
   */
  identifyOpportunities(
    candidates: ConsolidationCandidate[],
    taken: ReadonlySet<string> = new Set()
  ): ConsolidationOpportunity[] {
    this.similarity.reset?.();
    const ordered = [...candidates].sort(
      (a, b) => a.createdAt.localeCompare(b.createdAt) || a.path.localeCompare(b.path)
    );
    const clusters = singleLinkage(
      ordered.length,
      (a, b) => this.similarity.compare(this.at(ordered, a), this.at(ordered, b)),
      this.threshold
    );

    const names = new Set(taken);
    const opportunities = clusters.map(cluster => {
      const members = cluster.members.map(i => this.at(ordered, i));
      const reference = findReference(members);
      const { component, means } = dominantComponent(cluster.pairs, this.weights);
      const kind: OpportunityKind = reference ? 'reference' : KIND_BY_COMPONENT[component];

      const weakest = cluster.pairs.reduce((min, pair) =>
        pair.similarity.combined < min.similarity.combined ? pair : min
      );
      const rationale = [
        reference ? `${reference.from} references ${reference.to}` : `dominant signal: ${component}`,
        `mean tags ${format(means.tags)}, temporal ${format(means.temporal)}, topic ${format(means.topic)}`,
        `weakest pair ${this.at(ordered, weakest.a).path} / ${this.at(ordered, weakest.b).path} at ${format(weakest.similarity.combined)}`,
      ].join('; ');

      const suggestedName = dedupeName(suggestName(members, kind), names);
      names.add(suggestedName);

      return {
        sources: members.map(member => member.path),
        sourceHashes: members.map(member => member.contentHash),
        suggestedName,
        confidence: cluster.confidence,
        rationale,
        kind,
      };
    });

    return opportunities.sort(
      (a, b) => b.confidence - a.confidence || (a.sources[0] ?? '').localeCompare(b.sources[0] ?? '')
    );
  }

  // ==========================================================================
  // Applying
  // ==========================================================================

  /**
   * Merged content the opportunity would produce, without writing anything
   */
  async preview(opportunity: ConsolidationOpportunity): Promise<ConsolidationPreview> {
    const { sources, destination } = this.checkShape(opportunity);
    const loaded = await Promise.all(
      sources.map(async path => ({ file: await this.store.getFile(path), content: await this.files.read(path) }))
    );
    const content = this.merge(destination, loaded, opportunity.kind);
    return { destinationPath: destination, content, problems: validateDestination(destination, content) };
  }

  async apply(opportunity: ConsolidationOpportunity): Promise<ConsolidationResult> {
    const { sources, destination } = this.checkShape(opportunity);

    return this.locks.withLocks([...sources, destination], async () => {
      const now = this.clock().toISOString();
      const loaded: Array<{ file: TrackedFile; content: string }> = [];

      for (const [i, path] of sources.entries()) {
        const file = await this.store.getFile(path);
        const expected = opportunity.sourceHashes[i];
        if (file.contentHash !== expected) {
          throw new ValidationFailureError('Consolidation source changed', [
            `${path} hash is ${file.contentHash.slice(0, 12)}, expected ${(expected ?? '').slice(0, 12)}`,
          ]);
        }
        const content = await this.files.read(path);
        if (hashContent(content) !== file.contentHash) {
          throw new ValidationFailureError('Consolidation source changed', [
            `working copy of ${path} differs from its tracked content`,
          ]);
        }
        loaded.push({ file, content });
      }

      const merged = this.merge(destination, loaded, opportunity.kind);
      const destinationHash = hashContent(merged);

      const tracked = await this.store.findFile(destination);
      const onDisk = await this.files.readIfExists(destination);
      if (tracked || onDisk !== null) {
        throw new ConflictError(
          destination,
          tracked?.contentHash ?? hashContent(onDisk ?? ''),
          destinationHash
        );
      }

      await this.files.write(destination, merged);

      let commit: ConsolidationCommit;
      try {
        const written = await this.files.read(destination);
        const problems = validateDestination(destination, written);
        if (problems.length > 0) {
          throw new ValidationFailureError(`Consolidated file ${destination} is invalid`, problems);
        }

        commit = this.buildCommit(destination, destinationHash, merged, loaded, opportunity, now);
        await this.store.commitConsolidation(commit);
      } catch (error) {
        this.logger.error(
          `apply: ${destination} from ${sources.join(', ')} failed at ${now}: ${errorMessage(error)}`
        );
        await this.files.remove(destination);
        throw error;
      }

      this.logger.info(`apply: ${sources.length} files consolidated into ${destination} (${opportunity.kind})`);

      const archived: ArchiveRecord[] = [];
      for (const record of commit.archived) {
        archived.push(await this.ingestion.ingest(record));
        try {
          await this.files.remove(record.originalPath);
        } catch (error) {
          this.logger.warn(`apply: could not remove working copy ${record.originalPath}: ${errorMessage(error)}`);
        }
      }

      return { destination: commit.destination, archived, entry: commit.entry };
    });
  }

  private checkShape(opportunity: ConsolidationOpportunity): { sources: string[]; destination: string } {
    const problems: string[] = [];
    const sources = opportunity.sources.map(path => this.files.normalize(path));
    const destination = this.files.normalize(opportunity.suggestedName);

    if (sources.length < 2) {
      problems.push('an opportunity needs at least two sources');
    }
    if (new Set(sources).size !== sources.length) {
      problems.push('sources must be distinct');
    }
    if (opportunity.sourceHashes.length !== sources.length) {
      problems.push('sourceHashes must parallel sources');
    }
    if (sources.includes(destination)) {
      problems.push('destination cannot be one of the sources');
    }
    if (problems.length > 0) {
      throw new ValidationFailureError('Invalid consolidation opportunity', problems);
    }
    return { sources, destination };
  }

  private merge(
    destination: string,
    loaded: Array<{ file: TrackedFile; content: string }>,
    kind: OpportunityKind
  ): string {
    const context = primaryContext(
      loaded.map(({ file, content }) => ({
        path: file.path,
        content,
        contentHash: file.contentHash,
        tags: file.tags,
        createdAt: file.createdAt,
        sessionId: file.sessionId,
      }))
    );
    return mergeContent(
      destination,
      loaded.map(({ file, content }) => ({ path: file.path, content })),
      `Consolidated: ${context}`,
      kind
    );
  }

  private buildCommit(
    destination: string,
    destinationHash: string,
    merged: string,
    loaded: Array<{ file: TrackedFile; content: string }>,
    opportunity: ConsolidationOpportunity,
    now: string
  ): ConsolidationCommit {
    const files = loaded.map(({ file }) => file);
    const archived = loaded.map(({ file, content }): ArchiveRecord => ({
      archiveId: generateArchiveId(),
      originalPath: file.path,
      content,
      contentHash: file.contentHash,
      tags: file.tags,
      category: file.category ?? DEFAULT_CATEGORY,
      archivedAt: now,
      sourceRetentionScore: file.retentionScore,
      reason: 'consolidated',
      sessionId: file.sessionId,
    }));

    const generationMode = strongestMode(files);
    const hintedDays = files.flatMap(file => (file.retentionDays === undefined ? [] : [file.retentionDays]));
    const retentionDays = hintedDays.length > 0 ? Math.max(...hintedDays) : undefined;
    const stakeholders = [...new Set(files.flatMap(file => file.stakeholders ?? []))].sort();
    const frameworks = [...new Set(files.flatMap(file => file.frameworks ?? []))].sort();
    const [first] = files;

    const destinationFile: TrackedFile = {
      path: destination,
      contentHash: destinationHash,
      createdAt: now,
      lastAccessedAt: now,
      lastModifiedAt: now,
      retentionScore: this.scorer.score({ content: merged, generationMode, retentionDays, stakeholders, frameworks }),
      state: 'active',
      generationMode,
      tags: [...new Set(files.flatMap(file => file.tags))].sort(),
      sessionId: first?.sessionId,
      category: first?.category,
      retentionDays,
      stakeholders,
      frameworks,
    };

    const entry: ConsolidationLogEntry = {
      id: generateConsolidationId(),
      appliedAt: now,
      destinationPath: destination,
      destinationHash,
      sources: archived.map(record => ({
        path: record.originalPath,
        contentHash: record.contentHash,
        archiveId: record.archiveId,
      })),
      kind: opportunity.kind,
      confidence: opportunity.confidence,
    };

    return { destination: destinationFile, archived, entry };
  }

  private at(candidates: ConsolidationCandidate[], index: number): ConsolidationCandidate {
    const candidate = candidates[index];
    if (!candidate) {
      throw new RangeError(`No candidate at ${index}`);
    }
    return candidate;
  }
}
