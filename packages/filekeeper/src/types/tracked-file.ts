/**
 * Tracked file types
 */

/**
 * Generation mode of the content source. Sets the base retention band.
 */
export type GenerationMode = 'minimal' | 'professional' | 'research';

export const GENERATION_MODES: readonly GenerationMode[] = ['minimal', 'professional', 'research'];

export function isGenerationMode(value: string): value is GenerationMode {
  return GENERATION_MODES.some(mode => mode === value);
}

/**
 * Position of a file in its retention lifecycle.
 *
 * `created` is only ever observed in the event log; a registered file is
 * persisted as `active`. `archived` is terminal for the tracked record.
 */
export type LifecycleState = 'created' | 'active' | 'aging' | 'archive_eligible' | 'archived';

/**
 * States a tracked record can be stored in
 */
export type PersistedState = Extract<LifecycleState, 'active' | 'aging' | 'archive_eligible'>;

export const PERSISTED_STATES: readonly PersistedState[] = ['active', 'aging', 'archive_eligible'];

export function isPersistedState(value: string): value is PersistedState {
  return PERSISTED_STATES.some(state => state === value);
}

/**
 * A file under lifecycle management
 */
export interface TrackedFile {
  /** Path relative to the workspace root */
  path: string;
  /** SHA-256 of the current content */
  contentHash: string;
  createdAt: string;
  lastAccessedAt: string;
  lastModifiedAt: string;
  /** 0.0 - 10.0 */
  retentionScore: number;
  state: PersistedState;
  generationMode: GenerationMode;
  /** Sorted, de-duplicated */
  tags: string[];
  sessionId?: string | undefined;
  /** Content type declared by the content source, e.g. 'meeting_prep' */
  category?: string | undefined;
  /** Explicit retention-days hint; also extends the archive threshold */
  retentionDays?: number | undefined;
  /** Importance hints kept so a rescore weighs them as registration did */
  stakeholders?: string[] | undefined;
  frameworks?: string[] | undefined;
  /** Set while the user has marked the file to be kept */
  retained?: RetentionMark | undefined;
}

/**
 * User mark that keeps a file out of automatic aging and archival
 */
export interface RetentionMark {
  reason: string;
  at: string;
}

/**
 * Importance hints supplied by the content source at creation time
 */
export interface RegistrationHints {
  generationMode?: GenerationMode;
  /** "retain N days" override */
  retentionDays?: number;
  tags?: string[];
  stakeholders?: string[];
  frameworks?: string[];
  sessionId?: string;
  category?: string;
  /** Replace the content of an already tracked path */
  update?: boolean;
}

/**
 * Append-only lifecycle audit entry
 */
export interface LifecycleEvent {
  path: string;
  from: LifecycleState;
  to: LifecycleState;
  at: string;
  reason: string;
  archiveId?: string | undefined;
}

/**
 * Estimate of the next automatic transition
 */
export interface NextTransitionEstimate {
  to: LifecycleState;
  /** When the transition becomes due; null when it waits for an archive sweep */
  at: string | null;
}

export interface LifecycleStatus {
  path: string;
  score: number;
  state: PersistedState;
  /** Score at or above the protect ceiling, or retained by the user */
  protected: boolean;
  retained: RetentionMark | null;
  lastAccessedAt: string;
  /** Null for protected files, which only leave active by explicit archival */
  nextTransition: NextTransitionEstimate | null;
}
