import { Job } from '../../types/jobs.js';
import { SerializedError } from '../../utils/errorHandling.js';

/**
 * One unit of input to a batch (an article, in the narrated-news use case)
 */
export interface WorkItem {
  id: string;
  title: string;
  text: string;
  url?: string | undefined;
}

export interface ScriptArtifact {
  kind: 'script';
  text: string;
}

export interface AudioArtifact {
  kind: 'audio';
  /** Public URL of the narration, rehosted when possible */
  url: string;
  rehosted: boolean;
  job: Job;
}

export interface VideoArtifact {
  kind: 'video';
  url: string;
  /** URL reported by the rendering service */
  remoteUrl: string;
  rehosted: boolean;
  job: Job;
}

export type StageArtifact = ScriptArtifact | AudioArtifact | VideoArtifact;

export type ArtifactKind = StageArtifact['kind'];

export type ArtifactOf<K extends ArtifactKind> = Extract<StageArtifact, { kind: K }>;

export interface StageContext {
  runId: string;
  item: WorkItem;
  index: number;
  /** Artifacts produced by earlier stages for this item, in order */
  artifacts: readonly StageArtifact[];
  signal?: AbortSignal | undefined;
}

/**
 * A step in an item's chain. Sync stages finish in one call; async stages
 * submit a remote job and poll it, but still resolve with their artifact.
 */
export interface PipelineStage<A extends StageArtifact = StageArtifact> {
  readonly name: string;
  readonly mode: 'sync' | 'async';
  execute(context: StageContext): Promise<A>;
}

export type StageStatus = 'succeeded' | 'failed';

export interface StageResult {
  stage: string;
  status: StageStatus;
  artifact?: StageArtifact;
  error?: SerializedError;
  durationMs: number;
}

export type ItemStatus = 'succeeded' | 'failed' | 'canceled';

export interface ItemResult {
  itemId: string;
  index: number;
  title: string;
  status: ItemStatus;
  /** Results of the stages that ran, including the failing one */
  stages: StageResult[];
  error?: SerializedError;
}

export interface BatchResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  total: number;
  succeeded: number;
  failed: number;
  canceled: number;
  items: ItemResult[];
}

export interface ProcessBatchOptions {
  runId?: string;
  /** Pause after every item except the last; 0 disables it */
  interItemDelayMs?: number;
  /** Items in flight at once; 1 processes the batch sequentially */
  concurrency?: number;
  signal?: AbortSignal | undefined;
  /** Report the remaining items as canceled after an authentication failure */
  haltOnAuthError?: boolean;
}

function isArtifactOfKind<K extends ArtifactKind>(artifact: StageArtifact, kind: K): artifact is ArtifactOf<K> {
  return artifact.kind === kind;
}

/**
 * Latest artifact of the given kind produced for the item so far
 */
export function findArtifact<K extends ArtifactKind>(
  artifacts: readonly StageArtifact[],
  kind: K
): ArtifactOf<K> | undefined {
  for (let i = artifacts.length - 1; i >= 0; i--) {
    const artifact = artifacts[i];
    if (artifact && isArtifactOfKind(artifact, kind)) {
      return artifact;
    }
  }
  return undefined;
}
