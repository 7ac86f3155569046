import { randomUUID } from 'crypto';
import { ValidationError } from '../../../errors/index.js';
import { Job } from '../../../types/jobs.js';
import { JobRecordStore } from '../../jobStore/types.js';
import { ArtifactRehoster } from '../../storage/ArtifactRehoster.js';
import { SpeechSynthesizer } from '../../speech/HttpSpeechSynthesizer.js';
import { logger } from '../../../middleware/logging.js';
import { AudioArtifact, PipelineStage, StageContext, findArtifact } from '../types.js';

export interface AudioStageOptions {
  now?: () => Date;
  newId?: () => string;
}

/**
 * Narrates the item's script. Synthesized bytes are always stored (the
 * renderer needs a public URL); remote audio URLs are rehosted when possible.
 * Either way the render is recorded as a completed AudioRender job.
 */
export class AudioStage implements PipelineStage<AudioArtifact> {
  readonly name = 'audio';
  readonly mode = 'sync';
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly rehoster: ArtifactRehoster,
    private readonly store: JobRecordStore,
    options: AudioStageOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async execute(context: StageContext): Promise<AudioArtifact> {
    const { item, signal } = context;
    const script = findArtifact(context.artifacts, 'script');
    if (!script) {
      throw new ValidationError(`Item ${item.id} has no script to narrate`, {
        service: 'AudioStage',
        operation: 'execute',
        stage: this.name,
        itemId: item.id,
      });
    }

    const speech = await this.synthesizer.synthesize(script.text, { signal });
    const timestamp = this.now().toISOString();
    const base: Job = {
      id: `audio-${this.newId()}`,
      kind: 'AudioRender',
      status: 'COMPLETED',
      inputs: [],
      createdAt: timestamp,
      lastCheckedAt: timestamp,
      attempts: 0,
      itemId: item.id,
      stage: this.name,
    };

    if (speech.kind === 'stream') {
      const stored = await this.rehoster.store(speech.body, { stage: this.name, itemId: item.id }, speech.contentType);
      const job = await this.store.save({ ...base, rehostedUrl: stored.url });

      logger.info('[AudioStage] Narration stored', {
        service: 'AudioStage',
        operation: 'execute',
        itemId: item.id,
        jobId: job.id,
        url: stored.url,
      });

      return { kind: 'audio', url: stored.url, rehosted: true, job };
    }

    const saved = await this.store.save({ ...base, remoteOutputUrl: speech.url });
    const outcome = await this.rehoster.rehostJob(saved, this.store, { stage: this.name, itemId: item.id }, signal);

    return { kind: 'audio', url: outcome.url, rehosted: outcome.rehosted, job: outcome.job };
  }
}
