import { ConfigurationError, UnexpectedResponseError, ValidationError } from '../../../errors/index.js';
import { Job, JobInput } from '../../../types/jobs.js';
import { JobRecordStore } from '../../jobStore/types.js';
import { RenderJobApi } from '../../render/types.js';
import { JobPoller } from '../../polling/JobPoller.js';
import { PollPolicy } from '../../polling/PollPolicy.js';
import { ArtifactRehoster } from '../../storage/ArtifactRehoster.js';
import { logger } from '../../../middleware/logging.js';
import { PipelineStage, StageContext, VideoArtifact, findArtifact } from '../types.js';

export interface VideoStageDeps {
  api: RenderJobApi;
  poller: JobPoller;
  store: JobRecordStore;
  rehoster: ArtifactRehoster;
  /** Template video the narration is lip-synced onto */
  avatarVideoUrl: string | undefined;
  policy: PollPolicy;
  now?: () => Date;
}

/**
 * Lip-syncs the avatar template to the item's narration on the remote
 * rendering service, then rehosts the result.
 */
export class VideoStage implements PipelineStage<VideoArtifact> {
  readonly name = 'video';
  readonly mode = 'async';
  private readonly now: () => Date;

  constructor(private readonly deps: VideoStageDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Submit the render and record the job as SUBMITTED
   */
  async submit(context: StageContext): Promise<Job> {
    const { item, signal } = context;
    const errorContext = { service: 'VideoStage', operation: 'submit', stage: this.name, itemId: item.id };

    const audio = findArtifact(context.artifacts, 'audio');
    if (!audio) {
      throw new ValidationError(`Item ${item.id} has no narration to render`, errorContext);
    }
    if (!this.deps.avatarVideoUrl) {
      throw new ConfigurationError('RENDER_AVATAR_VIDEO_URL', 'No avatar template video configured', errorContext);
    }

    const inputs: JobInput[] = [
      { type: 'video', url: this.deps.avatarVideoUrl },
      { type: 'audio', url: audio.url },
    ];
    const submitted = await this.deps.api.submit({ inputs }, { ...(signal && { signal }) });

    const job = await this.deps.store.save({
      id: submitted.id,
      kind: 'VideoRender',
      status: submitted.status,
      inputs,
      createdAt: this.now().toISOString(),
      attempts: 0,
      itemId: item.id,
      stage: this.name,
    });

    logger.info('[VideoStage] Render submitted', {
      service: 'VideoStage',
      operation: 'submit',
      itemId: item.id,
      jobId: job.id,
    });

    return job;
  }

  /**
   * Poll until the render finishes. Anything but COMPLETED is thrown.
   */
  async poll(job: Job, signal?: AbortSignal): Promise<Job> {
    const result = await this.deps.poller.run(job.id, this.deps.policy, signal, {
      stage: this.name,
      ...(job.itemId !== undefined && { itemId: job.itemId }),
    });
    if (result.error) {
      throw result.error;
    }
    return result.job;
  }

  async execute(context: StageContext): Promise<VideoArtifact> {
    const submitted = await this.submit(context);
    const completed = await this.poll(submitted, context.signal);

    const remoteUrl = completed.remoteOutputUrl;
    if (!remoteUrl) {
      throw new UnexpectedResponseError('RenderService', `Job ${completed.id} completed without an output URL`, undefined, {
        service: 'VideoStage',
        operation: 'execute',
        jobId: completed.id,
        stage: this.name,
        itemId: context.item.id,
      });
    }

    const outcome = await this.deps.rehoster.rehostJob(
      completed,
      this.deps.store,
      { stage: this.name, itemId: context.item.id },
      context.signal
    );

    return { kind: 'video', url: outcome.url, remoteUrl, rehosted: outcome.rehosted, job: outcome.job };
  }
}
