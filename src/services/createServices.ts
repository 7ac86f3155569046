import { AxiosInstance } from 'axios';
import { AppConfig } from '../config/types.js';
import { SleepFn } from '../utils/delay.js';
import { JobRecordStore } from './jobStore/types.js';
import { RenderJobClient } from './render/RenderJobClient.js';
import { RenderJobApi } from './render/types.js';
import { JobPoller, PollObserver } from './polling/JobPoller.js';
import { PollPolicy, createPollPolicy } from './polling/PollPolicy.js';
import { ArtifactRehoster } from './storage/ArtifactRehoster.js';
import { BlobStore } from './storage/types.js';
import { createBlobStore } from './storage/index.js';
import { HttpSpeechSynthesizer, SpeechSynthesizer } from './speech/HttpSpeechSynthesizer.js';
import { ExcerptScriptWriter, ScriptWriter } from './script/ExcerptScriptWriter.js';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
import { PipelineStage } from './pipeline/types.js';
import { ScriptStage } from './pipeline/stages/ScriptStage.js';
import { AudioStage } from './pipeline/stages/AudioStage.js';
import { VideoStage } from './pipeline/stages/VideoStage.js';

export interface Services {
  store: JobRecordStore;
  api: RenderJobApi;
  poller: JobPoller;
  rehoster: ArtifactRehoster;
  orchestrator: PipelineOrchestrator;
  /** script → audio → video */
  stages: PipelineStage[];
  pollPolicy: PollPolicy;
}

/**
 * Collaborators that can be swapped out (tests pass in-process fakes)
 */
export interface ServiceOverrides {
  api?: RenderJobApi;
  blobStore?: BlobStore;
  synthesizer?: SpeechSynthesizer;
  scriptWriter?: ScriptWriter;
  sleep?: SleepFn;
  pollObserver?: PollObserver;
  /** HTTP client used to download finished artifacts */
  downloadHttp?: AxiosInstance;
}

/**
 * Wire the orchestration layer from configuration. Nothing here is a
 * singleton: every entry point builds its own graph.
 */
export function createServices(config: AppConfig, store: JobRecordStore, overrides: ServiceOverrides = {}): Services {
  const api = overrides.api ?? new RenderJobClient(config.render);
  const sleep = overrides.sleep;

  const poller = new JobPoller(api, store, {
    ...(sleep && { sleep }),
    ...(overrides.pollObserver && { observer: overrides.pollObserver }),
  });
  const rehoster = new ArtifactRehoster(overrides.blobStore ?? createBlobStore(config.storage), {
    keyPrefix: config.storage.keyPrefix,
    downloadTimeoutMs: config.render.timeoutMs * 10,
    ...(overrides.downloadHttp && { http: overrides.downloadHttp }),
  });
  const pollPolicy = createPollPolicy(config.polling);

  const stages: PipelineStage[] = [
    new ScriptStage(overrides.scriptWriter ?? new ExcerptScriptWriter(config.script.maxExcerptChars)),
    new AudioStage(overrides.synthesizer ?? new HttpSpeechSynthesizer(config.speech), rehoster, store),
    new VideoStage({
      api,
      poller,
      store,
      rehoster,
      avatarVideoUrl: config.render.avatarVideoUrl,
      policy: pollPolicy,
    }),
  ];

  return {
    store,
    api,
    poller,
    rehoster,
    orchestrator: new PipelineOrchestrator(sleep ? { sleep } : {}),
    stages,
    pollPolicy,
  };
}
