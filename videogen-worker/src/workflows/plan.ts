import { ApplicationFailure, type ActivityOptions } from '@temporalio/common';
import { NON_RETRYABLE_ERROR_TYPES, NonRetryableErrorType } from '../errors.js';
import type {
  AspectRatio,
  ClipReference,
  Scene,
  SceneMode,
  VideoGenerationWorkflowInput
} from '../types.js';

export const MAX_PROMPT_LENGTH = 2000;
export const MAX_SCENES = 5;
export const MIN_CLIP_SECONDS = 5;
export const MAX_CLIP_SECONDS = 8;

export const GENERATION_HEARTBEAT_TIMEOUT_SECONDS = 60;
// the generation activity heartbeats once per poll, plus the time the poll itself takes
export const MAX_POLL_INTERVAL_SECONDS = GENERATION_HEARTBEAT_TIMEOUT_SECONDS / 2;

export const planningActivityOptions: ActivityOptions = {
  startToCloseTimeout: '2 minutes',
  retry: {
    initialInterval: '5 seconds',
    backoffCoefficient: 2,
    maximumAttempts: 3,
    nonRetryableErrorTypes: NON_RETRYABLE_ERROR_TYPES
  }
};

export const generationActivityOptions: ActivityOptions = {
  startToCloseTimeout: '15 minutes',
  heartbeatTimeout: GENERATION_HEARTBEAT_TIMEOUT_SECONDS * 1000,
  retry: {
    initialInterval: '10 seconds',
    backoffCoefficient: 2,
    maximumAttempts: 3,
    nonRetryableErrorTypes: NON_RETRYABLE_ERROR_TYPES
  }
};

export const assemblyActivityOptions: ActivityOptions = {
  startToCloseTimeout: '10 minutes',
  retry: {
    initialInterval: '5 seconds',
    backoffCoefficient: 2,
    maximumAttempts: 3,
    nonRetryableErrorTypes: NON_RETRYABLE_ERROR_TYPES
  }
};

export interface ResolvedWorkflowOptions {
  prompt: string;
  outputVideoName: string;
  sceneMode: SceneMode;
  maxScenes: number;
  aspectRatio: AspectRatio;
  durationSeconds: number;
  reencode: boolean;
}

function invalid(message: string): ApplicationFailure {
  return ApplicationFailure.nonRetryable(message, NonRetryableErrorType.InvalidPrompt);
}

/** Applies defaults and rejects input no activity could succeed with. */
export function resolveWorkflowOptions(input: VideoGenerationWorkflowInput): ResolvedWorkflowOptions {
  const prompt = typeof input.prompt === 'string' ? input.prompt.trim() : '';
  if (!prompt) {
    throw invalid('Prompt must not be empty');
  }
  if (prompt.length > MAX_PROMPT_LENGTH) {
    throw invalid(`Prompt exceeds ${MAX_PROMPT_LENGTH} characters`);
  }

  const outputVideoName = input.outputVideoName ?? 'final_video.mp4';
  if (!/^[\w.-]+\.mp4$/.test(outputVideoName) || outputVideoName.startsWith('.')) {
    throw invalid(`Output video name must be a plain .mp4 file name: ${outputVideoName}`);
  }

  const maxScenes = input.maxScenes ?? MAX_SCENES;
  if (!Number.isInteger(maxScenes) || maxScenes < 1 || maxScenes > MAX_SCENES) {
    throw invalid(`maxScenes must be an integer between 1 and ${MAX_SCENES}`);
  }

  const durationSeconds = input.durationSeconds ?? MAX_CLIP_SECONDS;
  if (!Number.isInteger(durationSeconds) || durationSeconds < MIN_CLIP_SECONDS || durationSeconds > MAX_CLIP_SECONDS) {
    throw invalid(`durationSeconds must be between ${MIN_CLIP_SECONDS} and ${MAX_CLIP_SECONDS}`);
  }

  const aspectRatio = input.aspectRatio ?? '16:9';
  if (aspectRatio !== '16:9' && aspectRatio !== '9:16') {
    throw invalid(`Unsupported aspect ratio: ${String(aspectRatio)}`);
  }

  const sceneMode = input.sceneMode ?? 'parallel';
  if (sceneMode !== 'parallel' && sceneMode !== 'sequential') {
    throw invalid(`Unsupported scene mode: ${String(sceneMode)}`);
  }

  return {
    prompt,
    outputVideoName,
    sceneMode,
    maxScenes,
    aspectRatio,
    durationSeconds,
    reencode: input.reencode ?? false
  };
}

export function stagingPrefixFor(workflowId: string): string {
  return `videos/${workflowId}`;
}

export function orderScenes(scenes: Scene[]): Scene[] {
  return [...scenes].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
}

/** Fan-in order for assembly: ascending sequence number, whatever order the clips finished in. */
export function orderClips(clips: ClipReference[]): ClipReference[] {
  return [...clips].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
}
