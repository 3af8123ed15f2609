import { ApplicationFailure } from '@temporalio/common';

/** Failure types the workflow's retry policies treat as final. */
export const NonRetryableErrorType = {
  InvalidPrompt: 'InvalidPrompt',
  InvalidSceneOutput: 'InvalidSceneOutput',
  NoScenesPlanned: 'NoScenesPlanned',
  VideoGenerationFailed: 'VideoGenerationFailed',
  NoVideoGenerated: 'NoVideoGenerated',
  RemoteRejected: 'RemoteRejected',
  NoClipsToMerge: 'NoClipsToMerge'
} as const;

export type NonRetryableErrorType = (typeof NonRetryableErrorType)[keyof typeof NonRetryableErrorType];

export const NON_RETRYABLE_ERROR_TYPES: NonRetryableErrorType[] = Object.values(NonRetryableErrorType);

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export type VideoGenerationErrorCode =
  | 'GENERATION_FAILED'
  | 'NO_VIDEO'
  | 'TIMEOUT'
  | 'REJECTED';

export class VideoGenerationError extends Error {
  constructor(
    message: string,
    public readonly code: VideoGenerationErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'VideoGenerationError';
  }

  get retryable(): boolean {
    return this.code === 'TIMEOUT';
  }
}

export class SceneOutputError extends Error {
  constructor(message: string, public readonly rawOutput?: string) {
    super(message);
    this.name = 'SceneOutputError';
  }
}

export class FFmpegError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'FFmpegError';
  }
}

const failureTypeByCode: Record<VideoGenerationErrorCode, string> = {
  GENERATION_FAILED: NonRetryableErrorType.VideoGenerationFailed,
  NO_VIDEO: NonRetryableErrorType.NoVideoGenerated,
  REJECTED: NonRetryableErrorType.RemoteRejected,
  TIMEOUT: 'GenerationTimeout'
};

/**
 * Maps domain errors onto Temporal failures. Anything unrecognised is returned
 * as-is and left to the activity's retry policy.
 */
export function toActivityFailure(error: unknown): unknown {
  if (error instanceof VideoGenerationError) {
    const type = failureTypeByCode[error.code];
    return error.retryable
      ? ApplicationFailure.retryable(error.message, type)
      : ApplicationFailure.nonRetryable(error.message, type);
  }
  if (error instanceof SceneOutputError) {
    return ApplicationFailure.nonRetryable(error.message, NonRetryableErrorType.InvalidSceneOutput);
  }
  return error;
}
