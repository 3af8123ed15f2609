import { writeFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { ApiError, type GenerateVideosParameters } from '@google/genai';
import { logger } from '../logger.js';
import { VideoGenerationError } from '../errors.js';
import type { AspectRatio } from '../types.js';

export interface VideoFile {
  uri?: string;
  videoBytes?: string;
  mimeType?: string;
}

export interface GeneratedVideoEntry {
  video?: VideoFile;
}

/** Long-running generation job as reported by the Gemini API. */
export interface VideoOperation {
  name?: string;
  done?: boolean;
  error?: Record<string, unknown>;
  response?: {
    generatedVideos?: GeneratedVideoEntry[];
  };
}

/** The slice of `GoogleGenAI` used for video generation. */
export interface GenAiVideoClient {
  models: {
    generateVideos(params: GenerateVideosParameters): Promise<VideoOperation>;
  };
  operations: {
    getVideosOperation(params: { operation: VideoOperation }): Promise<VideoOperation>;
  };
  files: {
    download(params: { file: GeneratedVideoEntry; downloadPath: string }): Promise<void>;
  };
}

export interface VideoGenerationInput {
  prompt: string;
  durationSeconds: number;
  aspectRatio: AspectRatio;
  negativePrompt?: string;
  referenceImage?: {
    bytes: Buffer;
    mimeType: string;
  };
  outputPath: string;
  /** An operation submitted by an earlier attempt; polled instead of submitting again. */
  resumeOperationName?: string;
}

export interface GeneratedClip {
  outputPath: string;
  operationName?: string;
  pollCount: number;
  elapsedMs: number;
}

export interface PollHooks {
  /** Waits between polls; activities pass a cancellable sleep here. */
  sleep?: (ms: number) => Promise<void>;
  onPoll?: (state: { operationName?: string; pollCount: number; elapsedMs: number }) => void;
}

export interface VideoGenerationModel {
  generateVideo(input: VideoGenerationInput, hooks?: PollHooks): Promise<GeneratedClip>;
}

export interface VeoOptions {
  modelName: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_NEGATIVE_PROMPT = 'text,text overlay,text on screen';

// 408 and 429 clear up on their own; every other 4xx will fail again
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class VeoVideoModel implements VideoGenerationModel {
  constructor(
    private readonly client: GenAiVideoClient,
    private readonly options: VeoOptions
  ) {
    logger.info({ model: options.modelName }, 'Veo video model initialized');
  }

  async generateVideo(input: VideoGenerationInput, hooks: PollHooks = {}): Promise<GeneratedClip> {
    const sleep = hooks.sleep ?? ((ms: number) => delay(ms));
    const startedAt = Date.now();

    logger.info(
      {
        model: this.options.modelName,
        outputPath: input.outputPath,
        imageProvided: Boolean(input.referenceImage),
        promptLength: input.prompt.length
      },
      'Starting video generation'
    );

    const resumed = input.resumeOperationName ? await this.resume(input.resumeOperationName) : undefined;
    let operation = resumed ?? (await this.submit(input));
    let pollCount = 0;
    hooks.onPoll?.({ operationName: operation.name, pollCount, elapsedMs: Date.now() - startedAt });

    while (!operation.done) {
      const elapsedMs = Date.now() - startedAt;
      if (elapsedMs >= this.options.timeoutMs) {
        logger.error({ operationName: operation.name, elapsedMs }, 'Video generation timed out');
        throw new VideoGenerationError(
          `Video generation did not finish within ${Math.round(this.options.timeoutMs / 1000)}s`,
          'TIMEOUT'
        );
      }

      await sleep(this.options.pollIntervalMs);
      pollCount += 1;
      hooks.onPoll?.({ operationName: operation.name, pollCount, elapsedMs: Date.now() - startedAt });

      try {
        operation = await this.client.operations.getVideosOperation({ operation });
      } catch (error) {
        if (error instanceof ApiError && !isTransientStatus(error.status)) {
          throw new VideoGenerationError(`Polling rejected: ${error.message}`, 'REJECTED');
        }
        logger.warn({ error, pollCount }, 'Poll error, continuing');
        continue;
      }

      logger.debug({ operationName: operation.name, pollCount, done: Boolean(operation.done) }, 'Polled video operation');
    }

    if (operation.error) {
      logger.error({ operationName: operation.name, error: operation.error }, 'Video generation failed');
      const message = typeof operation.error.message === 'string' ? operation.error.message : JSON.stringify(operation.error);
      throw new VideoGenerationError(`Video generation failed: ${message}`, 'GENERATION_FAILED', operation.error);
    }

    const generated = operation.response?.generatedVideos?.[0];
    if (!generated?.video) {
      logger.error({ operationName: operation.name }, 'No video in response');
      throw new VideoGenerationError('No video was generated for the scene', 'NO_VIDEO');
    }

    await this.download(generated, input.outputPath);

    const elapsedMs = Date.now() - startedAt;
    logger.info({ operationName: operation.name, outputPath: input.outputPath, pollCount, elapsedMs }, 'Video generation completed');

    return { outputPath: input.outputPath, operationName: operation.name, pollCount, elapsedMs };
  }

  private async submit(input: VideoGenerationInput): Promise<VideoOperation> {
    const params: GenerateVideosParameters = {
      model: this.options.modelName,
      prompt: input.prompt,
      config: {
        personGeneration: 'allow_adult',
        aspectRatio: input.aspectRatio,
        numberOfVideos: 1,
        durationSeconds: input.durationSeconds,
        negativePrompt: input.negativePrompt ?? DEFAULT_NEGATIVE_PROMPT
      }
    };

    if (input.referenceImage) {
      params.image = {
        imageBytes: input.referenceImage.bytes.toString('base64'),
        mimeType: input.referenceImage.mimeType
      };
    }

    try {
      return await this.client.models.generateVideos(params);
    } catch (error) {
      if (error instanceof ApiError && !isTransientStatus(error.status)) {
        logger.error({ status: error.status, message: error.message }, 'Veo API rejected the request');
        throw new VideoGenerationError(`Veo API rejected the request: ${error.message}`, 'REJECTED');
      }
      throw error;
    }
  }

  private async resume(operationName: string): Promise<VideoOperation | undefined> {
    try {
      const operation = await this.client.operations.getVideosOperation({ operation: { name: operationName, done: false } });
      logger.info({ operationName, done: Boolean(operation.done) }, 'Resumed video operation from an earlier attempt');
      return operation;
    } catch (error) {
      logger.warn({ operationName, error }, 'Could not resume video operation, submitting a new one');
      return undefined;
    }
  }

  private async download(generated: GeneratedVideoEntry, outputPath: string): Promise<void> {
    const video = generated.video;
    if (video?.videoBytes) {
      await writeFile(outputPath, Buffer.from(video.videoBytes, 'base64'));
      return;
    }
    if (video?.uri) {
      await this.client.files.download({ file: generated, downloadPath: outputPath });
      return;
    }
    throw new VideoGenerationError('Generated video has neither bytes nor a download URI', 'NO_VIDEO');
  }
}
