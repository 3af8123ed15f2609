import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Context, log } from '@temporalio/activity';
import { ApplicationFailure } from '@temporalio/common';
import { NonRetryableErrorType, toActivityFailure } from '../errors.js';
import type { SceneWriter } from '../clients/gemini.js';
import type { VideoGenerationModel } from '../clients/veo.js';
import type { VideoEditor } from '../media/ffmpeg.js';
import type { ObjectStorage, StoredObject } from '../storage/objectStorage.js';
import type {
  ClipReference,
  CreateScenesInput,
  FinalArtifact,
  GenerationRequest,
  MergeVideosInput,
  Scene,
  UploadFileInput
} from '../types.js';

export interface ActivityDependencies {
  sceneWriter: SceneWriter;
  videoModel: VideoGenerationModel;
  storage: ObjectStorage;
  editor: VideoEditor;
  /** Parent directory for per-activity scratch space; defaults to the OS temp dir. */
  tempRoot?: string;
}

/** Operation name saved by a previous attempt's heartbeat, if any. */
export function heartbeatedOperationName(details: unknown): string | undefined {
  if (typeof details === 'object' && details !== null && 'operationName' in details && typeof details.operationName === 'string') {
    return details.operationName;
  }
  return undefined;
}

export function sceneClipPath(stagingPrefix: string, sequenceNumber: number): string {
  return `${stagingPrefix}/scene_${sequenceNumber}.mp4`;
}

export function createActivities(deps: ActivityDependencies) {
  const withWorkDir = async <T>(label: string, fn: (workDir: string) => Promise<T>): Promise<T> => {
    const workDir = await mkdtemp(join(deps.tempRoot ?? tmpdir(), `videogen-${label}-`));
    try {
      return await fn(workDir);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  };

  return {
    async createScenes(input: CreateScenesInput): Promise<Scene[]> {
      log.info('Creating scenes from prompt', { promptLength: input.prompt.length, maxScenes: input.maxScenes });
      try {
        return await deps.sceneWriter.createScenes(input.prompt, input.maxScenes);
      } catch (error) {
        throw toActivityFailure(error);
      }
    },

    async generateVgmPrompt(scene: Scene): Promise<string> {
      log.info('Generating video model prompt', { sequenceNumber: scene.sequenceNumber });
      return deps.sceneWriter.optimizePrompt(scene);
    },

    async generateVideoForScene(request: GenerationRequest): Promise<ClipReference> {
      const { sequenceNumber } = request;
      log.info('Generating video for scene', {
        sequenceNumber,
        durationSeconds: request.durationSeconds,
        aspectRatio: request.aspectRatio,
        referenceClip: request.referenceClip?.objectPath
      });

      const ctx = Context.current();
      const resumeOperationName = heartbeatedOperationName(ctx.info.heartbeatDetails);
      if (resumeOperationName) {
        log.info('Resuming video generation from heartbeat', { sequenceNumber, operationName: resumeOperationName });
      }
      try {
        return await withWorkDir(`scene-${sequenceNumber}`, async (workDir) => {
          let referenceImage: { bytes: Buffer; mimeType: string } | undefined;
          if (request.referenceClip) {
            const referencePath = join(workDir, 'reference.mp4');
            const imagePath = join(workDir, `scene_${sequenceNumber}_last_frame.png`);
            await deps.storage.downloadFile(request.referenceClip.objectPath, referencePath);
            await deps.editor.extractLastFrame(referencePath, imagePath);
            referenceImage = { bytes: await readFile(imagePath), mimeType: 'image/png' };
          }

          const outputPath = join(workDir, `scene_${sequenceNumber}.mp4`);
          await deps.videoModel.generateVideo(
            {
              prompt: request.prompt,
              durationSeconds: request.durationSeconds,
              aspectRatio: request.aspectRatio,
              negativePrompt: request.negativePrompt,
              referenceImage,
              outputPath,
              resumeOperationName
            },
            {
              sleep: (ms) => ctx.sleep(ms),
              onPoll: (state) => ctx.heartbeat(state)
            }
          );

          const stored = await deps.storage.uploadFile(outputPath, sceneClipPath(request.stagingPrefix, sequenceNumber));
          log.info('Scene video uploaded', { sequenceNumber, uri: stored.uri });
          return { sequenceNumber, objectPath: stored.objectPath, uri: stored.uri };
        });
      } catch (error) {
        throw toActivityFailure(error);
      }
    },

    async mergeVideos(input: MergeVideosInput): Promise<FinalArtifact> {
      if (input.clips.length === 0) {
        throw ApplicationFailure.nonRetryable('No clips to merge', NonRetryableErrorType.NoClipsToMerge);
      }
      log.info('Merging videos into a single video', {
        clipCount: input.clips.length,
        outputVideoName: input.outputVideoName
      });

      const ctx = Context.current();
      return withWorkDir('merge', async (workDir) => {
        const localPaths = input.clips.map((_, index) => join(workDir, `clip_${String(index).padStart(3, '0')}.mp4`));
        await Promise.all(
          input.clips.map(async (clip, index) => {
            await deps.storage.downloadFile(clip.objectPath, localPaths[index]);
            ctx.heartbeat({ downloaded: clip.objectPath });
          })
        );

        const outputPath = join(workDir, input.outputVideoName);
        await deps.editor.concatenate(localPaths, outputPath, { workDir, reencode: input.reencode });

        const stored = await deps.storage.uploadFile(outputPath, `${input.stagingPrefix}/${input.outputVideoName}`);
        log.info('Final video uploaded', { uri: stored.uri });
        return { objectPath: stored.objectPath, uri: stored.uri, clipCount: input.clips.length };
      });
    },

    async uploadFile(input: UploadFileInput): Promise<StoredObject> {
      log.info('Uploading file', { sourcePath: input.sourcePath, destinationPath: input.destinationPath });
      return deps.storage.uploadFile(input.sourcePath, input.destinationPath);
    }
  };
}

export type VideoGenerationActivities = ReturnType<typeof createActivities>;
