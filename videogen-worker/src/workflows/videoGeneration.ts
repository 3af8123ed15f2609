import { ApplicationFailure, defineQuery, log, proxyActivities, setHandler, workflowInfo } from '@temporalio/workflow';
import type { VideoGenerationActivities } from '../activities/index.js';
import { NonRetryableErrorType } from '../errors.js';
import type {
  ClipReference,
  Scene,
  VideoGenerationWorkflowInput,
  VideoGenerationWorkflowOutput,
  WorkflowProgress
} from '../types.js';
import {
  assemblyActivityOptions,
  generationActivityOptions,
  orderClips,
  orderScenes,
  planningActivityOptions,
  resolveWorkflowOptions,
  stagingPrefixFor
} from './plan.js';

const { createScenes, generateVgmPrompt } = proxyActivities<VideoGenerationActivities>(planningActivityOptions);
const { generateVideoForScene } = proxyActivities<VideoGenerationActivities>(generationActivityOptions);
const { mergeVideos } = proxyActivities<VideoGenerationActivities>(assemblyActivityOptions);

export const progressQuery = defineQuery<WorkflowProgress>('progress');

interface SceneResult {
  scene: Scene;
  clip: ClipReference;
}

/**
 * Expands a prompt into scenes, renders a clip per scene and stitches the clips
 * into one video. Resolves to the final video's location in the bucket.
 */
export async function videoGenerationWorkflow(input: VideoGenerationWorkflowInput): Promise<VideoGenerationWorkflowOutput> {
  const options = resolveWorkflowOptions(input);
  const { workflowId } = workflowInfo();
  const stagingPrefix = stagingPrefixFor(workflowId);

  const progress: WorkflowProgress = { stage: 'planning', scenesPlanned: 0, clipsCompleted: 0 };
  setHandler(progressQuery, () => ({ ...progress }));

  log.info('Running workflow', {
    stagingPrefix,
    sceneMode: options.sceneMode,
    maxScenes: options.maxScenes,
    outputVideoName: options.outputVideoName
  });

  const scenes = orderScenes(await createScenes({ prompt: options.prompt, maxScenes: options.maxScenes }));
  if (scenes.length === 0) {
    throw ApplicationFailure.nonRetryable('Scene planner produced no scenes', NonRetryableErrorType.NoScenesPlanned);
  }
  log.info('Scene development completed', { sceneCount: scenes.length });

  progress.stage = 'generating';
  progress.scenesPlanned = scenes.length;

  const processScene = async (scene: Scene, referenceClip?: ClipReference): Promise<SceneResult> => {
    const vgmPrompt = await generateVgmPrompt(scene);
    const clip = await generateVideoForScene({
      sequenceNumber: scene.sequenceNumber,
      prompt: vgmPrompt,
      durationSeconds: options.durationSeconds,
      aspectRatio: options.aspectRatio,
      stagingPrefix,
      referenceClip
    });
    progress.clipsCompleted += 1;
    log.info('Scene video generated', { sequenceNumber: scene.sequenceNumber, uri: clip.uri });
    return { scene: { ...scene, vgmPrompt }, clip };
  };

  let results: SceneResult[];
  if (options.sceneMode === 'sequential') {
    // each scene starts from the last frame of the one before it
    results = [];
    let previous: ClipReference | undefined;
    for (const scene of scenes) {
      const result = await processScene(scene, previous);
      results.push(result);
      previous = result.clip;
    }
  } else {
    results = await Promise.all(scenes.map((scene) => processScene(scene)));
  }

  progress.stage = 'assembling';
  const artifact = await mergeVideos({
    clips: orderClips(results.map((result) => result.clip)),
    stagingPrefix,
    outputVideoName: options.outputVideoName,
    reencode: options.reencode
  });
  progress.stage = 'completed';

  log.info('Final video generated and uploaded', { uri: artifact.uri, clipCount: artifact.clipCount });

  return {
    gcsUri: artifact.uri,
    objectPath: artifact.objectPath,
    clipCount: artifact.clipCount,
    scenes: orderScenes(results.map((result) => result.scene))
  };
}
