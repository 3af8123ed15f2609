import { ApplicationFailure } from '@temporalio/common';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { VideoGenerationActivities } from '../activities/index.js';
import type { ClipReference, GenerationRequest, Scene, WorkflowProgress } from '../types.js';

const temporal = vi.hoisted(() => ({
  activities: {
    createScenes: vi.fn<VideoGenerationActivities['createScenes']>(),
    generateVgmPrompt: vi.fn<VideoGenerationActivities['generateVgmPrompt']>(),
    generateVideoForScene: vi.fn<VideoGenerationActivities['generateVideoForScene']>(),
    mergeVideos: vi.fn<VideoGenerationActivities['mergeVideos']>()
  },
  proxyOptions: [] as unknown[],
  handlers: new Map<string, () => unknown>()
}));

vi.mock('@temporalio/workflow', async () => {
  const common = await vi.importActual<typeof import('@temporalio/common')>('@temporalio/common');
  return {
    ApplicationFailure: common.ApplicationFailure,
    defineQuery: (name: string) => ({ type: 'query', name }),
    log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    proxyActivities: (options: unknown) => {
      temporal.proxyOptions.push(options);
      return temporal.activities;
    },
    setHandler: (definition: { name: string }, handler: () => unknown) => {
      temporal.handlers.set(definition.name, handler);
    },
    workflowInfo: () => ({ workflowId: 'wf-test' })
  };
});

import { assemblyActivityOptions, generationActivityOptions, planningActivityOptions } from './plan.js';
import { progressQuery, videoGenerationWorkflow } from './videoGeneration.js';

const scene = (n: number): Scene => ({
  sequenceNumber: n,
  description: `scene ${n}`,
  durationEstimate: 6,
  cameraAngle: 'wide shot',
  lighting: 'dusk'
});

const clipFor = (n: number): ClipReference => ({
  sequenceNumber: n,
  objectPath: `videos/wf-test/scene_${n}.mp4`,
  uri: `gs://test-bucket/videos/wf-test/scene_${n}.mp4`
});

const queryProgress = (): unknown => temporal.handlers.get('progress')?.();

describe('videoGenerationWorkflow', () => {
  const { createScenes, generateVgmPrompt, generateVideoForScene, mergeVideos } = temporal.activities;

  beforeEach(() => {
    temporal.handlers.clear();
    createScenes.mockReset();
    generateVgmPrompt.mockReset();
    generateVideoForScene.mockReset();
    mergeVideos.mockReset();

    createScenes.mockResolvedValue([scene(3), scene(1), scene(2)]);
    generateVgmPrompt.mockImplementation(async (s) => `vgm ${s.sequenceNumber}`);
    generateVideoForScene.mockImplementation(async (request) => clipFor(request.sequenceNumber));
    mergeVideos.mockImplementation(async (input) => ({
      objectPath: `${input.stagingPrefix}/${input.outputVideoName}`,
      uri: `gs://test-bucket/${input.stagingPrefix}/${input.outputVideoName}`,
      clipCount: input.clips.length
    }));
  });

  it('proxies each stage with its own timeouts and retry policy', () => {
    expect(temporal.proxyOptions).toEqual([planningActivityOptions, generationActivityOptions, assemblyActivityOptions]);
    expect(progressQuery.name).toBe('progress');
  });

  it('plans, renders and merges scenes into one video', async () => {
    const output = await videoGenerationWorkflow({ prompt: '  a fox crossing fresh snow ' });

    expect(createScenes).toHaveBeenCalledWith({ prompt: 'a fox crossing fresh snow', maxScenes: 5 });
    expect(generateVideoForScene).toHaveBeenCalledTimes(3);
    expect(generateVideoForScene).toHaveBeenCalledWith({
      sequenceNumber: 1,
      prompt: 'vgm 1',
      durationSeconds: 8,
      aspectRatio: '16:9',
      stagingPrefix: 'videos/wf-test',
      referenceClip: undefined
    });
    expect(mergeVideos).toHaveBeenCalledWith({
      clips: [clipFor(1), clipFor(2), clipFor(3)],
      stagingPrefix: 'videos/wf-test',
      outputVideoName: 'final_video.mp4',
      reencode: false
    });
    expect(output).toEqual({
      gcsUri: 'gs://test-bucket/videos/wf-test/final_video.mp4',
      objectPath: 'videos/wf-test/final_video.mp4',
      clipCount: 3,
      scenes: [1, 2, 3].map((n) => ({ ...scene(n), vgmPrompt: `vgm ${n}` }))
    });
  });

  it('renders scenes concurrently and merges by sequence number, not completion order', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const completionOrder: number[] = [];
    generateVideoForScene.mockImplementation(async (request: GenerationRequest) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      // later scenes finish first
      await new Promise((resolve) => setTimeout(resolve, (4 - request.sequenceNumber) * 10));
      inFlight -= 1;
      completionOrder.push(request.sequenceNumber);
      return clipFor(request.sequenceNumber);
    });

    await videoGenerationWorkflow({ prompt: 'a fox crossing fresh snow' });

    expect(maxInFlight).toBe(3);
    expect(completionOrder).toEqual([3, 2, 1]);
    expect(mergeVideos.mock.calls[0][0].clips.map((clip) => clip.sequenceNumber)).toEqual([1, 2, 3]);
  });

  it('chains scenes off the previous clip in sequential mode', async () => {
    await videoGenerationWorkflow({ prompt: 'a fox crossing fresh snow', sceneMode: 'sequential' });

    const references = generateVideoForScene.mock.calls.map(([request]) => [request.sequenceNumber, request.referenceClip]);
    expect(references).toEqual([
      [1, undefined],
      [2, clipFor(1)],
      [3, clipFor(2)]
    ]);
  });

  it('passes the requested format through to generation and assembly', async () => {
    await videoGenerationWorkflow({
      prompt: 'a fox crossing fresh snow',
      outputVideoName: 'fox.mp4',
      maxScenes: 2,
      aspectRatio: '9:16',
      durationSeconds: 5,
      reencode: true
    });

    expect(createScenes).toHaveBeenCalledWith({ prompt: 'a fox crossing fresh snow', maxScenes: 2 });
    expect(generateVideoForScene.mock.calls[0][0]).toMatchObject({ aspectRatio: '9:16', durationSeconds: 5 });
    expect(mergeVideos.mock.calls[0][0]).toMatchObject({ outputVideoName: 'fox.mp4', reencode: true });
  });

  it('rejects an empty prompt before any activity runs', async () => {
    const error = await videoGenerationWorkflow({ prompt: '   ' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApplicationFailure);
    expect(error).toMatchObject({ type: 'InvalidPrompt', nonRetryable: true, message: 'Prompt must not be empty' });
    expect(createScenes).not.toHaveBeenCalled();
  });

  it('fails when no scenes were planned', async () => {
    createScenes.mockResolvedValue([]);

    await expect(videoGenerationWorkflow({ prompt: 'a fox crossing fresh snow' })).rejects.toMatchObject({
      type: 'NoScenesPlanned',
      nonRetryable: true
    });
    expect(generateVideoForScene).not.toHaveBeenCalled();
    expect(mergeVideos).not.toHaveBeenCalled();
  });

  it('does not merge when a scene fails', async () => {
    const failure = ApplicationFailure.nonRetryable('Video generation failed: blocked', 'VideoGenerationFailed');
    generateVideoForScene.mockImplementation(async (request) => {
      if (request.sequenceNumber === 2) throw failure;
      return clipFor(request.sequenceNumber);
    });

    await expect(videoGenerationWorkflow({ prompt: 'a fox crossing fresh snow' })).rejects.toBe(failure);
    expect(mergeVideos).not.toHaveBeenCalled();
  });

  it('reports progress through the query handler', async () => {
    let duringAssembly: unknown;
    mergeVideos.mockImplementation(async (input) => {
      duringAssembly = queryProgress();
      return { objectPath: 'videos/wf-test/final_video.mp4', uri: 'gs://test-bucket/x', clipCount: input.clips.length };
    });

    await videoGenerationWorkflow({ prompt: 'a fox crossing fresh snow' });

    const expectedDuring: WorkflowProgress = { stage: 'assembling', scenesPlanned: 3, clipsCompleted: 3 };
    const expectedAfter: WorkflowProgress = { stage: 'completed', scenesPlanned: 3, clipsCompleted: 3 };
    expect(duringAssembly).toEqual(expectedDuring);
    expect(queryProgress()).toEqual(expectedAfter);
  });
});
