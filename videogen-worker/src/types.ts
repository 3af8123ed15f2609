export type AspectRatio = '16:9' | '9:16';

export type SceneMode = 'parallel' | 'sequential';

export interface Scene {
  sequenceNumber: number;
  description: string;
  durationEstimate: number;
  cameraAngle: string;
  lighting: string;
  vgmPrompt?: string;
}

/** Everything the generation activity needs to render one clip. */
export interface GenerationRequest {
  sequenceNumber: number;
  prompt: string;
  durationSeconds: number;
  aspectRatio: AspectRatio;
  negativePrompt?: string;
  stagingPrefix: string;
  referenceClip?: ClipReference;
}

export interface ClipReference {
  sequenceNumber: number;
  objectPath: string;
  uri: string;
}

export interface FinalArtifact {
  objectPath: string;
  uri: string;
  clipCount: number;
}

export interface CreateScenesInput {
  prompt: string;
  maxScenes: number;
}

export interface MergeVideosInput {
  clips: ClipReference[];
  stagingPrefix: string;
  outputVideoName: string;
  reencode: boolean;
}

export interface UploadFileInput {
  sourcePath: string;
  destinationPath: string;
}

export interface VideoGenerationWorkflowInput {
  prompt: string;
  outputVideoName?: string;
  sceneMode?: SceneMode;
  maxScenes?: number;
  aspectRatio?: AspectRatio;
  durationSeconds?: number;
  reencode?: boolean;
}

export interface VideoGenerationWorkflowOutput {
  gcsUri: string;
  objectPath: string;
  clipCount: number;
  scenes: Scene[];
}

export type WorkflowStage = 'planning' | 'generating' | 'assembling' | 'completed';

export interface WorkflowProgress {
  stage: WorkflowStage;
  scenesPlanned: number;
  clipsCompleted: number;
}
