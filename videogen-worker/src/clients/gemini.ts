import { Type, type GenerateContentParameters, type Schema } from '@google/genai';
import { logger } from '../logger.js';
import { SceneOutputError } from '../errors.js';
import { sceneListSchema } from '../schema.js';
import { buildScenePlanningPrompt, buildVgmPromptRequest, fallbackVgmPrompt } from '../prompts.js';
import type { Scene } from '../types.js';

export interface SceneWriter {
  createScenes(prompt: string, maxScenes: number): Promise<Scene[]>;
  optimizePrompt(scene: Scene): Promise<string>;
}

/** The slice of `GoogleGenAI` used for text generation. */
export interface GenAiContentClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ readonly text: string | undefined }>;
  };
}

const sceneResponseSchema: Schema = {
  type: Type.ARRAY,
  items: {
    type: Type.OBJECT,
    properties: {
      sequenceNumber: { type: Type.INTEGER },
      description: { type: Type.STRING },
      durationEstimate: { type: Type.INTEGER },
      cameraAngle: { type: Type.STRING },
      lighting: { type: Type.STRING }
    },
    required: ['sequenceNumber', 'description', 'durationEstimate'],
    propertyOrdering: ['sequenceNumber', 'description', 'durationEstimate', 'cameraAngle', 'lighting']
  }
};

export class GeminiSceneWriter implements SceneWriter {
  constructor(
    private readonly client: GenAiContentClient,
    private readonly modelName: string
  ) {}

  async createScenes(prompt: string, maxScenes: number): Promise<Scene[]> {
    const response = await this.client.models.generateContent({
      model: this.modelName,
      contents: buildScenePlanningPrompt(prompt, maxScenes),
      config: {
        thinkingConfig: { thinkingBudget: -1 },
        responseMimeType: 'application/json',
        responseSchema: sceneResponseSchema
      }
    });

    const scenes = parseScenes(response.text);
    logger.info(
      { model: this.modelName, planned: scenes.length, kept: Math.min(scenes.length, maxScenes) },
      'Scenes planned'
    );
    return scenes.slice(0, maxScenes).map((scene, index) => ({ ...scene, sequenceNumber: index + 1 }));
  }

  async optimizePrompt(scene: Scene): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.modelName,
      contents: buildVgmPromptRequest(scene),
      config: {
        thinkingConfig: { thinkingBudget: -1 }
      }
    });

    const text = response.text?.trim();
    if (!text) {
      logger.warn({ sequenceNumber: scene.sequenceNumber }, 'Empty prompt from model, using scene description');
      return fallbackVgmPrompt(scene);
    }
    return text;
  }
}

/** Parses the model's JSON reply into scenes ordered by sequence number. */
export function parseScenes(raw: string | undefined): Scene[] {
  if (!raw) {
    throw new SceneOutputError('Scene planner returned an empty response');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SceneOutputError(
      `Scene planner returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      raw
    );
  }

  const parsed = sceneListSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new SceneOutputError(`Scene planner output failed validation: ${issues}`, raw);
  }

  return [...parsed.data].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
}
