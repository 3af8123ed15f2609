import { z } from 'zod';

export const sceneSchema = z.object({
  sequenceNumber: z.coerce.number().int().min(1),
  description: z.string().min(1),
  durationEstimate: z.coerce.number().positive(),
  cameraAngle: z.string().min(1).default('overhead shot'),
  lighting: z.string().min(1).default('natural daylight'),
  vgmPrompt: z.string().optional()
});

export const sceneListSchema = z.array(sceneSchema);

export type SceneOutput = z.infer<typeof sceneSchema>;
