import type { Scene } from './types.js';

export function buildScenePlanningPrompt(userPrompt: string, maxScenes: number): string {
  return `
You are a creative AI agent that transforms user input into cinematic movie scenes. Your task is to take any concept, story, or idea and convert it into a compelling visual narrative with dramatic flair and artistic vision.

# Requirements:
* Create between 1 and ${maxScenes} scenes that tell a complete story with a clear beginning and a satisfying ending
* Each scene must be 5-8 seconds long
* No overlay text or written words may appear in any scene
* For each scene, provide a detailed camera angle and lighting description

# Scene Structure:
* Opening: establish the story
* Development (optional): build tension
* Resolution: deliver a memorable conclusion

# Technical Specifications:
For each scene, specify:
* sequenceNumber: position of the scene in the story, starting at 1
* description: a vivid picture of what unfolds on screen
* durationEstimate: length in seconds
* cameraAngle: e.g. extreme close-up, wide shot, low angle, aerial view, tracking shot
* lighting: e.g. golden hour, dramatic shadows, neon glow, soft natural light

User Input: ${userPrompt}
`.trim();
}

export function buildVgmPromptRequest(scene: Scene): string {
  return `
Rewrite the following movie scene as a single paragraph prompt for a text-to-video model.
Describe the subject, action, setting, camera and lighting in concrete visual terms.
Do not mention text, captions or on-screen writing. Reply with the prompt only.

Scene description: ${scene.description}
Camera angle: ${scene.cameraAngle}
Lighting: ${scene.lighting}
Duration: ${scene.durationEstimate} seconds
`.trim();
}

export function fallbackVgmPrompt(scene: Scene): string {
  return `${scene.description}. The camera uses ${scene.cameraAngle}. The lighting is ${scene.lighting}.`;
}
