export { videoGenerationWorkflow, progressQuery } from './videoGeneration.js';
