import { randomUUID } from 'node:crypto';
import { cac, type CAC } from 'cac';
import { z } from 'zod';
import type { VideoGenerationWorkflowInput } from 'videogen-worker/types';

const cliOptionsSchema = z.object({
  outputName: z.string().min(1).default('final_video.mp4'),
  sceneMode: z.enum(['parallel', 'sequential']).default('parallel'),
  maxScenes: z.coerce.number().int().min(1).max(5).default(5),
  aspectRatio: z.enum(['16:9', '9:16']).default('16:9'),
  duration: z.coerce.number().int().min(5).max(8).default(8),
  reencode: z.boolean().default(false),
  workflowId: z.string().min(1).optional(),
  wait: z.boolean().default(true)
});

export interface StartRequest {
  input: VideoGenerationWorkflowInput;
  workflowId: string;
  wait: boolean;
}

export function newWorkflowId(): string {
  return `video-gen-workflow-${randomUUID()}`;
}

/** Turns parsed command-line arguments into a workflow submission. */
export function buildStartRequest(promptWords: string[], rawOptions: Record<string, unknown>): StartRequest {
  const prompt = promptWords.join(' ').trim();
  if (!prompt) {
    throw new Error('A prompt is required');
  }

  const parsed = cliOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new Error(parsed.error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`).join(', '));
  }
  const options = parsed.data;

  return {
    input: {
      prompt,
      outputVideoName: options.outputName,
      sceneMode: options.sceneMode,
      maxScenes: options.maxScenes,
      aspectRatio: options.aspectRatio,
      durationSeconds: options.duration,
      reencode: options.reencode
    },
    workflowId: options.workflowId ?? newWorkflowId(),
    wait: options.wait
  };
}

// mri turns numeric-looking values into numbers ("0042" becomes 42), so these are read verbatim from argv
const stringOptionFlags = [
  ['workflowId', '--workflow-id'],
  ['outputName', '--output-name']
] as const;

type StringOptionName = (typeof stringOptionFlags)[number][0];

export function rawStringOptions(argv: string[]): Partial<Record<StringOptionName, string>> {
  const options: Partial<Record<StringOptionName, string>> = {};
  const end = argv.indexOf('--');
  const args = end === -1 ? argv : argv.slice(0, end);

  for (const [name, flag] of stringOptionFlags) {
    args.forEach((arg, index) => {
      if (arg === flag && index + 1 < args.length) {
        options[name] = args[index + 1];
      } else if (arg.startsWith(`${flag}=`)) {
        options[name] = arg.slice(flag.length + 1);
      }
    });
  }
  return options;
}

export function createCli(onStart: (request: StartRequest) => Promise<void>): CAC {
  const cli = cac('videogen-start');

  cli
    .command('<...prompt>', 'Submit a video generation workflow for the prompt')
    .option('--output-name <name>', 'File name of the final video in the bucket', { default: 'final_video.mp4' })
    .option('--scene-mode <mode>', 'parallel or sequential (sequential chains last frames)', { default: 'parallel' })
    .option('--max-scenes <count>', 'Upper bound on planned scenes (1-5)', { default: 5 })
    .option('--aspect-ratio <ratio>', '16:9 or 9:16', { default: '16:9' })
    .option('--duration <seconds>', 'Clip length in seconds (5-8)', { default: 8 })
    .option('--reencode', 'Re-encode while concatenating instead of stream copy')
    .option('--workflow-id <id>', 'Explicit workflow id; reusing one is rejected by Temporal')
    .option('--no-wait', 'Return once the workflow is submitted')
    .action(async (prompt: string[], options: Record<string, unknown>) => {
      await onStart(buildStartRequest(prompt, { ...options, ...rawStringOptions(cli.rawArgs) }));
    });

  cli.help();
  return cli;
}
