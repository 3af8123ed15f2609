import { WorkflowFailedError, type Client } from '@temporalio/client';
import type { videoGenerationWorkflow } from 'videogen-worker/workflows';
import type { VideoGenerationWorkflowInput, VideoGenerationWorkflowOutput } from 'videogen-worker/types';
import { logger } from './logger.js';
import type { StarterConfig } from './config.js';

export const WORKFLOW_TYPE = 'videoGenerationWorkflow';

export interface SubmittedRun {
  workflowId: string;
  runId: string;
  result(): Promise<VideoGenerationWorkflowOutput>;
}

/** Submits workflow executions; the Temporal client in production, a fake in tests. */
export interface WorkflowSubmitter {
  submit(input: VideoGenerationWorkflowInput, workflowId: string): Promise<SubmittedRun>;
}

export class TemporalWorkflowSubmitter implements WorkflowSubmitter {
  constructor(
    private readonly client: Client,
    private readonly config: Pick<StarterConfig, 'TEMPORAL_TASK_QUEUE' | 'WORKFLOW_TIMEOUT_MINUTES'>
  ) {}

  async submit(input: VideoGenerationWorkflowInput, workflowId: string): Promise<SubmittedRun> {
    const handle = await this.client.workflow.start<typeof videoGenerationWorkflow>(WORKFLOW_TYPE, {
      taskQueue: this.config.TEMPORAL_TASK_QUEUE,
      workflowId,
      args: [input],
      workflowExecutionTimeout: this.config.WORKFLOW_TIMEOUT_MINUTES * 60 * 1000
    });
    return {
      workflowId: handle.workflowId,
      runId: handle.firstExecutionRunId,
      result: () => handle.result()
    };
  }
}

export interface RunNotifier {
  completed(workflowId: string, output: VideoGenerationWorkflowOutput): Promise<void>;
  failed(workflowId: string, error: string): Promise<void>;
}

export type StartResult =
  | { success: true; workflowId: string; runId: string; result?: VideoGenerationWorkflowOutput }
  | { success: false; workflowId: string; error: string };

export function describeFailure(error: unknown): string {
  if (error instanceof WorkflowFailedError && error.cause) {
    return error.cause.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class VideoGenerationStarter {
  constructor(
    private readonly submitter: WorkflowSubmitter,
    private readonly notifier?: RunNotifier
  ) {}

  /** Submits a run and, when `wait` is set, blocks until it completes or fails. */
  async start(input: VideoGenerationWorkflowInput, workflowId: string, wait: boolean): Promise<StartResult> {
    let run: SubmittedRun;
    try {
      run = await this.submitter.submit(input, workflowId);
    } catch (error) {
      const message = describeFailure(error);
      logger.error({ workflowId, error }, 'Failed to submit workflow');
      return { success: false, workflowId, error: message };
    }

    logger.info({ workflowId: run.workflowId, runId: run.runId }, 'Workflow submitted');
    if (!wait) {
      return { success: true, workflowId: run.workflowId, runId: run.runId };
    }

    try {
      const result = await run.result();
      logger.info({ workflowId: run.workflowId, gcsUri: result.gcsUri, clipCount: result.clipCount }, 'Workflow completed');
      await this.notifier?.completed(run.workflowId, result);
      return { success: true, workflowId: run.workflowId, runId: run.runId, result };
    } catch (error) {
      const message = describeFailure(error);
      logger.error({ workflowId: run.workflowId, error: message }, 'Workflow failed');
      await this.notifier?.failed(run.workflowId, message);
      return { success: false, workflowId: run.workflowId, error: message };
    }
  }
}

/**
 * Runs a start attempt end to end. Failures before submission (configuration,
 * connection) become a failed result too, so the caller always has one to print.
 */
export async function settleStart(workflowId: string, attempt: () => Promise<StartResult>): Promise<StartResult> {
  try {
    return await attempt();
  } catch (error) {
    const message = describeFailure(error);
    logger.error({ workflowId, error }, 'Could not start workflow');
    return { success: false, workflowId, error: message };
  }
}
