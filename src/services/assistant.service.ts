import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { FAILED_RUN_STATUSES } from '../types/assistant.types';
import type { AssistantClient, JobOutcome, RunJobOptions, Sleeper } from '../types/assistant.types';
import { RemoteServiceError } from '../middleware/relay.errorHandler.middleware';
import { createLogger } from '../utils/relay.logger.utils';

const logger = createLogger('assistant-service');

const PROVIDER = 'openai';

const threadSchema = z.object({ id: z.string() });
const runSchema = z.object({ id: z.string(), status: z.string() });
const messageListSchema = z.object({
  data: z.array(z.object({
    content: z.array(z.object({
      type: z.string(),
      text: z.object({ value: z.string() }).optional()
    }))
  }))
});

export const defaultSleeper: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface AssistantServiceConfig {
  apiKey: string;
  assistantId: string;
  /** Sent as additional_instructions on every run when non-empty */
  instructions?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  timeout?: number;
  baseUrl?: string;
  sleep?: Sleeper;
  /** Replaces the transport, used by tests */
  adapter?: AxiosAdapter;
}

const describeError = (error: unknown): { error: string; status?: number } => ({
  error: error instanceof Error ? error.message : String(error),
  status: axios.isAxiosError(error) ? error.response?.status : undefined
});

/**
 * ========================================
 * ASSISTANT SERVICE
 * ========================================
 *
 * Client for the OpenAI Assistants v2 REST API.
 * - threads hold a user's conversation history
 * - runs are polled on a fixed interval with a fixed attempt budget;
 *   a run that is still going when the budget runs out is dropped
 */
export class AssistantService implements AssistantClient {
  readonly assistantId: string;
  readonly pollIntervalMs: number;
  readonly maxPollAttempts: number;
  private readonly http: AxiosInstance;
  private readonly instructions?: string;
  private readonly sleep: Sleeper;

  constructor(config: AssistantServiceConfig) {
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY is required');
    }
    if (!config.assistantId) {
      throw new Error('OPENAI_ASSISTANT_ID is required');
    }

    this.assistantId = config.assistantId;
    this.instructions = config.instructions?.trim() || undefined;
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
    this.maxPollAttempts = config.maxPollAttempts ?? 10;
    this.sleep = config.sleep ?? defaultSleeper;

    this.http = axios.create({
      baseURL: config.baseUrl ?? 'https://api.openai.com/v1',
      timeout: config.timeout ?? 30000,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json',
        'OpenAI-Beta': 'assistants=v2'
      },
      ...(config.adapter && { adapter: config.adapter })
    });

    logger.info('Assistant client initialized', {
      assistantId: this.assistantId,
      pollIntervalMs: this.pollIntervalMs,
      maxPollAttempts: this.maxPollAttempts
    });
  }

  /**
   * Create an empty thread and return its id
   */
  async createConversation(): Promise<string> {
    let data: unknown;
    try {
      ({ data } = await this.http.post('/threads'));
    } catch (error: unknown) {
      const details = describeError(error);
      logger.error('Failed to create thread', details);
      throw new RemoteServiceError(`Failed to create thread: ${details.error}`, PROVIDER, details.status);
    }

    const parsed = threadSchema.safeParse(data);
    if (!parsed.success) {
      logger.error('Thread response has no id');
      throw new RemoteServiceError('Thread response has no id', PROVIDER);
    }

    return parsed.data.id;
  }

  async appendMessage(threadId: string, text: string): Promise<boolean> {
    try {
      await this.http.post(`/threads/${threadId}/messages`, {
        role: 'user',
        content: text
      });
      return true;

    } catch (error: unknown) {
      logger.error('Failed to add message to thread', { threadId, ...describeError(error) });
      return false;
    }
  }

  /**
   * Run the assistant on a thread and return the reply text, or null
   * when the run fails, stalls past the poll budget, or errors.
   */
  async runJob(threadId: string, options: RunJobOptions = {}): Promise<string | null> {
    const outcome = await this.pollJob(threadId, options);

    logger.jobFinished({
      threadId,
      runId: outcome.runId ?? 'none',
      outcome: outcome.kind,
      attempts: outcome.attempts,
      status: outcome.kind === 'failed' || outcome.kind === 'exhausted' ? outcome.status : undefined
    });

    return outcome.kind === 'completed' ? outcome.text : null;
  }

  /**
   * Start a run and poll it until it reaches a terminal status, the
   * attempt budget is spent, or the signal aborts.
   */
  async pollJob(threadId: string, options: RunJobOptions = {}): Promise<JobOutcome> {
    const { signal } = options;
    let runId: string | undefined;
    let attempts = 0;

    try {
      runId = await this.startRun(threadId);
      let status = 'queued';

      while (attempts < this.maxPollAttempts) {
        if (signal?.aborted) {
          return { kind: 'aborted', runId, attempts };
        }

        try {
          await this.sleep(this.pollIntervalMs, signal);
        } catch (error: unknown) {
          if (signal?.aborted) {
            return { kind: 'aborted', runId, attempts };
          }
          throw error;
        }

        if (signal?.aborted) {
          return { kind: 'aborted', runId, attempts };
        }

        attempts++;
        status = await this.getRunStatus(threadId, runId);

        if (status === 'completed') {
          const text = await this.getLatestReply(threadId);
          return { kind: 'completed', runId, attempts, text };
        }

        if (FAILED_RUN_STATUSES.has(status)) {
          return { kind: 'failed', runId, attempts, status };
        }
      }

      return { kind: 'exhausted', runId, attempts, status };

    } catch (error: unknown) {
      logger.error('Failed to run assistant', { threadId, runId, ...describeError(error) });
      return { kind: 'error', runId, attempts, error: describeError(error).error };
    }
  }

  private async startRun(threadId: string): Promise<string> {
    const { data } = await this.http.post(`/threads/${threadId}/runs`, {
      assistant_id: this.assistantId,
      ...(this.instructions ? { additional_instructions: this.instructions } : {})
    });
    return runSchema.parse(data).id;
  }

  private async getRunStatus(threadId: string, runId: string): Promise<string> {
    const { data } = await this.http.get(`/threads/${threadId}/runs/${runId}`);
    return runSchema.parse(data).status;
  }

  /**
   * Messages are listed newest first; the reply is the first part of the
   * newest message.
   */
  private async getLatestReply(threadId: string): Promise<string | null> {
    const { data } = await this.http.get(`/threads/${threadId}/messages`);
    const messages = messageListSchema.parse(data).data;

    if (messages.length === 0) {
      return null;
    }

    return messages[0].content[0]?.text?.value ?? null;
  }
}

export default AssistantService;
