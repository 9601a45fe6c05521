/**
 * ========================================
 * ASSISTANT TYPES
 * ========================================
 *
 * Contract between the orchestrator and the hosted assistant provider.
 * A conversation is an OpenAI thread; a job is a run on that thread.
 */

/**
 * Terminal failure statuses of a run. `completed` is the only success;
 * queued, in_progress, requires_action and cancelling keep the poll going.
 */
export const FAILED_RUN_STATUSES: ReadonlySet<string> = new Set([
  'failed',
  'cancelled',
  'expired',
  'incomplete',
]);

/**
 * How a poll ended. Only `completed` carries a reply; every other
 * outcome reaches the caller of `runJob` as null.
 */
export type JobOutcome =
  | { kind: 'completed'; runId: string; attempts: number; text: string | null }
  | { kind: 'failed'; runId: string; attempts: number; status: string }
  | { kind: 'exhausted'; runId: string; attempts: number; status: string }
  | { kind: 'aborted'; runId: string; attempts: number }
  | { kind: 'error'; runId?: string; attempts: number; error: string };

export interface RunJobOptions {
  /** Ends the poll early; checked before every status request */
  signal?: AbortSignal;
}

/**
 * Pause between status checks. Injected so tests do not wait.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AssistantClient {
  createConversation(): Promise<string>;
  appendMessage(threadId: string, text: string): Promise<boolean>;
  runJob(threadId: string, options?: RunJobOptions): Promise<string | null>;
}
