/**
 * Function Agent - Wraps a plain function as an Agent
 */

import type { Agent } from '../types/execution.js';

export type AgentHandler<TPayload, TResult> = (payload: TPayload) => TResult | Promise<TResult>;

/**
 * Usage:
 * ```typescript
 * orchestrator.register('echo', createAgent((payload: { text: string }) => payload.text));
 * ```
 */
export function createAgent<TPayload = unknown, TResult = unknown>(
  handler: AgentHandler<TPayload, TResult>
): Agent<TPayload, TResult> {
  return {
    execute(payload: TPayload): TResult | Promise<TResult> {
      return handler(payload);
    },
  };
}
