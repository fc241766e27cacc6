import type { ActualToolCall, ChatMessage, ToolDefinition } from '../evals/types.js';

export type ToolChoice = 'auto' | 'any';

export interface ToolCallRequest {
  model: string;
  messages: ChatMessage[];
  tools: readonly ToolDefinition[];
  toolChoice: ToolChoice;
}

/**
 * Whatever produces the tool calls under test, usually a chat model.
 */
export interface ToolCallProvider {
  readonly name: string;
  getToolCalls(request: ToolCallRequest): Promise<ActualToolCall[]>;
}
