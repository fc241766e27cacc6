import Anthropic from '@anthropic-ai/sdk';
import { getEnv } from '../config/env.js';
import type { ActualToolCall, ToolArgs, ToolDefinition } from '../evals/types.js';
import type { ToolCallProvider, ToolCallRequest } from './types.js';

export interface ContentBlockLike {
  type: string;
  name?: string;
  input?: unknown;
}

/** The slice of the Anthropic client this provider calls. */
export interface MessagesClient {
  messages: {
    create(body: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<{ content: ContentBlockLike[] }>;
  };
}

export interface AnthropicProviderOptions {
  client?: MessagesClient;
  apiKey?: string;
  maxTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;
}

export class AnthropicToolCallProvider implements ToolCallProvider {
  readonly name = 'anthropic';
  private client: MessagesClient;
  private maxTokens: number;

  constructor(options: AnthropicProviderOptions = {}) {
    const env = getEnv();
    this.client = options.client ?? new Anthropic({
      apiKey: options.apiKey ?? env.ANTHROPIC_API_KEY,
      timeout: options.timeoutMs ?? env.TOOLEVAL_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? env.TOOLEVAL_MAX_RETRIES,
    });
    this.maxTokens = options.maxTokens ?? env.TOOLEVAL_MAX_TOKENS;
  }

  async getToolCalls(request: ToolCallRequest): Promise<ActualToolCall[]> {
    const system = request.messages
      .filter(message => message.role === 'system')
      .map(message => message.content)
      .join('\n\n');

    const messages: Anthropic.Messages.MessageParam[] = [];
    for (const message of request.messages) {
      if (message.role !== 'system') {
        messages.push({ role: message.role, content: message.content });
      }
    }

    const body: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: this.maxTokens,
      messages,
    };
    if (system) {
      body.system = system;
    }
    if (request.tools.length > 0) {
      body.tools = request.tools.map(toAnthropicTool);
      body.tool_choice = { type: request.toolChoice };
    }

    const response = await this.client.messages.create(body);
    return extractToolCalls(response.content);
  }
}

export function toAnthropicTool(tool: ToolDefinition): Anthropic.Messages.Tool {
  const anthropicTool: Anthropic.Messages.Tool = {
    name: tool.name,
    input_schema: { ...tool.inputSchema, type: 'object' },
  };
  if (tool.description) {
    anthropicTool.description = tool.description;
  }
  return anthropicTool;
}

export function extractToolCalls(content: readonly ContentBlockLike[]): ActualToolCall[] {
  const calls: ActualToolCall[] = [];
  for (const block of content) {
    if (block.type !== 'tool_use' || !block.name) {
      continue;
    }
    calls.push({ name: block.name, args: isToolArgs(block.input) ? { ...block.input } : {} });
  }
  return calls;
}

function isToolArgs(value: unknown): value is ToolArgs {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
