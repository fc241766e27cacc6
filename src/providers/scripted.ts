import type { ActualToolCall } from '../evals/types.js';
import type { ToolCallProvider, ToolCallRequest } from './types.js';

export type ToolCallScript =
  | Readonly<Record<string, readonly ActualToolCall[]>>
  | ((request: ToolCallRequest) => readonly ActualToolCall[] | Promise<readonly ActualToolCall[]>);

/**
 * Answers from a fixed script instead of a model. A record script is keyed by
 * the last user message of the conversation.
 */
export class ScriptedToolCallProvider implements ToolCallProvider {
  readonly name = 'scripted';
  private script: ToolCallScript;
  readonly requests: ToolCallRequest[] = [];

  constructor(script: ToolCallScript) {
    this.script = script;
  }

  async getToolCalls(request: ToolCallRequest): Promise<ActualToolCall[]> {
    this.requests.push(request);

    if (typeof this.script === 'function') {
      const calls = await this.script(request);
      return calls.map(copyCall);
    }

    const userMessage = lastUserMessage(request);
    if (!Object.hasOwn(this.script, userMessage)) {
      throw new Error(`No scripted tool calls for message: ${userMessage}`);
    }
    return this.script[userMessage].map(copyCall);
  }
}

function lastUserMessage(request: ToolCallRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    if (request.messages[i].role === 'user') {
      return request.messages[i].content;
    }
  }
  return '';
}

function copyCall(call: ActualToolCall): ActualToolCall {
  return { name: call.name, args: { ...call.args } };
}
