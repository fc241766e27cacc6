export type { ToolCallProvider, ToolCallRequest, ToolChoice } from './types.js';
export {
  AnthropicToolCallProvider,
  extractToolCalls,
  toAnthropicTool,
  type AnthropicProviderOptions,
  type MessagesClient,
} from './anthropic.js';
export { ScriptedToolCallProvider, type ToolCallScript } from './scripted.js';
