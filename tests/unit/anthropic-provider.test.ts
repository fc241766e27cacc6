import { describe, expect, it } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicToolCallProvider,
  extractToolCalls,
  toAnthropicTool,
  type MessagesClient,
} from '../../src/providers/index.js';

function fakeClient(content: Array<{ type: string; name?: string; input?: unknown }>) {
  const bodies: Anthropic.Messages.MessageCreateParamsNonStreaming[] = [];
  const client: MessagesClient = {
    messages: {
      async create(body) {
        bodies.push(body);
        return { content };
      },
    },
  };
  return { client, bodies };
}

describe('AnthropicToolCallProvider', () => {
  it('sends system text separately and returns tool_use blocks', async () => {
    const content = [
      { type: 'text', text: 'Sending now.' },
      { type: 'tool_use', id: 'toolu_1', name: 'send_email', input: { to: 'a@example.com' } },
    ];
    const { client, bodies } = fakeClient(content);
    const provider = new AnthropicToolCallProvider({ client, maxTokens: 256 });

    const calls = await provider.getToolCalls({
      model: 'claude-test',
      messages: [
        { role: 'system', content: 'You manage email.' },
        { role: 'user', content: 'Email a@example.com' },
      ],
      tools: [{ name: 'send_email', description: 'Send an email', inputSchema: { properties: { to: { type: 'string' } } } }],
      toolChoice: 'any',
    });

    expect(calls).toEqual([{ name: 'send_email', args: { to: 'a@example.com' } }]);
    expect(bodies).toHaveLength(1);
    expect(bodies[0]).toEqual({
      model: 'claude-test',
      max_tokens: 256,
      system: 'You manage email.',
      messages: [{ role: 'user', content: 'Email a@example.com' }],
      tools: [
        {
          name: 'send_email',
          description: 'Send an email',
          input_schema: { type: 'object', properties: { to: { type: 'string' } } },
        },
      ],
      tool_choice: { type: 'any' },
    });
  });

  it('omits system, tools and tool_choice when there are none', async () => {
    const { client, bodies } = fakeClient([]);
    const provider = new AnthropicToolCallProvider({ client, maxTokens: 128 });

    const calls = await provider.getToolCalls({
      model: 'claude-test',
      messages: [{ role: 'user', content: 'Hi' }],
      tools: [],
      toolChoice: 'auto',
    });

    expect(calls).toEqual([]);
    expect(bodies[0]).toEqual({
      model: 'claude-test',
      max_tokens: 128,
      messages: [{ role: 'user', content: 'Hi' }],
    });
  });
});

describe('toAnthropicTool', () => {
  it('always declares an object schema', () => {
    expect(toAnthropicTool({ name: 'archive_email' })).toEqual({
      name: 'archive_email',
      input_schema: { type: 'object' },
    });
  });
});

describe('extractToolCalls', () => {
  it('keeps named tool_use blocks in order and defaults bad input to empty args', () => {
    expect(
      extractToolCalls([
        { type: 'tool_use', name: 'first', input: { n: 1 } },
        { type: 'text' },
        { type: 'tool_use', name: 'second', input: 'not an object' },
        { type: 'tool_use', input: {} },
      ])
    ).toEqual([
      { name: 'first', args: { n: 1 } },
      { name: 'second', args: {} },
    ]);
  });
});
