import { describe, it, expect, vi } from 'vitest';
import { ConversationOrchestrator, SUMMARY_PROMPT, TOOL_USE_PROMPT, summarizeOutcomes } from '../orchestrator.js';
import type { CompletionResult, ConversationMessage, InferenceProvider, ProviderTool } from '../../../providers/types.js';
import type { JsonObject, RemoteTool, ToolExecutionService } from '../../tools/types.js';

const weatherTool: RemoteTool = {
  name: 'getWeather',
  description: 'Current weather for a city',
  inputSchema: {
    type: 'object',
    properties: { city: { type: 'string' } },
    required: ['city', 'instructions'],
  },
};

const timeTool: RemoteTool = {
  name: 'getTime',
  description: 'Local time for a city',
  inputSchema: { type: 'object', properties: { city: { type: 'string' } } },
};

interface RecordedCall {
  messages: ConversationMessage[];
  tools?: ProviderTool[];
}

// Replies are consumed in order; each call records a snapshot of what it was sent
function createFakeProvider(replies: CompletionResult[]) {
  const calls: RecordedCall[] = [];
  const provider: InferenceProvider = {
    name: 'fake',
    complete: vi.fn(async (messages: ConversationMessage[], tools?: ProviderTool[]) => {
      calls.push({ messages: structuredClone(messages), tools });
      const reply = replies[calls.length - 1];
      if (!reply) {
        throw new Error('unexpected completion request');
      }
      return reply;
    }),
  };
  return { provider, calls };
}

function createToolService(
  tools: RemoteTool[],
  callTool: (name: string, payload: JsonObject) => Promise<unknown[]>,
) {
  return {
    listTools: vi.fn(async () => tools),
    callTool: vi.fn(callTool),
  } satisfies ToolExecutionService;
}

const history: ConversationMessage[] = [{ role: 'user', content: 'What is the weather in Paris?' }];

describe('Conversation Orchestrator', () => {
  it('answers in one round without a tool schema when the catalog is empty', async () => {
    const { provider, calls } = createFakeProvider([
      { textContent: 'Hello! I have no tools right now.', requestedCalls: [] },
    ]);
    const toolService = createToolService([], async () => []);

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(result).toEqual({ response: 'Hello! I have no tools right now.' });
    expect(calls).toHaveLength(1);
    expect(calls[0].tools).toBeUndefined();
    expect(calls[0].messages).toEqual([
      { role: 'system', content: TOOL_USE_PROMPT },
      { role: 'user', content: 'What is the weather in Paris?' },
    ]);
    expect(toolService.callTool).not.toHaveBeenCalled();
  });

  it('returns the text verbatim when the model requests no tools', async () => {
    const { provider, calls } = createFakeProvider([
      { textContent: 'Just chatting, **no tools** needed.', requestedCalls: [] },
    ]);
    const toolService = createToolService([weatherTool], async () => []);

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(result).toEqual({ response: 'Just chatting, **no tools** needed.' });
    expect(result.executionSummary).toBeUndefined();
    expect(calls[0].tools?.map(t => t.function.name)).toEqual(['getWeather']);
  });

  it('runs a single tool call and asks the model for a final answer', async () => {
    const { provider, calls } = createFakeProvider([
      {
        textContent: null,
        requestedCalls: [{ callId: 'call_1', toolName: 'getWeather', argumentsJson: '{"city":"Paris"}' }],
      },
      { textContent: 'It is 22C in Paris.', requestedCalls: [] },
    ]);
    const toolService = createToolService([weatherTool], async () => [{ type: 'text', text: '22C' }]);

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(result).toEqual({
      response: 'It is 22C in Paris.',
      executionSummary: {
        toolsExecuted: 1,
        successfulExecutions: 1,
        failedExecutions: 0,
        concurrentExecution: false,
      },
    });

    expect(calls[0].tools).toEqual([
      {
        type: 'function',
        function: {
          name: 'getWeather',
          description: 'Current weather for a city',
          parameters: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] },
        },
      },
    ]);

    expect(calls[1].tools).toBeUndefined();
    expect(calls[1].messages).toEqual([
      { role: 'system', content: TOOL_USE_PROMPT },
      { role: 'user', content: 'What is the weather in Paris?' },
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ callId: 'call_1', toolName: 'getWeather', arguments: { city: 'Paris' } }],
      },
      { role: 'tool', callId: 'call_1', content: '{"result":"22C"}' },
      { role: 'system', content: SUMMARY_PROMPT },
    ]);
  });

  it('runs several calls concurrently and counts a failed one', async () => {
    const { provider, calls } = createFakeProvider([
      {
        textContent: null,
        requestedCalls: [
          { callId: 'call_a', toolName: 'getWeather', argumentsJson: '{"city":"Paris"}' },
          { callId: 'call_b', toolName: 'getTime', argumentsJson: '{"city":"Paris"}' },
        ],
      },
      { textContent: 'Weather is 22C; I could not get the time.', requestedCalls: [] },
    ]);
    const toolService = createToolService([weatherTool, timeTool], async (name) => {
      if (name === 'getTime') {
        throw new Error('ECONNRESET');
      }
      return [{ type: 'text', text: '{"temp":22}' }];
    });

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(result.response).toBe('Weather is 22C; I could not get the time.');
    expect(result.executionSummary).toEqual({
      toolsExecuted: 2,
      successfulExecutions: 1,
      failedExecutions: 1,
      concurrentExecution: true,
    });

    const toolMessages = calls[1].messages.filter(m => m.role === 'tool');
    expect(toolMessages).toEqual([
      { role: 'tool', callId: 'call_a', content: '{"temp":22}' },
      { role: 'tool', callId: 'call_b', content: '{"error":"Failed to execute getTime: ECONNRESET"}' },
    ]);
  });

  it('still asks for a final answer when every call failed', async () => {
    const { provider, calls } = createFakeProvider([
      {
        textContent: null,
        requestedCalls: [{ callId: 'call_1', toolName: 'getWeather', argumentsJson: '{"city":"Paris"}' }],
      },
      { textContent: 'Sorry, the weather service is down.', requestedCalls: [] },
    ]);
    const toolService = createToolService([weatherTool], async () => {
      throw new Error('service unavailable');
    });

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(calls).toHaveLength(2);
    expect(result.response).toBe('Sorry, the weather service is down.');
    expect(result.executionSummary?.failedExecutions).toBe(1);
  });

  it('continues without tools when the catalog cannot be fetched', async () => {
    const { provider, calls } = createFakeProvider([
      { textContent: 'Answering without tools.', requestedCalls: [] },
    ]);
    const toolService: ToolExecutionService = {
      listTools: async () => {
        throw new Error('connection refused');
      },
      callTool: async () => [],
    };

    const result = await new ConversationOrchestrator({ provider, toolService }).run(history);

    expect(result).toEqual({ response: 'Answering without tools.' });
    expect(calls[0].tools).toBeUndefined();
  });

  it('propagates an inference failure', async () => {
    const provider: InferenceProvider = {
      name: 'fake',
      complete: async () => {
        throw new Error('inference unreachable');
      },
    };
    const toolService = createToolService([], async () => []);

    await expect(new ConversationOrchestrator({ provider, toolService }).run(history)).rejects.toThrow(
      'inference unreachable',
    );
  });
});

describe('summarizeOutcomes', () => {
  it('counts an empty batch as no execution', () => {
    expect(summarizeOutcomes([])).toEqual({
      toolsExecuted: 0,
      successfulExecutions: 0,
      failedExecutions: 0,
      concurrentExecution: false,
    });
  });
});
