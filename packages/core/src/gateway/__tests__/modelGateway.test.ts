import { describe, expect, jest, test } from '@jest/globals';

import type { RuntimeSettings } from '../../config/settings.js';
import { GatewayError } from '../../errors.js';
import {
  LOCAL_STOP_SEQUENCES,
  createModelGateway,
  isReasoningModel,
  type GenerateTextFn,
  type ModelFactory,
} from '../modelGateway.js';

const localSettings = (model: string): RuntimeSettings => ({
  backend: { mode: 'local', model, host: 'http://localhost:11434' },
  timeoutMs: undefined,
  maxRetries: undefined,
  debug: false,
});

const apiSettings = (apiKey: string | null): RuntimeSettings => ({
  backend: { mode: 'api', provider: 'groq', model: 'gemma2-9b-it', apiKey },
  timeoutMs: 20000,
  maxRetries: 2,
  debug: false,
});

function fakes(text = 'ok') {
  const generateText = jest.fn<GenerateTextFn>().mockResolvedValue({ text });
  const createModel = jest.fn<ModelFactory>(() => 'fake-model');
  return { generateText, createModel };
}

describe('createModelGateway', () => {
  test('caps tokens and adds stop sequences for local models', async () => {
    const { generateText, createModel } = fakes('🛠️ Command: ls');
    const gateway = createModelGateway(localSettings('llama3:8b'), { generateText, createModel });

    await expect(gateway.generate('prompt text', 512)).resolves.toBe('🛠️ Command: ls');
    expect(gateway.label).toBe('local:llama3:8b');
    expect(generateText).toHaveBeenCalledWith({
      model: 'fake-model',
      prompt: 'prompt text',
      temperature: 0.1,
      maxOutputTokens: 512,
      stopSequences: [...LOCAL_STOP_SEQUENCES],
    });
  });

  test('leaves local reasoning models uncapped', async () => {
    const { generateText, createModel } = fakes();
    const gateway = createModelGateway(localSettings('deepseek-r1:7b'), { generateText, createModel });

    await gateway.generate('p', 1024);

    expect(generateText).toHaveBeenCalledWith({ model: 'fake-model', prompt: 'p', temperature: 0.1 });
  });

  test('applies retries and a timeout for hosted providers', async () => {
    const { generateText, createModel } = fakes();
    const gateway = createModelGateway(apiSettings('test-secret'), { generateText, createModel });

    await gateway.generate('p', 1024);

    const [request] = generateText.mock.calls[0];
    expect(request.maxOutputTokens).toBe(1024);
    expect(request.stopSequences).toBeUndefined();
    expect(request.maxRetries).toBe(2);
    expect(request.abortSignal).toBeInstanceOf(AbortSignal);
  });

  test('resolves the model once per gateway', async () => {
    const { generateText, createModel } = fakes();
    const gateway = createModelGateway(localSettings('llama3'), { generateText, createModel });

    await gateway.generate('a', 10);
    await gateway.generate('b', 10);

    expect(createModel).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  test('wraps provider failures with the backend label', async () => {
    const generateText = jest.fn<GenerateTextFn>().mockRejectedValue(new Error('socket hang up'));
    const gateway = createModelGateway(localSettings('llama3'), {
      generateText,
      createModel: () => 'fake-model',
    });

    const failure = gateway.generate('p', 10);
    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toThrow('Generation failed (local:llama3): socket hang up');
  });

  test('reports a missing key without calling the provider', async () => {
    const generateText = jest.fn<GenerateTextFn>();
    const gateway = createModelGateway(apiSettings(null), { generateText });

    await expect(gateway.generate('p', 10)).rejects.toThrow(
      'No API key configured for groq. Set GROQ_API_KEY and retry.',
    );
    expect(generateText).not.toHaveBeenCalled();
  });
});

describe('isReasoningModel', () => {
  test.each([
    ['deepseek-r1:7b', true],
    ['qwq-think', true],
    ['llama3:8b-instruct-q4_1', false],
  ])('%s → %s', (model, expected) => {
    expect(isReasoningModel(model)).toBe(expected);
  });
});
