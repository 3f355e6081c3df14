/**
 * Model gateway: turns a prompt into completion text through the Vercel AI
 * SDK, against either a local Ollama server or a hosted provider.
 *
 * The language model is resolved on first use and memoized per gateway, so
 * constructing a gateway never fails even when credentials are missing.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type LanguageModel } from 'ai';

import { MODEL_TEMPERATURE } from '../constants.js';
import type { BackendSettings, RuntimeSettings } from '../config/settings.js';
import { describeBackend } from '../config/settings.js';
import { GatewayError, describeError } from '../errors.js';
import {
  PROVIDER_CATALOG,
  apiKeyVariable,
  findProvider,
  type ProviderCatalog,
} from './providerCatalog.js';

export const LOCAL_STOP_SEQUENCES: readonly string[] = ['\n\n\n', 'USER QUERY:'];

const REASONING_MODEL_HINTS = ['deepseek', 'r1', 'think', 'expert'];

export interface ModelGateway {
  readonly label: string;
  generate(prompt: string, maxTokens: number): Promise<string>;
}

export interface TextGenerationRequest {
  model: LanguageModel;
  prompt: string;
  temperature: number;
  maxOutputTokens?: number;
  stopSequences?: string[];
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

export type GenerateTextFn = (request: TextGenerationRequest) => Promise<{ text: string }>;

export type ModelFactory = (backend: BackendSettings, catalog: ProviderCatalog) => LanguageModel;

export interface ModelGatewayDependencies {
  generateText?: GenerateTextFn;
  createModel?: ModelFactory;
  catalog?: ProviderCatalog;
}

const defaultGenerateText: GenerateTextFn = async (request) => {
  const result = await generateText(request);
  return { text: result.text };
};

export function isReasoningModel(model: string): boolean {
  const normalized = model.toLowerCase();
  return REASONING_MODEL_HINTS.some((hint) => normalized.includes(hint));
}

export const createLanguageModel: ModelFactory = (backend, catalog) => {
  const label = describeBackend(backend);

  if (backend.mode === 'local') {
    const ollama = createOpenAI({ baseURL: `${backend.host}/v1`, apiKey: 'ollama' });
    return ollama.chat(backend.model);
  }

  const entry = findProvider(backend.provider, catalog);
  if (!entry) {
    throw new GatewayError(label, `Unknown provider "${backend.provider}".`);
  }
  if (!backend.apiKey) {
    throw new GatewayError(
      label,
      `No API key configured for ${backend.provider}. Set ${apiKeyVariable(backend.provider)} and retry.`,
    );
  }

  switch (entry.kind) {
    case 'anthropic':
      return createAnthropic({ apiKey: backend.apiKey })(backend.model);
    case 'google':
      return createGoogleGenerativeAI({ apiKey: backend.apiKey })(backend.model);
    case 'openai-compatible':
      return createOpenAI({ apiKey: backend.apiKey, baseURL: entry.baseURL }).chat(backend.model);
  }
};

function buildRequest(
  settings: RuntimeSettings,
  model: LanguageModel,
  prompt: string,
  maxTokens: number,
): TextGenerationRequest {
  const request: TextGenerationRequest = {
    model,
    prompt,
    temperature: MODEL_TEMPERATURE,
  };

  const { backend } = settings;
  const reasoningLocal = backend.mode === 'local' && isReasoningModel(backend.model);
  if (!reasoningLocal) {
    request.maxOutputTokens = maxTokens;
  }
  if (backend.mode === 'local' && !reasoningLocal) {
    request.stopSequences = [...LOCAL_STOP_SEQUENCES];
  }
  if (typeof settings.maxRetries === 'number') {
    request.maxRetries = settings.maxRetries;
  }
  if (typeof settings.timeoutMs === 'number') {
    request.abortSignal = AbortSignal.timeout(settings.timeoutMs);
  }

  return request;
}

export function createModelGateway(
  settings: RuntimeSettings,
  deps: ModelGatewayDependencies = {},
): ModelGateway {
  const generate = deps.generateText ?? defaultGenerateText;
  const createModel = deps.createModel ?? createLanguageModel;
  const catalog = deps.catalog ?? PROVIDER_CATALOG;
  const label = describeBackend(settings.backend);
  let memoizedModel: LanguageModel | null = null;

  const resolveModel = (): LanguageModel => {
    if (!memoizedModel) {
      memoizedModel = createModel(settings.backend, catalog);
    }
    return memoizedModel;
  };

  return {
    label,
    async generate(prompt: string, maxTokens: number): Promise<string> {
      try {
        const model = resolveModel();
        const result = await generate(buildRequest(settings, model, prompt, maxTokens));
        return result.text;
      } catch (error) {
        if (error instanceof GatewayError) {
          throw error;
        }
        throw new GatewayError(label, `Generation failed (${label}): ${describeError(error)}`, {
          cause: error,
        });
      }
    },
  };
}

export default {
  createModelGateway,
  createLanguageModel,
  isReasoningModel,
};
