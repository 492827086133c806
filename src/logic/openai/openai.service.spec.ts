import { Test, TestingModule } from '@nestjs/testing';
import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai/error';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { OpenAISettings } from '../../config/settings';
import { CompletionError, ConfigurationError } from '../../utils/errors';
import { COMPLETION_CLIENT_FACTORY, CompletionClientOptions } from './openai.client';
import { OpenAIService } from './openai.service';

function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-test',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

const settings: OpenAISettings = {
  endpoint: 'https://my-resource.openai.azure.com',
  apiKey: 'test-key',
  deployment: 'gpt-test',
  apiVersion: '2024-06-01',
  temperature: 0,
  maxTokens: 1000,
  timeoutMs: 60000,
  maxRetries: 0,
};

describe('OpenAIService', () => {
  let service: OpenAIService;
  const create = jest.fn<Promise<ChatCompletion>, [ChatCompletionCreateParamsNonStreaming]>();
  const factory = jest.fn((_options: CompletionClientOptions) => ({ chat: { completions: { create } } }));

  beforeEach(async () => {
    create.mockReset();
    factory.mockClear();
    const module: TestingModule = await Test.createTestingModule({
      providers: [OpenAIService, { provide: COMPLETION_CLIENT_FACTORY, useValue: factory }],
    }).compile();

    service = module.get<OpenAIService>(OpenAIService);
  });

  describe('complete', () => {
    it('sends the conversation to the deployment and returns the text', async () => {
      create.mockResolvedValue(completion('สวัสดีครับ'));

      const text = await service.complete(settings, [
        { role: 'system', content: 'be helpful' },
        { role: 'user', content: 'สวัสดี' },
      ]);

      expect(text).toBe('สวัสดีครับ');
      expect(factory).toHaveBeenCalledWith({
        endpoint: 'https://my-resource.openai.azure.com',
        apiKey: 'test-key',
        deployment: 'gpt-test',
        apiVersion: '2024-06-01',
        timeout: 60000,
        maxRetries: 0,
      });
      expect(create).toHaveBeenCalledWith({
        model: 'gpt-test',
        messages: [
          { role: 'system', content: 'be helpful' },
          { role: 'user', content: 'สวัสดี' },
        ],
        temperature: 0,
        max_tokens: 1000,
      });
    });

    it('fails with a configuration error before creating a client', async () => {
      await expect(service.complete({ ...settings, apiKey: undefined }, [{ role: 'user', content: 'hi' }]))
        .rejects.toBeInstanceOf(ConfigurationError);
      expect(factory).not.toHaveBeenCalled();
      expect(create).not.toHaveBeenCalled();
    });

    it('reports client options the SDK rejects as a configuration error', async () => {
      factory.mockImplementationOnce(() => {
        throw new Error('maxRetries must be a positive integer');
      });

      const err = await service.complete({ ...settings, maxRetries: -1 }, [{ role: 'user', content: 'hi' }])
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.message).toBe('Azure OpenAI settings are invalid: maxRetries must be a positive integer');
        expect(err.getStatus()).toBe(412);
      }
      expect(create).not.toHaveBeenCalled();
    });

    it('wraps authentication failures', async () => {
      create.mockRejectedValue(new APIError(401, undefined, 'Unauthorized', undefined));

      const err = await service.complete(settings, [{ role: 'user', content: 'hi' }]).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CompletionError);
      if (err instanceof CompletionError) {
        expect(err.detail).toBe('Authentication failed (401). Check your API key.');
        expect(err.message).toBe('เกิดข้อผิดพลาด: Authentication failed (401). Check your API key.');
        expect(err.upstreamStatus).toBe(401);
      }
    });

    it('treats an empty completion as a failure', async () => {
      create.mockResolvedValue(completion(null));

      await expect(service.complete(settings, [{ role: 'user', content: 'hi' }]))
        .rejects.toBeInstanceOf(CompletionError);
    });
  });

  describe('testConnection', () => {
    it('reports success', async () => {
      create.mockResolvedValue(completion('Hi'));

      await expect(service.testConnection(settings)).resolves.toEqual({
        service: 'openai',
        ok: true,
        message: 'Connection successful',
      });
      expect(factory).toHaveBeenCalledWith(expect.objectContaining({ timeout: 10000, maxRetries: 0 }));
      expect(create).toHaveBeenCalledWith({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'Hello' }],
        max_tokens: 10,
      });
    });

    it.each([
      [new APIError(404, undefined, 'Not Found', undefined), "Resource not found (404). Check deployment name 'gpt-test' and endpoint URL."],
      [new APIError(403, undefined, 'Forbidden', undefined), 'Access forbidden (403). Check your API key permissions.'],
      [new APIConnectionTimeoutError(), 'Connection timeout. Check your network connection.'],
      [new APIConnectionError({ message: 'socket hang up' }), 'Connection error. Check your endpoint URL.'],
    ])('explains %p', async (error, message) => {
      create.mockRejectedValue(error);

      await expect(service.testConnection(settings)).resolves.toEqual({ service: 'openai', ok: false, message });
    });

    it('reports missing configuration without a request', async () => {
      const check = await service.testConnection({ ...settings, endpoint: undefined });

      expect(check.ok).toBe(false);
      expect(check.message).toBe('Azure OpenAI is not configured. Missing required configuration: AZURE_OAI_ENDPOINT');
      expect(create).not.toHaveBeenCalled();
    });
  });
});
