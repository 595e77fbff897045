/**
 * OpenAILLM - Provider de LLM usando OpenAI
 *
 * Suporta:
 * - Chat Completions com streaming (resposta falada frase a frase)
 * - Chat Completions sem streaming (resumo da chamada)
 * - Endpoints compatíveis com a API da OpenAI (baseUrl)
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage, ILLM, LLMResponse, OpenAIConfig } from '../types';
import { Logger } from '../utils/Logger';

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;
  private config: OpenAIConfig;
  private logger: Logger;

  constructor(config: OpenAIConfig) {
    this.config = config;
    this.logger = new Logger('OpenAI-LLM');
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  }

  /**
   * Gera resposta do LLM
   */
  async generate(
    messages: ChatMessage[],
    options?: { maxTokens?: number; temperature?: number }
  ): Promise<LLMResponse> {
    const startTime = Date.now();
    this.logger.debug(`🤖 Gerando resposta (${messages.length} mensagens)...`);

    const response = await this.client.chat.completions.create({
      model: this.config.llmModel,
      messages: messages.map(toOpenAIMessage),
      max_tokens: options?.maxTokens ?? this.config.maxTokens,
      temperature: options?.temperature ?? this.config.temperature,
      stream: false,
    });

    const choice = response.choices[0];
    const result: LLMResponse = {
      text: choice?.message.content ?? '',
      finishReason: choice?.finish_reason ?? 'stop',
      usage: response.usage ? {
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens,
      } : undefined,
    };

    this.logger.info(`✅ LLM (${Date.now() - startTime}ms, ${result.usage?.totalTokens ?? 0} tokens)`);
    return result;
  }

  /**
   * Gera resposta com streaming: cada delta não vazio é entregue assim que chega.
   * Abortar o signal cancela a requisição HTTP.
   */
  async *generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    const startTime = Date.now();
    this.logger.debug(`🤖 Gerando resposta com stream...`);

    const stream = await this.client.chat.completions.create(
      {
        model: this.config.llmModel,
        messages: messages.map(toOpenAIMessage),
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        stream: true,
      },
      { signal }
    );

    let characters = 0;
    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content ?? '';
      if (content) {
        characters += content.length;
        yield content;
      }
    }

    this.logger.debug(`✅ LLM Stream (${Date.now() - startTime}ms, ${characters} chars)`);
  }
}
