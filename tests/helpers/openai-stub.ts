/**
 * Chat completion fixtures for the SQL assistant
 */

import type OpenAI from 'openai';
import type { ChatCompletionClient } from '../../src/assistant/sql-generator';

export function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null }
      }
    ]
  };
}

export type CreateCompletion = jest.Mock<
  Promise<OpenAI.Chat.ChatCompletion>,
  [OpenAI.Chat.ChatCompletionCreateParamsNonStreaming]
>;

export function stubClient(create: CreateCompletion): ChatCompletionClient {
  return { chat: { completions: { create } } };
}
