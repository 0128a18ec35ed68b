/**
 * SQL Assistant
 * Turns an English question into a PostgreSQL query with the OpenAI chat completions API
 */

import OpenAI from 'openai';
import { AssistantError, ConfigurationError, getLogger, Logger } from '../lib/error-handler';
import type { AssistantConfig } from '../lib/environment-config';

/** The one OpenAI call the assistant makes */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface SqlAssistantOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface GeneratedQuery {
  question: string;
  sql: string;
  model: string;
}

export const SYSTEM_PROMPT =
  'You are a PostgreSQL expert who generates accurate SQL queries based on natural language questions.';

const REQUIREMENTS = [
  'Generate ONLY the SQL query that I can directly use. No other response.',
  'Use proper JOINs to get descriptive names from lookup tables',
  'Use appropriate aggregations (COUNT, AVG, SUM, etc.) when needed',
  'Add LIMIT clauses for queries that might return many rows (default LIMIT 100)',
  'Use proper date/time functions for TIMESTAMP columns',
  'Make sure the query is syntactically correct for PostgreSQL',
  'Add helpful column aliases using AS'
];

const DEFAULT_OPTIONS: SqlAssistantOptions = {
  model: 'gpt-4o-mini',
  temperature: 0.1,
  maxTokens: 1000
};

export function buildUserPrompt(schemaDescription: string, question: string): string {
  const requirements = REQUIREMENTS.map((requirement, i) => `${i + 1}. ${requirement}`).join('\n');

  return `You are a PostgreSQL expert. Given the following database schema and a user's question, generate a valid PostgreSQL query.

${schemaDescription}

User Question: ${question}

Requirements:
${requirements}

Generate the SQL query:`;
}

/**
 * Strips a markdown code fence (```sql ... ```) from a model reply
 */
export function extractSql(reply: string): string {
  return reply.replace(/^```[a-z]*\s*|\s*```$/gim, '').trim();
}

export class SqlAssistant {
  private readonly options: SqlAssistantOptions;
  private readonly logger: Logger;

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly schemaDescription: string,
    options: Partial<SqlAssistantOptions> = {},
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger ?? getLogger();
  }

  static fromConfig(config: AssistantConfig, schemaDescription: string, logger?: Logger): SqlAssistant {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for the query assistant', 'CONFIG_MISSING_OPENAI_KEY');
    }
    return new SqlAssistant(new OpenAI({ apiKey: config.apiKey }), schemaDescription, { model: config.model }, logger);
  }

  async generateSql(question: string): Promise<GeneratedQuery> {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new AssistantError('Question is empty', 'ASSISTANT_EMPTY_QUESTION');
    }

    this.logger.debug('Requesting SQL from the assistant', { model: this.options.model, question: trimmed });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(this.schemaDescription, trimmed) }
        ],
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens
      });
    } catch (error) {
      throw new AssistantError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        'ASSISTANT_REQUEST_FAILED',
        { model: this.options.model },
        error
      );
    }

    const content = completion.choices[0]?.message.content ?? '';
    const sql = extractSql(content);
    if (sql.length === 0) {
      throw new AssistantError('The assistant returned no SQL', 'ASSISTANT_EMPTY_REPLY', { model: this.options.model });
    }

    return { question: trimmed, sql, model: this.options.model };
  }
}
