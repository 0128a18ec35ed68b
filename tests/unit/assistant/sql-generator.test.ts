/**
 * SQL Assistant Tests
 * Prompt assembly and reply handling against a stubbed chat completions client
 */

import {
  buildUserPrompt,
  extractSql,
  SqlAssistant,
  SYSTEM_PROMPT
} from '../../../src/assistant/sql-generator';
import { AssistantError, ConfigurationError } from '../../../src/lib/error-handler';
import { completion, stubClient, type CreateCompletion } from '../../helpers/openai-stub';

const SCHEMA = 'Database Schema:\n- customer(\n        id BIGINT NOT NULL PRIMARY KEY\n        )';

describe('SQL Assistant', () => {
  describe('extractSql', () => {
    test.each([
      ['```sql\nSELECT 1;\n```', 'SELECT 1;'],
      ['```\nSELECT *\nFROM customer\n```', 'SELECT *\nFROM customer'],
      ['  SELECT id FROM customer  ', 'SELECT id FROM customer'],
      ['```sql\n```', '']
    ])('should clean %j', (reply, expected) => {
      expect(extractSql(reply)).toBe(expected);
    });
  });

  describe('buildUserPrompt', () => {
    test('should place the schema, question and numbered requirements', () => {
      const prompt = buildUserPrompt(SCHEMA, 'How many customers are there?');

      expect(prompt).toContain(`\n\n${SCHEMA}\n\nUser Question: How many customers are there?\n\nRequirements:\n1. Generate ONLY`);
      expect(prompt).toContain('\n4. Add LIMIT clauses for queries that might return many rows (default LIMIT 100)\n');
      expect(prompt).toContain('\n7. Add helpful column aliases using AS\n\nGenerate the SQL query:');
    });
  });

  describe('generateSql', () => {
    let create: CreateCompletion;

    beforeEach(() => {
      create = jest.fn();
    });

    test('should send the prompt and return the cleaned SQL', async () => {
      create.mockResolvedValue(completion('```sql\nSELECT COUNT(*) AS customer_count FROM customer;\n```'));
      const assistant = new SqlAssistant(stubClient(create), SCHEMA);

      const generated = await assistant.generateSql('  How many customers are there?  ');

      expect(generated).toEqual({
        question: 'How many customers are there?',
        sql: 'SELECT COUNT(*) AS customer_count FROM customer;',
        model: 'gpt-4o-mini'
      });
      expect(create).toHaveBeenCalledWith({
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(SCHEMA, 'How many customers are there?') }
        ],
        temperature: 0.1,
        max_tokens: 1000
      });
    });

    test('should honour a configured model', async () => {
      create.mockResolvedValue(completion('SELECT 1'));
      const assistant = new SqlAssistant(stubClient(create), SCHEMA, { model: 'gpt-4o' });

      await expect(assistant.generateSql('anything')).resolves.toMatchObject({ model: 'gpt-4o' });
      expect(create.mock.calls[0][0].model).toBe('gpt-4o');
    });

    test('should reject an empty question without calling the API', async () => {
      const assistant = new SqlAssistant(stubClient(create), SCHEMA);

      await expect(assistant.generateSql('   ')).rejects.toMatchObject({ errorCode: 'ASSISTANT_EMPTY_QUESTION' });
      expect(create).not.toHaveBeenCalled();
    });

    test('should wrap request failures', async () => {
      create.mockRejectedValue(new Error('401 Incorrect API key provided'));
      const assistant = new SqlAssistant(stubClient(create), SCHEMA);

      const failure = assistant.generateSql('How many customers?');
      await expect(failure).rejects.toBeInstanceOf(AssistantError);
      await expect(failure).rejects.toMatchObject({
        errorCode: 'ASSISTANT_REQUEST_FAILED',
        message: 'OpenAI request failed: 401 Incorrect API key provided'
      });
    });

    test.each([null, '```sql\n```'])('should reject a reply of %j', async content => {
      create.mockResolvedValue(completion(content));
      const assistant = new SqlAssistant(stubClient(create), SCHEMA);

      await expect(assistant.generateSql('How many customers?')).rejects.toMatchObject({
        errorCode: 'ASSISTANT_EMPTY_REPLY'
      });
    });
  });

  describe('fromConfig', () => {
    test('should require an API key', () => {
      expect(() => SqlAssistant.fromConfig({ apiKey: null, model: 'gpt-4o-mini' }, SCHEMA)).toThrow(ConfigurationError);
    });

    test('should build an assistant when a key is present', () => {
      expect(SqlAssistant.fromConfig({ apiKey: 'test-key', model: 'gpt-4o-mini' }, SCHEMA)).toBeInstanceOf(SqlAssistant);
    });
  });
});
