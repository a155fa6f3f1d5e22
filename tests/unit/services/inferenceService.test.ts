import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type { DescriptiveStats, SchemaDescription } from '../../../src/ai/types.js';

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const { createInferenceService, parseJsonReply } = await import('../../../src/services/inferenceService.js');
const { AIError, TimeoutError } = await import('../../../src/utils/errors.js');

// ── Helpers ──────────────────────────────────────────────────────────

type Completion = { choices: Array<{ message: { content: string | null } }> };

interface MockOpenAI {
  chat: {
    completions: {
      create: jest.Mock<(body: unknown, options?: unknown) => Promise<Completion>>;
    };
  };
}

function createMockOpenAI(content: string | null): MockOpenAI {
  return {
    chat: {
      completions: {
        create: jest
          .fn<(body: unknown, options?: unknown) => Promise<Completion>>()
          .mockResolvedValue({ choices: [{ message: { content } }] }),
      },
    },
  };
}

const schema: SchemaDescription = {
  connectionId: 'default',
  version: 'v1',
  tables: [{ name: 'sales', columns: [{ name: 'amount', dataType: 'numeric' }] }],
};

const stats: DescriptiveStats = {
  rowCount: 1,
  columnCount: 1,
  numeric: {},
  categorical: {},
  chunked: false,
  chunkCount: 1,
  quality: { duplicateRows: 0, duplicatePercentage: 0, missingPercentage: {}, score: 100 },
};

describe('createInferenceService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('inferSql', () => {
    it('returns the SQL and explanation from a JSON reply', async () => {
      const openai = createMockOpenAI(
        JSON.stringify({ sql: 'SELECT SUM(amount) AS total FROM sales', explanation: 'Total amount' }),
      );
      const service = createInferenceService({ openai: openai as never, model: 'test-model', timeoutMs: 5000 });

      const candidate = await service.inferSql('  What is the total amount? ', schema);

      expect(candidate).toEqual({ sql: 'SELECT SUM(amount) AS total FROM sales', explanation: 'Total amount' });
      expect(openai.chat.completions.create).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'test-model',
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: expect.stringContaining('### sales\nColumns: amount (numeric)') },
            { role: 'user', content: 'What is the total amount?' },
          ],
        }),
        { timeout: 5000 },
      );
    });

    it('accepts a reply wrapped in a code fence', async () => {
      const openai = createMockOpenAI('```json\n{"sql": "SELECT amount FROM sales"}\n```');
      const service = createInferenceService({ openai: openai as never });

      expect(await service.inferSql('amounts', schema)).toEqual({
        sql: 'SELECT amount FROM sales',
        explanation: '',
      });
    });

    it('fails when the reply has no sql field', async () => {
      const service = createInferenceService({
        openai: createMockOpenAI(JSON.stringify({ explanation: 'nothing' })) as never,
      });

      await expect(service.inferSql('amounts', schema)).rejects.toThrow(
        'AI response missing required "sql" field',
      );
    });

    it('fails on an empty reply', async () => {
      const service = createInferenceService({ openai: createMockOpenAI(null) as never });

      await expect(service.inferSql('amounts', schema)).rejects.toThrow('OpenAI returned an empty response');
    });

    it('wraps transport errors in AIError', async () => {
      const openai = createMockOpenAI('{}');
      openai.chat.completions.create.mockRejectedValueOnce(new Error('socket hang up'));
      const service = createInferenceService({ openai: openai as never });

      const attempt = service.inferSql('amounts', schema);
      await expect(attempt).rejects.toBeInstanceOf(AIError);
      await expect(attempt).rejects.toThrow('Failed to get response from OpenAI');
    });

    it('times out a completion that never returns', async () => {
      const openai = createMockOpenAI('{}');
      openai.chat.completions.create.mockImplementationOnce(() => new Promise<Completion>(() => undefined));
      const service = createInferenceService({ openai: openai as never, timeoutMs: 20 });

      await expect(service.inferSql('amounts', schema)).rejects.toBeInstanceOf(TimeoutError);
    });
  });

  describe('inferAnalysisNarrative', () => {
    it('returns the trimmed narrative', async () => {
      const service = createInferenceService({
        openai: createMockOpenAI(JSON.stringify({ narrative: '  Revenue grew steadily.  ' })) as never,
      });

      expect(await service.inferAnalysisNarrative({ columns: ['a'], rows: [[1]] }, stats)).toBe(
        'Revenue grew steadily.',
      );
    });

    it('fails when the narrative field is missing', async () => {
      const service = createInferenceService({ openai: createMockOpenAI('{"text": "x"}') as never });

      await expect(service.inferAnalysisNarrative({ columns: ['a'], rows: [[1]] }, stats)).rejects.toThrow(
        'AI response missing required "narrative" field',
      );
    });
  });
});

describe('parseJsonReply', () => {
  it('rejects invalid JSON', () => {
    expect(() => parseJsonReply('not json')).toThrow(
      'Failed to parse AI response as JSON. The AI returned invalid output.',
    );
  });

  it('rejects a JSON array', () => {
    expect(() => parseJsonReply('[1, 2]')).toThrow('AI response is not a valid JSON object');
  });
});
