import { describe, it, expect } from 'vitest';
import { reflect } from '../reflect.js';
import { ProviderQuotaExceededError } from '../../errors/index.js';
import { createFakeLLM, createMockLogger } from '../../test-utils/fakes.js';

describe('reflect', () => {
  it('returns follow-up queries when evidence is insufficient', async () => {
    const llm = createFakeLLM([
      [
        'reviewing research notes',
        '{"isSufficient": false, "knowledgeGap": "no hardware details", "followUpQueries": ["qubit hardware", "Qubit hardware", "error rates"]}',
      ],
    ]);

    const result = await reflect(llm, '[1] Basics: qubits', 'What is quantum computing?', 1, {
      maxFollowUps: 3,
    });

    expect(result).toEqual({
      isSufficient: false,
      knowledgeGap: 'no hardware details',
      followUpQueries: ['qubit hardware', 'error rates'],
    });
    expect(llm.generate.mock.calls[0]?.[0]).toContain('after 1 research round(s)');
  });

  it('ignores follow-ups once sufficient', async () => {
    const llm = createFakeLLM([], '{"isSufficient": true, "followUpQueries": ["more"]}');

    await expect(reflect(llm, 'notes', 'q', 1)).resolves.toEqual({
      isSufficient: true,
      knowledgeGap: '',
      followUpQueries: [],
    });
  });

  it('treats malformed output as sufficient', async () => {
    const logger = createMockLogger();
    const llm = createFakeLLM([], '{"sufficient": "maybe"}');

    await expect(reflect(llm, 'notes', 'q', 2, { logger })).resolves.toEqual({
      isSufficient: true,
      knowledgeGap: '',
      followUpQueries: [],
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'reflection: Model output does not match the expected schema; treating evidence as sufficient'
    );
  });

  it('propagates provider errors', async () => {
    const llm = createFakeLLM([
      [
        'reviewing',
        () => {
          throw new ProviderQuotaExceededError('fake');
        },
      ],
    ]);

    await expect(reflect(llm, 'notes', 'q', 1)).rejects.toBeInstanceOf(ProviderQuotaExceededError);
  });
});
