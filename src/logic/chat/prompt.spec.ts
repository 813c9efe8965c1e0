import { fragmentRecord } from '../../testing/fragments';
import { DepartmentTag, Role } from '../../utils/types';
import { ASSISTANT_SYSTEM, buildPromptContext, truncate } from './prompt';

describe('buildPromptContext', () => {
  it('puts fragments and the question in the user message and prior turns in history', () => {
    const context = buildPromptContext(
      Role.FINANCE,
      'And Q2?',
      [{ fragment: fragmentRecord('fin-1', DepartmentTag.FINANCE, 'Q2 revenue was 12M.'), score: 0.9 }],
      [
        {
          id: 't1',
          query: 'Q1 revenue?',
          answer: '10M.',
          sources: [],
          createdAt: new Date('2024-01-01T00:00:00.000Z'),
        },
      ],
      400,
    );

    expect(context.system).toBe(ASSISTANT_SYSTEM);
    expect(context.history).toEqual([
      { role: 'user', content: 'Q1 revenue?' },
      { role: 'assistant', content: '10M.' },
    ]);
    expect(context.user).toBe(
      'User role: finance\nQuestion: And Q2?\n\nContext from company documents:\n[1] Source: fin-1.md (finance)\nQ2 revenue was 12M.',
    );
  });
});

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncate('abcde fghij', 6)).toBe('abcde...');
  });
});
