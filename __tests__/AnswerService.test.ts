import { SYSTEM_PROMPT, buildContext, buildPrompt } from '../services/AnswerService';
import { RetrievalResult } from '../types';
import { makeChunk } from './helpers';

function result(documentName: string, pageNumber: number | null, index: number, text: string): RetrievalResult {
  return {
    chunk: makeChunk(documentName, pageNumber, index, text),
    fusedScore: 1,
    lexicalScore: 1,
    semanticScore: 1,
    lexicalRank: index,
    semanticRank: index,
    rawLexicalScore: 1,
    rawSemanticScore: 1
  };
}

describe('AnswerService prompt', () => {
  const context = [result('a.pdf', 2, 0, 'Alpha text.'), result('b.pdf', null, 1, 'Beta text.')];

  it('should label each passage with its source and page', () => {
    expect(buildContext(context)).toBe(
      '[Source 1: a.pdf, page 2]\nAlpha text.\n\n[Source 2: b.pdf, page unknown]\nBeta text.\n'
    );
  });

  it('should place the context between the instructions and the question', () => {
    const prompt = buildPrompt('What is alpha?', context);

    expect(prompt.startsWith(SYSTEM_PROMPT)).toBe(true);
    expect(prompt.endsWith('Question: What is alpha?\n\nAnswer:')).toBe(true);
    expect(prompt).toContain('Context from documents:\n[Source 1: a.pdf, page 2]');
  });
});
