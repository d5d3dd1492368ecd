import { GEMINI_MIN_OUTPUT_TOKENS, geminiOutputBudget } from './gemini.provider.js';

describe('geminiOutputBudget', () => {
  it('raises small extraction limits to the thinking floor', () => {
    expect(geminiOutputBudget(256)).toBe(GEMINI_MIN_OUTPUT_TOKENS);
    expect(GEMINI_MIN_OUTPUT_TOKENS).toBe(8192);
  });

  it('keeps limits above the floor', () => {
    expect(geminiOutputBudget(12000)).toBe(12000);
  });
});
