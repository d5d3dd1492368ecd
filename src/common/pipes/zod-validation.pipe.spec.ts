import { InvalidInputError } from '../errors/game-errors.js';
import { SubmitTurnBodySchema, UndoBodySchema } from '../../turns/dto/submit-turn.dto.js';
import { ZodValidationPipe } from './zod-validation.pipe.js';

function rejectionOf(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err;
    throw err;
  }
  throw new Error('expected an InvalidInputError');
}

describe('ZodValidationPipe', () => {
  it('returns the parsed value', () => {
    const pipe = new ZodValidationPipe(SubmitTurnBodySchema);
    expect(pipe.transform({ text: '  a bard  ', expectedTurnNo: 2 }, { type: 'body' })).toEqual({
      text: 'a bard',
      expectedTurnNo: 2,
    });
  });

  it('names the request part and every offending path', () => {
    const pipe = new ZodValidationPipe(SubmitTurnBodySchema);
    const error = rejectionOf(() =>
      pipe.transform({ text: '   ', expectedTurnNo: -1 }, { type: 'body' }),
    );

    expect(error.message).toBe('Invalid request body');
    expect(error.httpStatus).toBe(422);
    expect(error.details).toEqual({
      source: 'body',
      issues: [
        { path: 'text', message: expect.any(String) },
        { path: 'expectedTurnNo', message: expect.any(String) },
      ],
    });
  });

  it('reports a wrong top-level type at the root', () => {
    const pipe = new ZodValidationPipe(UndoBodySchema);
    const error = rejectionOf(() => pipe.transform('undo', { type: 'query' }));
    expect(error.details).toEqual({
      source: 'query',
      issues: [{ path: '(root)', message: expect.any(String) }],
    });
  });
});
