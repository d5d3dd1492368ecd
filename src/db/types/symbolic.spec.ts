import { DECAY_STATE } from './enums.js';
import { toDecayState } from './symbolic.js';

describe('toDecayState', () => {
  it('labels decay by its upper bounds', () => {
    expect([0, 0.4, 0.41, 0.7, 0.71, 1].map(toDecayState)).toEqual([
      'STABLE',
      'STABLE',
      'STRAINED',
      'STRAINED',
      'DISTORTED',
      'DISTORTED',
    ]);
  });

  it('only returns declared states', () => {
    expect(DECAY_STATE).toEqual(['STABLE', 'STRAINED', 'DISTORTED']);
  });
});
