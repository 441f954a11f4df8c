import { describe, expect, it } from 'vitest';

import { buildAttemptFeedback, feedbackToneFor } from '@/modules/progression/index.js';

describe('feedbackToneFor', () => {
  it('grades passes by score', () => {
    expect(feedbackToneFor(100, 70, true)).toBe('perfect');
    expect(feedbackToneFor(90, 70, true)).toBe('excellent');
    expect(feedbackToneFor(75, 70, true)).toBe('passed');
  });

  it('encourages a fail within ten points of the pass mark', () => {
    expect(feedbackToneFor(70, 80, false)).toBe('almost');
    expect(feedbackToneFor(69.99, 80, false)).toBe('retry');
  });
});

describe('buildAttemptFeedback', () => {
  it('pairs the tone with its message', () => {
    expect(buildAttemptFeedback(100, 70, true)).toEqual({
      tone: 'perfect',
      message: 'Perfect score! Every answer was right.',
    });
    expect(buildAttemptFeedback(0, 70, false)).toEqual({
      tone: 'retry',
      message: 'Not passed this time. Study the explanations and give it another go.',
    });
  });
});
