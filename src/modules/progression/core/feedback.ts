import { ALMOST_MARGIN, type AttemptFeedback, type FeedbackTone } from './types.js';

const MESSAGES: Record<FeedbackTone, string> = {
  perfect: 'Perfect score! Every answer was right.',
  excellent: 'Excellent work! You clearly know this topic.',
  passed: 'Level passed. Review the explanations to earn more stars.',
  almost: 'So close! Review the explanations and try again.',
  retry: 'Not passed this time. Study the explanations and give it another go.',
};

export const feedbackToneFor = (
  scorePercentage: number,
  passingScore: number,
  passed: boolean
): FeedbackTone => {
  if (passed) {
    if (scorePercentage >= 100) {
      return 'perfect';
    }
    return scorePercentage >= 90 ? 'excellent' : 'passed';
  }
  return passingScore - scorePercentage <= ALMOST_MARGIN ? 'almost' : 'retry';
};

export const buildAttemptFeedback = (
  scorePercentage: number,
  passingScore: number,
  passed: boolean
): AttemptFeedback => {
  const tone = feedbackToneFor(scorePercentage, passingScore, passed);
  return { tone, message: MESSAGES[tone] };
};
