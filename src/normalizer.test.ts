import assert from 'node:assert/strict';
import { test } from 'node:test';
import { MalformedResponseError, UpstreamError } from './errors.js';
import { extractJsonText, normalizeAnalysis, selectCompletionText, toAnalysisResponse } from './normalizer.js';

const payload = {
  overallSummary: 'Clear lesson with strong questioning.',
  strengths: ['Warm tone'],
  growthAreas: ['Pacing'],
  actionableNextSteps: ['Add exit tickets'],
  techniqueEvaluations: [
    {
      techniqueId: 'wait-time',
      wasObserved: true,
      rating: 4,
      evidence: ['Paused after the question at 02:10'],
      feedback: 'Consistent wait time.',
      suggestions: ['Extend to five seconds'],
    },
  ],
};

test('fenced json with surrounding prose normalizes like the bare json', () => {
  const bare = JSON.stringify(payload);
  const fenced = `Here is my analysis.\n\n\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\`\nLet me know if you need more.`;
  assert.deepEqual(
    normalizeAnalysis(fenced, { includeRatings: true }),
    normalizeAnalysis(bare, { includeRatings: true }),
  );
  assert.deepEqual(normalizeAnalysis(bare, { includeRatings: true }), payload);
});

test('extractJsonText uses only the fence interior', () => {
  assert.equal(extractJsonText('intro ```json\n{"a":1}\n``` outro'), '{"a":1}');
  assert.equal(extractJsonText('  {"a":1}\n'), '{"a":1}');
});

test('missing optional fields default to empty values', () => {
  const result = normalizeAnalysis(
    JSON.stringify({ techniqueEvaluations: [{ techniqueId: 'cold-call' }] }),
    { includeRatings: true },
  );
  assert.deepEqual(result, {
    overallSummary: '',
    strengths: [],
    growthAreas: [],
    actionableNextSteps: [],
    techniqueEvaluations: [
      {
        techniqueId: 'cold-call',
        wasObserved: false,
        rating: null,
        evidence: [],
        feedback: '',
        suggestions: [],
      },
    ],
  });
});

test('ratings are clamped, rounded and dropped when not requested', () => {
  const text = JSON.stringify({
    overallSummary: 's',
    techniqueEvaluations: [
      { techniqueId: 'a', wasObserved: true, rating: 7 },
      { techniqueId: 'b', wasObserved: true, rating: 2.6 },
      { techniqueId: 'c', wasObserved: false, rating: null },
      { techniqueId: 'd', wasObserved: true, rating: 'high' },
    ],
  });
  const rated = normalizeAnalysis(text, { includeRatings: true });
  assert.deepEqual(rated.techniqueEvaluations.map((te) => te.rating), [5, 3, null, null]);
  const unrated = normalizeAnalysis(text, { includeRatings: false });
  assert.deepEqual(unrated.techniqueEvaluations.map((te) => te.rating), [null, null, null, null]);
});

test('evaluations without a technique id and non-string list items are dropped', () => {
  const result = normalizeAnalysis(
    JSON.stringify({
      strengths: ['one', 2, null, 'three'],
      techniqueEvaluations: [{ wasObserved: true }, 'nonsense', { techniqueId: 'kept' }],
    }),
    { includeRatings: false },
  );
  assert.deepEqual(result.strengths, ['one', 'three']);
  assert.deepEqual(result.techniqueEvaluations.map((te) => te.techniqueId), ['kept']);
});

test('undecodable text is a malformed response carrying only its length', () => {
  const text = 'I could not analyze this video.';
  assert.throws(
    () => normalizeAnalysis(text, { includeRatings: true }),
    (error: unknown) =>
      error instanceof MalformedResponseError
      && error.length === text.length
      && !error.message.includes('could not analyze'),
  );
  assert.throws(() => normalizeAnalysis('[1, 2]', { includeRatings: true }), MalformedResponseError);
  assert.throws(() => normalizeAnalysis('```json\nnull\n```', { includeRatings: true }), MalformedResponseError);
});

test('completion text comes from the first candidate', () => {
  assert.equal(selectCompletionText({ candidates: ['first', 'second'], usage: {} }), 'first');
  assert.throws(
    () => selectCompletionText({ candidates: [], blockReason: 'SAFETY', usage: {} }),
    (error: unknown) => error instanceof UpstreamError && error.message === 'Content was blocked by safety filters',
  );
  assert.throws(
    () => selectCompletionText({ candidates: [], usage: {} }),
    (error: unknown) => error instanceof UpstreamError && error.message === 'Analysis service returned no results',
  );
  assert.throws(() => selectCompletionText({ candidates: ['  '], usage: {} }), UpstreamError);
});

test('responses use the snake_case contract', () => {
  const result = normalizeAnalysis(JSON.stringify(payload), { includeRatings: true });
  assert.deepEqual(toAnalysisResponse(result, 'gemini-test', { inputTokens: 1200 }), {
    overall_summary: 'Clear lesson with strong questioning.',
    strengths: ['Warm tone'],
    growth_areas: ['Pacing'],
    actionable_next_steps: ['Add exit tickets'],
    technique_evaluations: [
      {
        technique_id: 'wait-time',
        was_observed: true,
        rating: 4,
        evidence: ['Paused after the question at 02:10'],
        feedback: 'Consistent wait time.',
        suggestions: ['Extend to five seconds'],
      },
    ],
    model_used: 'gemini-test',
    usage: { input_tokens: 1200, output_tokens: null },
  });
});
