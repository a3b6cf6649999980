import { z } from 'zod';
import { MalformedResponseError, UpstreamError } from './errors.js';
import type { AnalysisResponse, AnalysisResult, RawCompletion, TechniqueEvaluation } from './types.js';

const FENCED_JSON = /```json\s*([\s\S]*?)\s*```/i;

const stringList = z.array(z.unknown()).catch([]).transform((items) =>
  items.filter((item): item is string => typeof item === 'string'));

const RatingSchema = z.unknown().transform((value): number | null => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  return Math.min(5, Math.max(1, Math.round(value)));
});

const TechniqueEvaluationSchema = z.object({
  techniqueId: z.string().min(1),
  wasObserved: z.boolean().catch(false),
  rating: RatingSchema,
  evidence: stringList,
  feedback: z.string().catch(''),
  suggestions: stringList,
});

const AnalysisSchema = z.object({
  overallSummary: z.string().catch(''),
  strengths: stringList,
  growthAreas: stringList,
  actionableNextSteps: stringList,
  techniqueEvaluations: z.array(z.unknown()).catch([]),
});

/** Interior of the first ```json fence, or the whole trimmed text. */
export function extractJsonText(rawText: string): string {
  const match = rawText.match(FENCED_JSON);
  return match ? match[1] : rawText.trim();
}

export function selectCompletionText(completion: RawCompletion): string {
  if (completion.candidates.length === 0) {
    throw new UpstreamError(
      completion.blockReason ? 'Content was blocked by safety filters' : 'Analysis service returned no results',
    );
  }
  const text = completion.candidates[0];
  if (!text.trim()) {
    throw new UpstreamError('Empty response from analysis service');
  }
  return text;
}

export function normalizeAnalysis(rawText: string, options: { includeRatings: boolean }): AnalysisResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(extractJsonText(rawText));
  } catch {
    throw new MalformedResponseError('not valid JSON', rawText.length);
  }

  const parsed = AnalysisSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedResponseError('not an analysis object', rawText.length);
  }

  const techniqueEvaluations: TechniqueEvaluation[] = [];
  for (const candidate of parsed.data.techniqueEvaluations) {
    const evaluation = TechniqueEvaluationSchema.safeParse(candidate);
    if (!evaluation.success) continue;
    techniqueEvaluations.push({
      ...evaluation.data,
      rating: options.includeRatings ? evaluation.data.rating : null,
    });
  }

  return {
    overallSummary: parsed.data.overallSummary,
    strengths: parsed.data.strengths,
    growthAreas: parsed.data.growthAreas,
    actionableNextSteps: parsed.data.actionableNextSteps,
    techniqueEvaluations,
  };
}

export function toAnalysisResponse(
  result: AnalysisResult,
  model: string,
  usage: RawCompletion['usage'],
): AnalysisResponse {
  return {
    overall_summary: result.overallSummary,
    strengths: result.strengths,
    growth_areas: result.growthAreas,
    actionable_next_steps: result.actionableNextSteps,
    technique_evaluations: result.techniqueEvaluations.map((te) => ({
      technique_id: te.techniqueId,
      was_observed: te.wasObserved,
      rating: te.rating,
      evidence: te.evidence,
      feedback: te.feedback,
      suggestions: te.suggestions,
    })),
    model_used: model,
    usage: {
      input_tokens: usage.inputTokens ?? null,
      output_tokens: usage.outputTokens ?? null,
    },
  };
}
