import { z } from 'zod';
import {
  MalformedResponseError,
  ProcessingCancelledError,
  ProcessingFailedError,
  ProcessingTimedOutError,
  UpstreamError,
} from './errors.js';
import type { GenerationClient, MediaFileClient } from './gemini.js';
import { describeError, type Logger } from './logger.js';
import { normalizeAnalysis, selectCompletionText, toAnalysisResponse } from './normalizer.js';
import { buildVideoAnalysisPrompt } from './prompts/builder.js';
import type { RateLimiter } from './rate-limit.js';
import type { ReadinessPoller } from './readiness.js';
import type { SessionTokens } from './session.js';
import { transition, type AnalysisEvent, type AnalysisState } from './state-machine.js';
import type { AnalysisResponse, AnalyzeVideoRequest, ErrorBody } from './types.js';

export const MAX_TECHNIQUES = 20;
export const GEMINI_FILE_NAME_PATTERN = /^files\/[A-Za-z0-9_-]+$/;

const TechniqueSchema = z.object({
  id: z.string().min(1, 'technique id is required'),
  name: z.string().min(1, 'technique name is required'),
  description: z.string().default(''),
  lookFors: z.array(z.string()).default([]),
  exemplarPhrases: z.array(z.string()).default([]),
});

const AnalyzeVideoRequestSchema = z.object({
  geminiFileName: z
    .string({ required_error: 'geminiFileName is required' })
    .regex(GEMINI_FILE_NAME_PATTERN, 'Invalid geminiFileName format'),
  techniques: z
    .array(TechniqueSchema, { required_error: 'techniques is required' })
    .min(1, 'At least one technique is required')
    .max(MAX_TECHNIQUES, 'Too many techniques'),
  includeRatings: z.boolean().default(true),
});

export type RequestCheck =
  | { ok: true; request: AnalyzeVideoRequest }
  | { ok: false; body: ErrorBody };

export function parseAnalyzeVideoRequest(input: unknown): RequestCheck {
  const parsed = AnalyzeVideoRequestSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, request: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const body: ErrorBody = { error: 'Invalid request', message: issue?.message ?? 'Invalid request body' };
  if (issue?.code === 'too_big' && issue.path[0] === 'techniques') {
    body.max_techniques = MAX_TECHNIQUES;
  }
  return { ok: false, body };
}

export type PipelineOutcome =
  | { status: 200; body: AnalysisResponse; state: AnalysisState }
  | { status: 400 | 401 | 429 | 500 | 502; body: ErrorBody; state: AnalysisState };

export type PipelineInput = {
  authorization: string | undefined;
  readBody: () => Promise<unknown>;
  correlationId: string;
  signal?: AbortSignal;
};

export type VideoAnalysisDeps = {
  sessions: Pick<SessionTokens, 'verify'>;
  rateLimiter: RateLimiter;
  poller: Pick<ReadinessPoller, 'awaitReady'>;
  files: Pick<MediaFileClient, 'deleteFile'>;
  generator: GenerationClient;
  videoRateLimitPerHour: number;
  logger: Logger;
};

class InvalidJsonBody extends Error {}

/**
 * One `POST /analyze/video` call: authenticate, check quota, validate, wait for
 * the uploaded file, generate, normalize, commit quota, delete the file.
 */
export class VideoAnalysisPipeline {
  constructor(private readonly deps: VideoAnalysisDeps) {}

  async run(input: PipelineInput): Promise<PipelineOutcome> {
    const log = this.deps.logger.child({ correlationId: input.correlationId });
    let state: AnalysisState = 'UNAUTHENTICATED';

    const auth = await this.deps.sessions.verify(input.authorization);
    if (!auth.valid) {
      state = transition(state, { type: 'AUTH_FAILED' });
      return { status: 401, body: { error: auth.error }, state };
    }
    state = transition(state, { type: 'AUTHENTICATED' });
    const principal = auth.principal;
    const limit = this.deps.videoRateLimitPerHour;

    let artifact: string | undefined;
    try {
      const decision = await this.deps.rateLimiter.check(principal.id, 'video', limit);
      if (!decision.allowed) {
        state = transition(state, { type: 'RATE_DENIED' });
        log.warn('Video rate limit exceeded', { userId: principal.id, used: decision.current, limit });
        return {
          status: 429,
          body: {
            error: 'Rate limit exceeded',
            message: `Maximum ${limit} video analyses per hour. Please try again later.`,
            retry_after: decision.retryAfterSeconds,
          },
          state,
        };
      }
      state = transition(state, { type: 'RATE_ALLOWED' });

      const checked = parseAnalyzeVideoRequest(await readJson(input.readBody));
      if (!checked.ok) {
        state = transition(state, { type: 'VALIDATION_FAILED' });
        return { status: 400, body: checked.body, state };
      }
      state = transition(state, { type: 'VALIDATION_SUCCEEDED' });
      const { geminiFileName, techniques, includeRatings } = checked.request;
      artifact = geminiFileName;

      const file = await this.deps.poller.awaitReady(geminiFileName, input.signal);
      state = transition(state, { type: 'ARTIFACT_READY' });

      const prompt = buildVideoAnalysisPrompt({ techniques, includeRatings });
      const completion = await this.deps.generator.generate(
        { prompt, media: { uri: file.uri, mimeType: file.mimeType } },
        input.signal,
      );
      state = transition(state, { type: 'GENERATED' });

      const result = normalizeAnalysis(selectCompletionText(completion), { includeRatings });
      state = transition(state, { type: 'NORMALIZED' });

      const used = await this.deps.rateLimiter.commit(principal.id, 'video', decision.checkedAt);
      state = transition(state, { type: 'COMMITTED' });

      await this.cleanup(geminiFileName, log);
      state = transition(state, { type: 'CLEANED_UP' });

      log.info('Video analysis completed', {
        userId: principal.id,
        file: geminiFileName,
        techniques: techniques.length,
        evaluations: result.techniqueEvaluations.length,
        used,
        limit,
        inputTokens: completion.usage.inputTokens,
        outputTokens: completion.usage.outputTokens,
      });
      return { status: 200, body: toAnalysisResponse(result, this.deps.generator.model, completion.usage), state };
    } catch (error) {
      if (error instanceof InvalidJsonBody) {
        state = transition(state, { type: 'VALIDATION_FAILED' });
        return { status: 400, body: { error: 'Invalid JSON body' }, state };
      }

      const failedIn = state;
      state = transition(state, { type: 'FAILED', reason: failureReason(error, input.signal) });
      log.error('Video analysis failed', {
        userId: principal.id,
        file: artifact,
        state: failedIn,
        ...diagnostics(error),
      });

      if (state === 'ABORTING' && artifact) {
        await this.cleanup(artifact, log);
        state = transition(state, { type: 'CLEANED_UP' });
      }
      return { ...failureResponse(error), state };
    }
  }

  /** Best effort: a failed delete is logged and never changes the outcome. */
  private async cleanup(name: string, log: Logger): Promise<void> {
    try {
      await this.deps.files.deleteFile(name);
    } catch (error) {
      log.warn('Artifact cleanup failed', { file: name, error: describeError(error) });
    }
  }
}

async function readJson(readBody: () => Promise<unknown>): Promise<unknown> {
  try {
    return await readBody();
  } catch {
    throw new InvalidJsonBody();
  }
}

function failureReason(
  error: unknown,
  signal: AbortSignal | undefined,
): Extract<AnalysisEvent, { type: 'FAILED' }>['reason'] {
  if (signal?.aborted || error instanceof ProcessingCancelledError) return 'cancelled';
  if (error instanceof ProcessingFailedError || error instanceof ProcessingTimedOutError) return 'processing';
  if (error instanceof MalformedResponseError) return 'malformed';
  if (error instanceof UpstreamError) return 'upstream';
  return 'unexpected';
}

function diagnostics(error: unknown): Record<string, unknown> {
  const meta: Record<string, unknown> = { error: describeError(error) };
  if (error instanceof UpstreamError) {
    meta.httpStatus = error.httpStatus;
    if (error.body) meta.upstreamBody = error.body.slice(0, 500);
  }
  if (error instanceof MalformedResponseError) {
    meta.responseLength = error.length;
  }
  if (error instanceof ProcessingTimedOutError) {
    meta.elapsedMs = error.elapsedMs;
  }
  return meta;
}

function failureResponse(error: unknown): { status: 500 | 502; body: ErrorBody } {
  if (error instanceof MalformedResponseError) {
    return { status: 502, body: { error: 'Invalid response format from analysis service' } };
  }
  if (error instanceof UpstreamError) {
    return { status: 502, body: { error: 'Analysis service error' } };
  }
  return { status: 500, body: { error: 'Video analysis failed' } };
}
