/**
 * Google Gemini adapters: file status/deletion through the File API and
 * content generation against an uploaded file or plain prompt text.
 */

import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import { FileState, GoogleAIFileManager, type FileMetadataResponse } from '@google/generative-ai/server';
import { CleanupFailedError, StatusQueryError, UpstreamError } from './errors.js';
import type { FileStatusSource } from './readiness.js';
import type { ArtifactMetadata, ArtifactState, RawCompletion } from './types.js';

export interface MediaFileClient extends FileStatusSource {
  /** Resolves when the file is gone, including when it never existed. */
  deleteFile(name: string): Promise<void>;
}

export type GenerationPayload = {
  prompt: string;
  media?: { uri: string; mimeType: string };
};

export interface GenerationClient {
  readonly model: string;
  generate(payload: GenerationPayload, signal?: AbortSignal): Promise<RawCompletion>;
}

const TEMPERATURE = 0.4;
const MAX_OUTPUT_TOKENS_MEDIA = 8192;
const MAX_OUTPUT_TOKENS_TEXT = 4096;

// The main and `/server` bundles each declare their own GoogleGenerativeAIFetchError,
// so the status is read off the error rather than matched by class.
export function httpStatusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function toArtifactState(state: FileState | string | undefined): ArtifactState {
  if (state === FileState.ACTIVE) return 'ACTIVE';
  if (state === FileState.FAILED) return 'FAILED';
  return 'PROCESSING';
}

export function toArtifactMetadata(file: FileMetadataResponse): ArtifactMetadata {
  return {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType,
    state: toArtifactState(file.state),
    sizeBytes: file.sizeBytes,
    expirationTime: file.expirationTime,
  };
}

export class GeminiFileClient implements MediaFileClient {
  private readonly manager: GoogleAIFileManager;

  constructor(apiKey: string, timeoutMs: number) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for the Gemini file client');
    }
    this.manager = new GoogleAIFileManager(apiKey, { timeout: timeoutMs });
  }

  async getFile(name: string, signal?: AbortSignal): Promise<ArtifactMetadata> {
    try {
      const file = await this.manager.getFile(name, { signal });
      return toArtifactMetadata(file);
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new StatusQueryError(httpStatusOf(error), error instanceof Error ? error.message : undefined);
    }
  }

  async deleteFile(name: string): Promise<void> {
    try {
      await this.manager.deleteFile(name);
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 404) return;
      throw new CleanupFailedError(name, status);
    }
  }
}

export class GeminiGenerationClient implements GenerationClient {
  private readonly client: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly timeoutMs: number,
  ) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for the Gemini generation client');
    }
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(payload: GenerationPayload, signal?: AbortSignal): Promise<RawCompletion> {
    const generativeModel = this.client.getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: TEMPERATURE,
        maxOutputTokens: payload.media ? MAX_OUTPUT_TOKENS_MEDIA : MAX_OUTPUT_TOKENS_TEXT,
      },
    });

    const parts: Part[] = [];
    if (payload.media) {
      parts.push({ fileData: { fileUri: payload.media.uri, mimeType: payload.media.mimeType } });
    }
    parts.push({ text: payload.prompt });

    try {
      const result = await generativeModel.generateContent(
        { contents: [{ role: 'user', parts }] },
        { signal, timeout: this.timeoutMs },
      );
      const response = result.response;
      return {
        candidates: (response.candidates ?? []).map((candidate) =>
          (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('')),
        blockReason: response.promptFeedback?.blockReason,
        finishReason: response.candidates?.[0]?.finishReason,
        usage: {
          inputTokens: response.usageMetadata?.promptTokenCount,
          outputTokens: response.usageMetadata?.candidatesTokenCount,
        },
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new UpstreamError(
        'Gemini generateContent failed',
        httpStatusOf(error),
        error instanceof Error ? error.message : undefined,
      );
    }
  }
}
