export type TechniqueDefinition = {
  id: string;
  name: string;
  description: string;
  lookFors: string[];
  exemplarPhrases: string[];
};

export type PauseInfo = {
  startTime: number;
  endTime: number;
  duration: number;
  precedingText: string;
  followingText: string;
};

export type PauseData = {
  pauses: PauseInfo[];
  summary: {
    count: number;
    averageDuration: number;
    maxDuration: number;
    totalPauseTime: number;
  };
};

export type Principal = {
  id: string;
  email: string;
  expiresAt: Date;
};

export type SessionUser = {
  id: string;
  email: string;
  displayName: string;
  photoURL: string | null;
};

export type ArtifactState = 'PROCESSING' | 'ACTIVE' | 'FAILED';

export type ArtifactMetadata = {
  name: string;
  uri: string;
  mimeType: string;
  state: ArtifactState;
  sizeBytes?: string;
  expirationTime?: string;
};

export type TokenUsage = {
  inputTokens?: number;
  outputTokens?: number;
};

export type RawCompletion = {
  candidates: string[];
  blockReason?: string;
  finishReason?: string;
  usage: TokenUsage;
};

export type TechniqueEvaluation = {
  techniqueId: string;
  wasObserved: boolean;
  rating: number | null;
  evidence: string[];
  feedback: string;
  suggestions: string[];
};

export type AnalysisResult = {
  overallSummary: string;
  strengths: string[];
  growthAreas: string[];
  actionableNextSteps: string[];
  techniqueEvaluations: TechniqueEvaluation[];
};

export type AnalyzeVideoRequest = {
  geminiFileName: string;
  techniques: TechniqueDefinition[];
  includeRatings: boolean;
};

export type AnalysisResponse = {
  overall_summary: string;
  strengths: string[];
  growth_areas: string[];
  actionable_next_steps: string[];
  technique_evaluations: Array<{
    technique_id: string;
    was_observed: boolean;
    rating: number | null;
    evidence: string[];
    feedback: string;
    suggestions: string[];
  }>;
  model_used: string;
  usage: {
    input_tokens: number | null;
    output_tokens: number | null;
  };
};

export type ErrorBody = {
  error: string;
  message?: string;
  retry_after?: number;
  max_techniques?: number;
};

export type RateLimitStatus = {
  used: number;
  limit: number;
  remaining: number;
  resets_in: number;
};
