import type { PauseData, TechniqueDefinition } from '../types.js';
import {
  PAUSE_SECTION,
  RATING_RULE_WITH,
  RATING_RULE_WITHOUT,
  RATING_SCALE,
  RESPONSE_SCHEMA_WITH_RATINGS,
  RESPONSE_SCHEMA_WITHOUT_RATINGS,
  TRANSCRIPT_GUIDELINES,
  TRANSCRIPT_PREAMBLE,
  TRANSCRIPT_SECTION,
  TRANSCRIPT_TECHNIQUES_HEADER,
  VIDEO_GUIDELINES,
  VIDEO_PREAMBLE,
  VIDEO_TECHNIQUES_HEADER,
} from './templates.js';

export const WAIT_TIME_TECHNIQUE_ID = 'wait-time';

export type TranscriptPromptOptions = {
  transcript: string;
  techniques: TechniqueDefinition[];
  includeRatings: boolean;
  pauseData?: PauseData;
};

export type VideoPromptOptions = {
  techniques: TechniqueDefinition[];
  includeRatings: boolean;
};

/** Replaces every `{{name}}` placeholder. Values are inserted literally. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : placeholder,
  );
}

export function formatTechnique(technique: TechniqueDefinition): string {
  return `
### ${technique.name}
**ID:** ${technique.id}
**Description:** ${technique.description}

**Look-fors (observable indicators):**
${technique.lookFors.map((lookFor) => `- ${lookFor}`).join('\n')}

**Exemplar phrases:**
${technique.exemplarPhrases.map((phrase) => `- "${phrase}"`).join('\n')}
`;
}

export function formatTechniques(techniques: TechniqueDefinition[]): string {
  return techniques.map(formatTechnique).join('\n');
}

export function formatPauseData(pauseData: PauseData): string {
  const pauseDetails = pauseData.pauses
    .map((pause, i) =>
      `${i + 1}. ${pause.duration.toFixed(1)}s pause after "${pause.precedingText}" -> before "${pause.followingText}"`)
    .join('\n');

  return fillTemplate(PAUSE_SECTION, {
    pauseCount: pauseData.summary.count.toString(),
    pauseAvgDuration: pauseData.summary.averageDuration.toFixed(1),
    pauseMaxDuration: pauseData.summary.maxDuration.toFixed(1),
    pauseTotalTime: pauseData.summary.totalPauseTime.toFixed(1),
    pauseDetails,
  });
}

function responseContract(includeRatings: boolean, guidelines: string): string {
  let text = includeRatings ? RESPONSE_SCHEMA_WITH_RATINGS : RESPONSE_SCHEMA_WITHOUT_RATINGS;
  if (includeRatings) {
    text += RATING_SCALE;
  }
  text += fillTemplate(guidelines, {
    ratingRule: includeRatings ? RATING_RULE_WITH : RATING_RULE_WITHOUT,
  });
  return text;
}

export function buildTranscriptAnalysisPrompt(options: TranscriptPromptOptions): string {
  const { transcript, techniques, includeRatings, pauseData } = options;

  let prompt = TRANSCRIPT_PREAMBLE;
  prompt += fillTemplate(TRANSCRIPT_SECTION, { transcript });

  if (pauseData && techniques.some((t) => t.id === WAIT_TIME_TECHNIQUE_ID)) {
    prompt += formatPauseData(pauseData);
  }

  prompt += TRANSCRIPT_TECHNIQUES_HEADER;
  prompt += formatTechniques(techniques);
  prompt += responseContract(includeRatings, TRANSCRIPT_GUIDELINES);
  return prompt;
}

export function buildVideoAnalysisPrompt(options: VideoPromptOptions): string {
  const { techniques, includeRatings } = options;

  let prompt = VIDEO_PREAMBLE;
  prompt += VIDEO_TECHNIQUES_HEADER;
  prompt += formatTechniques(techniques);
  prompt += responseContract(includeRatings, VIDEO_GUIDELINES);
  return prompt;
}
