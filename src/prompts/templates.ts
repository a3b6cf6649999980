// Prompt text shared by the transcript and video variants. Schema, rating
// scale and rating rules live here once; the variants only differ in their
// preamble, technique header and evidence guidelines.

export const RATING_SCALE = `
## Rating Scale
1 - Developing: not observed, or needs substantial development
2 - Emerging: attempted, with inconsistent results
3 - Proficient: solid use with room for refinement
4 - Accomplished: effective and consistent use
5 - Exemplary: could serve as a model for other teachers
`;

const SCHEMA_HEAD = `
## Response Format
Return a single JSON object with this structure:
{
    "overallSummary": "2-3 sentences on the overall effectiveness of the lesson",
    "strengths": ["strength 1", "strength 2", "strength 3"],
    "growthAreas": ["growth area 1", "growth area 2"],
    "actionableNextSteps": ["next step 1", "next step 2", "next step 3"],
    "techniqueEvaluations": [
        {
            "techniqueId": "the exact ID from the technique definition",
            "wasObserved": true/false,`;

const SCHEMA_TAIL = `
            "evidence": ["quote or observed behaviour"],
            "feedback": "detailed feedback on how the technique was used",
            "suggestions": ["concrete improvement"]
        }
    ]
}
`;

export const RESPONSE_SCHEMA_WITH_RATINGS = `${SCHEMA_HEAD}
            "rating": 1-5 (null if not observed),${SCHEMA_TAIL}`;

export const RESPONSE_SCHEMA_WITHOUT_RATINGS = `${SCHEMA_HEAD}${SCHEMA_TAIL}`;

export const RATING_RULE_WITH = '- When a technique was not observed, set wasObserved to false and rating to null';
export const RATING_RULE_WITHOUT = '- When a technique was not observed, set wasObserved to false';

export const TRANSCRIPT_GUIDELINES = `
## Guidelines
- IMPORTANT: copy each technique's "ID" value exactly into "techniqueId"
- Be specific and cite evidence from the transcript
- Keep feedback actionable and growth-oriented
- Balance recognition of strengths with constructive suggestions
{{ratingRule}}
- Look for patterns rather than isolated moments

Respond ONLY with the JSON object and no other text.`;

export const VIDEO_GUIDELINES = `
## Guidelines
- IMPORTANT: copy each technique's "ID" value exactly into "techniqueId"
- Be specific and cite observable evidence from the video (actions, quotes, interactions)
- Reference timestamps for specific moments where you can
- Consider both verbal and non-verbal teacher behaviour
- Keep feedback actionable and growth-oriented
- Balance recognition of strengths with constructive suggestions
{{ratingRule}}
- Look for patterns rather than isolated moments

Respond ONLY with the JSON object and no other text.`;

export const TRANSCRIPT_PREAMBLE = `You are an experienced instructional coach reviewing the transcript of a lesson. Evaluate how the teacher used the techniques listed below and give constructive feedback.`;

export const TRANSCRIPT_SECTION = `
## Lesson Transcript
\`\`\`
{{transcript}}
\`\`\`
`;

export const PAUSE_SECTION = `
## Wait Time Data (pauses of 3 seconds or more)
Pauses detected in the recording. They may show wait time after questions.

**Summary:**
- Total pauses: {{pauseCount}}
- Average duration: {{pauseAvgDuration}}s
- Longest pause: {{pauseMaxDuration}}s
- Total pause time: {{pauseTotalTime}}s

**Pause Details:**
{{pauseDetails}}

Use these numbers for specific feedback on wait time: check whether pauses follow questions and whether they last long enough (3 seconds or more is the usual target).
`;

export const TRANSCRIPT_TECHNIQUES_HEADER = `
## Techniques to Evaluate
Look for evidence of these techniques in the transcript:
`;

export const VIDEO_PREAMBLE = `You are an experienced instructional coach reviewing a video of a lesson. Evaluate how the teacher used the techniques listed below and give constructive feedback.

Watch the whole video and pay attention to:
- The teacher's verbal communication and questioning
- Non-verbal communication (body language, positioning, gestures)
- Student engagement and responses
- Classroom management and pacing
- Use of instructional materials and technology`;

export const VIDEO_TECHNIQUES_HEADER = `
## Techniques to Evaluate
Look for evidence of these techniques in the video:
`;
