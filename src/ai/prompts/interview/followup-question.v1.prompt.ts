import type { AnalysisResult, PlannedQuestion } from "../../../shared/types/interview.types";

const ANSWER_PREVIEW_LIMIT = 300;

export const FOLLOWUP_QUESTION_V1_PROMPT = `Based on this interview answer, write one relevant follow-up question.

Rules:
- Keep it natural and specific to what the candidate mentioned.
- Address the missing information when it is listed.
- For project questions, dig into challenges or what they learned.
- For experience questions, ask for concrete examples or outcomes.
- For skills questions, ask for specific implementation details.
- Keep it under 25 words.
- Return only the follow-up question, nothing else.`;

export function buildFollowupQuestionV1Prompt(input: {
  question: PlannedQuestion;
  answer: string;
  analysis: AnalysisResult;
}): string {
  return [
    FOLLOWUP_QUESTION_V1_PROMPT,
    "",
    `Question type: ${input.question.type}`,
    `Original question: ${input.question.text}`,
    `Answer preview: ${previewAnswer(input.answer, ANSWER_PREVIEW_LIMIT)}`,
    `Missing points: ${input.analysis.missingPoints.join("; ") || "none listed"}`,
    `Reason for follow-up: ${input.analysis.reason || "not given"}`,
  ].join("\n");
}

export function previewAnswer(answer: string, limit: number): string {
  return answer.length > limit ? `${answer.slice(0, limit)}...` : answer;
}
