import type { PlannedQuestion } from "../../../shared/types/interview.types";
import { previewAnswer } from "./followup-question.v1.prompt";

export const ENCOURAGEMENT_V1_PROMPT = `Write a brief, encouraging reaction to this interview answer.
Be positive, specific and natural. Keep it under 20 words. Return only the reaction.

Examples:
- "That's wonderful! Your passion for the field really comes through."
- "Excellent! I can see you have hands-on experience."
- "Great answer! Your technical approach is impressive."`;

export function buildEncouragementV1Prompt(input: { question: PlannedQuestion; answer: string }): string {
  return [
    ENCOURAGEMENT_V1_PROMPT,
    "",
    `Question type: ${input.question.type}`,
    `Answer preview: ${previewAnswer(input.answer, 500)}`,
  ].join("\n");
}
