import type { PlannedQuestion } from "../../../shared/types/interview.types";

export const ANSWER_ANALYSIS_V1_PROMPT = `You analyze one candidate answer and decide whether a follow-up question is needed.

Output STRICT JSON:
{
  "needs_followup": boolean,
  "reason": "brief reason why a follow-up is or is not needed",
  "missing_points": ["key points the answer did not address"],
  "feedback": "brief constructive feedback"
}

Decision rules:
- needs_followup = true if the answer is too brief, vague, or missing key technical details.
- needs_followup = true if the candidate mentions something interesting that needs elaboration.
- needs_followup = false if the answer covers the expected key points.
- For technical topics, check that enough technical detail was provided.

Output constraints:
- Return JSON only.
- No markdown.
- No extra text.`;

export function buildAnswerAnalysisV1Prompt(input: {
  question: PlannedQuestion;
  answer: string;
}): string {
  return [
    ANSWER_ANALYSIS_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        question_type: input.question.type,
        question: input.question.text,
        expected_key_points: input.question.keyPoints,
        expected_duration: input.question.expectedDuration,
        answer: input.answer,
      },
      null,
      2,
    ),
  ].join("\n");
}
