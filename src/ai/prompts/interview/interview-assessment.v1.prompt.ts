import type { ConversationSummary } from "../../../shared/types/interview.types";

const PROMPT_TEXT_LIMIT = 6000;

export const INTERVIEW_ASSESSMENT_V1_PROMPT = `Based on the complete interview conversation, assess the candidate.

Output STRICT JSON:
{
  "overall_score": 1-10,
  "strengths": ["key strengths"],
  "areas_for_improvement": ["areas that need work"],
  "technical_competency": 1-10,
  "communication_skills": 1-10,
  "problem_solving": 1-10,
  "enthusiasm": 1-10,
  "detailed_feedback": "one feedback paragraph",
  "recommendation": "hire | consider | not_recommended",
  "key_takeaways": ["main points from the interview"]
}

Output constraints:
- Return JSON only.
- No markdown.`;

export function buildInterviewAssessmentV1Prompt(summary: ConversationSummary): string {
  const payload = JSON.stringify(
    {
      role: summary.role,
      resume: summary.resume,
      conversation: summary.conversationHistory.map((entry) => ({
        question: entry.questionText,
        answer: entry.answerText,
      })),
      technical_answers: summary.technicalAnswers.map((entry) => ({
        question: entry.question,
        answer: entry.answer,
      })),
    },
    null,
    2,
  );
  return [INTERVIEW_ASSESSMENT_V1_PROMPT, "", "Interview JSON:", payload.slice(0, PROMPT_TEXT_LIMIT)].join("\n");
}
