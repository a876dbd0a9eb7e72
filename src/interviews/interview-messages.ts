import type { PlannedQuestionType } from "../shared/types/interview.types";

export const SKIP_PHRASES: ReadonlySet<string> = new Set([
  "skip",
  "skip to next",
  "next question",
  "skip this",
  "move to next",
]);

export const SKIP_ACKNOWLEDGEMENT = "No problem! Let's move on to the next question.";
export const SKIPPED_ANSWER = "Skipped";
export const TECHNICAL_ANSWER_ACKNOWLEDGEMENT = "Good answer! Let's continue with the technical questions.";
export const TECHNICAL_PHASE_INTRO = "Now let's test your technical knowledge. ";

const FALLBACK_FOLLOWUPS = {
  project: "Can you tell me more about the most challenging part of that project?",
  experience: "What was the most valuable thing you learned from that experience?",
  skills: "How do you stay updated with the latest developments in this area?",
  general: "That's interesting! Can you give me a specific example?",
} as const;

export function isSkipRequest(answer: string): boolean {
  return SKIP_PHRASES.has(answer.trim().toLowerCase());
}

export function getFallbackFollowup(type: PlannedQuestionType): string {
  switch (type) {
    case "project":
    case "experience":
    case "skills":
      return FALLBACK_FOLLOWUPS[type];
    default:
      return FALLBACK_FOLLOWUPS.general;
  }
}

export function buildCompletionMessage(extraCoverageLine?: string): string {
  const covered = [
    "- Personal introduction and background questions",
    "- Questions based on your resume and experience",
    ...(extraCoverageLine ? [extraCoverageLine] : []),
  ];
  return [
    "**Thank you for completing the interview!**",
    "",
    "We've covered:",
    ...covered,
    "",
    "Your responses have been recorded and will be reviewed by our team. We appreciate the time you've taken to participate in this interview process.",
    "",
    "**Next Steps:**",
    "- Our team will review your responses",
    "- You'll hear back from us within 2-3 business days",
    "- Feel free to reach out if you have any questions",
    "",
    "Thank you once again, and we look forward to potentially working with you!",
  ].join("\n");
}
