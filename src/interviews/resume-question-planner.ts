import type {
  ExperienceQuestion,
  PlannedQuestion,
  PlannedQuestionType,
  PlanSummary,
  ProjectQuestion,
} from "../shared/types/interview.types";
import type { ResumeExperience, ResumeRecord } from "../shared/types/resume.types";

const MAX_PROJECT_QUESTIONS = 3;
const MAX_EXPERIENCE_QUESTIONS = 2;
const SKILLS_QUESTIONS_ASKED = 2;

const SKILLS_QUESTION_BANK = [
  "What programming languages or technologies are you most comfortable with and why?",
  "Can you describe a challenging technical problem you've solved recently?",
  "How do you stay updated with new technologies in your field?",
  "Tell me about a time you had to learn something new quickly. How did you approach it?",
] as const;

// Substrings of a company name that point at self-employment, education or extracurriculars.
const COMPANY_EXCLUSION_TERMS = [
  "self employed",
  "self-employed",
  "freelance",
  "personal",
  "own",
  "individual",
  "college",
  "university",
  "school",
  "institute",
  "club",
  "society",
  "committee",
  "student",
  "academic",
  "campus",
  "pes",
  "mit",
  "iit",
  "nit",
  "bits",
  "team",
  "group",
  "association",
  "organization",
];

const EMPLOYMENT_TITLE_TERMS = [
  "intern",
  "trainee",
  "apprentice",
  "employee",
  "worker",
  "analyst",
  "consultant",
  "specialist",
  "engineer",
  "developer",
  "programmer",
];

const LEADERSHIP_TITLE_TERMS = [
  "head",
  "co-head",
  "leader",
  "president",
  "vice president",
  "secretary",
  "treasurer",
  "coordinator",
  "member",
];

/**
 * Builds the ordered résumé-phase question list: introduction, hobbies, up to three
 * projects, then either up to two genuine employment entries or two generic skills
 * questions. Ids run 1..k in insertion order.
 */
export function planResumeQuestions(resume: ResumeRecord): PlannedQuestion[] {
  const questions: PlannedQuestion[] = [];
  const nextId = (): number => questions.length + 1;

  const candidateName = resume.name.trim() || "Candidate";
  questions.push({
    id: nextId(),
    type: "introduction",
    text: `Hello ${candidateName}! Please introduce yourself. Tell us about your background, education, and what interests you about this field.`,
    expectedDuration: "2-3 minutes",
    keyPoints: ["background", "education", "interests"],
    candidateName,
  });

  questions.push({
    id: nextId(),
    type: "hobbies",
    text: "Can you tell us about your hobbies and interests? How do they relate to your current course of study or career goals?",
    expectedDuration: "1-2 minutes",
    keyPoints: ["hobbies", "relation to career"],
  });

  resume.projects.slice(0, MAX_PROJECT_QUESTIONS).forEach((project, index) => {
    questions.push(buildProjectQuestion(nextId(), project.title.trim() || `Project ${index + 1}`, project));
  });

  const employment = resume.experience.filter(isGenuineEmployment);
  if (employment.length > 0) {
    for (const entry of employment.slice(0, MAX_EXPERIENCE_QUESTIONS)) {
      questions.push(buildExperienceQuestion(nextId(), entry));
    }
  } else {
    for (const text of SKILLS_QUESTION_BANK.slice(0, SKILLS_QUESTIONS_ASKED)) {
      questions.push({
        id: nextId(),
        type: "skills",
        text,
        expectedDuration: "2-3 minutes",
        keyPoints: ["technical skills", "problem solving", "learning ability"],
      });
    }
  }

  return questions;
}

export function isGenuineEmployment(entry: ResumeExperience): boolean {
  const company = entry.company.trim();
  const companyLower = company.toLowerCase();
  const title = entry.title.toLowerCase();

  if (company.length <= 3 || !entry.duration.trim()) {
    return false;
  }
  if (COMPANY_EXCLUSION_TERMS.some((term) => companyLower.includes(term))) {
    return false;
  }
  if (LEADERSHIP_TITLE_TERMS.some((term) => title.includes(term))) {
    return false;
  }
  return EMPLOYMENT_TITLE_TERMS.some((term) => title.includes(term));
}

export function summarizePlan(plan: ReadonlyArray<PlannedQuestion>): PlanSummary {
  const questionTypes: Partial<Record<PlannedQuestionType, number>> = {};
  for (const question of plan) {
    questionTypes[question.type] = (questionTypes[question.type] ?? 0) + 1;
  }
  return {
    totalQuestions: plan.length,
    questionTypes,
  };
}

function buildProjectQuestion(
  id: number,
  title: string,
  project: ProjectQuestion["project"],
): ProjectQuestion {
  return {
    id,
    type: "project",
    text: `Let's discuss your project '${title}'. Can you explain what it was about, the challenges you faced, the technologies you used, and the outcome?`,
    expectedDuration: "3-4 minutes",
    keyPoints: ["project description", "challenges", "technologies", "outcome"],
    project,
  };
}

function buildExperienceQuestion(id: number, experience: ResumeExperience): ExperienceQuestion {
  const text = experience.title.toLowerCase().includes("intern")
    ? `Tell me about your internship experience as ${experience.title} at ${experience.company}. What were your main responsibilities and what did you learn?`
    : `Describe your experience as ${experience.title} at ${experience.company}. What were your key accomplishments and responsibilities?`;
  return {
    id,
    type: "experience",
    text,
    expectedDuration: "2-3 minutes",
    keyPoints: ["responsibilities", "accomplishments", "learning"],
    experience,
  };
}
