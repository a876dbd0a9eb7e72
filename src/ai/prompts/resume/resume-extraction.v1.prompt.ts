export const RESUME_TEXT_LIMIT = 4000;

export const RESUME_EXTRACTION_V1_PROMPT = `You are a resume parser. Extract information from the resume text and return ONLY valid JSON in this exact shape:

{
  "name": "Full Name",
  "email": "email@example.com",
  "phone": "phone number",
  "education": [
    { "degree": "degree name", "institution": "school name", "year": "graduation year" }
  ],
  "skills": ["skill1", "skill2"],
  "experience": [
    { "title": "job title", "company": "company name", "duration": "time period", "description": "job description" }
  ],
  "projects": [
    { "title": "project name", "tech": ["technology1", "technology2"], "description": "project description" }
  ]
}

Guidelines:
- Return ONLY the JSON object, no additional text.
- If information is not available, use an empty string for text fields and an empty array for lists.
- Extract skills from the skills section and from experience descriptions.
- For experience, include duration and description when available.

Resume text:`;

export function buildResumeExtractionV1Prompt(resumeText: string): string {
  return `${RESUME_EXTRACTION_V1_PROMPT}\n${resumeText.slice(0, RESUME_TEXT_LIMIT)}`;
}
