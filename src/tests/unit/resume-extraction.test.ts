import assert from "node:assert/strict";
import { test } from "node:test";
import { noopLogger } from "../../config/logger";
import { DocumentService } from "../../documents/document.service";
import { ResumeExtractionService } from "../../resumes/resume-extraction.service";
import { normalizeResumeRecord } from "../../resumes/resume-normalizer";
import { ExtractionError } from "../../shared/errors";
import { FakeLlmClient } from "../helpers/interview-fakes";

const EXTRACTED = {
  name: "Asha Rao",
  email: "asha@example.com",
  phone: "555-0101",
  education: [{ degree: "B.Tech", institution: "State University", year: 2024 }],
  skills: ["Python", "SQL"],
  experience: [],
  projects: [{ title: "Library Bot", tech: "Python, Flask", description: "Chat bot." }],
};

test("normalizeResumeRecord fills every missing field", () => {
  assert.deepEqual(normalizeResumeRecord({}), {
    name: "",
    email: "",
    phone: "",
    education: [],
    skills: [],
    experience: [],
    projects: [],
  });
});

test("normalizeResumeRecord coerces loose values", () => {
  const resume = normalizeResumeRecord({
    name: "  Asha  ",
    skills: "Python, SQL , ",
    education: [{ degree: "B.Tech", year: 2024 }, "not an entry"],
    experience: { title: "not a list" },
    projects: [{ title: "Bot", tech: ["Python", 7, ""] }],
  });
  assert.equal(resume.name, "Asha");
  assert.deepEqual(resume.skills, ["Python", "SQL"]);
  assert.deepEqual(resume.education, [{ degree: "B.Tech", institution: "", year: "2024" }]);
  assert.deepEqual(resume.experience, []);
  assert.deepEqual(resume.projects, [{ title: "Bot", tech: ["Python", "7"], description: "" }]);
});

test("extraction sends at most the first 4000 characters of text", async () => {
  const llmClient = new FakeLlmClient([JSON.stringify(EXTRACTED)]);
  const service = new ResumeExtractionService(new DocumentService(noopLogger), llmClient, noopLogger);

  const resume = await service.extractFromText(`${"x".repeat(4000)}ZZZTAIL`);
  assert.equal(resume.name, "Asha Rao");
  assert.deepEqual(resume.projects[0].tech, ["Python", "Flask"]);
  assert.equal(resume.education[0].year, "2024");
  assert.equal(llmClient.calls.length, 1);
  assert.equal(llmClient.calls[0].prompt.includes("ZZZTAIL"), false);
  assert.equal(llmClient.calls[0].promptName, "resume_extraction_v1");
});

test("extraction gives up after three attempts", async () => {
  const llmClient = new FakeLlmClient(["garbage"]);
  const service = new ResumeExtractionService(new DocumentService(noopLogger), llmClient, noopLogger);

  await assert.rejects(
    service.extractFromText("Asha Rao, Python developer"),
    (error: unknown) =>
      error instanceof ExtractionError &&
      error.message === "Failed to extract resume after 3 attempts (json_parse_failed)." &&
      error.rawResponse === "garbage",
  );
  // Each attempt is one extraction call plus one repair call.
  assert.equal(llmClient.calls.length, 6);
});

test("a later attempt can succeed", async () => {
  const llmClient = new FakeLlmClient([
    new Error("LLM API error: HTTP 400 - bad request"),
    JSON.stringify(EXTRACTED),
  ]);
  const service = new ResumeExtractionService(new DocumentService(noopLogger), llmClient, noopLogger);
  const resume = await service.extractFromText("Asha Rao");
  assert.equal(resume.email, "asha@example.com");
  assert.equal(llmClient.calls.length, 2);
});

test("blank text is an extraction error", async () => {
  const service = new ResumeExtractionService(new DocumentService(noopLogger), new FakeLlmClient(["{}"]), noopLogger);
  await assert.rejects(service.extractFromText("   "), ExtractionError);
});

test("documents are typed by mime type or file name", () => {
  const documents = new DocumentService(noopLogger);
  assert.equal(documents.detectDocumentType("cv.PDF"), "pdf");
  assert.equal(documents.detectDocumentType(undefined, "application/pdf"), "pdf");
  assert.equal(documents.detectDocumentType("cv.docx"), "docx");
  assert.equal(documents.detectDocumentType("cv.txt", "text/plain"), "unknown");
});

test("unsupported documents are rejected before parsing", async () => {
  const documents = new DocumentService(noopLogger);
  await assert.rejects(
    documents.extractText(Buffer.from("plain text"), "cv.txt", "text/plain"),
    (error: unknown) =>
      error instanceof ExtractionError && error.message === "Unsupported document type. Please upload PDF or DOCX.",
  );
});
