import assert from "node:assert/strict";
import { test } from "node:test";
import { noopLogger } from "../../config/logger";
import { HeuristicAnswerAnalyzer, LlmInterviewOracle, countWords } from "../../interviews/interview-oracle";
import { planResumeQuestions } from "../../interviews/resume-question-planner";
import { GenerationOracleError } from "../../shared/errors";
import type { PlannedQuestion } from "../../shared/types/interview.types";
import { FALLBACK_ENCOURAGEMENTS } from "../../shared/utils/encouragement.util";
import { buildProjects, buildResume, FakeLlmClient, firstPick } from "../helpers/interview-fakes";

const plan = planResumeQuestions(
  buildResume({
    projects: buildProjects(1),
    experience: [
      { title: "Software Engineer", company: "Acme Corp", duration: "2022 - 2024", description: "APIs" },
    ],
  }),
);

function questionOfType(type: PlannedQuestion["type"]): PlannedQuestion {
  const question = plan.find((candidate) => candidate.type === type);
  if (!question) {
    throw new Error(`No ${type} question in the test plan`);
  }
  return question;
}

function words(count: number, extra = ""): string {
  return [...Array.from({ length: count }, (_, index) => `word${index}`), extra].join(" ").trim();
}

test("LLM analysis is parsed into an analysis result", async () => {
  const llmClient = new FakeLlmClient([
    JSON.stringify({
      needs_followup: true,
      reason: "Too short",
      missing_points: ["outcome", 3, " "],
      feedback: " Add the outcome. ",
    }),
  ]);
  const oracle = new LlmInterviewOracle({ llmClient, logger: noopLogger });

  const analysis = await oracle.analyzeAnswer(questionOfType("project"), "It was a web app.");
  assert.deepEqual(analysis, {
    needsFollowup: true,
    feedback: "Add the outcome.",
    reason: "Too short",
    missingPoints: ["outcome"],
  });
  assert.equal(llmClient.calls[0].promptName, "answer_analysis_v1");
  assert.equal(llmClient.calls[0].prompt.includes('"question_type": "project"'), true);
});

test("analysis without a boolean decision is an oracle failure", async () => {
  const oracle = new LlmInterviewOracle({
    llmClient: new FakeLlmClient([JSON.stringify({ feedback: "ok" })]),
    logger: noopLogger,
  });
  await assert.rejects(
    oracle.analyzeAnswer(questionOfType("hobbies"), "chess"),
    (error: unknown) => error instanceof GenerationOracleError && error.operation === "analyze_answer",
  );
});

test("unparseable analysis after repair is an oracle failure", async () => {
  const llmClient = new FakeLlmClient(["not json", "still not json"]);
  const oracle = new LlmInterviewOracle({ llmClient, logger: noopLogger });
  await assert.rejects(
    oracle.analyzeAnswer(questionOfType("hobbies"), "chess"),
    (error: unknown) => error instanceof GenerationOracleError && error.reason === "json_parse_failed",
  );
  assert.equal(llmClient.calls.length, 2);
  assert.equal(llmClient.calls[1].promptName, "answer_analysis_v1_json_repair");
});

test("generated follow-ups and encouragement are unquoted", async () => {
  const llmClient = new FakeLlmClient(['"Which part was hardest?"', "Great detail!"]);
  const oracle = new LlmInterviewOracle({ llmClient, logger: noopLogger });
  const question = questionOfType("project");

  assert.equal(
    await oracle.generateFollowup(question, "answer", {
      needsFollowup: true,
      feedback: "",
      reason: "",
      missingPoints: [],
    }),
    "Which part was hardest?",
  );
  assert.equal(await oracle.generateEncouragement(question, "answer"), "Great detail!");
  assert.deepEqual(
    llmClient.calls.map((call) => call.kind),
    ["text", "text"],
  );
});

test("failed generation raises an oracle error naming the operation", async () => {
  const oracle = new LlmInterviewOracle({
    llmClient: new FakeLlmClient([new Error("LLM API error: HTTP 401 - unauthorized")]),
    logger: noopLogger,
  });
  await assert.rejects(
    oracle.generateEncouragement(questionOfType("hobbies"), "chess"),
    (error: unknown) =>
      error instanceof GenerationOracleError &&
      error.operation === "generate_encouragement" &&
      error.reason === "llm_failure",
  );
});

test("a configured analyzer replaces the LLM analysis call", async () => {
  const llmClient = new FakeLlmClient(["unused"]);
  const oracle = new LlmInterviewOracle({
    llmClient,
    logger: noopLogger,
    analyzer: new HeuristicAnswerAnalyzer(firstPick),
  });
  const analysis = await oracle.analyzeAnswer(questionOfType("experience"), words(16));
  assert.equal(analysis.needsFollowup, true);
  assert.equal(llmClient.calls.length, 0);
});

test("heuristic follow-ups for experience and challenging projects", async () => {
  const analyzer = new HeuristicAnswerAnalyzer(firstPick);
  const project = questionOfType("project");
  const experience = questionOfType("experience");

  assert.deepEqual(await analyzer.analyzeAnswer(project, words(20, "challenge")), {
    needsFollowup: true,
    feedback: "Great detail about the challenges you faced!",
    reason: "The answer mentions challenges worth exploring.",
    missingPoints: [],
  });
  assert.equal((await analyzer.analyzeAnswer(project, words(21))).needsFollowup, false);
  assert.equal((await analyzer.analyzeAnswer(project, words(19, "challenge"))).needsFollowup, false);
  assert.equal((await analyzer.analyzeAnswer(experience, words(16))).feedback, "Interesting experience! I'd like to know more.");
  assert.equal((await analyzer.analyzeAnswer(experience, words(15))).needsFollowup, false);
  assert.equal((await analyzer.analyzeAnswer(questionOfType("hobbies"), words(40))).needsFollowup, false);
});

test("heuristic generation uses the fixed lines", async () => {
  const analyzer = new HeuristicAnswerAnalyzer(firstPick);
  assert.equal(
    await analyzer.generateFollowup(questionOfType("experience")),
    "What was the most valuable thing you learned from that experience?",
  );
  assert.equal(
    await analyzer.generateFollowup(questionOfType("introduction")),
    "That's interesting! Can you give me a specific example?",
  );
  assert.equal(await analyzer.generateEncouragement(), FALLBACK_ENCOURAGEMENTS[0]);
});

test("countWords splits on whitespace", () => {
  assert.equal(countWords("  one two\nthree\tfour "), 4);
  assert.equal(countWords("   "), 0);
});
