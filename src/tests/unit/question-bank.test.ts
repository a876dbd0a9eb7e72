import assert from "node:assert/strict";
import { test } from "node:test";
import { QuestionBank } from "../../interviews/question-bank";
import { UnknownRoleError } from "../../shared/errors";
import { createSeededRandom } from "../../shared/utils/random";
import { buildTestBank, firstPick } from "../helpers/interview-fakes";

test("default catalogue exposes the three roles with display names", () => {
  const bank = new QuestionBank();
  assert.deepEqual(bank.roles(), ["python_developer", "java_developer", "mern_stack"]);
  assert.equal(bank.displayName("python_developer"), "Python Developer");
  assert.equal(bank.displayName("java_developer"), "Java Developer");
  assert.equal(bank.displayName("mern_stack"), "MERN Stack Developer");
  assert.equal(bank.questionCount("java_developer"), 10);
});

test("unknown roles report zero questions and keep their key as display name", () => {
  const bank = new QuestionBank();
  assert.equal(bank.has("cobol_developer"), false);
  assert.equal(bank.questionCount("cobol_developer"), 0);
  assert.equal(bank.displayName("cobol_developer"), "cobol_developer");
});

test("questionsFor returns a copy in catalogue order", () => {
  const bank = new QuestionBank();
  const questions = bank.questionsFor("python_developer");
  assert.equal(questions[0], "Explain the difference between deep copy and shallow copy in Python.");
  questions.pop();
  assert.equal(bank.questionsFor("python_developer").length, 10);
});

test("sample draws distinct questions from the role", () => {
  const bank = new QuestionBank();
  const all = new Set(bank.questionsFor("mern_stack"));
  const sample = bank.sample("mern_stack", 4, createSeededRandom(42));
  assert.equal(sample.length, 4);
  assert.equal(new Set(sample).size, 4);
  for (const question of sample) {
    assert.equal(all.has(question), true);
  }
});

test("sample with the same seed repeats the same order", () => {
  const bank = new QuestionBank();
  assert.deepEqual(
    bank.sample("java_developer", 4, createSeededRandom(11)),
    bank.sample("java_developer", 4, createSeededRandom(11)),
  );
});

test("sample keeps catalogue order when every draw picks the first remaining item", () => {
  assert.deepEqual(buildTestBank().sample("qa", 3, firstPick), ["T1", "T2", "T3"]);
});

test("sample larger than the catalogue returns every question once", () => {
  assert.deepEqual(buildTestBank().sample("qa", 12), ["T1", "T2", "T3", "T4", "T5"]);
});

test("unknown role fails questionsFor and sample", () => {
  const bank = new QuestionBank();
  assert.throws(() => bank.questionsFor("rust_developer"), UnknownRoleError);
  assert.throws(
    () => bank.sample("rust_developer", 4),
    (error: unknown) =>
      error instanceof UnknownRoleError &&
      error.code === "unknown_role" &&
      error.availableRoles.join(",") === "python_developer,java_developer,mern_stack",
  );
});
