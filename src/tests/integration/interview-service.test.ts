import assert from "node:assert/strict";
import { test } from "node:test";
import { FALLBACK_ASSESSMENT } from "../../interviews/interview-assessment.service";
import { InterviewService } from "../../interviews/interview.service";
import { QuestionBank } from "../../interviews/question-bank";
import { SessionBusyError, SessionNotActiveError, SessionNotFoundError, UnknownRoleError } from "../../shared/errors";
import type { AnalysisResult, ConversationSummary } from "../../shared/types/interview.types";
import { SessionStore } from "../../state/session-store";
import type { PersistedInterviewRecord, TranscriptStore } from "../../storage/interview-storage.service";
import {
  buildResume,
  buildTestBank,
  createRecordingLogger,
  FakeOracle,
  firstPick,
  NO_FOLLOWUP_ANALYSIS,
} from "../helpers/interview-fakes";

class MemoryTranscriptStore implements TranscriptStore {
  readonly saved: PersistedInterviewRecord[] = [];
  failWith: Error | null = null;

  async save(record: PersistedInterviewRecord): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saved.push(record);
    return `memory://${record.sessionId}`;
  }
}

function createService(
  options: { oracle?: FakeOracle; transcriptStore?: TranscriptStore; now?: () => number; bank?: QuestionBank } = {},
) {
  const logger = createRecordingLogger();
  const assessed: ConversationSummary[] = [];
  let nextId = 0;
  const service = new InterviewService({
    questionBank: options.bank ?? buildTestBank(),
    oracle: options.oracle ?? new FakeOracle(),
    assessor: {
      async assess(summary) {
        assessed.push(summary);
        return FALLBACK_ASSESSMENT;
      },
    },
    sessionStore: new SessionStore(5, options.now),
    transcriptStore: options.transcriptStore,
    logger,
    random: firstPick,
    clock: () => new Date("2025-03-01T10:00:00.000Z"),
    createId: () => {
      nextId += 1;
      return `session-${nextId}`;
    },
  });
  return { service, logger, assessed };
}

async function answerUntilDone(service: InterviewService, sessionId: string): Promise<number> {
  let turns = 0;
  for (;;) {
    turns += 1;
    const result = await service.answer(sessionId, `answer ${turns}`);
    if (result.status === "completed") {
      return turns;
    }
  }
}

test("start creates independent sessions", () => {
  const { service } = createService();
  const first = service.start(buildResume(), "qa");
  const second = service.start(buildResume({ name: "Ravi" }));

  assert.equal(first.sessionId, "session-1");
  assert.equal(second.sessionId, "session-2");
  assert.equal(second.question.startsWith("Hello Ravi!"), true);
  assert.equal(service.info("session-1").role, "qa");
  assert.equal(service.info("session-2").role, null);
});

test("start with an unknown role stores nothing", () => {
  const { service } = createService();
  assert.throws(() => service.start(buildResume(), "pilot"), UnknownRoleError);
  assert.throws(() => service.info("session-1"), SessionNotFoundError);
});

test("listRoles describes every catalogue role", () => {
  const { service } = createService({ bank: new QuestionBank() });
  assert.deepEqual(service.listRoles()[2], {
    key: "mern_stack",
    displayName: "MERN Stack Developer",
    questionCount: 10,
  });
});

test("a second answer while one is in flight is rejected", async () => {
  const oracle = new FakeOracle();
  let release: (value: AnalysisResult) => void = () => undefined;
  oracle.analyze = () =>
    new Promise<AnalysisResult>((resolve) => {
      release = resolve;
    });
  const { service } = createService({ oracle });
  const { sessionId } = service.start(buildResume());

  const pending = service.answer(sessionId, "first");
  await assert.rejects(service.answer(sessionId, "second"), SessionBusyError);
  release(NO_FOLLOWUP_ANALYSIS);
  const result = await pending;
  assert.equal(result.status, "success");
  assert.equal(service.summary(sessionId).conversationHistory.length, 1);

  oracle.analyze = () => NO_FOLLOWUP_ANALYSIS;
  assert.equal((await service.answer(sessionId, "third")).status, "success");
});

test("a completed interview saves its transcript once", async () => {
  const transcriptStore = new MemoryTranscriptStore();
  const { service, logger } = createService({ transcriptStore });
  const { sessionId } = service.start(buildResume(), "qa");

  assert.equal(await answerUntilDone(service, sessionId), 8);
  await service.complete(sessionId);

  assert.equal(transcriptStore.saved.length, 1);
  const record = transcriptStore.saved[0];
  assert.equal(record.sessionId, sessionId);
  assert.equal(record.role, "qa");
  assert.equal(record.startedAt, "2025-03-01T10:00:00.000Z");
  assert.equal(record.conversationHistory.length, 4);
  assert.equal(record.technicalAnswers.length, 4);
  assert.equal(record.stats.questionsAnswered, 8);
  assert.equal(logger.entries.some((entry) => entry.message === "interview.transcript.saved"), true);
  await assert.rejects(service.answer(sessionId, "late"), SessionNotActiveError);
});

test("a failing transcript store does not affect completion", async () => {
  const transcriptStore = new MemoryTranscriptStore();
  transcriptStore.failWith = new Error("disk full");
  const { service, logger } = createService({ transcriptStore });
  const { sessionId } = service.start(buildResume());

  const result = await service.complete(sessionId);
  assert.equal(result.status, "completed");
  assert.deepEqual(
    logger.entries.filter((entry) => entry.level === "error").map((entry) => entry.meta?.error),
    ["disk full"],
  );
});

test("idle sessions expire", () => {
  let nowMs = 0;
  const { service } = createService({ now: () => nowMs });
  const { sessionId } = service.start(buildResume());

  nowMs = 4 * 60_000;
  assert.equal(service.info(sessionId).state, "in_progress");
  nowMs += 5 * 60_000 + 1;
  assert.throws(() => service.info(sessionId), SessionNotFoundError);
});

test("reset, assess and delete act on the stored session", async () => {
  const { service, assessed } = createService();
  const { sessionId } = service.start(buildResume(), "qa");
  await service.answer(sessionId, "hello");

  assert.deepEqual(await service.assess(sessionId), FALLBACK_ASSESSMENT);
  assert.equal(assessed[0].conversationHistory[0].answerText, "hello");

  assert.equal(service.reset(sessionId).state, "not_started");
  await assert.rejects(service.answer(sessionId, "after reset"), SessionNotActiveError);

  service.delete(sessionId);
  assert.throws(() => service.info(sessionId), SessionNotFoundError);
  assert.throws(() => service.delete(sessionId), SessionNotFoundError);
});

test("complete, reset and delete wait for an in-flight answer", async () => {
  const oracle = new FakeOracle();
  let release: (value: AnalysisResult) => void = () => undefined;
  oracle.analyze = () =>
    new Promise<AnalysisResult>((resolve) => {
      release = resolve;
    });
  const { service } = createService({ oracle });
  const { sessionId } = service.start(buildResume());

  const pending = service.answer(sessionId, "first");
  await assert.rejects(service.complete(sessionId), SessionBusyError);
  assert.throws(() => service.reset(sessionId), SessionBusyError);
  assert.throws(() => service.delete(sessionId), SessionBusyError);

  release(NO_FOLLOWUP_ANALYSIS);
  assert.equal((await pending).status, "success");
  assert.equal((await service.complete(sessionId)).status, "completed");
});

test("the transcript flag lives on the session and clears on reset", async () => {
  const transcriptStore = new MemoryTranscriptStore();
  const { service } = createService({ transcriptStore });
  const { sessionId } = service.start(buildResume());

  await service.complete(sessionId);
  await service.complete(sessionId);
  assert.equal(transcriptStore.saved.length, 1);

  service.reset(sessionId);
  const { sessionId: otherId } = service.start(buildResume());
  await service.complete(otherId);
  assert.deepEqual(
    transcriptStore.saved.map((record) => record.sessionId),
    [sessionId, otherId],
  );
});
