import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  AnswerRecord,
  PlannedQuestion,
  QuestionStats,
  TechnicalAnswer,
} from "../shared/types/interview.types";
import type { ResumeRecord } from "../shared/types/resume.types";

export interface PersistedInterviewRecord {
  sessionId: string;
  role: string | null;
  startedAt: string;
  completedAt: string;
  resume: ResumeRecord | null;
  plan: ReadonlyArray<PlannedQuestion>;
  conversationHistory: ReadonlyArray<AnswerRecord>;
  technicalAnswers: ReadonlyArray<TechnicalAnswer>;
  stats: QuestionStats;
}

export interface TranscriptStore {
  save(record: PersistedInterviewRecord): Promise<string>;
}

export class InterviewStorageService implements TranscriptStore {
  private readonly storageDir: string;

  constructor(storageDir: string) {
    this.storageDir = path.resolve(storageDir);
  }

  async save(record: PersistedInterviewRecord): Promise<string> {
    await mkdir(this.storageDir, { recursive: true });

    const rolePrefix = record.role ?? "general";
    const timestamp = toFileTimestamp(record.completedAt);
    const fileName = `${rolePrefix}_${record.sessionId}_${timestamp}.json`;
    const filePath = path.join(this.storageDir, fileName);

    await writeFile(filePath, JSON.stringify(record, null, 2), "utf-8");
    return filePath;
  }
}

function toFileTimestamp(isoTimestamp: string): string {
  return isoTimestamp.replace(/[:.]/g, "-");
}
