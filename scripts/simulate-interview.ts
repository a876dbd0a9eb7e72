import { readFile } from "node:fs/promises";
import path from "node:path";
import { createLogger } from "../src/config/logger";
import { HeuristicAnswerAnalyzer } from "../src/interviews/interview-oracle";
import { InterviewSession } from "../src/interviews/interview-session";
import { QuestionBank } from "../src/interviews/question-bank";
import { normalizeResumeRecord } from "../src/resumes/resume-normalizer";
import { isRecord } from "../src/shared/utils/is-record";
import { createSeededRandom } from "../src/shared/utils/random";

const DEFAULT_RESUME_PATH = path.join(__dirname, "fixtures", "sample-resume.json");

const SCRIPTED_ANSWERS = [
  "I studied computer science and I enjoy building backend services that other teams depend on.",
  "skip",
  "The hardest challenge was keeping balances consistent when several devices synced offline, so I added a merge step keyed on transaction ids and timestamps.",
  "I used websockets with a small fan-out layer.",
  "During the internship I owned two reporting endpoints, wrote their SQL and cut the slowest query from seconds to milliseconds by adding an index.",
];

async function run(): Promise<void> {
  const resumePath = process.argv[2] ?? DEFAULT_RESUME_PATH;
  const role = process.argv[3] ?? "python_developer";
  const raw: unknown = JSON.parse(await readFile(resumePath, "utf-8"));
  if (!isRecord(raw)) {
    throw new Error(`Resume file must contain a JSON object: ${resumePath}`);
  }

  const random = createSeededRandom(7);
  const session = new InterviewSession({
    id: "simulation",
    role,
    oracle: new HeuristicAnswerAnalyzer(random),
    questionBank: new QuestionBank(),
    logger: createLogger({ minLevel: "warn" }),
    random,
  });

  const first = session.initialize(normalizeResumeRecord(raw));
  console.log(`Q: ${first.question}`);

  let turn = 0;
  while (session.isActive()) {
    const answer = SCRIPTED_ANSWERS[turn] ?? `Answer number ${turn + 1} with a short explanation.`;
    turn += 1;
    console.log(`A: ${answer}`);
    const result = await session.processAnswer(answer);
    if (result.status === "completed") {
      console.log(result.message);
      console.log("Stats:", result.sessionInfo.stats);
      break;
    }
    console.log(`   ${result.positiveResponse}`);
    console.log(`Q${result.isFollowup ? " (follow-up)" : ""}: ${result.question}`);
  }
}

run().catch((error) => {
  console.error("simulate-interview failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
