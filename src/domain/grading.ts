import { isDeepStrictEqual } from "util";
import { GradeResult, QuestionFeedback } from "./grade";
import { roundHalfEven } from "./rounding";

/**
 * A question as the engine sees it. Stored assessments are read permissively,
 * so `type` is any string and `points` may be missing.
 */
export interface GradableQuestion {
  id?: string;
  prompt?: string;
  type?: string;
  answer_key?: unknown;
  points?: number;
}

export interface GradableAnswer {
  question_index: number;
  question_id?: string;
  answer?: unknown;
}

interface Verdict {
  correctness: number;
  rationale: string;
}

const DEFAULT_VERDICT: Verdict = {
  correctness: 0.5,
  rationale: "Partial credit: baseline heuristic",
};

const KEYWORD_TARGET = 5;
const ESSAY_FULL_CREDIT_LENGTH = 200;
const ESSAY_PARTIAL_CREDIT_LENGTH = 80;

/**
 * Coerce an arbitrary submitted answer to text for the word and length rules.
 */
export function answerText(answer: unknown): string {
  if (answer === undefined || answer === null) return "";
  if (typeof answer === "string") return answer;
  if (typeof answer === "number" || typeof answer === "boolean" || typeof answer === "bigint") {
    return String(answer);
  }
  return JSON.stringify(answer) ?? "";
}

export function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word.length > 0)
  );
}

export function scoreMultipleChoice(answer: unknown, answerKey: unknown): Verdict {
  if (answerKey === undefined || answerKey === null) {
    return DEFAULT_VERDICT;
  }
  return isDeepStrictEqual(answer, answerKey)
    ? { correctness: 1.0, rationale: "Correct option" }
    : { correctness: 0.0, rationale: "Incorrect option" };
}

export function scoreShortAnswer(prompt: string, answer: unknown): Verdict {
  const promptWords = wordSet(prompt);
  const answerWords = wordSet(answerText(answer));

  let overlap = 0;
  for (const word of answerWords) {
    if (promptWords.has(word)) overlap++;
  }

  return {
    correctness: Math.min(1.0, overlap / KEYWORD_TARGET),
    rationale: `Keyword overlap score: ${overlap}`,
  };
}

export function scoreEssay(answer: unknown): Verdict {
  // Code points, not UTF-16 units
  const length = Array.from(answerText(answer)).length;

  let correctness = 0.3;
  if (length > ESSAY_FULL_CREDIT_LENGTH) {
    correctness = 1.0;
  } else if (length > ESSAY_PARTIAL_CREDIT_LENGTH) {
    correctness = 0.6;
  }

  return { correctness, rationale: `Length heuristic: ${length} chars` };
}

/**
 * Find the answer for the question at `index`. An answer tagged with the
 * question's id takes precedence; otherwise the first answer at that index
 * that is not tagged for some other question.
 */
export function findAnswer(
  question: GradableQuestion,
  index: number,
  answers: GradableAnswer[]
): GradableAnswer | undefined {
  if (question.id) {
    const byId = answers.find((a) => a.question_id === question.id);
    if (byId) return byId;
  }
  return answers.find(
    (a) =>
      a.question_index === index && (a.question_id === undefined || a.question_id === question.id)
  );
}

function judge(question: GradableQuestion, answer: GradableAnswer | undefined): Verdict {
  if (!answer) return DEFAULT_VERDICT;

  switch (question.type) {
    case "multiple_choice":
      return scoreMultipleChoice(answer.answer, question.answer_key);
    case "short_answer":
      return scoreShortAnswer(question.prompt ?? "", answer.answer);
    case "essay":
      return scoreEssay(answer.answer);
    default:
      return DEFAULT_VERDICT;
  }
}

/**
 * Grade a set of answers against an ordered list of questions.
 *
 * Pure: holds no state between calls and never throws on odd input.
 * Unanswered questions and unknown question types get 0.5 correctness.
 */
export function gradeAnswers(
  questions: GradableQuestion[],
  answers: GradableAnswer[]
): GradeResult {
  const feedback: QuestionFeedback[] = [];
  let totalPoints = 0;
  let earnedTotal = 0;

  questions.forEach((question, index) => {
    const points = question.points ?? 1;
    const { correctness, rationale } = judge(question, findAnswer(question, index, answers));
    const earned = roundHalfEven(points * correctness);

    totalPoints += points;
    earnedTotal += earned;
    feedback.push({
      question_index: index,
      points,
      earned,
      correctness: roundHalfEven(correctness, 2),
      feedback: rationale,
    });
  });

  const score = totalPoints > 0 ? roundHalfEven((earnedTotal / totalPoints) * 100, 2) : 0.0;

  return {
    graded: true,
    total_points: totalPoints,
    score,
    feedback,
  };
}
