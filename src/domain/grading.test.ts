import {
  answerText,
  findAnswer,
  gradeAnswers,
  GradableQuestion,
  scoreEssay,
  scoreMultipleChoice,
  scoreShortAnswer,
  wordSet,
} from "./grading";

describe("grading", () => {
  describe("scoreMultipleChoice", () => {
    it("gives full credit for the exact key", () => {
      expect(scoreMultipleChoice(1, 1)).toEqual({ correctness: 1.0, rationale: "Correct option" });
      expect(scoreMultipleChoice("B", "B").correctness).toBe(1.0);
    });

    it("gives no credit for any other value", () => {
      expect(scoreMultipleChoice(2, 1)).toEqual({ correctness: 0.0, rationale: "Incorrect option" });
    });

    it("does not coerce types", () => {
      expect(scoreMultipleChoice("1", 1).correctness).toBe(0.0);
      expect(scoreMultipleChoice(true, 1).correctness).toBe(0.0);
    });

    it("compares structured keys by value", () => {
      expect(scoreMultipleChoice([0, 2], [0, 2]).correctness).toBe(1.0);
      expect(scoreMultipleChoice([2, 0], [0, 2]).correctness).toBe(0.0);
    });

    it("falls back to the baseline when the key is absent", () => {
      expect(scoreMultipleChoice(1, null)).toEqual({
        correctness: 0.5,
        rationale: "Partial credit: baseline heuristic",
      });
      expect(scoreMultipleChoice(1, undefined).correctness).toBe(0.5);
    });
  });

  describe("wordSet", () => {
    it("lowercases and splits on whitespace runs", () => {
      expect([...wordSet("  The  cat\tthe\nCAT ")]).toEqual(["the", "cat"]);
    });

    it("returns an empty set for blank text", () => {
      expect(wordSet("   ").size).toBe(0);
    });
  });

  describe("scoreShortAnswer", () => {
    const prompt = "Explain how plants make food from sunlight and water";

    it("scores k shared words as k/5", () => {
      const verdict = scoreShortAnswer(prompt, "Plants use sunlight");

      expect(verdict.correctness).toBe(0.4);
      expect(verdict.rationale).toBe("Keyword overlap score: 2");
    });

    it("caps at 1.0", () => {
      const verdict = scoreShortAnswer(prompt, "plants make food from sunlight and water");

      expect(verdict.correctness).toBe(1.0);
      expect(verdict.rationale).toBe("Keyword overlap score: 7");
    });

    it("counts repeated words once", () => {
      expect(scoreShortAnswer(prompt, "water water WATER").correctness).toBe(0.2);
    });

    it("does not strip punctuation", () => {
      expect(scoreShortAnswer(prompt, "water.").correctness).toBe(0);
    });

    it("is non-decreasing as shared words are added", () => {
      const words = ["explain", "how", "plants", "make", "food", "from", "sunlight"];
      let previous = 0;
      for (let k = 1; k <= words.length; k++) {
        const correctness = scoreShortAnswer(prompt, words.slice(0, k).join(" ")).correctness;
        expect(correctness).toBeGreaterThanOrEqual(previous);
        expect(correctness).toBe(Math.min(1, k / 5));
        previous = correctness;
      }
    });
  });

  describe("scoreEssay", () => {
    it("buckets by length with breakpoints at 80 and 200", () => {
      expect(scoreEssay("a".repeat(80)).correctness).toBe(0.3);
      expect(scoreEssay("a".repeat(81)).correctness).toBe(0.6);
      expect(scoreEssay("a".repeat(200)).correctness).toBe(0.6);
      expect(scoreEssay("a".repeat(201)).correctness).toBe(1.0);
    });

    it("reports the length in the rationale", () => {
      expect(scoreEssay("a".repeat(50)).rationale).toBe("Length heuristic: 50 chars");
    });

    it("counts code points", () => {
      expect(scoreEssay("🙂".repeat(81)).rationale).toBe("Length heuristic: 81 chars");
    });

    it("coerces non-string answers", () => {
      expect(scoreEssay(12345).rationale).toBe("Length heuristic: 5 chars");
      expect(scoreEssay(null).rationale).toBe("Length heuristic: 0 chars");
    });
  });

  describe("answerText", () => {
    it("renders structured answers as JSON", () => {
      expect(answerText({ a: 1 })).toBe('{"a":1}');
      expect(answerText([1, 2])).toBe("[1,2]");
      expect(answerText(false)).toBe("false");
      expect(answerText(undefined)).toBe("");
    });
  });

  describe("findAnswer", () => {
    it("returns the first answer at the index", () => {
      const answers = [
        { question_index: 0, answer: "first" },
        { question_index: 0, answer: "second" },
      ];

      expect(findAnswer({ type: "essay" }, 0, answers)?.answer).toBe("first");
    });

    it("prefers an answer tagged with the question id", () => {
      const answers = [
        { question_index: 0, answer: "by index" },
        { question_index: 3, question_id: "q-a", answer: "by id" },
      ];

      expect(findAnswer({ id: "q-a" }, 0, answers)?.answer).toBe("by id");
    });

    it("skips an answer at the index that is tagged for another question", () => {
      const answers = [{ question_index: 0, question_id: "q-b", answer: 1 }];

      expect(findAnswer({ id: "q-a" }, 0, answers)).toBeUndefined();
      expect(findAnswer({ id: "q-b" }, 1, answers)?.answer).toBe(1);
    });

    it("ignores out of range indices", () => {
      expect(findAnswer({}, 1, [{ question_index: 7, answer: "x" }])).toBeUndefined();
    });
  });

  describe("gradeAnswers", () => {
    it("grades a multiple choice and a short essay", () => {
      const questions: GradableQuestion[] = [
        { prompt: "Pick one", type: "multiple_choice", answer_key: 1, points: 3 },
        { prompt: "Write", type: "essay", points: 10 },
      ];
      const answers = [
        { question_index: 0, answer: 1 },
        { question_index: 1, answer: "x".repeat(50) },
      ];

      const result = gradeAnswers(questions, answers);

      expect(result).toEqual({
        graded: true,
        total_points: 13,
        score: 46.15,
        feedback: [
          { question_index: 0, points: 3, earned: 3, correctness: 1.0, feedback: "Correct option" },
          {
            question_index: 1,
            points: 10,
            earned: 3,
            correctness: 0.3,
            feedback: "Length heuristic: 50 chars",
          },
        ],
      });
    });

    it("gives unanswered questions half credit", () => {
      const questions: GradableQuestion[] = [
        { prompt: "a", type: "essay", points: 10 },
        { prompt: "b", type: "essay", points: 10 },
        { prompt: "c", type: "short_answer", points: 4 },
      ];

      const result = gradeAnswers(questions, [{ question_index: 0, answer: "y".repeat(201) }]);

      expect(result.feedback[2]).toEqual({
        question_index: 2,
        points: 4,
        earned: 2,
        correctness: 0.5,
        feedback: "Partial credit: baseline heuristic",
      });
      expect(result.total_points).toBe(24);
      // 10 + 5 + 2 = 17 of 24
      expect(result.score).toBe(70.83);
    });

    it("rounds half points to even", () => {
      const questions: GradableQuestion[] = [
        { type: "essay", points: 5 },
        { type: "essay", points: 3 },
        { type: "essay", points: 1 },
      ];

      const earned = gradeAnswers(questions, []).feedback.map((f) => f.earned);

      expect(earned).toEqual([2, 2, 0]);
    });

    it("scores an id-tagged answer on one question only", () => {
      const questions: GradableQuestion[] = [
        { id: "q-a", type: "multiple_choice", answer_key: 1, points: 4 },
        { id: "q-b", type: "multiple_choice", answer_key: 1, points: 4 },
      ];

      const result = gradeAnswers(questions, [{ question_index: 0, question_id: "q-b", answer: 1 }]);

      expect(result.feedback.map((f) => [f.earned, f.feedback])).toEqual([
        [2, "Partial credit: baseline heuristic"],
        [4, "Correct option"],
      ]);
      expect(result.score).toBe(75);
    });

    it("treats unknown question types as the baseline even when answered", () => {
      const result = gradeAnswers(
        [{ prompt: "Draw", type: "diagram", points: 2 }],
        [{ question_index: 0, answer: "picture" }]
      );

      expect(result.feedback[0].correctness).toBe(0.5);
      expect(result.feedback[0].earned).toBe(1);
    });

    it("defaults missing points to 1", () => {
      const result = gradeAnswers(
        [{ type: "multiple_choice", answer_key: "A" }],
        [{ question_index: 0, answer: "A" }]
      );

      expect(result.total_points).toBe(1);
      expect(result.score).toBe(100);
    });

    it("scores 0 when there are no points available", () => {
      expect(gradeAnswers([], [{ question_index: 0, answer: "x" }])).toEqual({
        graded: true,
        total_points: 0,
        score: 0,
        feedback: [],
      });
    });

    it("counts every question toward the total regardless of answers", () => {
      const questions: GradableQuestion[] = [
        { type: "essay", points: 4 },
        { type: "essay", points: 6 },
      ];

      expect(gradeAnswers(questions, []).total_points).toBe(10);
    });

    it("returns identical results on repeated calls", () => {
      const questions: GradableQuestion[] = [
        { prompt: "Name the main parts of a cell", type: "short_answer", points: 5 },
      ];
      const answers = [{ question_index: 0, answer: "The cell has parts" }];

      expect(gradeAnswers(questions, answers)).toEqual(gradeAnswers(questions, answers));
    });
  });
});
