import { randomUUID } from "crypto";
import { QuestionGenerator, UploadedSource } from "./questionGenerator";
import { Question } from "./question";

/**
 * TemplateQuestionGenerator returns the same three questions for every upload.
 * Only the file name is used; the file contents are never read.
 */
export class TemplateQuestionGenerator implements QuestionGenerator {
  async generateQuestions(source: UploadedSource): Promise<Question[]> {
    return [
      {
        id: randomUUID(),
        prompt: `Describe the main concept from ${source.filename}.`,
        type: "short_answer",
        options: null,
        answer_key: null,
        points: 5,
      },
      {
        id: randomUUID(),
        prompt: "Which option best matches the definition?",
        type: "multiple_choice",
        options: ["Option A", "Option B", "Option C", "Option D"],
        answer_key: 1,
        points: 3,
      },
      {
        id: randomUUID(),
        prompt: "Write a short essay explaining the implications.",
        type: "essay",
        options: null,
        answer_key: null,
        points: 10,
      },
    ];
  }
}
