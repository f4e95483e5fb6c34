import { Question } from "./question";

export interface UploadedSource {
  filename: string;
  mimetype?: string;
  size: number;
  buffer: Buffer;
}

export interface QuestionGenerator {
  /**
   * Produce questions for an assessment built from an uploaded file.
   * Returns a promise since real generators may parse documents or call external APIs.
   */
  generateQuestions(source: UploadedSource): Promise<Question[]>;
}
