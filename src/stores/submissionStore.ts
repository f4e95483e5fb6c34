import { z } from "zod";
import { GradeResult } from "../domain/grade";
import { Submission, SubmissionCreate } from "../domain/submission";
import { COLLECTIONS } from "./collections";
import { DocumentStore } from "./documentStore";

const storedFeedbackSchema = z.object({
  question_index: z.number(),
  points: z.number(),
  earned: z.number(),
  correctness: z.number(),
  feedback: z.string(),
});

const storedSubmissionSchema = z
  .object({
    id: z.string(),
    assessment_id: z.string(),
    student_name: z.string().nullable().default(null),
    answers: z
      .array(
        z
          .object({
            question_index: z.number(),
            question_id: z.string().optional(),
            answer: z.unknown(),
          })
          .passthrough()
      )
      .default([]),
    graded: z.boolean().optional(),
    total_points: z.number().optional(),
    score: z.number().optional(),
    feedback: z.array(storedFeedbackSchema).optional(),
  })
  .passthrough();

export class SubmissionStore {
  constructor(private readonly documents: DocumentStore) {}

  async create(payload: SubmissionCreate): Promise<Submission> {
    const id = await this.documents.createDocument(COLLECTIONS.submission, { ...payload });
    return { id, ...payload };
  }

  async getById(id: string): Promise<Submission | null> {
    const doc = await this.documents.findById(COLLECTIONS.submission, id);
    return doc ? storedSubmissionSchema.parse(doc) : null;
  }

  /**
   * Overwrite the grade fields on a submission. Returns false if it no longer exists.
   */
  async saveGrade(id: string, grade: GradeResult): Promise<boolean> {
    return this.documents.updateById(COLLECTIONS.submission, id, { ...grade });
  }
}
