import { z } from "zod";
import { GradeResult } from "./grade";

export const submissionAnswerSchema = z.object({
  question_index: z.number().int(),
  question_id: z.string().min(1).optional(),
  answer: z.unknown(),
});

export const submissionCreateSchema = z.object({
  assessment_id: z.string().min(1),
  student_name: z.string().nullable().default(null),
  answers: z.array(submissionAnswerSchema),
});

export interface SubmissionAnswer {
  question_index: number; // position in the assessment's question list, not bounds-checked
  question_id?: string;
  answer?: unknown;
}

export interface SubmissionCreate {
  assessment_id: string;
  student_name: string | null;
  answers: SubmissionAnswer[];
}

/**
 * A stored submission. Grade fields are written onto the same record
 * each time the submission is graded.
 */
export interface Submission extends SubmissionCreate, Partial<GradeResult> {
  id: string;
}
