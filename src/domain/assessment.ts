import { z } from "zod";
import { Question, questionSchema } from "./question";

export const assessmentCreateSchema = z.object({
  title: z.string(),
  description: z.string().nullable().default(null),
  source_type: z.string().nullable().default(null), // pdf | ppt | image | text | file
  source_reference: z.string().nullable().default(null),
  questions: z.array(questionSchema).default([]),
});

export interface AssessmentCreate {
  title: string;
  description: string | null;
  source_type: string | null;
  source_reference: string | null;
  questions: Question[];
}

export interface Assessment extends AssessmentCreate {
  id: string;
}
