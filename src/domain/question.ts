import { z } from "zod";

export const QUESTION_TYPES = ["short_answer", "multiple_choice", "essay"] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const questionSchema = z.object({
  id: z.string().min(1).optional(),
  prompt: z.string(),
  type: z.enum(QUESTION_TYPES).default("short_answer"),
  options: z.array(z.string()).nullable().default(null), // only for multiple_choice
  answer_key: z.unknown().transform((value) => value ?? null),
  points: z.number().int().positive().default(1),
});

export type QuestionInput = z.input<typeof questionSchema>;

export interface Question {
  id?: string;
  prompt: string;
  type: QuestionType;
  options: string[] | null;
  answer_key: unknown;
  points: number;
}
