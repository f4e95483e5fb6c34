import { z } from "zod";

export const LESSON_BLOCK_KINDS = ["text", "quiz", "image", "video"] as const;

export type LessonBlockKind = (typeof LESSON_BLOCK_KINDS)[number];

export const lessonBlockSchema = z.object({
  kind: z.enum(LESSON_BLOCK_KINDS),
  content: z.record(z.unknown()),
});

export const lessonCreateSchema = z.object({
  title: z.string(),
  description: z.string().nullable().default(null),
  content_blocks: z.array(lessonBlockSchema).default([]),
});

export interface LessonBlock {
  kind: LessonBlockKind;
  content: Record<string, unknown>;
}

export interface LessonCreate {
  title: string;
  description: string | null;
  content_blocks: LessonBlock[];
}

export interface Lesson extends LessonCreate {
  id: string;
}
