import { z } from "zod";
import { LESSON_BLOCK_KINDS, Lesson, LessonCreate } from "../domain/lesson";
import { COLLECTIONS } from "./collections";
import { DocumentStore } from "./documentStore";

const storedLessonSchema = z
  .object({
    id: z.string(),
    title: z.string().default(""),
    description: z.string().nullable().default(null),
    content_blocks: z
      .array(z.object({ kind: z.enum(LESSON_BLOCK_KINDS), content: z.record(z.unknown()) }))
      .default([]),
  })
  .passthrough();

export class LessonStore {
  constructor(private readonly documents: DocumentStore) {}

  async create(payload: LessonCreate): Promise<Lesson> {
    const id = await this.documents.createDocument(COLLECTIONS.lesson, { ...payload });
    return { id, ...payload };
  }

  async getAll(): Promise<Lesson[]> {
    const docs = await this.documents.getDocuments(COLLECTIONS.lesson);
    const lessons: Lesson[] = [];

    for (const doc of docs) {
      const parsed = storedLessonSchema.safeParse(doc);
      if (parsed.success) {
        lessons.push(parsed.data);
      } else {
        console.error(`Skipping unreadable lesson ${doc.id}:`, parsed.error.message);
      }
    }
    return lessons;
  }

  async getById(id: string): Promise<Lesson | null> {
    const doc = await this.documents.findById(COLLECTIONS.lesson, id);
    return doc ? storedLessonSchema.parse(doc) : null;
  }
}
