import { randomUUID } from "crypto";
import { z } from "zod";
import { Assessment, AssessmentCreate } from "../domain/assessment";
import { COLLECTIONS } from "./collections";
import { DocumentStore, StoredDocument } from "./documentStore";

// Stored documents are read leniently: missing fields take defaults and
// unknown question types reach the grader as-is. Listing skips documents
// that still do not parse.
const storedQuestionSchema = z
  .object({
    id: z.string().optional(),
    prompt: z.string().default(""),
    type: z.string().default("short_answer"),
    options: z.array(z.string()).nullable().default(null),
    answer_key: z.unknown().transform((value) => value ?? null),
    points: z.number().default(1),
  })
  .passthrough();

const storedAssessmentSchema = z
  .object({
    id: z.string(),
    title: z.string().default(""),
    description: z.string().nullable().default(null),
    source_type: z.string().nullable().default(null),
    source_reference: z.string().nullable().default(null),
    questions: z.array(storedQuestionSchema).default([]),
  })
  .passthrough();

export type StoredAssessment = z.infer<typeof storedAssessmentSchema>;

export class AssessmentStore {
  constructor(private readonly documents: DocumentStore) {}

  /**
   * Save a new assessment. Questions without an id are given one.
   */
  async create(payload: AssessmentCreate): Promise<Assessment> {
    const data: AssessmentCreate = {
      ...payload,
      questions: payload.questions.map((q) => ({ ...q, id: q.id ?? randomUUID() })),
    };
    const id = await this.documents.createDocument(COLLECTIONS.assessment, { ...data });
    return { id, ...data };
  }

  async getAll(): Promise<StoredAssessment[]> {
    const docs = await this.documents.getDocuments(COLLECTIONS.assessment);
    const assessments: StoredAssessment[] = [];

    for (const doc of docs) {
      const parsed = storedAssessmentSchema.safeParse(doc);
      if (parsed.success) {
        assessments.push(parsed.data);
      } else {
        console.error(`Skipping unreadable assessment ${doc.id}:`, parsed.error.message);
      }
    }
    return assessments;
  }

  async getById(id: string): Promise<StoredAssessment | null> {
    const doc = await this.documents.findById(COLLECTIONS.assessment, id);
    return doc ? toAssessment(doc) : null;
  }
}

function toAssessment(doc: StoredDocument): StoredAssessment {
  return storedAssessmentSchema.parse(doc);
}
