import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { assessmentCreateSchema } from "../../domain/assessment";
import { QuestionGenerator } from "../../domain/questionGenerator";
import { AssessmentStore } from "../../stores/assessmentStore";
import { sendValidationError } from "../validation";

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const uploadQuerySchema = z.object({
  title: z.string().default("Generated Assessment"),
  description: z.string().default("Generated from uploaded source"),
  source_type: z.string().default("file"),
});

export interface AssessmentsRouterOptions {
  assessments: AssessmentStore;
  questionGenerator: QuestionGenerator;
}

export function createAssessmentsRouter({
  assessments,
  questionGenerator,
}: AssessmentsRouterOptions): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

  // POST /assessments - Create an assessment from a full payload
  router.post("/", async (req, res) => {
    const parsed = assessmentCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const assessment = await assessments.create(parsed.data);
      res.status(201).json(assessment);
    } catch (error) {
      console.error("Error creating assessment:", error);
      res.status(500).json({ error: "Failed to create assessment" });
    }
  });

  // GET /assessments - List all assessments
  router.get("/", async (req, res) => {
    try {
      res.json(await assessments.getAll());
    } catch (error) {
      console.error("Error fetching assessments:", error);
      res.status(500).json({ error: "Failed to fetch assessments" });
    }
  });

  // POST /assessments/from-upload - Build an assessment from an uploaded file
  router.post("/from-upload", upload.single("file"), async (req, res) => {
    const query = uploadQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(res, query.error);
    }
    if (!req.file) {
      return res.status(400).json({ error: "file is required" });
    }

    try {
      // multer hands over the multipart filename parameter decoded as latin1
      const filename = Buffer.from(req.file.originalname, "latin1").toString("utf8") || "upload";
      const questions = await questionGenerator.generateQuestions({
        filename,
        mimetype: req.file.mimetype,
        size: req.file.size,
        buffer: req.file.buffer,
      });

      const assessment = await assessments.create({
        title: query.data.title,
        description: query.data.description,
        source_type: query.data.source_type,
        source_reference: filename,
        questions,
      });
      res.status(201).json(assessment);
    } catch (error) {
      console.error("Error generating assessment from upload:", error);
      res.status(500).json({ error: "Failed to generate assessment" });
    }
  });

  // GET /assessments/:id - Get one assessment
  router.get("/:id", async (req, res) => {
    try {
      const assessment = await assessments.getById(req.params.id);
      if (!assessment) {
        return res.status(404).json({ error: "Assessment not found" });
      }
      res.json(assessment);
    } catch (error) {
      console.error("Error fetching assessment:", error);
      res.status(500).json({ error: "Failed to fetch assessment" });
    }
  });

  return router;
}
