import { Router } from "express";
import { NotFoundError } from "../../domain/errors";
import { submissionCreateSchema } from "../../domain/submission";
import { GradingService } from "../../services/gradingService";
import { AssessmentStore } from "../../stores/assessmentStore";
import { SubmissionStore } from "../../stores/submissionStore";
import { sendValidationError } from "../validation";

export interface SubmissionsRouterOptions {
  assessments: AssessmentStore;
  submissions: SubmissionStore;
  grading: GradingService;
}

export function createSubmissionsRouter({
  assessments,
  submissions,
  grading,
}: SubmissionsRouterOptions): Router {
  const router = Router();

  // POST /submissions - Record a student's answers
  router.post("/", async (req, res) => {
    const parsed = submissionCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const assessment = await assessments.getById(parsed.data.assessment_id);
      if (!assessment) {
        return res.status(404).json({ error: "Assessment not found" });
      }

      const submission = await submissions.create(parsed.data);
      res.status(201).json(submission);
    } catch (error) {
      console.error("Error saving submission:", error);
      res.status(500).json({ error: "Failed to save submission" });
    }
  });

  // GET /submissions/:id - Get one submission, including grade fields once graded
  router.get("/:id", async (req, res) => {
    try {
      const submission = await submissions.getById(req.params.id);
      if (!submission) {
        return res.status(404).json({ error: "Submission not found" });
      }
      res.json(submission);
    } catch (error) {
      console.error("Error fetching submission:", error);
      res.status(500).json({ error: "Failed to fetch submission" });
    }
  });

  // POST /submissions/:id/grade - Grade a submission and store the result
  router.post("/:id/grade", async (req, res) => {
    try {
      const result = await grading.gradeSubmission(req.params.id);
      res.json(result);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return res.status(404).json({ error: error.message });
      }
      console.error("Error grading submission:", error);
      res.status(500).json({ error: "Failed to grade submission" });
    }
  });

  return router;
}
