import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import { QuestionGenerator } from "../domain/questionGenerator";
import { TemplateQuestionGenerator } from "../domain/templateQuestionGenerator";
import { GradingService } from "../services/gradingService";
import { AssessmentStore } from "../stores/assessmentStore";
import { DocumentStore } from "../stores/documentStore";
import { LessonStore } from "../stores/lessonStore";
import { SubmissionStore } from "../stores/submissionStore";
import { createAssessmentsRouter } from "./routes/assessments";
import { createLessonsRouter } from "./routes/lessons";
import { createRootRouter } from "./routes/root";
import { createSubmissionsRouter } from "./routes/submissions";

export interface AppDependencies {
  documents: DocumentStore;
  questionGenerator?: QuestionGenerator;
  corsOrigins?: string[] | "*";
  databaseUrl?: string;
  databaseName?: string;
}

/**
 * Build the Express app around an already-open document store.
 * Nothing here touches process state, so tests can create as many apps as they like.
 */
export function createApp({
  documents,
  questionGenerator = new TemplateQuestionGenerator(),
  corsOrigins = "*",
  databaseUrl,
  databaseName,
}: AppDependencies) {
  const assessments = new AssessmentStore(documents);
  const submissions = new SubmissionStore(documents);
  const lessons = new LessonStore(documents);
  const grading = new GradingService(assessments, submissions);

  const app = express();

  // Middleware
  app.use(cors({ origin: corsOrigins, credentials: corsOrigins !== "*" }));
  app.use(express.json());

  // Routes
  app.use("/", createRootRouter({ documents, databaseUrl, databaseName }));
  app.use("/assessments", createAssessmentsRouter({ assessments, questionGenerator }));
  app.use("/submissions", createSubmissionsRouter({ assessments, submissions, grading }));
  app.use("/lessons", createLessonsRouter(lessons));

  // Body parser and upload failures surface here
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      return res.status(400).json({ error: error.message });
    }
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: "Malformed JSON body" });
    }
    console.error("Unhandled request error:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
