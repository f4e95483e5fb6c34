import { Router } from "express";
import { lessonCreateSchema } from "../../domain/lesson";
import { LessonStore } from "../../stores/lessonStore";
import { sendValidationError } from "../validation";

export function createLessonsRouter(lessons: LessonStore): Router {
  const router = Router();

  // POST /lessons - Save a new lesson
  router.post("/", async (req, res) => {
    const parsed = lessonCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const lesson = await lessons.create(parsed.data);
      res.status(201).json(lesson);
    } catch (error) {
      console.error("Error saving lesson:", error);
      res.status(500).json({ error: "Failed to save lesson" });
    }
  });

  // GET /lessons - List all lessons
  router.get("/", async (req, res) => {
    try {
      res.json(await lessons.getAll());
    } catch (error) {
      console.error("Error fetching lessons:", error);
      res.status(500).json({ error: "Failed to fetch lessons" });
    }
  });

  // GET /lessons/:id - Get one lesson
  router.get("/:id", async (req, res) => {
    try {
      const lesson = await lessons.getById(req.params.id);
      if (!lesson) {
        return res.status(404).json({ error: "Lesson not found" });
      }
      res.json(lesson);
    } catch (error) {
      console.error("Error fetching lesson:", error);
      res.status(500).json({ error: "Failed to fetch lesson" });
    }
  });

  return router;
}
