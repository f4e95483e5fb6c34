import { Response } from "express";
import { ZodError } from "zod";

/**
 * Send the 400 response for a body that failed schema validation.
 */
export function sendValidationError(res: Response, error: ZodError) {
  return res.status(400).json({
    error: "Invalid request body",
    details: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}
