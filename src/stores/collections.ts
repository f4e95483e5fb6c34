export const COLLECTIONS = {
  assessment: "assessment",
  submission: "submission",
  lesson: "lesson",
} as const;
