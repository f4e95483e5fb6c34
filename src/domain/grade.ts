export interface QuestionFeedback {
  question_index: number;
  points: number;
  earned: number;
  correctness: number; // 0.0–1.0, two decimals
  feedback: string;
}

export interface GradeResult {
  graded: boolean;
  total_points: number;
  score: number; // 0–100, two decimals
  feedback: QuestionFeedback[];
}
