import { NotFoundError } from "../domain/errors";
import { GradeResult } from "../domain/grade";
import { gradeAnswers } from "../domain/grading";
import { AssessmentStore } from "../stores/assessmentStore";
import { SubmissionStore } from "../stores/submissionStore";

/**
 * GradingService grades a stored submission against its assessment and
 * writes the result back onto the submission.
 *
 * The two reads are independent; an edit landing between them is not guarded against.
 * Re-grading overwrites the previous grade fields.
 */
export class GradingService {
  constructor(
    private readonly assessments: AssessmentStore,
    private readonly submissions: SubmissionStore
  ) {}

  async gradeSubmission(submissionId: string): Promise<GradeResult> {
    const submission = await this.submissions.getById(submissionId);
    if (!submission) {
      throw new NotFoundError("Submission not found");
    }

    const assessment = await this.assessments.getById(submission.assessment_id);
    if (!assessment) {
      throw new NotFoundError("Assessment not found for submission");
    }

    const result = gradeAnswers(assessment.questions, submission.answers);

    const saved = await this.submissions.saveGrade(submissionId, result);
    if (!saved) {
      throw new NotFoundError("Submission not found");
    }

    return result;
  }
}
