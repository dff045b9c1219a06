import type { Assignment } from "../contracts/annotation";
import { isAnswer } from "../contracts/annotation";
import {
  newAssignmentsResponse,
  newExpAnnotationsResponse,
  type AnnotationSummaryData,
} from "../serializer/serializers";
import { withContext, type RequestProcessFunc } from "./dispatch";
import { requireExperiment, type ExperimentHandlerDeps } from "./experiments";

export function summarizeAnnotations(assignments: Assignment[]): AnnotationSummaryData {
  const summary: AnnotationSummaryData = {
    yes: 0,
    maybe: 0,
    no: 0,
    skip: 0,
    unanswered: 0,
    total: assignments.length,
  };

  for (const assignment of assignments) {
    if (assignment.answer === null) {
      summary.unanswered += 1;
    } else if (isAnswer(assignment.answer)) {
      summary[assignment.answer] += 1;
    }
  }

  return summary;
}

export function getUserAssignments(deps: ExperimentHandlerDeps): RequestProcessFunc {
  return async (req) => {
    const userId = deps.identity.getUserId(req);
    const experiment = await requireExperiment(deps.experiments, req);

    const assignments = await withContext(
      "error fetching assignments",
      deps.assignments.getUserAssignments(experiment.id, userId)
    );
    return newAssignmentsResponse(assignments);
  };
}

export function getExperimentAnnotations(deps: ExperimentHandlerDeps): RequestProcessFunc {
  return async (req) => {
    deps.identity.getUserId(req);
    const experiment = await requireExperiment(deps.experiments, req);

    const assignments = await withContext(
      "error fetching assignments",
      deps.assignments.getAllByExperiment(experiment.id)
    );
    return newExpAnnotationsResponse(summarizeAnnotations(assignments));
  };
}
