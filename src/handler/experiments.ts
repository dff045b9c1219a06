import type { FastifyRequest } from "fastify";

import type { Experiment } from "../contracts/annotation";
import { ExperimentRequestSchema } from "../contracts/wire";
import { notFound } from "../serializer/http_error";
import {
  newExperimentResponse,
  newExperimentsResponse,
  type ExperimentWithProgress,
} from "../serializer/serializers";
import type { IdentityResolver } from "../service/identity";
import type { AssignmentStore, ExperimentStore } from "../store/annotation_store";
import { readJsonBody, urlParamInt, withContext, type RequestProcessFunc } from "./dispatch";

export type ExperimentHandlerDeps = {
  experiments: ExperimentStore;
  assignments: AssignmentStore;
  identity: IdentityResolver;
};

/**
 * Percentage of the user's assignments in the experiment that carry an
 * answer, at 32-bit float precision. A user with no assignments is at 0.
 */
export async function experimentProgress(
  assignments: AssignmentStore,
  experimentId: number,
  userId: number
): Promise<number> {
  const [countAll, countComplete] = await Promise.all([
    withContext(
      "error counting assignments",
      assignments.countUserAssignments(experimentId, userId)
    ),
    withContext(
      "error counting complete assignments",
      assignments.countCompleteUserAssignments(experimentId, userId)
    ),
  ]);

  if (countAll === 0) {
    return 0;
  }

  return Math.fround((100 * countComplete) / countAll);
}

// Resolves the `experimentId` path parameter to a stored experiment or throws 400/404/500.
export async function requireExperiment(
  experiments: ExperimentStore,
  req: FastifyRequest
): Promise<Experiment> {
  const experimentId = urlParamInt(req, "experimentId");
  const experiment = await withContext("error fetching experiment", experiments.getById(experimentId));
  if (!experiment) {
    throw notFound("no experiment found");
  }
  return experiment;
}

export function getExperimentDetails(deps: ExperimentHandlerDeps): RequestProcessFunc {
  return async (req) => {
    const userId = deps.identity.getUserId(req);
    const experiment = await requireExperiment(deps.experiments, req);
    const progress = await experimentProgress(deps.assignments, experiment.id, userId);

    return newExperimentResponse(experiment, progress);
  };
}

export function getExperiments(deps: ExperimentHandlerDeps): RequestProcessFunc {
  return async (req) => {
    const userId = deps.identity.getUserId(req);
    const experiments = await withContext("error listing experiments", deps.experiments.getAll());

    // One count pair per experiment, in listing order.
    const items: ExperimentWithProgress[] = [];
    for (const experiment of experiments) {
      const progress = await experimentProgress(deps.assignments, experiment.id, userId);
      items.push({ experiment, progress });
    }

    return newExperimentsResponse(items);
  };
}

export function createExperiment(deps: Pick<ExperimentHandlerDeps, "experiments">): RequestProcessFunc {
  return async (req) => {
    const body = readJsonBody(req, ExperimentRequestSchema);

    const experiment = await withContext(
      "error creating experiment",
      deps.experiments.create({ name: body.name, description: body.description })
    );

    // nothing is assigned yet on a fresh experiment
    return newExperimentResponse(experiment, 0);
  };
}

export function updateExperiment(deps: ExperimentHandlerDeps): RequestProcessFunc {
  return async (req) => {
    const userId = deps.identity.getUserId(req);
    const experiment = await requireExperiment(deps.experiments, req);
    const body = readJsonBody(req, ExperimentRequestSchema);

    experiment.name = body.name;
    experiment.description = body.description;

    await withContext("error updating experiment", deps.experiments.update(experiment));

    const progress = await experimentProgress(deps.assignments, experiment.id, userId);
    return newExperimentResponse(experiment, progress);
  };
}
