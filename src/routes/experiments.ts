import type { FastifyPluginAsync } from "fastify";

import { getExperimentAnnotations, getUserAssignments } from "../handler/assignments";
import { toRouteHandler, useEnvelopeErrors, useRawBodies } from "../handler/dispatch";
import {
  createExperiment,
  getExperimentDetails,
  getExperiments,
  updateExperiment,
} from "../handler/experiments";
import { getFilePairs } from "../handler/file_pairs";
import { HeaderIdentityResolver, type IdentityResolver } from "../service/identity";
import type { AssignmentStore, ExperimentStore, FilePairStore } from "../store/annotation_store";

export type ExperimentRoutesOptions = {
  experiments: ExperimentStore;
  assignments: AssignmentStore;
  filePairs: FilePairStore;
  identity?: IdentityResolver;
};

export const experimentRoutes: FastifyPluginAsync<ExperimentRoutesOptions> = async (app, opts) => {
  const deps = {
    experiments: opts.experiments,
    assignments: opts.assignments,
    filePairs: opts.filePairs,
    identity: opts.identity ?? new HeaderIdentityResolver(),
  };

  useRawBodies(app);
  useEnvelopeErrors(app);

  app.options("/experiments", async (_req, reply) => reply.code(204).send());
  app.options("/experiments/:experimentId", async (_req, reply) => reply.code(204).send());

  app.get("/experiments", toRouteHandler(getExperiments(deps)));
  app.post("/experiments", toRouteHandler(createExperiment(deps)));
  app.get("/experiments/:experimentId", toRouteHandler(getExperimentDetails(deps)));
  app.put("/experiments/:experimentId", toRouteHandler(updateExperiment(deps)));

  app.get("/experiments/:experimentId/assignments", toRouteHandler(getUserAssignments(deps)));
  app.get("/experiments/:experimentId/annotations", toRouteHandler(getExperimentAnnotations(deps)));
  app.get("/experiments/:experimentId/file-pairs", toRouteHandler(getFilePairs(deps)));
};
