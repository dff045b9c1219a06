import { newListFilePairsResponse } from "../serializer/serializers";
import type { IdentityResolver } from "../service/identity";
import type { ExperimentStore, FilePairStore } from "../store/annotation_store";
import { withContext, type RequestProcessFunc } from "./dispatch";
import { requireExperiment } from "./experiments";

export type FilePairHandlerDeps = {
  experiments: ExperimentStore;
  filePairs: FilePairStore;
  identity: IdentityResolver;
};

export function getFilePairs(deps: FilePairHandlerDeps): RequestProcessFunc {
  return async (req) => {
    deps.identity.getUserId(req);
    const experiment = await requireExperiment(deps.experiments, req);

    const filePairs = await withContext(
      "error fetching file pairs",
      deps.filePairs.getAllByExperiment(experiment.id)
    );
    return newListFilePairsResponse(filePairs);
  };
}
