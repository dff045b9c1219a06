import type {
  Assignment,
  Experiment,
  Feature,
  FilePair,
  RoleName,
  User,
} from "../contracts/annotation";
import { roleName } from "../contracts/annotation";
import type { HTTPError } from "./http_error";

export type ExperimentData = {
  id: number;
  name: string;
  description: string;
  progress: number;
};

export type AssignmentData = {
  id: number;
  userId: number;
  pairId: number;
  experimentId: number;
  answer: string | null;
  duration: number;
};

export type AnnotationSummaryData = {
  yes: number;
  maybe: number;
  no: number;
  skip: number;
  unanswered: number;
  total: number;
};

export type FilePairData = {
  id: number;
  diff: string;
  score: number;
  leftBlobId: string;
  rightBlobId: string;
  leftLoc: number;
  rightLoc: number;
};

export type FilePairListItemData = {
  id: number;
  leftPath: string;
  rightPath: string;
};

export type UserData = {
  id: number;
  login: string;
  username: string;
  avatarURL: string;
  role: RoleName;
};

export type FeatureData = {
  name: string;
  weight: number;
};

export type FeaturesData = {
  featuresA: FeatureData[];
  featuresB: FeatureData[];
  score: FeatureData;
};

export type CountData = { count: number };
export type VersionData = { version: string };
export type FilePairsUploadData = { success: number; failures: number };
export type TokenData = { token: string };

// Every shape an endpoint may put under `data`.
export type ResponseData =
  | ExperimentData
  | ExperimentData[]
  | AssignmentData[]
  | AnnotationSummaryData
  | FilePairData
  | FilePairListItemData[]
  | UserData
  | FeaturesData
  | CountData
  | VersionData
  | FilePairsUploadData
  | TokenData;

export type Response<T extends ResponseData = ResponseData> = {
  status: number;
  data?: T;
  errors?: HTTPError[];
};

export function newResponse<T extends ResponseData>(payload: T | null | undefined): Response<T> {
  if (payload === null || payload === undefined) {
    return { status: 204 };
  }

  return { status: 200, data: payload };
}

/**
 * The zero envelope: no status, no data. Handlers return it when there is
 * nothing left to communicate to the client.
 */
export function newEmptyResponse(): Response {
  return { status: 0 };
}

export const isEmptyResponse = (response: Response): boolean =>
  response.status === 0 && response.data === undefined && response.errors === undefined;

export function newErrorResponse(...errors: HTTPError[]): Response {
  return {
    status: errors[0]?.statusCode() ?? 500,
    errors,
  };
}

const toExperimentData = (e: Experiment, progress: number): ExperimentData => ({
  id: e.id,
  name: e.name,
  description: e.description,
  progress,
});

export function newExperimentResponse(e: Experiment, progress: number): Response<ExperimentData> {
  return newResponse(toExperimentData(e, progress));
}

export type ExperimentWithProgress = {
  experiment: Experiment;
  progress: number;
};

export function newExperimentsResponse(items: ExperimentWithProgress[]): Response<ExperimentData[]> {
  return newResponse(items.map(({ experiment, progress }) => toExperimentData(experiment, progress)));
}

export function newAssignmentsResponse(assignments: Assignment[]): Response<AssignmentData[]> {
  return newResponse(
    assignments.map((a) => ({
      id: a.id,
      userId: a.userId,
      pairId: a.pairId,
      experimentId: a.experimentId,
      answer: a.answer ?? null,
      duration: a.duration,
    }))
  );
}

export function newExpAnnotationsResponse(summary: AnnotationSummaryData): Response<AnnotationSummaryData> {
  return newResponse({
    yes: summary.yes,
    maybe: summary.maybe,
    no: summary.no,
    skip: summary.skip,
    unanswered: summary.unanswered,
    total: summary.total,
  });
}

// The diff and line counts are computed by the caller; only the pair identity is read here.
export function newFilePairResponse(
  fp: FilePair,
  diff: string,
  leftLoc: number,
  rightLoc: number
): Response<FilePairData> {
  return newResponse({
    id: fp.id,
    diff,
    score: fp.score,
    leftBlobId: fp.left.blobId,
    rightBlobId: fp.right.blobId,
    leftLoc,
    rightLoc,
  });
}

export function newListFilePairsResponse(filePairs: FilePair[]): Response<FilePairListItemData[]> {
  return newResponse(
    filePairs.map((fp) => ({
      id: fp.id,
      leftPath: fp.left.path,
      rightPath: fp.right.path,
    }))
  );
}

export function newUserResponse(u: User): Response<UserData> {
  return newResponse({
    id: u.id,
    login: u.login,
    username: u.username,
    avatarURL: u.avatarUrl,
    role: roleName(u.role),
  });
}

const toFeatureData = (f: Feature): FeatureData => ({ name: f.name, weight: f.weight });

export function newFeaturesResponse(
  featuresA: Feature[],
  featuresB: Feature[],
  score: Feature
): Response<FeaturesData> {
  return newResponse({
    featuresA: featuresA.map(toFeatureData),
    featuresB: featuresB.map(toFeatureData),
    score: toFeatureData(score),
  });
}

export function newCountResponse(count: number): Response<CountData> {
  return newResponse({ count });
}

export function newVersionResponse(version: string): Response<VersionData> {
  return newResponse({ version });
}

export function newFilePairsUploadResponse(success: number, failures: number): Response<FilePairsUploadData> {
  return newResponse({ success, failures });
}

export function newTokenResponse(token: string): Response<TokenData> {
  return newResponse({ token });
}
