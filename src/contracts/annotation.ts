export type Experiment = {
  id: number;
  name: string;
  description: string;
};

export type NewExperiment = Omit<Experiment, "id">;

export const ANSWERS = ["yes", "maybe", "no", "skip"] as const;
export type Answer = (typeof ANSWERS)[number];

const ANSWER_SET: ReadonlySet<string> = new Set(ANSWERS);

export const isAnswer = (value: string): value is Answer => ANSWER_SET.has(value);

export type Assignment = {
  id: number;
  userId: number;
  pairId: number;
  experimentId: number;
  // null until the user records an answer for the pair
  answer: string | null;
  duration: number;
};

export type FileSide = {
  blobId: string;
  repositoryId: string;
  commitHash: string;
  path: string;
  content: string;
  hash: string;
};

export type FilePair = {
  id: number;
  experimentId: number;
  left: FileSide;
  right: FileSide;
  score: number;
  diffScore: number;
};

export const ROLES = {
  requester: 1,
  worker: 2,
} as const;

export type RoleName = keyof typeof ROLES;
export type Role = (typeof ROLES)[RoleName];

export const roleName = (role: Role): RoleName =>
  role === ROLES.requester ? "requester" : "worker";

export const parseRole = (value: number): Role | null => {
  if (value === ROLES.requester) return ROLES.requester;
  if (value === ROLES.worker) return ROLES.worker;
  return null;
};

export type User = {
  id: number;
  login: string;
  username: string;
  avatarUrl: string;
  role: Role;
};

export type Feature = {
  name: string;
  weight: number;
};
