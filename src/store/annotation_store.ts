import type {
  Assignment,
  Experiment,
  FilePair,
  NewExperiment,
  User,
} from "../contracts/annotation";

export interface ExperimentStore {
  getById(id: number): Promise<Experiment | null>;
  getAll(): Promise<Experiment[]>;
  create(experiment: NewExperiment): Promise<Experiment>;
  update(experiment: Experiment): Promise<void>;
}

export interface AssignmentStore {
  countUserAssignments(experimentId: number, userId: number): Promise<number>;
  countCompleteUserAssignments(experimentId: number, userId: number): Promise<number>;
  getUserAssignments(experimentId: number, userId: number): Promise<Assignment[]>;
  getAllByExperiment(experimentId: number): Promise<Assignment[]>;
}

export interface FilePairStore {
  getAllByExperiment(experimentId: number): Promise<FilePair[]>;
}

export interface UserStore {
  getById(id: number): Promise<User | null>;
}

export type AnnotationStore = ExperimentStore & {
  assignments: AssignmentStore;
  filePairs: FilePairStore;
  users: UserStore;
};

export type NewAssignment = Omit<Assignment, "id" | "answer" | "duration"> & {
  answer?: string | null;
  duration?: number;
};

export type NewFilePair = Omit<FilePair, "id">;
export type NewUser = Omit<User, "id">;

/**
 * Process-local store used by tests and `STORE=memory` runs. Reads hand out
 * copies so callers can mutate what they get back without touching state.
 */
export class MemoryAnnotationStore implements AnnotationStore {
  private experiments = new Map<number, Experiment>();
  private assignmentRows = new Map<number, Assignment>();
  private filePairRows = new Map<number, FilePair>();
  private userRows = new Map<number, User>();
  private nextIds = { experiment: 1, assignment: 1, filePair: 1, user: 1 };

  readonly assignments: AssignmentStore = {
    countUserAssignments: async (experimentId, userId) =>
      this.userAssignments(experimentId, userId).length,
    countCompleteUserAssignments: async (experimentId, userId) =>
      this.userAssignments(experimentId, userId).filter((a) => a.answer !== null).length,
    getUserAssignments: async (experimentId, userId) =>
      this.userAssignments(experimentId, userId).map((a) => ({ ...a })),
    getAllByExperiment: async (experimentId) =>
      Array.from(this.assignmentRows.values())
        .filter((a) => a.experimentId === experimentId)
        .map((a) => ({ ...a })),
  };

  readonly filePairs: FilePairStore = {
    getAllByExperiment: async (experimentId) =>
      Array.from(this.filePairRows.values())
        .filter((fp) => fp.experimentId === experimentId)
        .map(cloneFilePair),
  };

  readonly users: UserStore = {
    getById: async (id) => {
      const user = this.userRows.get(id);
      return user ? { ...user } : null;
    },
  };

  async getById(id: number): Promise<Experiment | null> {
    const experiment = this.experiments.get(id);
    return experiment ? { ...experiment } : null;
  }

  async getAll(): Promise<Experiment[]> {
    return Array.from(this.experiments.values()).map((e) => ({ ...e }));
  }

  async create(experiment: NewExperiment): Promise<Experiment> {
    const created: Experiment = {
      id: this.nextIds.experiment++,
      name: experiment.name,
      description: experiment.description,
    };
    this.experiments.set(created.id, created);
    return { ...created };
  }

  async update(experiment: Experiment): Promise<void> {
    if (!this.experiments.has(experiment.id)) {
      throw new Error(`experiment ${experiment.id} does not exist`);
    }
    this.experiments.set(experiment.id, { ...experiment });
  }

  async createAssignment(args: NewAssignment): Promise<Assignment> {
    const a: Assignment = {
      id: this.nextIds.assignment++,
      userId: args.userId,
      pairId: args.pairId,
      experimentId: args.experimentId,
      answer: args.answer ?? null,
      duration: args.duration ?? 0,
    };
    this.assignmentRows.set(a.id, a);
    return { ...a };
  }

  async createFilePair(args: NewFilePair): Promise<FilePair> {
    const fp = cloneFilePair({ ...args, id: this.nextIds.filePair++ });
    this.filePairRows.set(fp.id, fp);
    return cloneFilePair(fp);
  }

  async createUser(args: NewUser): Promise<User> {
    const user: User = { id: this.nextIds.user++, ...args };
    this.userRows.set(user.id, user);
    return { ...user };
  }

  private userAssignments(experimentId: number, userId: number): Assignment[] {
    return Array.from(this.assignmentRows.values()).filter(
      (a) => a.experimentId === experimentId && a.userId === userId
    );
  }
}

const cloneFilePair = (fp: FilePair): FilePair => ({
  ...fp,
  left: { ...fp.left },
  right: { ...fp.right },
});
