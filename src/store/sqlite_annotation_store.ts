import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import pino from "pino";

import type {
  AnnotationStore,
  AssignmentStore,
  FilePairStore,
  NewAssignment,
  NewFilePair,
  NewUser,
  UserStore,
} from "./annotation_store";
import type { Assignment, Experiment, FilePair, NewExperiment, User } from "../contracts/annotation";
import { parseRole } from "../contracts/annotation";

type StoreLogger = {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
};

type ExperimentRow = { id: number; name: string; description: string };

type AssignmentRow = {
  id: number;
  user_id: number;
  pair_id: number;
  experiment_id: number;
  answer: string | null;
  duration: number;
};

type FilePairRow = {
  id: number;
  experiment_id: number;
  left_blob_id: string;
  left_repository_id: string;
  left_commit_hash: string;
  left_path: string;
  left_content: string;
  left_hash: string;
  right_blob_id: string;
  right_repository_id: string;
  right_commit_hash: string;
  right_path: string;
  right_content: string;
  right_hash: string;
  score: number;
  diff_score: number;
};

type UserRow = {
  id: number;
  login: string;
  username: string;
  avatar_url: string;
  role: number;
};

type CountRow = { count: number };

const createDefaultLogger = (): StoreLogger =>
  pino({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  });

const rowToExperiment = (row: ExperimentRow): Experiment => ({
  id: row.id,
  name: row.name,
  description: row.description,
});

const rowToAssignment = (row: AssignmentRow): Assignment => ({
  id: row.id,
  userId: row.user_id,
  pairId: row.pair_id,
  experimentId: row.experiment_id,
  answer: row.answer,
  duration: row.duration,
});

const rowToFilePair = (row: FilePairRow): FilePair => ({
  id: row.id,
  experimentId: row.experiment_id,
  left: {
    blobId: row.left_blob_id,
    repositoryId: row.left_repository_id,
    commitHash: row.left_commit_hash,
    path: row.left_path,
    content: row.left_content,
    hash: row.left_hash,
  },
  right: {
    blobId: row.right_blob_id,
    repositoryId: row.right_repository_id,
    commitHash: row.right_commit_hash,
    path: row.right_path,
    content: row.right_content,
    hash: row.right_hash,
  },
  score: row.score,
  diffScore: row.diff_score,
});

const rowToUser = (row: UserRow): User => {
  const role = parseRole(row.role);
  if (role === null) {
    throw new Error(`user ${row.id} has unknown role ${row.role}`);
  }
  return {
    id: row.id,
    login: row.login,
    username: row.username,
    avatarUrl: row.avatar_url,
    role,
  };
};

export class SqliteAnnotationStore implements AnnotationStore {
  private db: Database.Database;
  private log: StoreLogger;

  readonly assignments: AssignmentStore;
  readonly filePairs: FilePairStore;
  readonly users: UserStore;

  constructor(
    dbPath: string = "./data/annotation.db",
    log: StoreLogger = createDefaultLogger()
  ) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    } else {
      this.log.warn({ dbPath }, "store: in-memory database, data is lost on restart");
    }
    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
    this.initSchema();

    this.assignments = {
      countUserAssignments: async (experimentId, userId) => this.count(`
        SELECT COUNT(*) AS count FROM assignments
        WHERE experiment_id = ? AND user_id = ?
      `, experimentId, userId),
      countCompleteUserAssignments: async (experimentId, userId) => this.count(`
        SELECT COUNT(*) AS count FROM assignments
        WHERE experiment_id = ? AND user_id = ? AND answer IS NOT NULL
      `, experimentId, userId),
      getUserAssignments: async (experimentId, userId) =>
        this.db.prepare<[number, number], AssignmentRow>(`
          SELECT * FROM assignments
          WHERE experiment_id = ? AND user_id = ?
          ORDER BY id
        `).all(experimentId, userId).map(rowToAssignment),
      getAllByExperiment: async (experimentId) =>
        this.db.prepare<[number], AssignmentRow>(`
          SELECT * FROM assignments WHERE experiment_id = ? ORDER BY id
        `).all(experimentId).map(rowToAssignment),
    };

    this.filePairs = {
      getAllByExperiment: async (experimentId) =>
        this.db.prepare<[number], FilePairRow>(`
          SELECT * FROM file_pairs WHERE experiment_id = ? ORDER BY id
        `).all(experimentId).map(rowToFilePair),
    };

    this.users = {
      getById: async (id) => {
        const row = this.db.prepare<[number], UserRow>(`
          SELECT * FROM users WHERE id = ?
        `).get(id);
        return row ? rowToUser(row) : null;
      },
    };

    this.log.info({ evt: "store.ready", dbPath }, "store.ready");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS experiments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT ''
      );

      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        login TEXT NOT NULL UNIQUE,
        username TEXT NOT NULL,
        avatar_url TEXT NOT NULL,
        role INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS file_pairs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        experiment_id INTEGER NOT NULL,
        left_blob_id TEXT NOT NULL,
        left_repository_id TEXT NOT NULL,
        left_commit_hash TEXT NOT NULL,
        left_path TEXT NOT NULL,
        left_content TEXT NOT NULL,
        left_hash TEXT NOT NULL,
        right_blob_id TEXT NOT NULL,
        right_repository_id TEXT NOT NULL,
        right_commit_hash TEXT NOT NULL,
        right_path TEXT NOT NULL,
        right_content TEXT NOT NULL,
        right_hash TEXT NOT NULL,
        score REAL NOT NULL,
        diff_score REAL NOT NULL,
        FOREIGN KEY (experiment_id) REFERENCES experiments(id)
      );

      CREATE INDEX IF NOT EXISTS idx_file_pairs_experiment ON file_pairs(experiment_id);

      CREATE TABLE IF NOT EXISTS assignments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        pair_id INTEGER NOT NULL,
        experiment_id INTEGER NOT NULL,
        answer TEXT,
        duration INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (user_id) REFERENCES users(id),
        FOREIGN KEY (pair_id) REFERENCES file_pairs(id),
        FOREIGN KEY (experiment_id) REFERENCES experiments(id)
      );

      CREATE INDEX IF NOT EXISTS idx_assignments_experiment_user ON assignments(experiment_id, user_id);
    `);
  }

  private count(sql: string, ...params: number[]): number {
    const row = this.db.prepare<number[], CountRow>(sql).get(...params);
    return Number(row?.count ?? 0);
  }

  async getById(id: number): Promise<Experiment | null> {
    const row = this.db.prepare<[number], ExperimentRow>(`
      SELECT id, name, description FROM experiments WHERE id = ?
    `).get(id);
    return row ? rowToExperiment(row) : null;
  }

  async getAll(): Promise<Experiment[]> {
    return this.db.prepare<[], ExperimentRow>(`
      SELECT id, name, description FROM experiments ORDER BY id
    `).all().map(rowToExperiment);
  }

  async create(experiment: NewExperiment): Promise<Experiment> {
    const result = this.db.prepare(`
      INSERT INTO experiments (name, description) VALUES (?, ?)
    `).run(experiment.name, experiment.description);

    return {
      id: Number(result.lastInsertRowid),
      name: experiment.name,
      description: experiment.description,
    };
  }

  async update(experiment: Experiment): Promise<void> {
    const result = this.db.prepare(`
      UPDATE experiments SET name = ?, description = ? WHERE id = ?
    `).run(experiment.name, experiment.description, experiment.id);

    if (result.changes === 0) {
      throw new Error(`experiment ${experiment.id} does not exist`);
    }
  }

  async createUser(args: NewUser): Promise<User> {
    const result = this.db.prepare(`
      INSERT INTO users (login, username, avatar_url, role) VALUES (?, ?, ?, ?)
    `).run(args.login, args.username, args.avatarUrl, args.role);

    return { id: Number(result.lastInsertRowid), ...args };
  }

  async createFilePair(args: NewFilePair): Promise<FilePair> {
    const result = this.db.prepare(`
      INSERT INTO file_pairs (
        experiment_id,
        left_blob_id,
        left_repository_id,
        left_commit_hash,
        left_path,
        left_content,
        left_hash,
        right_blob_id,
        right_repository_id,
        right_commit_hash,
        right_path,
        right_content,
        right_hash,
        score,
        diff_score
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      args.experimentId,
      args.left.blobId,
      args.left.repositoryId,
      args.left.commitHash,
      args.left.path,
      args.left.content,
      args.left.hash,
      args.right.blobId,
      args.right.repositoryId,
      args.right.commitHash,
      args.right.path,
      args.right.content,
      args.right.hash,
      args.score,
      args.diffScore
    );

    return {
      id: Number(result.lastInsertRowid),
      experimentId: args.experimentId,
      left: { ...args.left },
      right: { ...args.right },
      score: args.score,
      diffScore: args.diffScore,
    };
  }

  async createAssignment(args: NewAssignment): Promise<Assignment> {
    const a = {
      userId: args.userId,
      pairId: args.pairId,
      experimentId: args.experimentId,
      answer: args.answer ?? null,
      duration: args.duration ?? 0,
    };

    const result = this.db.prepare(`
      INSERT INTO assignments (user_id, pair_id, experiment_id, answer, duration)
      VALUES (?, ?, ?, ?, ?)
    `).run(a.userId, a.pairId, a.experimentId, a.answer, a.duration);

    return { id: Number(result.lastInsertRowid), ...a };
  }

  close(): void {
    this.db.close();
  }
}
