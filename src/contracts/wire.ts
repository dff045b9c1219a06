import { z } from "zod";

// null stands for "not given", both for the whole body and for each field
const optionalText = z.string().nullish().transform((value) => value ?? "");

export const ExperimentRequestSchema = z.preprocess(
  (body) => body ?? {},
  z.object({
    name: optionalText,
    description: optionalText,
  })
);

export type ExperimentRequest = z.infer<typeof ExperimentRequestSchema>;

export const HttpErrorBodySchema = z.object({
  status: z.number().int(),
  title: z.string(),
  details: z.string().optional(),
}).strict();

export const ErrorEnvelopeSchema = z.object({
  status: z.number().int(),
  errors: z.array(HttpErrorBodySchema).min(1),
}).strict();

export const ExperimentDataSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
  progress: z.number().min(0).max(100),
}).strict();

export const AssignmentDataSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  pairId: z.number().int(),
  experimentId: z.number().int(),
  answer: z.string().nullable(),
  duration: z.number().int(),
}).strict();

export const AnnotationSummaryDataSchema = z.object({
  yes: z.number().int().min(0),
  maybe: z.number().int().min(0),
  no: z.number().int().min(0),
  skip: z.number().int().min(0),
  unanswered: z.number().int().min(0),
  total: z.number().int().min(0),
}).strict();

export const FilePairListItemDataSchema = z.object({
  id: z.number().int(),
  leftPath: z.string(),
  rightPath: z.string(),
}).strict();

export const UserDataSchema = z.object({
  id: z.number().int(),
  login: z.string(),
  username: z.string(),
  avatarURL: z.string(),
  role: z.enum(["requester", "worker"]),
}).strict();

export const envelopeOf = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    status: z.literal(200),
    data,
  }).strict();
