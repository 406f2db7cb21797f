import { z } from 'zod';
import { TASK_STATUSES, type Task } from './types.js';

export const taskStatusSchema = z.enum(TASK_STATUSES);

export const artifactSchema = z.object({
  type: z.string(),
  uri: z.string().optional(),
  description: z.string().optional(),
  content: z.string().optional(),
});

// Array and map fields default to empty, as the backend does for new rows.
export const taskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().nullable().optional(),
  status: taskStatusSchema,
  progress: z.number(),
  startTime: z.number(),
  endTime: z.number().nullable().optional(),
  parentId: z.string().nullable().optional(),
  subtasks: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  assignedTools: z.array(z.string()).default([]),
  artifacts: z.array(artifactSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
  error: z.string().nullable().optional(),
  result: z.unknown().optional(),
});

export const taskListSchema = z.object({
  tasks: z.array(taskSchema),
});

/** `{ success, data, error }` wrapper some gateways put around responses */
const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.unknown().optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export function parseEnvelope(body: unknown): Envelope | null {
  const parsed = envelopeSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
