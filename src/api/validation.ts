import { z } from 'zod';
import { JsonValue } from '../types';
import { ValidationError } from '../domain/common/Errors';

// --- Reusable patterns ---

// Safe ID: alphanumeric, hyphens, underscores
const safeId = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'ID must be alphanumeric with hyphens/underscores only');

// String with reasonable length limits
const shortString = z.string().min(1).max(500);
const longString = z.string().min(1).max(10000);

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const projectContextSchema = z.record(z.string(), jsonValueSchema);

// --- Enums ---

const taskPrioritySchema = z.enum(['high', 'medium', 'low']);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

export const agentNameParamSchema = z.object({
  name: safeId,
});

// --- Workflow schemas ---

export const createWorkflowSchema = z.object({
  type: shortString,
  description: longString,
  projectContext: projectContextSchema.optional(),
}).strict();

// --- Task schemas ---

export const createTaskSchema = z.object({
  description: longString,
  agent: safeId,
  dependencies: z.array(safeId).max(100).optional(),
  priority: taskPrioritySchema.optional(),
  projectContext: projectContextSchema.optional(),
}).strict();

export const completeTaskSchema = z.object({
  output: z.string().max(100000),
  artifacts: z.array(z.string().min(1).max(1000)).optional(),
  nextAgentHint: safeId.optional(),
}).strict();

// --- Agent schemas ---

export const agentResponseSchema = z.object({
  analysis: longString,
  recommendation: longString,
  nextSteps: longString,
  handoff: safeId.optional(),
  artifacts: z.array(z.string().min(1).max(1000)).optional(),
}).strict();

// --- Parsing ---

type RequestPart = 'body' | 'params' | 'query';

const PART_LABELS: Record<RequestPart, string> = {
  body: 'Invalid request body',
  params: 'Invalid URL parameters',
  query: 'Invalid query parameters',
};

/**
 * Validate one part of a request against a Zod schema.
 * @throws {ValidationError} with one detail entry per issue
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, part: RequestPart): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      PART_LABELS[part],
      result.error.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
      }))
    );
  }
  return result.data;
}
