import { z } from 'zod';

const argsSchema = z.record(z.unknown());

export const toolCallSchema = z.object({
  name: z.string().min(1),
  args: argsSchema.default({}),
});

const criticBase = {
  field: z.string().min(1),
  weight: z.number(),
};

export const criticSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('binary'), ...criticBase }),
  z.object({
    type: z.literal('numeric'),
    ...criticBase,
    valueRange: z.tuple([z.number(), z.number()]),
    matchThreshold: z.number().optional(),
  }),
  z.object({
    type: z.literal('similarity'),
    ...criticBase,
    metric: z.string().optional(),
    similarityThreshold: z.number().optional(),
  }),
]);

export const rubricSchema = z.object({
  failThreshold: z.number(),
  warnThreshold: z.number(),
  toolSelectionWeight: z.number().optional(),
  failOnToolSelection: z.boolean().optional(),
  failOnToolCallQuantity: z.boolean().optional(),
});

const weightPolicySchema = z.union([
  z.literal(false),
  z.object({ maxTotalWeight: z.number(), minWeight: z.number() }),
]);

export const caseSchema = z.object({
  name: z.string().min(1),
  userMessage: z.string(),
  extends: z.boolean().default(false),
  expectedToolCalls: z.array(toolCallSchema).optional(),
  critics: z.array(criticSchema).optional(),
  rubric: rubricSchema.partial().optional(),
  additionalMessages: z
    .array(z.object({ role: z.enum(['system', 'user', 'assistant']), content: z.string() }))
    .optional(),
  weightPolicy: weightPolicySchema.optional(),
});

export const toolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional(),
});

export const suiteFileSchema = z.object({
  name: z.string().min(1),
  system: z.string().default(''),
  toolChoice: z.enum(['auto', 'any']).default('auto'),
  rubric: rubricSchema.optional(),
  tools: z.array(toolDefinitionSchema).default([]),
  cases: z.array(caseSchema).min(1),
});

export const scriptFileSchema = z.record(z.array(toolCallSchema));

export type CriticDefinition = z.infer<typeof criticSchema>;
export type CaseDefinition = z.infer<typeof caseSchema>;
export type SuiteFile = z.infer<typeof suiteFileSchema>;
