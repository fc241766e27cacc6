import { readFileSync, existsSync } from 'fs';
import yaml from 'js-yaml';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import {
  BinaryCritic,
  NumericCritic,
  SimilarityCritic,
  type Critic,
  type SimilarityRegistry,
} from '../critics/index.js';
import { EvalRubric } from '../evals/rubric.js';
import { EvalSuite } from '../evals/suite.js';
import { ValidationError } from '../evals/errors.js';
import type { ActualToolCall } from '../evals/types.js';
import {
  scriptFileSchema,
  suiteFileSchema,
  type CaseDefinition,
  type CriticDefinition,
} from './schema.js';

export interface LoadSuiteOptions {
  strategies?: SimilarityRegistry;
}

export function loadSuite(path: string, options: LoadSuiteOptions = {}): EvalSuite {
  return parseSuite(readYaml(path), options);
}

export function parseSuite(data: unknown, options: LoadSuiteOptions = {}): EvalSuite {
  const file = validate(suiteFileSchema, data, 'Invalid suite file');
  const defaultRubric = file.rubric ? new EvalRubric(file.rubric) : undefined;

  const suite = new EvalSuite({
    name: file.name,
    systemMessage: file.system,
    tools: file.tools,
    toolChoice: file.toolChoice,
  });

  file.cases.forEach((definition, index) => {
    const critics = definition.critics?.map(c => createCritic(c, options.strategies));

    if (definition.extends) {
      const previous = suite.cases.at(-1);
      if (!previous) {
        throw new ValidationError('Invalid suite file', [`cases.${index}: the first case cannot extend another`]);
      }
      if (definition.additionalMessages) {
        throw new ValidationError('Invalid suite file', [
          `cases.${index}.additionalMessages: a case that extends another takes its history from the previous case`,
        ]);
      }
      suite.extendCase({
        name: definition.name,
        userMessage: definition.userMessage,
        expectedToolCalls: definition.expectedToolCalls,
        critics,
        rubric: definition.rubric ? previous.rubric.with(definition.rubric) : undefined,
        weightPolicy: definition.weightPolicy,
      });
      return;
    }

    if (!definition.expectedToolCalls) {
      throw new ValidationError('Invalid suite file', [`cases.${index}.expectedToolCalls: Required`]);
    }
    suite.addCase({
      name: definition.name,
      userMessage: definition.userMessage,
      expectedToolCalls: definition.expectedToolCalls,
      critics,
      rubric: resolveRubric(definition, defaultRubric, index),
      additionalMessages: definition.additionalMessages,
      weightPolicy: definition.weightPolicy,
    });
  });

  return suite;
}

export function createCritic(definition: CriticDefinition, strategies?: SimilarityRegistry): Critic {
  switch (definition.type) {
    case 'binary':
      return new BinaryCritic({ field: definition.field, weight: definition.weight });
    case 'numeric':
      return new NumericCritic({
        field: definition.field,
        weight: definition.weight,
        valueRange: definition.valueRange,
        matchThreshold: definition.matchThreshold,
      });
    case 'similarity':
      return new SimilarityCritic({
        field: definition.field,
        weight: definition.weight,
        metric: definition.metric,
        similarityThreshold: definition.similarityThreshold,
        strategies,
      });
    default: {
      const unreachable: never = definition;
      return unreachable;
    }
  }
}

/** Reads a dry-run script: user message -> tool calls the stand-in model makes. */
export function loadToolCallScript(path: string): Record<string, ActualToolCall[]> {
  return validate(scriptFileSchema, readYaml(path), 'Invalid tool call script');
}

function resolveRubric(definition: CaseDefinition, defaultRubric: EvalRubric | undefined, index: number): EvalRubric {
  const override = definition.rubric;
  if (defaultRubric) {
    return override ? defaultRubric.with(override) : defaultRubric;
  }
  if (override?.failThreshold === undefined || override.warnThreshold === undefined) {
    throw new ValidationError('Invalid suite file', [
      `cases.${index}.rubric: needs failThreshold and warnThreshold when the suite has no rubric`,
    ]);
  }
  return new EvalRubric({
    ...override,
    failThreshold: override.failThreshold,
    warnThreshold: override.warnThreshold,
  });
}

function readYaml(path: string): unknown {
  if (!existsSync(path)) {
    throw new ValidationError(`File not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  try {
    return yaml.load(content);
  } catch (e) {
    throw new ValidationError(`Failed to parse YAML in ${path}`, [e instanceof Error ? e.message : String(e)]);
  }
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, message: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(message, formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
