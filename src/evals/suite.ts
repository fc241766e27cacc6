import pLimit from 'p-limit';
import type { ToolCallProvider, ToolChoice } from '../providers/types.js';
import { EvalCase, failedEvaluation, type EvalCaseOptions } from './case.js';
import { asErrorMessage, ConfigurationError, ValidationError } from './errors.js';
import type {
  ActualToolCall,
  ChatMessage,
  EvaluationResult,
  ExpectedToolCall,
  ToolDefinition,
} from './types.js';

export interface CaseReport {
  name: string;
  input: string;
  expectedToolCalls: ExpectedToolCall[];
  actualToolCalls: ActualToolCall[];
  evaluation: EvaluationResult;
  error?: {
    kind: 'provider' | 'configuration';
    message: string;
  };
}

export interface RunSummary {
  total: number;
  passed: number;
  warned: number;
  failed: number;
  errored: number;
  averageScore: number;
}

export interface ModelRun {
  model: string;
  /** Case names in authoring order. */
  caseOrder: string[];
  /** Keyed by case name; every key is an own property, `__proto__` included. */
  cases: Record<string, CaseReport>;
  summary: RunSummary;
}

export interface SuiteReport {
  id: string;
  suite: string;
  provider: string;
  startedAt: string;
  completedAt: string;
  runs: ModelRun[];
}

export interface RunOptions {
  concurrency?: number;
  onCaseComplete?: (model: string, report: CaseReport) => void;
}

export interface EvalSuiteOptions {
  name: string;
  systemMessage: string;
  tools?: readonly ToolDefinition[];
  toolChoice?: ToolChoice;
}

export type ExtendCaseOptions = Pick<EvalCaseOptions, 'name' | 'userMessage'> &
  Partial<Pick<EvalCaseOptions, 'expectedToolCalls' | 'rubric' | 'critics' | 'weightPolicy'>>;

/**
 * A named collection of cases sharing a system message and a tool catalog.
 */
export class EvalSuite {
  readonly name: string;
  readonly systemMessage: string;
  readonly tools: readonly ToolDefinition[];
  readonly toolChoice: ToolChoice;
  private readonly caseList: EvalCase[] = [];

  constructor(options: EvalSuiteOptions) {
    if (!options.name) {
      throw new ValidationError('Eval suite needs a name');
    }
    this.name = options.name;
    this.systemMessage = options.systemMessage;
    this.tools = [...(options.tools ?? [])];
    this.toolChoice = options.toolChoice ?? 'auto';
  }

  get cases(): readonly EvalCase[] {
    return this.caseList;
  }

  addCase(options: EvalCaseOptions): EvalCase {
    if (this.caseList.some(c => c.name === options.name)) {
      throw new ValidationError(`Duplicate case name '${options.name}' in suite '${this.name}'`);
    }
    const evalCase = new EvalCase(options);
    this.caseList.push(evalCase);
    return evalCase;
  }

  /**
   * Continues the conversation of the last case: its user message becomes
   * history for the new one. Expectations, critics and rubric carry over
   * unless given.
   */
  extendCase(options: ExtendCaseOptions): EvalCase {
    const last = this.caseList.at(-1);
    if (!last) {
      throw new ValidationError('No cases to extend. Add a case first.');
    }

    const additionalMessages: ChatMessage[] = [
      ...last.additionalMessages,
      { role: 'user', content: last.userMessage },
    ];

    return this.addCase({
      name: options.name,
      userMessage: options.userMessage,
      expectedToolCalls: options.expectedToolCalls ?? last.expectedToolCalls,
      rubric: options.rubric ?? last.rubric,
      critics: options.critics ?? last.critics,
      weightPolicy: options.weightPolicy ?? last.weightPolicy,
      additionalMessages,
    });
  }

  buildMessages(evalCase: EvalCase): ChatMessage[] {
    return [
      { role: 'system', content: this.systemMessage },
      ...evalCase.additionalMessages,
      { role: 'user', content: evalCase.userMessage },
    ];
  }

  async run(models: readonly string[], provider: ToolCallProvider, options: RunOptions = {}): Promise<SuiteReport> {
    const startedAt = new Date();
    const runs: ModelRun[] = [];

    for (const model of models) {
      runs.push(await this.runModel(model, provider, options));
    }

    return {
      id: `${slugify(this.name)}-${startedAt.getTime()}`,
      suite: this.name,
      provider: provider.name,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
      runs,
    };
  }

  private async runModel(model: string, provider: ToolCallProvider, options: RunOptions): Promise<ModelRun> {
    const limit = pLimit(Math.max(1, options.concurrency ?? 1));
    const reports = await Promise.all(
      this.caseList.map(evalCase =>
        limit(async () => {
          const report = await this.runCase(evalCase, model, provider);
          options.onCaseComplete?.(model, report);
          return report;
        })
      )
    );

    return {
      model,
      caseOrder: reports.map(report => report.name),
      cases: Object.fromEntries(reports.map(report => [report.name, report])),
      summary: summarizeRun(reports),
    };
  }

  private async runCase(evalCase: EvalCase, model: string, provider: ToolCallProvider): Promise<CaseReport> {
    const base = {
      name: evalCase.name,
      input: evalCase.userMessage,
      expectedToolCalls: evalCase.expectedToolCalls.map(call => ({ name: call.name, args: { ...call.args } })),
    };

    let actualToolCalls: ActualToolCall[];
    try {
      actualToolCalls = await provider.getToolCalls({
        model,
        messages: this.buildMessages(evalCase),
        tools: this.tools,
        toolChoice: this.toolChoice,
      });
    } catch (error) {
      return {
        ...base,
        actualToolCalls: [],
        evaluation: failedEvaluation(),
        error: { kind: 'provider', message: asErrorMessage(error) },
      };
    }

    try {
      return { ...base, actualToolCalls, evaluation: evalCase.evaluate(actualToolCalls) };
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      return {
        ...base,
        actualToolCalls,
        evaluation: failedEvaluation(),
        error: { kind: 'configuration', message: error.message },
      };
    }
  }
}

export function summarizeRun(reports: readonly CaseReport[]): RunSummary {
  const count = (classification: EvaluationResult['classification']) =>
    reports.filter(r => r.evaluation.classification === classification).length;

  const total = reports.length;
  return {
    total,
    passed: count('PASS'),
    warned: count('WARN'),
    failed: count('FAIL'),
    errored: reports.filter(r => r.error !== undefined).length,
    averageScore: total > 0 ? reports.reduce((sum, r) => sum + r.evaluation.score, 0) / total : 0,
  };
}

function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'suite';
}
