import { describe, expect, it } from 'vitest';
import { BinaryCritic, NumericCritic } from '../../src/critics/index.js';
import { EvalRubric, EvalSuite, ValidationError } from '../../src/evals/index.js';
import { ScriptedToolCallProvider, type ToolCallProvider } from '../../src/providers/index.js';
import { orderedCases } from '../../src/results/index.js';

const rubric = new EvalRubric({ failThreshold: 0.5, warnThreshold: 0.8 });

function emailSuite(): EvalSuite {
  const suite = new EvalSuite({
    name: 'Email Assistant',
    systemMessage: 'You manage email.',
    tools: [{ name: 'send_email' }, { name: 'archive_email' }],
  });
  suite.addCase({
    name: 'send',
    userMessage: 'Email a@example.com',
    expectedToolCalls: [{ name: 'send_email', args: { to: 'a@example.com' } }],
    rubric,
    critics: [new BinaryCritic({ field: 'to', weight: 1 })],
  });
  suite.extendCase({
    name: 'archive',
    userMessage: 'Archive email 7',
    expectedToolCalls: [{ name: 'archive_email', args: { id: 7 } }],
    critics: [new NumericCritic({ field: 'id', weight: 1, valueRange: [0, 100] })],
  });
  return suite;
}

describe('EvalSuite', () => {
  it('rejects duplicate case names', () => {
    const suite = emailSuite();
    expect(() =>
      suite.addCase({ name: 'send', userMessage: 'again', expectedToolCalls: [], rubric })
    ).toThrow(ValidationError);
  });

  it('cannot extend an empty suite', () => {
    const suite = new EvalSuite({ name: 'Empty', systemMessage: '' });
    expect(() => suite.extendCase({ name: 'next', userMessage: 'hi' })).toThrow('No cases to extend');
  });

  it('carries the previous conversation into an extended case', () => {
    const suite = emailSuite();
    const [first, second] = suite.cases;

    expect(second.rubric).toBe(first.rubric);
    expect(suite.buildMessages(second)).toEqual([
      { role: 'system', content: 'You manage email.' },
      { role: 'user', content: 'Email a@example.com' },
      { role: 'user', content: 'Archive email 7' },
    ]);
  });

  it('inherits expectations and critics when they are not given', () => {
    const suite = emailSuite();
    const third = suite.extendCase({ name: 'archive again', userMessage: 'And once more' });
    expect(third.expectedToolCalls).toEqual([{ name: 'archive_email', args: { id: 7 } }]);
    expect(third.critics).toEqual(suite.cases[1].critics);
    expect(third.additionalMessages.map(m => m.content)).toEqual(['Email a@example.com', 'Archive email 7']);
  });

  it('runs every case against every model', async () => {
    const provider = new ScriptedToolCallProvider({
      'Email a@example.com': [{ name: 'send_email', args: { to: 'a@example.com' } }],
      'Archive email 7': [{ name: 'archive_email', args: { id: 8 } }],
    });
    const completed: string[] = [];

    const report = await emailSuite().run(['model-a', 'model-b'], provider, {
      concurrency: 2,
      onCaseComplete: (model, caseReport) => completed.push(`${model}:${caseReport.name}`),
    });

    expect(report.suite).toBe('Email Assistant');
    expect(report.provider).toBe('scripted');
    expect(report.id).toMatch(/^email-assistant-\d+$/);
    expect(report.runs.map(run => run.model)).toEqual(['model-a', 'model-b']);
    expect(completed.sort()).toEqual(['model-a:archive', 'model-a:send', 'model-b:archive', 'model-b:send']);

    const [run] = report.runs;
    expect(Object.keys(run.cases)).toEqual(['send', 'archive']);
    expect(run.cases.send.evaluation.score).toBe(1);
    expect(run.cases.archive.evaluation.score).toBeCloseTo(0.995);
    expect(run.summary).toMatchObject({ total: 2, passed: 2, warned: 0, failed: 0, errored: 0 });
    expect(provider.requests[0]).toMatchObject({ model: 'model-a', toolChoice: 'auto' });
  });

  it('keeps every case name as an own key, in authoring order', async () => {
    const names = ['b', '2', '__proto__', '1'];
    const suite = new EvalSuite({ name: 'Odd names', systemMessage: '' });
    for (const name of names) {
      suite.addCase({ name, userMessage: `case ${name}`, expectedToolCalls: [{ name: 'ping', args: {} }], rubric });
    }
    const provider = new ScriptedToolCallProvider(() => [{ name: 'ping', args: {} }]);

    const [run] = (await suite.run(['model-a'], provider)).runs;

    expect(run.caseOrder).toEqual(names);
    expect(Object.keys(run.cases).sort()).toEqual(['1', '2', '__proto__', 'b']);
    expect(Object.hasOwn(run.cases, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(run.cases)).toBe(Object.prototype);
    expect(orderedCases(run).map(report => report.name)).toEqual(names);
    expect(run.summary.total).toBe(4);
  });

  it('records provider failures and keeps going', async () => {
    const provider: ToolCallProvider = {
      name: 'flaky',
      async getToolCalls(request) {
        if (request.messages.at(-1)?.content === 'Email a@example.com') {
          throw new Error('rate limited');
        }
        return [{ name: 'archive_email', args: { id: 7 } }];
      },
    };

    const report = await emailSuite().run(['model-a'], provider);
    const { cases, summary } = report.runs[0];

    expect(cases.send.evaluation).toEqual({ score: 0, classification: 'FAIL', fieldResults: [] });
    expect(cases.send.error).toEqual({ kind: 'provider', message: 'rate limited' });
    expect(cases.send.actualToolCalls).toEqual([]);
    expect(cases.archive.evaluation.classification).toBe('PASS');
    expect(summary).toMatchObject({ total: 2, passed: 1, failed: 1, errored: 1, averageScore: 0.5 });
  });

  it('records critic configuration errors as failed cases', async () => {
    const suite = new EvalSuite({ name: 'Broken', systemMessage: '' });
    suite.addCase({
      name: 'bad range',
      userMessage: 'Archive email 7',
      expectedToolCalls: [{ name: 'archive_email', args: { id: 7 } }],
      rubric,
      critics: [new NumericCritic({ field: 'id', weight: 1, valueRange: [3, 3] })],
    });
    const provider = new ScriptedToolCallProvider(() => [{ name: 'archive_email', args: { id: 7 } }]);

    const report = await suite.run(['model-a'], provider);
    const result = report.runs[0].cases['bad range'];

    expect(result.evaluation.classification).toBe('FAIL');
    expect(result.error?.kind).toBe('configuration');
    expect(result.actualToolCalls).toEqual([{ name: 'archive_email', args: { id: 7 } }]);
  });
});
