import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { loadSuite, loadToolCallScript, parseSuite } from '../../src/loader/index.js';
import { ScriptedToolCallProvider } from '../../src/providers/index.js';
import { ValidationError } from '../../src/evals/errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

function validationIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('loadSuite', () => {
  it('builds a suite from YAML', () => {
    const suite = loadSuite(fixture('email-suite.yaml'));

    expect(suite.name).toBe('Email assistant');
    expect(suite.tools.map(t => t.name)).toEqual(['send_email', 'archive_email']);
    expect(suite.cases.map(c => c.name)).toEqual(['send to one recipient', 'archive after sending']);

    const [first, second] = suite.cases;
    expect(first.critics.map(c => c.kind)).toEqual(['binary', 'similarity']);
    expect(first.rubric.warnThreshold).toBe(0.8);
    expect(second.rubric.warnThreshold).toBe(0.9);
    expect(second.rubric.failThreshold).toBe(0.5);
    expect(second.additionalMessages).toEqual([{ role: 'user', content: 'Send a hello email to a@example.com' }]);
  });

  it('runs end to end against a script', async () => {
    const suite = loadSuite(fixture('email-suite.yaml'));
    const provider = new ScriptedToolCallProvider(loadToolCallScript(fixture('email-script.yaml')));

    const report = await suite.run(['dry-run'], provider);
    const cases = report.runs[0].cases;

    expect(cases['send to one recipient'].evaluation.score).toBeCloseTo(1);
    expect(cases['archive after sending'].evaluation.score).toBeCloseTo(0.995);
    expect(report.runs[0].summary.passed).toBe(2);
  });

  it('reports a missing file', () => {
    expect(() => loadSuite(fixture('nope.yaml'))).toThrow('File not found');
  });
});

describe('parseSuite', () => {
  const base = {
    name: 'Inline',
    rubric: { failThreshold: 0.5, warnThreshold: 0.8 },
  };

  it('reports schema issues with their paths', () => {
    const issues = validationIssues(() =>
      parseSuite({
        ...base,
        cases: [{ name: 'x', userMessage: 'hi', expectedToolCalls: [], critics: [{ type: 'fuzzy', field: 'a', weight: 1 }] }],
      })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^cases\.0\.critics\.0\.type: /);
  });

  it('requires at least one case', () => {
    const issues = validationIssues(() => parseSuite({ ...base, cases: [] }));
    expect(issues[0]).toMatch(/^cases: /);
  });

  it('refuses to extend from the first case', () => {
    const issues = validationIssues(() =>
      parseSuite({ ...base, cases: [{ name: 'x', userMessage: 'hi', extends: true }] })
    );
    expect(issues).toEqual(['cases.0: the first case cannot extend another']);
  });

  it('rejects history on a case that extends another', () => {
    const issues = validationIssues(() =>
      parseSuite({
        ...base,
        cases: [
          { name: 'x', userMessage: 'hi', expectedToolCalls: [] },
          {
            name: 'y',
            userMessage: 'again',
            extends: true,
            additionalMessages: [{ role: 'assistant', content: 'done' }],
          },
        ],
      })
    );
    expect(issues).toEqual([
      'cases.1.additionalMessages: a case that extends another takes its history from the previous case',
    ]);
  });

  it('requires expected calls on a case that does not extend', () => {
    const issues = validationIssues(() => parseSuite({ ...base, cases: [{ name: 'x', userMessage: 'hi' }] }));
    expect(issues).toEqual(['cases.0.expectedToolCalls: Required']);
  });

  it('needs thresholds on the case when the suite has no rubric', () => {
    const issues = validationIssues(() =>
      parseSuite({
        name: 'No rubric',
        cases: [{ name: 'x', userMessage: 'hi', expectedToolCalls: [], rubric: { failThreshold: 0.5 } }],
      })
    );
    expect(issues).toEqual(['cases.0.rubric: needs failThreshold and warnThreshold when the suite has no rubric']);
  });

  it('applies defaults for optional fields', () => {
    const suite = parseSuite({
      ...base,
      cases: [{ name: 'x', userMessage: 'hi', expectedToolCalls: [{ name: 'ping' }] }],
    });

    expect(suite.systemMessage).toBe('');
    expect(suite.toolChoice).toBe('auto');
    expect(suite.cases[0].expectedToolCalls).toEqual([{ name: 'ping', args: {} }]);
    expect(suite.cases[0].critics).toEqual([]);
  });

  it('accepts a disabled weight policy', () => {
    const suite = parseSuite({
      ...base,
      cases: [
        {
          name: 'heavy',
          userMessage: 'hi',
          expectedToolCalls: [{ name: 'ping', args: { a: 1, b: 2 } }],
          critics: [
            { type: 'binary', field: 'a', weight: 1 },
            { type: 'binary', field: 'b', weight: 1 },
          ],
          weightPolicy: false,
        },
      ],
    });
    expect(suite.cases[0].weightPolicy).toBe(false);
  });
});
