import { describe, it, expect } from 'vitest';
import {
  AnalysisStrategy,
  FailureAnalyzer,
  LlmAnalysisStrategy,
  RuleBasedAnalysisStrategy,
  describeFailure,
  identifyFailurePatterns,
} from '../../src/services/failure-analyzer';
import { TestRunner } from '../../src/services/test-runner';
import { PromptConfigSnapshot, TestSuiteResults } from '../../src/types';
import { AGENTS_YAML, ScriptedGenerator, ScriptedLLM, TASKS_YAML, milan, strongOutput, weakOutput } from '../helpers/fixtures';

const prompts: PromptConfigSnapshot = {
  agents: { email_copywriter: { role: 'Copywriter' } },
  tasks: { write_email_task: { description: 'Write it.' } },
  agentsText: AGENTS_YAML,
  tasksText: TASKS_YAML,
};

async function suiteWithOneFailure(): Promise<TestSuiteResults> {
  const runner = new TestRunner(new ScriptedGenerator([strongOutput(), weakOutput()]));
  return runner.runTestSuite([milan(), milan()], 0.95);
}

const WEAK_DESCRIPTION =
  'Prospect: Milan Novak at Brewtech | Score: 26/100 | Issues: First name not properly capitalized in greeting, ' +
  'Intent compliance too low: 0/15 (required: >= 12)';

describe('identifyFailurePatterns', () => {
  it('groups failed results by pattern', async () => {
    const suite = await suiteWithOneFailure();
    const patterns = identifyFailurePatterns(suite);

    expect(patterns.map(p => p.patternType)).toEqual([
      'intent_compliance',
      'personalization_weak',
      'structure_issues',
      'message_quality_low',
      'missing_cta',
    ]);
    expect(patterns[0]).toEqual({
      patternType: 'intent_compliance',
      frequency: 1,
      percentage: 100,
      affectedAgents: ['content_personalizer', 'email_copywriter'],
      affectedTasks: ['personalize_content_task', 'write_email_task'],
      exampleFailures: [WEAK_DESCRIPTION],
      rootCause: 'Agents not properly using selling_intent keywords',
      severity: 'critical',
    });
  });

  it('returns nothing when every test passed', async () => {
    const runner = new TestRunner(new ScriptedGenerator([strongOutput()]));
    expect(identifyFailurePatterns(await runner.runTestSuite([milan()]))).toEqual([]);
  });

  it('describes a failure without a score', () => {
    expect(
      describeFailure({
        prospect: milan(),
        passed: false,
        score: null,
        output: null,
        criticalFailures: ['Generation failed: boom'],
        durationMs: 1,
        error: 'boom',
      })
    ).toBe('Prospect: Milan Novak at Brewtech | Issues: Generation failed: boom');
  });
});

describe('FailureAnalyzer', () => {
  const llmAnswer = 'AGENT WEAKNESSES:\nemail_copywriter: [generic pitch]\nPRIORITY FIXES:\n1. Use the intent\nSUMMARY:\nIntent is ignored.';

  it('uses the LLM analysis when it parses', async () => {
    const llm = new ScriptedLLM([llmAnswer]);
    const report = await new FailureAnalyzer(llm).analyzeFailures(await suiteWithOneFailure(), prompts);

    expect(report.source).toBe('llm');
    expect(report.totalFailures).toBe(1);
    expect(report.agentWeaknesses).toEqual({ email_copywriter: ['generic pitch'] });
    expect(report.taskWeaknesses).toEqual({});
    expect(report.priorityFixes).toEqual(['Use the intent']);
    expect(report.summary).toBe('Intent is ignored.');
    expect(report.failurePatterns).toHaveLength(5);
  });

  it('keeps the LLM analysis when it names an agent after an Object.prototype member', async () => {
    const llm = new ScriptedLLM(['AGENT WEAKNESSES:\nconstructor: [generic pitch]\nSUMMARY:\nOdd agent name.']);
    const report = await new FailureAnalyzer(llm).analyzeFailures(await suiteWithOneFailure(), prompts);

    expect(report.source).toBe('llm');
    expect(Object.entries(report.agentWeaknesses)).toEqual([['constructor', ['generic pitch']]]);
    expect(report.summary).toBe('Odd agent name.');
  });

  it('sends patterns, examples and prompt documents to the LLM', async () => {
    const llm = new ScriptedLLM([llmAnswer]);
    await new FailureAnalyzer(llm).analyzeFailures(await suiteWithOneFailure(), prompts);

    const prompt = llm.requests[0].user;
    expect(prompt).toContain('- intent_compliance: 1 failures (100%) - Agents not properly using selling_intent keywords');
    expect(prompt).toContain(`- ${WEAK_DESCRIPTION}`);
    expect(prompt).toContain('# agent prompts');
  });

  it('falls back to rules when the LLM fails', async () => {
    const llm = new ScriptedLLM([new Error('rate limited')]);
    const report = await new FailureAnalyzer(llm).analyzeFailures(await suiteWithOneFailure(), prompts);

    expect(report.source).toBe('rules');
    expect(report.priorityFixes).toEqual([
      'Strengthen selling_intent enforcement in content_personalizer and email_copywriter',
      'Improve LinkedIn research reliability and confidence assessment',
      'Add explicit CTA requirements with examples to email_copywriter',
    ]);
    expect(report.agentWeaknesses.email_copywriter).toEqual([
      'Not enforcing selling_intent keywords in subject and body',
      'Allowing generic data platform messaging when specific intent provided',
      'Not consistently including strong CTAs',
      'May be using weak permission-seeking language',
    ]);
    expect(report.summary).toBe(
      'Found 5 failure patterns. Primary issues are intent_compliance, personalization_weak, structure_issues.'
    );
  });

  it('falls back to rules when the LLM answer has no sections', async () => {
    const llm = new ScriptedLLM(['Sorry, I cannot help with that.']);
    const report = await new FailureAnalyzer(llm).analyzeFailures(await suiteWithOneFailure(), prompts);
    expect(report.source).toBe('rules');
  });

  it('fails when every strategy fails', async () => {
    const broken: AnalysisStrategy = {
      source: 'rules',
      analyze: async () => {
        throw new Error('boom');
      },
    };
    const analyzer = new FailureAnalyzer(new ScriptedLLM([]), [broken]);
    await expect(analyzer.analyzeFailures(await suiteWithOneFailure(), prompts)).rejects.toThrow(
      'All analysis strategies failed: boom'
    );
  });

  it('builds a prompt with placeholders when nothing failed', () => {
    const prompt = new LlmAnalysisStrategy(new ScriptedLLM([])).buildPrompt({ patterns: [], failures: [], prompts });
    expect(prompt).toContain('(none)');
  });

  it('produces a rule summary for an empty pattern list', async () => {
    const findings = await new RuleBasedAnalysisStrategy().analyze({ patterns: [], failures: [], prompts });
    expect(findings.summary).toBe('Found 0 failure patterns. Primary issues are .');
  });
});
