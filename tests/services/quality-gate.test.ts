import { describe, it, expect } from 'vitest';
import { runWithQualityValidation } from '../../src/services/quality-gate';
import { ScriptedGenerator, milan, strongOutput, weakOutput } from '../helpers/fixtures';

describe('runWithQualityValidation', () => {
  it('accepts the first good email', async () => {
    const generator = new ScriptedGenerator([strongOutput()]);
    const result = await runWithQualityValidation(generator, milan());

    expect(result.attempts).toBe(1);
    expect(result.success).toBe(true);
    expect(result.score.total).toBe(89);
    expect(result.decision.tier).toBe('acceptable');
    expect(generator.requests[0].retryHints).toBeUndefined();
  });

  it('retries with FOCUS hints after a weak email', async () => {
    const prospect = milan();
    const generator = new ScriptedGenerator([weakOutput(), strongOutput()]);
    const result = await runWithQualityValidation(generator, prospect);

    expect(result.attempts).toBe(2);
    expect(result.success).toBe(true);
    expect(generator.requests[1].retryHints).toEqual({
      attempt: 2,
      enhancements: [
        'FOCUS: Ensure exact 5-paragraph structure',
        'FOCUS: Include specific achievement recognition',
        'FOCUS: Include a customer use case with metrics',
        'FOCUS: Include clear 15-minute meeting request',
        'FOCUS: Repeat the selling intent keywords in subject and body',
      ],
    });
    expect(prospect.retryHints).toBeUndefined();
  });

  it('returns the last attempt when every email is weak', async () => {
    const generator = new ScriptedGenerator([weakOutput(), weakOutput()]);
    const result = await runWithQualityValidation(generator, milan(), { maxAttempts: 2 });

    expect(result.attempts).toBe(2);
    expect(result.success).toBe(false);
    expect(result.score.total).toBe(26);
    expect(result.decision.tier).toBe('low');
  });

  it('retries the same request after a generation error', async () => {
    const generator = new ScriptedGenerator([new Error('flaky'), strongOutput()]);
    const result = await runWithQualityValidation(generator, milan());

    expect(result.attempts).toBe(2);
    expect(generator.requests[1].retryHints).toBeUndefined();
  });

  it('rethrows an error on the final attempt', async () => {
    const generator = new ScriptedGenerator([new Error('first'), new Error('second')]);
    await expect(runWithQualityValidation(generator, milan(), { maxAttempts: 2 })).rejects.toThrow('second');
  });
});
