import { describe, it, expect, afterEach } from 'vitest';
import { fillTemplate, parseJsonResponse, retryWithBackoff } from '../../src/services/llm-service';
import { OfflineLLMService, getLLMService, setLLMService } from '../../src/services/llm-service-factory';
import { LLMUnavailableError } from '../../src/errors';
import { ScriptedLLM } from '../helpers/fixtures';

describe('retryWithBackoff', () => {
  it('doubles the delay between attempts until one succeeds', async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`fail ${calls}`);
        return 'done';
      },
      3,
      10,
      async ms => {
        delays.push(ms);
      }
    );

    expect(result).toBe('done');
    expect(delays).toEqual([10, 20]);
  });

  it('throws the last error once retries are exhausted', async () => {
    const delays: number[] = [];
    let calls = 0;
    const attempt = retryWithBackoff(
      async () => {
        calls++;
        throw new Error(`fail ${calls}`);
      },
      2,
      5,
      async ms => {
        delays.push(ms);
      }
    );

    await expect(attempt).rejects.toThrow('fail 3');
    expect(delays).toEqual([5, 10]);
  });
});

describe('parseJsonResponse', () => {
  it('parses bare and fenced JSON', () => {
    expect(parseJsonResponse('{"a": 1}')).toEqual({ a: 1 });
    expect(parseJsonResponse('```\n{"b": [true]}\n```')).toEqual({ b: [true] });
  });

  it('reports unparsable text', () => {
    expect(() => parseJsonResponse('nope')).toThrow('Failed to parse LLM response as JSON: nope');
  });
});

describe('fillTemplate', () => {
  it('replaces every occurrence and leaves unknown placeholders', () => {
    expect(fillTemplate('{{a}} and {{a}} but {{b}}', { a: 'x' })).toBe('x and x but {{b}}');
  });
});

describe('getLLMService', () => {
  afterEach(() => {
    setLLMService(null);
  });

  it('returns the offline service without an API key', async () => {
    const service = getLLMService({});
    expect(service).toBeInstanceOf(OfflineLLMService);
    await expect(service.complete({ system: 's', user: 'u' })).rejects.toBeInstanceOf(LLMUnavailableError);
  });

  it('returns the override when one is set', () => {
    const fake = new ScriptedLLM([]);
    setLLMService(fake);
    expect(getLLMService({ apiKey: 'test-secret' })).toBe(fake);
  });
});
