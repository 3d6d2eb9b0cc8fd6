import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FailoverOrchestrator } from '../failoverOrchestrator.js';
import type { ParseResult } from '../responseRepairer.js';
import { repairAndParse } from '../responseRepairer.js';
import { ScriptedProvider, fatal, rateLimited, success, transient } from '../../test/fakes.js';

const passThrough = (raw: string): ParseResult<string> => ({ ok: true, content: raw });

describe('FailoverOrchestrator', () => {
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('returns the primary result on first success', async () => {
    const primary = new ScriptedProvider('gemini', [success('one')]);
    const backup = new ScriptedProvider('groq', [success('two')]);
    const orchestrator = new FailoverOrchestrator([primary, backup], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(result).toEqual({ ok: true, value: 'one', provider: 'gemini', attempts: 1 });
    expect(backup.calls).toBe(0);
    expect(sleeps).toEqual([]);
  });

  it('retries transient primary failures with linear backoff and skips backups', async () => {
    const primary = new ScriptedProvider('gemini', [transient(), transient(), success('third')]);
    const backup = new ScriptedProvider('groq', [success('backup')]);
    const orchestrator = new FailoverOrchestrator([primary, backup], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(result).toEqual({ ok: true, value: 'third', provider: 'gemini', attempts: 3 });
    expect(primary.calls).toBe(3);
    expect(backup.calls).toBe(0);
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('fails over immediately when the primary is rate limited', async () => {
    const primary = new ScriptedProvider('gemini', [rateLimited(), success('never')]);
    const backup = new ScriptedProvider('groq', [success('backup')]);
    const orchestrator = new FailoverOrchestrator([primary, backup], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(result).toEqual({ ok: true, value: 'backup', provider: 'groq', attempts: 1 });
    expect(primary.calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('tries each backup once, in order, until one succeeds', async () => {
    const primary = new ScriptedProvider('gemini', [fatal()]);
    const groq = new ScriptedProvider('groq', [fatal('groq down')]);
    const openrouter = new ScriptedProvider('openrouter', [success('or')]);
    const hf = new ScriptedProvider('huggingface', [success('hf')]);
    const orchestrator = new FailoverOrchestrator([primary, groq, openrouter, hf], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(result).toEqual({ ok: true, value: 'or', provider: 'openrouter', attempts: 1 });
    expect([primary.calls, groq.calls, openrouter.calls, hf.calls]).toEqual([3, 1, 1, 0]);
  });

  it('skips unavailable providers without recording a failure', async () => {
    const primary = new ScriptedProvider('gemini', [success('never')], false);
    const groq = new ScriptedProvider('groq', [fatal('groq down')]);
    const orchestrator = new FailoverOrchestrator([primary, groq], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(primary.calls).toBe(0);
    expect(result).toEqual({
      ok: false,
      failures: [{ provider: 'groq', attempts: 1, lastError: { status: 'fatal', reason: 'groq down' } }],
    });
  });

  it('reports the last error per provider when everything fails', async () => {
    const primary = new ScriptedProvider('gemini', [transient('t1'), transient('t2'), fatal('f3')]);
    const groq = new ScriptedProvider('groq', [rateLimited('slow down')]);
    const orchestrator = new FailoverOrchestrator([primary, groq], { sleep });

    const result = await orchestrator.run('prompt', passThrough);

    expect(result).toEqual({
      ok: false,
      failures: [
        { provider: 'gemini', attempts: 3, lastError: { status: 'fatal', reason: 'f3' } },
        { provider: 'groq', attempts: 1, lastError: { status: 'rate_limited', reason: 'slow down' } },
      ],
    });
  });

  it('treats unparseable output as a failed attempt and moves on', async () => {
    const primary = new ScriptedProvider('gemini', [success('not json')]);
    const groq = new ScriptedProvider('groq', [success('{"fact": "Bernoulli is energy conservation."}')]);
    const orchestrator = new FailoverOrchestrator([primary, groq], { sleep, primaryAttempts: 1 });

    const result = await orchestrator.run('prompt', raw => repairAndParse(raw, 'fact'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.provider).toBe('groq');
    expect(result.value).toEqual({ kind: 'fact', text: 'Bernoulli is energy conservation.' });
    expect(orchestrator.getStats().providers.gemini).toEqual({ attempts: 1, success: 0, fail: 1 });
  });

  it('does not retry the primary after unparseable output', async () => {
    const primary = new ScriptedProvider('gemini', [success('{"fact": ')]);
    const groq = new ScriptedProvider('groq', [success('{"fact": "Kinematic viscosity is mu / rho."}')]);
    const orchestrator = new FailoverOrchestrator([primary, groq], { sleep, primaryAttempts: 3 });

    const result = await orchestrator.run('prompt', raw => repairAndParse(raw, 'fact'));

    expect(primary.calls).toBe(1);
    expect(sleeps).toEqual([]);
    expect(result.ok && result.provider).toBe('groq');
  });

  it('passes the configured timeout and signal to providers', async () => {
    const primary = new ScriptedProvider('gemini', [success('ok')]);
    const controller = new AbortController();
    const orchestrator = new FailoverOrchestrator([primary], { sleep, timeoutMs: 1234 });

    await orchestrator.run('prompt text', passThrough, controller.signal);

    expect(primary.prompts).toEqual(['prompt text']);
    expect(primary.options).toEqual([{ timeoutMs: 1234, signal: controller.signal }]);
  });

  it('stops retrying once the caller aborts during backoff', async () => {
    const controller = new AbortController();
    const primary = new ScriptedProvider('gemini', [transient()]);
    const groq = new ScriptedProvider('groq', [success('late')]);
    const orchestrator = new FailoverOrchestrator([primary, groq], {
      sleep: async () => {
        controller.abort();
        throw new Error('aborted');
      },
    });

    const result = await orchestrator.run('prompt', passThrough, controller.signal);

    expect(result.ok).toBe(false);
    expect(primary.calls).toBe(1);
    expect(groq.calls).toBe(0);
  });

  it('tracks provider stats and resets them', async () => {
    const primary = new ScriptedProvider('gemini', [transient('boom'), success('ok')]);
    const orchestrator = new FailoverOrchestrator([primary], { sleep });

    await orchestrator.run('prompt', passThrough);

    expect(orchestrator.getStats()).toEqual({
      providers: { gemini: { attempts: 2, success: 1, fail: 1 } },
      lastProvider: 'gemini',
      lastError: '',
    });
    orchestrator.resetStats();
    expect(orchestrator.getStats().providers.gemini).toEqual({ attempts: 0, success: 0, fail: 0 });
  });

  it('exposes which providers are configured', () => {
    const orchestrator = new FailoverOrchestrator([
      new ScriptedProvider('gemini', [], false),
      new ScriptedProvider('groq', []),
    ]);
    expect(orchestrator.availableProviders()).toEqual(['groq']);
    expect(orchestrator.hasAvailableProvider()).toBe(true);
  });
});
