import { describe, it, expect, vi } from 'vitest';
import { attemptBudget, HealthProber, probeOrder } from '../health-prober';
import { Endpoint } from '../../types';
import { createTestLogger, ScriptedProbe } from '../../__tests__/fakes';

const AT = '[2024-01-02 03:04:05]';

const EDGE: Endpoint = { name: 'nginx', url: 'http://localhost', criticality: 'critical' };
const BACKEND: Endpoint = { name: 'backend', url: 'http://localhost:5000', criticality: 'advisory' };
const TRANSACTIONS: Endpoint = { name: 'transactions', url: 'http://localhost:3000', criticality: 'advisory' };

function steppingClock(stepMs = 100): () => number {
  let current = 0;
  return () => {
    current += stepMs;
    return current;
  };
}

describe('attemptBudget', () => {
  it('should divide the timeout by the interval', () => {
    expect(attemptBudget(10, 2)).toBe(5);
    expect(attemptBudget(30, 2)).toBe(15);
    expect(attemptBudget(7, 2)).toBe(3);
  });

  it('should allow at least one attempt', () => {
    expect(attemptBudget(1, 2)).toBe(1);
  });
});

describe('probeOrder', () => {
  it('should probe advisory endpoints before critical ones', () => {
    expect(probeOrder([EDGE, BACKEND, TRANSACTIONS])).toEqual([BACKEND, TRANSACTIONS, EDGE]);
  });
});

describe('HealthProber', () => {
  it('should stop polling an endpoint at its first success', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const probe = new ScriptedProbe({ [EDGE.url]: 2 });
    const prober = new HealthProber(createTestLogger().logger, probe, { sleep, now: steppingClock() });

    const result = await prober.probeAll([EDGE], 10, 2);

    expect(result.status).toBe('ok');
    expect(result.health).toEqual([{ endpoint: EDGE, reachable: true, attempts: 3, elapsedMs: 100 }]);
    expect(probe.attempts.get(EDGE.url)).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should spend the whole budget without sleeping after the last attempt', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const probe = new ScriptedProbe();
    const log = createTestLogger();
    const prober = new HealthProber(log.logger, probe, { sleep, now: steppingClock() });

    const result = await prober.probeAll([EDGE], 10, 2);

    expect(probe.attempts.get(EDGE.url)).toBe(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(result).toMatchObject({
      stage: 'Health checks',
      status: 'fatal',
      kind: 'transient',
      message: 'Critical endpoint(s) unreachable: nginx',
      missing: ['nginx']
    });
    expect(log.lines()).toContain(
      `${AT} [ERROR] nginx service health check failed after 5 attempt(s): connect ECONNREFUSED 127.0.0.1`
    );
  });

  it('should only warn when an advisory endpoint stays down', async () => {
    const probe = new ScriptedProbe({ [EDGE.url]: 0, [TRANSACTIONS.url]: 0 });
    const log = createTestLogger();
    const prober = new HealthProber(log.logger, probe, { sleep: async () => undefined, now: steppingClock() });

    const result = await prober.probeAll([EDGE, BACKEND, TRANSACTIONS], 4, 2);

    expect(result.status).toBe('warning');
    expect(result.message).toBe('Advisory endpoint(s) unreachable: backend');
    expect(result.missing).toEqual(['backend']);
    expect(result.health?.map(status => [status.endpoint.name, status.reachable, status.attempts])).toEqual([
      ['backend', false, 2],
      ['transactions', true, 1],
      ['nginx', true, 1]
    ]);
    expect(log.lines()).toContain(
      `${AT} [WARNING] backend service health check failed after 2 attempt(s): connect ECONNREFUSED 127.0.0.1`
    );
  });

  it('should probe advisory endpoints first', async () => {
    const probe = new ScriptedProbe({ [EDGE.url]: 0, [BACKEND.url]: 0, [TRANSACTIONS.url]: 0 });
    const prober = new HealthProber(createTestLogger().logger, probe, { sleep: async () => undefined });

    const result = await prober.probeAll([EDGE, BACKEND, TRANSACTIONS], 30, 2);

    expect(result.status).toBe('ok');
    expect([...probe.attempts.keys()]).toEqual([BACKEND.url, TRANSACTIONS.url, EDGE.url]);
  });

  it('should log a passing run', async () => {
    const log = createTestLogger();
    const probe = new ScriptedProbe({ [EDGE.url]: 0 });
    const prober = new HealthProber(log.logger, probe, { sleep: async () => undefined, now: steppingClock() });

    await prober.probeAll([EDGE], 30, 2);

    expect(log.lines()).toEqual([
      `${AT} [INFO] === Performing Health Checks ===`,
      `${AT} [INFO] Checking service health (timeout: 30s, interval: 2s)...`,
      `${AT} [INFO] Checking nginx service at http://localhost...`,
      `${AT} [SUCCESS] nginx service is healthy (attempt 1/15)`,
      `${AT} [SUCCESS] All health checks passed`
    ]);
  });
});
