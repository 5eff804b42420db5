import { fetch } from 'undici';
import { ProbeOutcome, TrafficProbe } from './types';

/**
 * Single best-effort GET. Like `curl -f`, a status of 400 or above counts
 * as a failure.
 */
export class HttpTrafficProbe implements TrafficProbe {
  async get(url: string, timeoutMs: number): Promise<ProbeOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal, redirect: 'follow' });
      await response.arrayBuffer();

      if (response.status >= 400) {
        return { ok: false, status: response.status, error: `HTTP ${response.status}` };
      }
      return { ok: true, status: response.status };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
