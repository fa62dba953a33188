import { paths } from '../api/paths.js';
import { errorMessage } from '../core/errors.js';
import type { FetchLike } from '../http/session.js';
import { readinessProbeAttemptsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

export interface ReadinessOptions {
  timeoutMs: number;
  intervalMs?: number;
  probeTimeoutMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Polls the liveness endpoint until it answers 200 or the timeout elapses.
 * Always makes at least one attempt. Never throws: unreachable hosts and
 * non-200 answers just mean "not ready yet".
 */
export async function waitUntilReady(baseUrl: string, opts: ReadinessOptions): Promise<boolean> {
  const log = getLogger();
  const fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;
  const intervalMs = opts.intervalMs ?? 1000;
  const probeTimeoutMs = opts.probeTimeoutMs ?? 2000;
  const url = `${baseUrl.replace(/\/+$/, '')}${paths.info}`;
  const start = now();
  let attempt = 0;

  log.info({ url, timeoutMs: opts.timeoutMs }, 'Waiting for server to be ready');
  for (;;) {
    attempt++;
    try {
      const res = await fetchImpl(url, { signal: AbortSignal.timeout(probeTimeoutMs) });
      // drain so the socket can be reused or released
      await res.arrayBuffer();
      if (res.status === 200) {
        readinessProbeAttemptsTotal.inc({ result: 'ready' });
        log.info({ attempt, elapsedMs: now() - start }, 'Server is ready');
        return true;
      }
      readinessProbeAttemptsTotal.inc({ result: 'not_ready' });
      log.debug({ attempt, status: res.status }, 'readiness-probe');
    } catch (err) {
      readinessProbeAttemptsTotal.inc({ result: 'unreachable' });
      log.debug({ attempt, err: errorMessage(err) }, 'readiness-probe unreachable');
    }
    if (now() - start >= opts.timeoutMs) {
      log.warn({ attempts: attempt, timeoutMs: opts.timeoutMs }, 'Server did not become ready');
      return false;
    }
    await sleep(intervalMs);
  }
}
