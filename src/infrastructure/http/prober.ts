/**
 * HTTP reachability probe for tunnelled services
 */

export interface ProbeTimeouts {
  /** Whole-request budget, connect included */
  timeoutMs: number;
}

export interface HttpProber {
  /** Resolves true when any HTTP response arrives, whatever its status */
  probe(url: string, timeouts: ProbeTimeouts): Promise<boolean>;
}

export class FetchHttpProber implements HttpProber {
  async probe(url: string, timeouts: ProbeTimeouts): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeouts.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        signal: controller.signal,
        headers: { 'User-Agent': 'kagent-setup-probe' },
      });
      // any status proves the tunnel carries traffic
      await response.body?.cancel();
      return true;
    } catch {
      // refused, reset or aborted on timeout
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
