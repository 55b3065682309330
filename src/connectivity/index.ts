export interface ConnectivityProbe {
  isOnline(): boolean | Promise<boolean>;
}

export type ConnectivityListener = (online: boolean) => void;

/**
 * Connectivity state pushed by the host (network manager events, a UI
 * toggle). Listeners only hear transitions.
 */
export class ConnectivityMonitor implements ConnectivityProbe {
  private online: boolean;
  private listeners = new Set<ConnectivityListener>();

  constructor(initiallyOnline = true) {
    this.online = initiallyOnline;
  }

  isOnline(): boolean {
    return this.online;
  }

  setOnline(online: boolean): void {
    if (online === this.online) return;
    this.online = online;
    for (const listener of [...this.listeners]) {
      listener(online);
    }
  }

  onChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export interface HttpConnectivityProbeConfig {
  url: string;
  timeoutMs: number;
}

/** Any HTTP response, whatever its status, counts as reachable. */
export const createHttpConnectivityProbe = (
  config: HttpConnectivityProbeConfig
): ConnectivityProbe => ({
  async isOnline(): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      const response = await fetch(config.url, { method: "HEAD", signal: controller.signal });
      await response.body?.cancel();
      return true;
    } catch {
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  },
});
