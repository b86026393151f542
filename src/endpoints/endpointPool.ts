import { EventEmitter } from 'node:events';
import { NoEndpointsAvailableError } from '../errors.js';
import { logInfo, logWarn } from '../logger.js';
import type { EndpointHealth, EndpointSnapshot, HealthTransition } from '../types.js';
import { nowMs } from '../utils.js';

export interface EndpointPoolOptions {
  addresses: string[];
  quarantineThreshold: number;
  quarantineCooldownMs: number;
  clock?: () => number;
}

export interface SelectOptions {
  /** Address to skip when any other endpoint can be selected. */
  avoid?: string | null;
}

interface EndpointState {
  address: string;
  health: EndpointHealth;
  consecutiveFailures: number;
  lastFailureAtMs: number | null;
  quarantinedUntilMs: number | null;
}

/**
 * Candidate write endpoints with per-endpoint health. Selection prefers
 * healthy over degraded endpoints, never returns a quarantined one, and
 * rotates round-robin among endpoints of equal health.
 *
 * Emits `transition` with a {@link HealthTransition} on every health change.
 */
export class EndpointPool extends EventEmitter {
  private readonly endpoints: EndpointState[];
  private readonly byAddress = new Map<string, EndpointState>();
  private readonly quarantineThreshold: number;
  private readonly quarantineCooldownMs: number;
  private readonly clock: () => number;
  private cursor = 0;

  constructor(opts: EndpointPoolOptions) {
    super();
    const addresses = [...new Set(opts.addresses.map((address) => address.trim()).filter((address) => address.length > 0))];
    if (addresses.length === 0) {
      throw new Error('EndpointPool needs at least one endpoint address');
    }

    this.quarantineThreshold = Math.max(1, Math.floor(opts.quarantineThreshold));
    this.quarantineCooldownMs = Math.max(0, opts.quarantineCooldownMs);
    this.clock = opts.clock ?? nowMs;
    this.endpoints = addresses.map((address) => ({
      address,
      health: 'healthy',
      consecutiveFailures: 0,
      lastFailureAtMs: null,
      quarantinedUntilMs: null,
    }));
    for (const endpoint of this.endpoints) {
      this.byAddress.set(endpoint.address, endpoint);
    }
  }

  select(options: SelectOptions = {}): EndpointSnapshot {
    this.releaseExpiredQuarantines();

    let candidates = this.endpoints.filter((endpoint) => endpoint.health !== 'quarantined');
    if (candidates.length === 0) {
      throw new NoEndpointsAvailableError();
    }

    if (options.avoid && candidates.length > 1) {
      candidates = candidates.filter((endpoint) => endpoint.address !== options.avoid);
    }

    const preferred = candidates.some((endpoint) => endpoint.health === 'healthy') ? 'healthy' : 'degraded';
    const count = this.endpoints.length;
    for (let offset = 0; offset < count; offset += 1) {
      const index = (this.cursor + offset) % count;
      const endpoint = this.endpoints[index];
      if (endpoint && endpoint.health === preferred && candidates.includes(endpoint)) {
        this.cursor = (index + 1) % count;
        return snapshot(endpoint);
      }
    }

    throw new NoEndpointsAvailableError();
  }

  report(address: string, outcome: 'success' | 'failure'): void {
    const endpoint = this.byAddress.get(address);
    if (!endpoint) {
      logWarn(`Health report for unknown endpoint ${address}`);
      return;
    }

    if (outcome === 'success') {
      endpoint.consecutiveFailures = 0;
      endpoint.quarantinedUntilMs = null;
      this.transition(endpoint, 'healthy');
      return;
    }

    const atMs = this.clock();
    endpoint.consecutiveFailures += 1;
    endpoint.lastFailureAtMs = atMs;

    if (endpoint.consecutiveFailures >= this.quarantineThreshold) {
      endpoint.quarantinedUntilMs = atMs + this.quarantineCooldownMs;
      this.transition(endpoint, 'quarantined');
      return;
    }

    if (endpoint.health === 'healthy') {
      this.transition(endpoint, 'degraded');
    }
  }

  snapshot(): EndpointSnapshot[] {
    this.releaseExpiredQuarantines();
    return this.endpoints.map(snapshot);
  }

  get(address: string): EndpointSnapshot | null {
    const endpoint = this.byAddress.get(address);
    return endpoint ? snapshot(endpoint) : null;
  }

  private releaseExpiredQuarantines(): void {
    const now = this.clock();
    for (const endpoint of this.endpoints) {
      if (endpoint.health !== 'quarantined' || endpoint.quarantinedUntilMs === null || endpoint.quarantinedUntilMs > now) {
        continue;
      }
      // A failure right after cooldown quarantines again straight away.
      endpoint.consecutiveFailures = this.quarantineThreshold - 1;
      endpoint.quarantinedUntilMs = null;
      this.transition(endpoint, 'degraded');
    }
  }

  private transition(endpoint: EndpointState, to: EndpointHealth): void {
    const from = endpoint.health;
    if (from === to) {
      return;
    }
    endpoint.health = to;

    const event: HealthTransition = { address: endpoint.address, from, to, atMs: this.clock() };
    if (to === 'quarantined') {
      logWarn(`Endpoint ${endpoint.address} quarantined after ${endpoint.consecutiveFailures} consecutive failures`);
    } else {
      logInfo(`Endpoint ${endpoint.address} ${from} -> ${to}`);
    }
    this.emit('transition', event);
  }
}

function snapshot(endpoint: EndpointState): EndpointSnapshot {
  return {
    address: endpoint.address,
    health: endpoint.health,
    consecutiveFailures: endpoint.consecutiveFailures,
    lastFailureAtMs: endpoint.lastFailureAtMs,
    quarantinedUntilMs: endpoint.quarantinedUntilMs,
  };
}
