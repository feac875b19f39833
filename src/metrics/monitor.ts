import http from 'http';
import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { StateKind } from '../types.js';

export type ReconcileOutcome = 'changed' | 'unchanged' | 'missing' | 'invalid' | 'unavailable';

/** Hooks the state manager reports into; every method is optional to call. */
export interface MonitorMetrics {
  recordReconcile(kind: StateKind, outcome: ReconcileOutcome): void;
  recordDispatch(kind: StateKind, timestampMs: number): void;
  recordInvalid(kind: StateKind): void;
  recordReadRetry(kind: StateKind): void;
}

export interface MonitorMetricsOptions {
  readonly promPort?: number;
  readonly collectDefaults?: boolean;
}

function createCounters(register: Registry) {
  const reconcile = new Counter({
    name: 'bench_monitor_reconcile_total',
    help: 'Reconciliations by state kind and outcome',
    labelNames: ['kind', 'outcome'],
    registers: [register]
  });
  const dispatch = new Counter({
    name: 'bench_monitor_dispatch_total',
    help: 'Change notifications delivered to subscribers',
    labelNames: ['kind'],
    registers: [register]
  });
  const invalid = new Counter({
    name: 'bench_monitor_invalid_documents_total',
    help: 'Documents rejected as malformed or failing validation',
    labelNames: ['kind'],
    registers: [register]
  });
  const readRetries = new Counter({
    name: 'bench_monitor_read_retries_total',
    help: 'Read attempts retried after a transient failure',
    labelNames: ['kind'],
    registers: [register]
  });
  return { reconcile, dispatch, invalid, readRetries };
}

function createGauges(register: Registry) {
  const lastDispatch = new Gauge({
    name: 'bench_monitor_last_dispatch_timestamp_seconds',
    help: 'Unix time of the last change notification per kind',
    labelNames: ['kind'],
    registers: [register]
  });
  return { lastDispatch };
}

export class MonitorMetricsManager implements MonitorMetrics {
  readonly registry = new Registry();
  private readonly counters = createCounters(this.registry);
  private readonly gauges = createGauges(this.registry);
  private readonly server?: http.Server;
  private readonly promPort: number;

  constructor(options: MonitorMetricsOptions = {}) {
    this.promPort = options.promPort ?? 0;
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
    if (this.promPort > 0) {
      this.server = http.createServer((_req, res) => {
        this.registry
          .metrics()
          .then((body) => {
            res.setHeader('Content-Type', this.registry.contentType);
            res.end(body);
          })
          .catch((error: unknown) => {
            res.statusCode = 500;
            res.end(error instanceof Error ? error.message : String(error));
          });
      });
    }
  }

  async start(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => server.listen(this.promPort, resolve));
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server || !server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  recordReconcile(kind: StateKind, outcome: ReconcileOutcome): void {
    this.counters.reconcile.inc({ kind, outcome });
  }

  recordDispatch(kind: StateKind, timestampMs: number): void {
    this.counters.dispatch.inc({ kind });
    this.gauges.lastDispatch.set({ kind }, timestampMs / 1_000);
  }

  recordInvalid(kind: StateKind): void {
    this.counters.invalid.inc({ kind });
  }

  recordReadRetry(kind: StateKind): void {
    this.counters.readRetries.inc({ kind });
  }

  async snapshot(): Promise<string> {
    return this.registry.metrics();
  }
}

export function createMonitorMetrics(options?: MonitorMetricsOptions): MonitorMetricsManager {
  return new MonitorMetricsManager(options);
}
