import type { FastifyInstance } from 'fastify';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type SignalingMetrics = Readonly<{
  clientsConnected: Gauge<string>;
  clientsRejectedTotal: Counter<'reason'>;
  messagesTotal: Counter<'type'>;
  protocolErrorsTotal: Counter<string>;
}>;

export type MediaMetrics = Readonly<{
  framesPushedTotal: Counter<string>;
  frameForwardErrorsTotal: Counter<string>;
}>;

export type MetricsBundle = Readonly<{
  registry: Registry;
  signaling: SignalingMetrics;
  media: MediaMetrics;
}>;

export function createMetrics(): MetricsBundle {
  // Per-gateway registry so tests (and embedders) can run several gateways in one process
  // without metric name collisions.
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const clientsConnected = new Gauge({
    name: 'signaling_clients_connected',
    help: 'Number of browser clients currently registered',
    registers: [registry],
  });

  const clientsRejectedTotal = new Counter({
    name: 'signaling_clients_rejected_total',
    help: 'Upgrade attempts rejected after a valid handshake',
    labelNames: ['reason'] as const,
    registers: [registry],
  });

  const messagesTotal = new Counter({
    name: 'signaling_messages_total',
    help: 'Signaling messages received, by kind',
    labelNames: ['type'] as const,
    registers: [registry],
  });

  const protocolErrorsTotal = new Counter({
    name: 'signaling_protocol_errors_total',
    help: 'Clients closed because of malformed or unexpected signaling traffic',
    registers: [registry],
  });

  const framesPushedTotal = new Counter({
    name: 'media_frames_pushed_total',
    help: 'Frames pushed into the frame sink',
    registers: [registry],
  });

  const frameForwardErrorsTotal = new Counter({
    name: 'media_frame_forward_errors_total',
    help: 'Per-client frame forwarding failures',
    registers: [registry],
  });

  return {
    registry,
    signaling: { clientsConnected, clientsRejectedTotal, messagesTotal, protocolErrorsTotal },
    media: { framesPushedTotal, frameForwardErrorsTotal },
  };
}

export function setupHttpMetrics(app: FastifyInstance, metrics: MetricsBundle): void {
  const httpRequestsTotal = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [metrics.registry],
  });

  const httpRequestDurationSeconds = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request latency in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [metrics.registry],
  });

  const startTimes = new WeakMap<object, bigint>();

  app.addHook('onRequest', async (request) => {
    startTimes.set(request, process.hrtime.bigint());
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = startTimes.get(request);
    if (!start) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const route = request.routeOptions?.url ?? 'unknown';
    const labels = {
      method: request.method,
      route,
      status_code: String(reply.statusCode),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });
}
