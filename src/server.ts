import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type http from 'node:http';
import type { Duplex } from 'node:stream';

import { clientPageHtml } from './clientPage.js';
import type { Config } from './config.js';
import { applyPermissiveCors } from './cors.js';
import { setupHttpMetrics, type MetricsBundle } from './metrics.js';
import { setupSecurityHeaders } from './middleware/securityHeaders.js';
import { respondUpgradeHttp } from './routes/upgradeHttp.js';
import { isUpgradeRequest, validateWebSocketHandshakeRequest } from './routes/wsUpgradeRequest.js';
import { destroyBestEffort, isDestroyed } from './socketSafe.js';
import { formatOneLineError } from './util/text.js';

/** Receives every upgrade request that passed handshake validation. */
export interface UpgradeAcceptor {
  accept(req: http.IncomingMessage, socket: Duplex, head: Buffer, handshakeKey: string): void;
}

export type ServerBundle = {
  app: FastifyInstance;
  isShuttingDown: () => boolean;
  markShuttingDown: () => void;
  closeUpgradeSockets: () => void;
};

export type BuildServerOptions = Readonly<{
  metrics: MetricsBundle;
  acceptor: UpgradeAcceptor;
}>;

export function buildServer(config: Config, opts: BuildServerOptions): ServerBundle {
  let shuttingDown = false;
  const upgradeSockets = new Set<Duplex>();

  const app = fastify({
    logger: { level: config.LOG_LEVEL },
    // Bounds the initial request read so a stalled peer cannot hold a connection open forever.
    requestTimeout: config.HANDSHAKE_TIMEOUT_MS,
  });

  setupSecurityHeaders(app);
  setupHttpMetrics(app, opts.metrics);

  const pageHtml = clientPageHtml({ iceServers: config.ICE_SERVERS });

  const handleHealthz = async () => ({ ok: true });
  const handleReadyz = async (_request: FastifyRequest, reply: FastifyReply) => {
    if (shuttingDown) return reply.code(503).send({ ok: false });
    return { ok: true };
  };

  const handlePage = async (request: FastifyRequest, reply: FastifyReply) => {
    applyPermissiveCors(reply);
    if (isUpgradeRequest(request.raw)) {
      // Node only routes `Connection: Upgrade` requests to the upgrade event; anything else
      // that still names a protocol switch is a malformed handshake.
      return reply.code(400).type('text/plain; charset=utf-8').send('Invalid WebSocket upgrade\n');
    }
    reply.header('cache-control', 'no-store');
    return reply.type('text/html; charset=utf-8').send(pageHtml);
  };

  app.get('/healthz', handleHealthz);
  app.get('/readyz', handleReadyz);
  app.get('/*', handlePage);

  // CORS preflight, on every path.
  app.options('/*', async (request, reply) => {
    applyPermissiveCors(reply, request.headers['access-control-request-headers']);
    return reply.code(204).send();
  });

  // WebSocket upgrades are handled at the Node HTTP server layer (Fastify does not route
  // upgrade requests).
  app.server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    upgradeSockets.add(socket);
    socket.once('close', () => upgradeSockets.delete(socket));
    // Node drops its own socket error handler before emitting 'upgrade'.
    socket.on('error', (err) => {
      app.log.debug({ err: formatOneLineError(err, 512) }, 'upgrade_socket_error');
      destroyBestEffort(socket);
    });

    try {
      if (shuttingDown) {
        respondUpgradeHttp(socket, 503, 'Shutting down');
        return;
      }

      const handshake = validateWebSocketHandshakeRequest(req);
      if (!handshake.ok) {
        respondUpgradeHttp(socket, handshake.status, handshake.message);
        return;
      }

      opts.acceptor.accept(req, socket, head, handshake.key);
    } catch (err) {
      app.log.error({ err: formatOneLineError(err, 512) }, 'upgrade_unexpected_error');
      if (isDestroyed(socket)) return;
      respondUpgradeHttp(socket, 500, 'WebSocket upgrade failed');
    }
  });

  return {
    app,
    isShuttingDown: () => shuttingDown,
    markShuttingDown: () => {
      shuttingDown = true;
    },
    closeUpgradeSockets: () => {
      for (const socket of upgradeSockets) {
        destroyBestEffort(socket);
      }
      upgradeSockets.clear();
    },
  };
}
