import type { FastifyInstance } from 'fastify';

export function setupSecurityHeaders(app: FastifyInstance): void {
  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('x-content-type-options', 'nosniff');
    reply.header('referrer-policy', 'no-referrer');
    // The viewer page only plays a remote stream; it never needs local capture devices.
    reply.header('permissions-policy', 'camera=(), geolocation=(), microphone=()');
    return payload;
  });
}
