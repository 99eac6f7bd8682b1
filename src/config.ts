import { z } from 'zod';

import { MAX_CLIENTS } from './clientRegistry.js';
import { buildIceServers, type IceServer } from './mediaEngine.js';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type Config = Readonly<{
  HOST: string;
  PORT: number;
  LOG_LEVEL: LogLevel;
  SHUTDOWN_GRACE_MS: number;
  HANDSHAKE_TIMEOUT_MS: number;

  MAX_CLIENTS: number;
  MAX_MESSAGE_BYTES: number;

  // Connectivity-assist relays, handed to the media engine and the bootstrap page as-is.
  STUN_SERVER: string;
  TURN_SERVER: string;
  TURN_USERNAME: string;
  TURN_PASSWORD: string;
  ICE_SERVERS: readonly IceServer[];
}>;

type Env = Record<string, string | undefined>;

const MAX_RELAY_ADDRESS_LEN = 512;

const envSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10_000),
  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),

  MAX_CLIENTS: z.coerce.number().int().min(1).max(1024).default(MAX_CLIENTS),
  MAX_MESSAGE_BYTES: z.coerce.number().int().min(1024).default(64 * 1024),

  STUN_SERVER: z.string().max(MAX_RELAY_ADDRESS_LEN).optional().default('stun:stun.l.google.com:19302'),
  TURN_SERVER: z.string().max(MAX_RELAY_ADDRESS_LEN).optional().default(''),
  TURN_USERNAME: z.string().optional().default(''),
  TURN_PASSWORD: z.string().optional().default(''),
});

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  const stunServer = raw.STUN_SERVER.trim();
  const turnServer = raw.TURN_SERVER.trim();
  const turnUsername = raw.TURN_USERNAME.trim();
  const turnPassword = raw.TURN_PASSWORD;

  if (turnServer) {
    if (!turnUsername) {
      throw new Error('TURN_USERNAME is required when TURN_SERVER is set');
    }
    if (!turnPassword) {
      throw new Error('TURN_PASSWORD is required when TURN_SERVER is set');
    }
  }

  return {
    HOST: raw.HOST,
    PORT: raw.PORT,
    LOG_LEVEL: raw.LOG_LEVEL,
    SHUTDOWN_GRACE_MS: raw.SHUTDOWN_GRACE_MS,
    HANDSHAKE_TIMEOUT_MS: raw.HANDSHAKE_TIMEOUT_MS,

    MAX_CLIENTS: raw.MAX_CLIENTS,
    MAX_MESSAGE_BYTES: raw.MAX_MESSAGE_BYTES,

    STUN_SERVER: stunServer,
    TURN_SERVER: turnServer,
    TURN_USERNAME: turnUsername,
    TURN_PASSWORD: turnPassword,
    ICE_SERVERS: buildIceServers({ stunServer, turnServer, turnUsername, turnPassword }),
  };
}
