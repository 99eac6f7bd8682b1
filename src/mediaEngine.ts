/**
 * Contract between the gateway and the external real-time media engine.
 *
 * The gateway only routes signaling messages and pushes samples; ICE, DTLS/SRTP and RTP
 * packetization all live behind these interfaces, supplied by the host application.
 */

export type SessionDescription = Readonly<{
  type: "offer" | "answer" | "pranswer" | "rollback";
  sdp: string;
}>;

export type ConnectivityCandidate = Readonly<{
  candidate: string;
  sdpMid?: string | null;
  sdpMLineIndex?: number | null;
  usernameFragment?: string | null;
}>;

export type IceServer = Readonly<{
  urls: string;
  username?: string;
  credential?: string;
}>;

export type SampleFormat = Readonly<{
  kind: "video" | "audio";
  codec: string;
  width?: number;
  height?: number;
  sampleRate?: number;
  channels?: number;
}>;

/**
 * One media sample. `data` is borrowed from the producer for the duration of the synchronous
 * call it is passed to; anything that outlives the call must copy it.
 */
export type PushedFrame = Readonly<{
  pts: number;
  data: Uint8Array;
}>;

export type MediaSessionOptions = Readonly<{
  clientIndex: number;
  iceServers: readonly IceServer[];
  /** Relays a locally gathered candidate to the browser. */
  onLocalCandidate: (candidate: ConnectivityCandidate) => void;
}>;

export interface MediaSession {
  createOffer(): Promise<SessionDescription>;
  setRemoteDescription(description: SessionDescription): Promise<void>;
  addRemoteCandidate(candidate: ConnectivityCandidate): Promise<void>;
  /** Must not keep a reference to `frame.data` after returning. */
  sendFrame(frame: PushedFrame, format: SampleFormat): void;
  /** The viewer went away; the engine decides what to release. */
  close(): void;
}

export interface MediaEngine {
  supportsFormat(format: SampleFormat): boolean;
  createSession(options: MediaSessionOptions): Promise<MediaSession>;
}

export class MediaEngineUnavailableError extends Error {
  constructor() {
    super("No media engine is attached to this gateway");
    this.name = "MediaEngineUnavailableError";
  }
}

/**
 * Stand-in used when the host has not wired a media engine: the page and registry keep
 * working, while session requests fail per client.
 */
export function createDetachedMediaEngine(): MediaEngine {
  return {
    supportsFormat: () => false,
    createSession: async () => {
      throw new MediaEngineUnavailableError();
    },
  };
}

export function buildIceServers(
  opts: Readonly<{ stunServer: string; turnServer: string; turnUsername: string; turnPassword: string }>,
): IceServer[] {
  const servers: IceServer[] = [];
  if (opts.stunServer) servers.push({ urls: withScheme(opts.stunServer, "stun:") });
  if (opts.turnServer) {
    servers.push({
      urls: withScheme(opts.turnServer, "turn:"),
      username: opts.turnUsername,
      credential: opts.turnPassword,
    });
  }
  return servers;
}

function withScheme(address: string, scheme: "stun:" | "turn:"): string {
  return /^(stuns?|turns?):/i.test(address) ? address : `${scheme}${address}`;
}
