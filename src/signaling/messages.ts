import { z } from "zod";

import type { ConnectivityCandidate, SessionDescription } from "../mediaEngine.js";
import { err, ok, type Result } from "../result.js";

// Wire shapes match what the bootstrap page's RTCPeerConnection code sends and expects.

const candidateSchema = z.object({
  candidate: z.string(),
  sdpMid: z.string().nullable().optional(),
  sdpMLineIndex: z.number().int().min(0).nullable().optional(),
  usernameFragment: z.string().nullable().optional(),
});

const inboundSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("request-offer") }),
  z.object({
    type: z.literal("answer"),
    answer: z.object({ type: z.literal("answer"), sdp: z.string().min(1) }),
  }),
  z.object({ type: z.literal("ice-candidate"), candidate: candidateSchema }),
]);

export type SignalingMessage =
  | Readonly<{ kind: "RequestSession" }>
  | Readonly<{ kind: "SessionDescription"; description: SessionDescription }>
  | Readonly<{ kind: "ConnectivityCandidate"; candidate: ConnectivityCandidate }>;

export type OutboundSignal =
  | Readonly<{ type: "offer"; offer: SessionDescription }>
  | Readonly<{ type: "ice-candidate"; candidate: ConnectivityCandidate }>
  | Readonly<{ type: "error"; message: string }>;

export function parseSignalingMessage(payload: Buffer | string): Result<SignalingMessage> {
  const text = typeof payload === "string" ? payload : payload.toString("utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return err("INVALID_SIGNAL", "Signaling message is not valid JSON");
  }

  const parsed = inboundSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return err("INVALID_SIGNAL", `Unrecognized signaling message${where}: ${issue?.message ?? "invalid"}`);
  }

  const msg = parsed.data;
  switch (msg.type) {
    case "request-offer":
      return ok({ kind: "RequestSession" });
    case "answer":
      return ok({ kind: "SessionDescription", description: msg.answer });
    case "ice-candidate":
      return ok({ kind: "ConnectivityCandidate", candidate: msg.candidate });
  }
}

export function serializeSignal(signal: OutboundSignal): string {
  return JSON.stringify(signal);
}
