// arena-backend/ArenaSocketServer.ts

import type http from "http";
import type { IncomingMessage } from "http";
import { WebSocket, WebSocketServer } from "ws";

import {
  ArenaRuntime,
  closeCodeForAuth,
  closeCodeForReason,
  Logger,
  MAX_INBOUND_BYTES,
} from "../worldcore";
import type { FrameSink, RawInbound, SessionId } from "../worldcore";

const log = Logger.scope("SOCKET");

/** The slice of a ws socket the arena touches. */
export interface ArenaSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawInbound, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type HandshakeRequest = Pick<IncomingMessage, "headers" | "url"> & {
  socket: { remoteAddress?: string };
};

/** ws socket as seen by the Broadcaster. */
class SocketFrameSink implements FrameSink {
  constructor(private readonly socket: ArenaSocket) {}

  get bufferedAmount(): number {
    return this.socket.bufferedAmount;
  }

  send(data: Buffer, cb: (err?: Error) => void): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      cb(new Error("socket not open"));
      return;
    }
    this.socket.send(data, { binary: true }, cb);
  }
}

export function parseHandshake(req: HandshakeRequest): { token: string | null; userAgent: string | null } {
  const base = req.headers.host && req.url ? `ws://${req.headers.host}${req.url}` : `ws://localhost${req.url ?? "/"}`;
  const url = new URL(base);
  const ua = req.headers["user-agent"];
  return {
    token: url.searchParams.get("token"),
    userAgent: typeof ua === "string" ? ua : null,
  };
}

export class ArenaSocketServer {
  readonly wss: WebSocketServer;
  private readonly sockets = new Map<SessionId, ArenaSocket>();

  constructor(
    private readonly runtime: ArenaRuntime,
    server: http.Server,
    path: string,
  ) {
    // Oversized frames are refused by ws before they are buffered.
    this.wss = new WebSocketServer({ server, path, maxPayload: MAX_INBOUND_BYTES });

    this.wss.on("connection", (socket: WebSocket, req: IncomingMessage) => {
      this.accept(socket, req).catch((err: unknown) => {
        log.error("Connection setup failed", { err });
      });
    });

    runtime.onSessionClosed((sessionId, reason) => {
      const socket = this.sockets.get(sessionId);
      this.sockets.delete(sessionId);
      if (socket && socket.readyState === WebSocket.OPEN) {
        socket.close(closeCodeForReason(reason), reason);
      }
    });
  }

  get openSockets(): number {
    return this.sockets.size;
  }

  async accept(socket: ArenaSocket, req: HandshakeRequest): Promise<void> {
    const remoteAddress = req.socket.remoteAddress ?? "unknown";
    let sessionId: SessionId | null = null;

    // Must exist before the first await: ws emits protocol errors on the socket
    // at any point, and an unhandled "error" event takes the process down.
    socket.on("error", (err) => {
      log.warn("Socket error", { sessionId, remoteAddress, err });
    });

    let hs: { token: string | null; userAgent: string | null };
    try {
      hs = parseHandshake(req);
    } catch (err) {
      log.warn("Bad handshake URL", { remoteAddress, err });
      socket.close(closeCodeForAuth("invalid_token"), "invalid_token");
      return;
    }

    try {
      const res = await this.runtime.sessions.open({
        remoteAddress,
        userAgent: hs.userAgent,
        token: hs.token,
        sink: new SocketFrameSink(socket),
      });

      if (!res.ok) {
        socket.close(closeCodeForAuth(res.error.code), res.error.code);
        return;
      }

      const id = res.sessionId;
      sessionId = id;
      if (socket.readyState !== WebSocket.OPEN) {
        this.runtime.sessions.drop(id, "client_closed");
        return;
      }

      this.sockets.set(id, socket);

      socket.on("message", (data, isBinary) => {
        if (!isBinary) {
          // Text frames are not part of the protocol; count them as malformed.
          this.runtime.sessions.route(id, Buffer.alloc(0));
          return;
        }
        try {
          this.runtime.sessions.route(id, data);
        } catch (err) {
          log.warn("Inbound message handling failed", { sessionId: id, err });
        }
      });

      socket.on("close", () => {
        this.sockets.delete(id);
        this.runtime.sessions.drop(id, "client_closed");
      });
    } catch (err) {
      log.error("Handshake failed", { remoteAddress, err });
      socket.close(1011, "internal_error");
    }
  }

  close(): void {
    this.wss.close();
  }
}
