/* ------------------------------------------------- */
/* File: src/net/server.ts                           */
/* ------------------------------------------------- */
import express, { Express } from "express";
import http from "http";
import { Server as IOServer } from "socket.io";

import { FrameEvents, FrameServerSocket, serverSocketTransport } from "../adapters/socket-io.js";
import type { Logger } from "../engine/types.js";
import { DEFAULT_MAX_FRAME_BYTES, HEADER_BYTES } from "./codec.js";
import type { ProtocolMessage } from "./protocol.js";
import { ConnectionSession, DisconnectHandler, MessageHandler, SessionState } from "./session.js";

export class ServerClient {
  constructor(
    readonly id: number,
    readonly address: string,
    private readonly session: ConnectionSession,
  ) {}

  get state(): SessionState {
    return this.session.state;
  }

  get closed(): Promise<void> {
    return this.session.closed;
  }

  send(message: ProtocolMessage): Promise<void> {
    return this.session.send(message);
  }

  close(): void {
    this.session.close();
  }
}

export interface ClientHandlers {
  onMessage: MessageHandler;
  onDisconnect: DisconnectHandler;
}

export type ClientConnectedHandler = (client: ServerClient) => ClientHandlers;

export interface SessionServerOptions {
  host: string;
  port: number;
  onClientConnected: ClientConnectedHandler;
  maxFrameBytes?: number;
  pingIntervalMs?: number;
  logger?: Logger;
}

/**
 * Registre des connexions : un id et une ConnectionSession par socket,
 * puis `onClientConnected` fournit les handlers.
 */
export class SessionServer {
  readonly app: Express = express();
  private readonly httpServer = http.createServer(this.app);
  private readonly io: IOServer<FrameEvents, FrameEvents>;
  private readonly _clients = new Map<number, ServerClient>();
  private readonly logger: Logger;
  private readonly maxFrameBytes: number;
  private nextClientId = 1;
  private accepting = false;
  private shuttingDown: Promise<void> | null = null;

  constructor(private readonly options: SessionServerOptions) {
    if (typeof options.onClientConnected !== "function") {
      throw new TypeError("onClientConnected must be a function");
    }
    this.logger = options.logger ?? console;
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;

    this.io = new IOServer<FrameEvents, FrameEvents>(this.httpServer, {
      pingInterval: options.pingIntervalMs ?? 10_000,
      maxHttpBufferSize: this.maxFrameBytes + HEADER_BYTES + 1024,
    });

    /*  Santé                                                              */
    this.app.get("/health", (_req, res) => {
      res.json({ status: "ok", clients: this._clients.size });
    });

    this.io.on("connection", socket => this.acceptClient(socket));
  }

  get clients(): ReadonlyMap<number, ServerClient> {
    return this._clients;
  }

  get listening(): boolean {
    return this.httpServer.listening;
  }

  address(): { host: string; port: number } | null {
    const addr = this.httpServer.address();
    if (addr && typeof addr === "object") return { host: addr.address, port: addr.port };
    return null;
  }

  async start(): Promise<void> {
    if (this.httpServer.listening) return;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.httpServer.once("error", onError);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off("error", onError);
        resolve();
      });
    });
    this.accepting = true;

    const bound = this.address();
    this.logger.log(`🚀  [SERVER] Listening on ${bound?.host ?? this.options.host}:${bound?.port ?? this.options.port}`);
  }

  /** Ferme l'écoute. Les sessions ouvertes continuent. */
  async stop(): Promise<void> {
    this.accepting = false;
    if (!this.httpServer.listening) return;

    this.httpServer.close(err => {
      if (err) this.logger.warn("[SERVER] Close reported:", err.message);
      else this.logger.log("[SERVER] All connections drained");
    });
    this.logger.log(`[SERVER] Stopped accepting (${this._clients.size} session(s) still open)`);
  }

  /** stop() + fermeture de toutes les sessions et de socket.io */
  shutdown(): Promise<void> {
    this.shuttingDown ??= this.closeEverything();
    return this.shuttingDown;
  }

  private async closeEverything(): Promise<void> {
    await this.stop();
    const live = [...this._clients.values()];
    live.forEach(c => c.close());
    await Promise.all(live.map(c => c.closed));
    await new Promise<void>(resolve => {
      this.io.close(() => resolve());
    });
  }

  private acceptClient(socket: FrameServerSocket): void {
    if (!this.accepting) {
      this.logger.warn(`[SERVER] Refusing ${socket.id}: not accepting connections`);
      socket.disconnect(true);
      return;
    }

    const id = this.nextClientId++;
    let external: ClientHandlers | null = null;

    const session = new ConnectionSession(
      serverSocketTransport(socket),
      {
        onMessage: async message => {
          if (external) await external.onMessage(message);
        },
        onDisconnect: reason => {
          this._clients.delete(id);
          this.logger.log(`[SERVER] Client #${id} disconnected (${reason})`);
          external?.onDisconnect(reason);
        },
      },
      { maxFrameBytes: this.maxFrameBytes, logger: this.logger, label: `client #${id}` },
    );

    const client = new ServerClient(id, socket.handshake.address, session);
    this._clients.set(id, client);
    this.logger.log(`[SERVER] Client #${id} connected from ${client.address}`);

    try {
      const handlers = this.options.onClientConnected(client);
      if (typeof handlers.onMessage !== "function" || typeof handlers.onDisconnect !== "function") {
        throw new TypeError("onClientConnected must return onMessage and onDisconnect functions");
      }
      external = handlers;
    } catch (err) {
      this.logger.error(`[SERVER] Rejecting client #${id}:`, err);
      session.close("client setup failed");
      return;
    }

    session.start();
  }
}
