/* ------------------------------------------------- */
/* File: src/net/client.ts                           */
/* ------------------------------------------------- */
import { io } from "socket.io-client";

import { FrameClientSocket, clientSocketTransport } from "../adapters/socket-io.js";
import type { Logger } from "../engine/types.js";
import { BattleshipError, ConnectionClosedError } from "../errors.js";
import type { ProtocolMessage } from "./protocol.js";
import { ConnectionSession, DisconnectHandler, MessageHandler, SessionState } from "./session.js";

export interface ClientSessionOptions {
  maxFrameBytes?: number;
  logger?: Logger;
  /** délai max de `connect()`, en ms */
  timeoutMs?: number;
}

interface LoginWaiter {
  resolve: (clientId: number) => void;
  reject: (err: Error) => void;
}

/**
 * Côté client d'une connexion. Chaque message décodé part vers `onMessage` ;
 * `onDisconnect` est appelé une fois, quel que soit le côté qui ferme.
 */
export class ClientSession {
  private socket: FrameClientSocket | null = null;
  private session: ConnectionSession | null = null;
  private loginWaiter: LoginWaiter | null = null;
  private readonly logger: Logger;

  constructor(
    readonly url: string,
    private readonly onMessage: MessageHandler,
    private readonly onDisconnect: DisconnectHandler = () => {},
    private readonly options: ClientSessionOptions = {},
  ) {
    if (typeof onMessage !== "function") {
      throw new TypeError("onMessage must be an async function");
    }
    this.logger = options.logger ?? console;
  }

  get state(): SessionState {
    return this.session?.state ?? "connecting";
  }

  get closed(): Promise<void> {
    return this.session?.closed ?? Promise.resolve();
  }

  async connect(): Promise<void> {
    if (this.socket) throw new Error("ClientSession.connect() called twice");

    const socket: FrameClientSocket = io(this.url, {
      transports: ["websocket"],
      reconnection: false,
      forceNew: true,
      autoConnect: false,
      timeout: this.options.timeoutMs ?? 5_000,
    });
    this.socket = socket;

    // session branchée dans "connect" : aucune trame du même tick n'est perdue
    await new Promise<void>((resolve, reject) => {
      const onConnect = () => {
        detach();
        this.attach(socket);
        resolve();
      };
      const onDisconnect = (reason: string) => {
        detach();
        reject(new BattleshipError("CONNECTION_FAILED", `Connection to ${this.url} dropped: ${reason}`, { url: this.url }));
      };
      const onConnectError = (err: Error) => {
        detach();
        socket.close();
        reject(
          new BattleshipError("CONNECTION_FAILED", `Could not connect to ${this.url}: ${err.message}`, {
            url: this.url,
          }),
        );
      };
      const detach = () => {
        socket.off("connect", onConnect);
        socket.off("disconnect", onDisconnect);
        socket.off("connect_error", onConnectError);
      };

      socket.on("connect", onConnect);
      socket.on("disconnect", onDisconnect);
      socket.on("connect_error", onConnectError);
      socket.connect();
    });
    this.logger.log(`[CLIENT] Connected to ${this.url}`);
  }

  async send(message: ProtocolMessage): Promise<void> {
    if (!this.session) throw new ConnectionClosedError("ClientSession is not connected");
    await this.session.send(message);
  }

  /** Envoie `login` et attend la réponse : l'id attribué, ou l'erreur du serveur. */
  async tryLogin(username: string): Promise<number> {
    if (this.loginWaiter) throw new Error("A login request is already pending");

    const reply = new Promise<number>((resolve, reject) => {
      this.loginWaiter = { resolve, reject };
    });
    try {
      await this.send({ t: "login", username });
    } catch (err) {
      this.loginWaiter = null;
      throw err;
    }
    return reply;
  }

  close(): void {
    if (this.session) this.session.close();
    else this.socket?.close();
  }

  private attach(socket: FrameClientSocket): void {
    const session = new ConnectionSession(
      clientSocketTransport(socket),
      {
        onMessage: message => this.dispatch(message),
        onDisconnect: reason => {
          this.loginWaiter?.reject(new ConnectionClosedError(`Disconnected before login completed (${reason})`));
          this.loginWaiter = null;
          this.onDisconnect(reason);
        },
      },
      { maxFrameBytes: this.options.maxFrameBytes, logger: this.logger, label: `client ${socket.id ?? ""}`.trim() },
    );
    this.session = session;
    session.start();
  }

  private async dispatch(message: ProtocolMessage): Promise<void> {
    const waiter = this.loginWaiter;
    if (waiter && message.t === "login_ok") {
      this.loginWaiter = null;
      waiter.resolve(message.clientId);
    } else if (waiter && message.t === "error") {
      this.loginWaiter = null;
      waiter.reject(new BattleshipError(message.code, message.msg));
    }
    await this.onMessage(message);
  }
}
