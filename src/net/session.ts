/* ------------------------------------------------- */
/* File: src/net/session.ts                          */
/* ------------------------------------------------- */
import { ConnectionClosedError, ProtocolError } from "../errors.js";
import type { Logger } from "../engine/types.js";
import { AsyncQueue } from "../utils/async-queue.js";
import { DEFAULT_MAX_FRAME_BYTES, encodeMessage, parseStream } from "./codec.js";
import type { ProtocolMessage } from "./protocol.js";
import type { FrameTransport } from "./transport.js";

export type SessionState = "connecting" | "open" | "closing" | "closed";

export type MessageHandler = (message: ProtocolMessage) => Promise<void>;
export type DisconnectHandler = (reason: string) => void;

export interface SessionHandlers {
  onMessage: MessageHandler;
  onDisconnect?: DisconnectHandler;
}

export interface SessionOptions {
  maxFrameBytes?: number;
  logger?: Logger;
  /** préfixe des logs, ex. `client #3` */
  label?: string;
}

/**
 * Une connexion : décode les octets reçus, passe chaque message au handler
 * dans l'ordre, et se ferme une seule fois.
 *
 * connecting -> open -> closing -> closed
 */
export class ConnectionSession {
  private _state: SessionState = "connecting";
  private readonly inbox = new AsyncQueue<Uint8Array>();
  private readonly onMessage: MessageHandler;
  private readonly onDisconnect: DisconnectHandler | undefined;
  private readonly maxFrameBytes: number;
  private readonly logger: Logger;
  private readonly label: string;
  private receiving: Promise<void> | null = null;
  private cancelled = false;
  private reason: string | null = null;
  private resolveClosed: () => void = () => {};

  /** résolue après l'appel du handler de déconnexion */
  readonly closed: Promise<void>;

  constructor(
    private readonly transport: FrameTransport,
    handlers: SessionHandlers,
    options: SessionOptions = {},
  ) {
    if (typeof handlers.onMessage !== "function") {
      throw new TypeError("onMessage must be an async function");
    }
    if (handlers.onDisconnect !== undefined && typeof handlers.onDisconnect !== "function") {
      throw new TypeError("onDisconnect must be a function");
    }

    this.onMessage = handlers.onMessage;
    this.onDisconnect = handlers.onDisconnect;
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this.logger = options.logger ?? console;
    this.label = options.label ?? `session ${transport.id}`;
    this.closed = new Promise<void>(resolve => {
      this.resolveClosed = resolve;
    });

    transport.onData(chunk => this.inbox.push(chunk));
    transport.onClose(reason => {
      this.reason ??= reason;
      if (this._state === "open") this._state = "closing";
      this.inbox.end();
      if (!this.receiving) this.finish();
    });
  }

  get state(): SessionState {
    return this._state;
  }

  get id(): string {
    return this.transport.id;
  }

  start(): void {
    if (this._state !== "connecting") {
      throw new Error(`Cannot start a session in state ${this._state}`);
    }
    this._state = "open";
    this.receiving = this.receive();
  }

  async send(message: ProtocolMessage): Promise<void> {
    if (this._state !== "open") {
      throw new ConnectionClosedError(`Cannot send ${message.t}: ${this.label} is ${this._state}`);
    }
    this.transport.write(encodeMessage(message, this.maxFrameBytes));
  }

  close(reason = "closed locally"): void {
    if (this._state === "closing" || this._state === "closed") return;

    this.reason ??= reason;
    this.cancelled = true;
    this._state = "closing";
    this.inbox.abort();
    this.transport.close();
    if (!this.receiving) this.finish();
  }

  private async receive(): Promise<void> {
    try {
      for await (const message of parseStream(this.inbox, this.maxFrameBytes)) {
        if (this.cancelled) break;
        await this.onMessage(message);
      }
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.reason ??= `protocol error: ${err.message}`;
        this.logger.warn(`[SESSION] ${this.label} dropped: ${err.message}`);
      } else {
        this.reason ??= "message handler failed";
        this.logger.error(`[SESSION] ${this.label} message handler failed:`, err);
      }
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    if (this._state === "closed") return;
    this._state = "closed";
    this.inbox.abort();
    this.transport.close();

    const reason = this.reason ?? "end of stream";
    this.logger.log(`[SESSION] ${this.label} closed (${reason})`);
    try {
      this.onDisconnect?.(reason);
    } catch (err) {
      this.logger.error(`[SESSION] ${this.label} disconnect handler failed:`, err);
    } finally {
      this.resolveClosed();
    }
  }
}
