/* ------------------------------------------------- */
/* File: src/adapters/socket-io.ts                   */
/* ------------------------------------------------- */
import type { Socket as IOServerSocket } from "socket.io";
import type { Socket as IOClientSocket } from "socket.io-client";

import type { FrameTransport } from "../net/transport.js";
import { FRAME_EVENT } from "../net/protocol.js";

/** Buffer sous Node, ArrayBuffer dans le navigateur */
export interface FrameEvents {
  [FRAME_EVENT]: (chunk: Uint8Array | ArrayBuffer) => void;
}

export type FrameServerSocket = IOServerSocket<FrameEvents, FrameEvents>;
export type FrameClientSocket = IOClientSocket<FrameEvents, FrameEvents>;

export function toBytes(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return null;
}

export function serverSocketTransport(socket: FrameServerSocket): FrameTransport {
  return {
    id: socket.id,
    write: bytes => {
      socket.emit(FRAME_EVENT, bytes);
    },
    onData: listener => {
      socket.on(FRAME_EVENT, data => {
        const bytes = toBytes(data);
        if (bytes) listener(bytes);
        else socket.disconnect(true);
      });
    },
    onClose: listener => {
      socket.on("disconnect", reason => listener(reason));
    },
    close: () => {
      if (socket.connected) socket.disconnect(true);
    },
  };
}

export function clientSocketTransport(socket: FrameClientSocket): FrameTransport {
  return {
    id: socket.id ?? "unconnected",
    write: bytes => {
      socket.emit(FRAME_EVENT, bytes);
    },
    onData: listener => {
      socket.on(FRAME_EVENT, data => {
        const bytes = toBytes(data);
        if (bytes) listener(bytes);
        else socket.disconnect();
      });
    },
    onClose: listener => {
      socket.on("disconnect", reason => listener(reason));
    },
    close: () => {
      if (socket.connected) socket.disconnect();
    },
  };
}
