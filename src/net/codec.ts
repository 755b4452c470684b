/* ------------------------------------------------- */
/* File: src/net/codec.ts                            */
/* ------------------------------------------------- */
import { ProtocolError } from "../errors.js";
import { ProtocolMessage, ProtocolMessageSchema } from "./protocol.js";

/* trame : longueur u32 big-endian, puis le JSON en UTF-8 */
export const HEADER_BYTES = 4;
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function encodeMessage(message: ProtocolMessage, maxFrameBytes = DEFAULT_MAX_FRAME_BYTES): Buffer {
  const checked = ProtocolMessageSchema.safeParse(message);
  if (!checked.success) {
    throw new ProtocolError(`Refusing to encode invalid message: ${checked.error.message}`);
  }

  const body = Buffer.from(JSON.stringify(checked.data), "utf-8");
  if (body.length > maxFrameBytes) {
    throw new ProtocolError(`Message of ${body.length} bytes exceeds frame limit ${maxFrameBytes}`);
  }

  const frame = Buffer.alloc(HEADER_BYTES + body.length);
  frame.writeUInt32BE(body.length, 0);
  body.copy(frame, HEADER_BYTES);
  return frame;
}

export function decodeBody(body: Uint8Array): ProtocolMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8.decode(body));
  } catch (err) {
    throw new ProtocolError("Frame body is not valid UTF-8 JSON", { cause: err });
  }

  const parsed = ProtocolMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Unknown or malformed message: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Décodeur incrémental. `push` accumule, `drain` rend les messages complets
 * dans l'ordre.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  /** octets d'une trame incomplète */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): void {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  *drain(): Generator<ProtocolMessage, void, undefined> {
    while (this.buffer.length >= HEADER_BYTES) {
      const size = this.buffer.readUInt32BE(0);
      if (size > this.maxFrameBytes) {
        throw new ProtocolError(`Frame of ${size} bytes exceeds limit ${this.maxFrameBytes}`);
      }
      if (this.buffer.length < HEADER_BYTES + size) return;

      const body = this.buffer.subarray(HEADER_BYTES, HEADER_BYTES + size);
      this.buffer = this.buffer.subarray(HEADER_BYTES + size);
      yield decodeBody(body);
    }
  }
}

/* fin du générateur = fin du flux ; une trame incomplète à la fin est ignorée */
export async function* parseStream(
  source: AsyncIterable<Uint8Array>,
  maxFrameBytes = DEFAULT_MAX_FRAME_BYTES,
): AsyncGenerator<ProtocolMessage, void, undefined> {
  const decoder = new FrameDecoder(maxFrameBytes);
  for await (const chunk of source) {
    decoder.push(chunk);
    for (const message of decoder.drain()) {
      yield message;
    }
  }
}
