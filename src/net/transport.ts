/* Canal d'octets sous une session (voir src/adapters/socket-io.ts). */
export interface FrameTransport {
  readonly id: string;
  write(bytes: Uint8Array): void;
  onData(listener: (chunk: Uint8Array) => void): void;
  /** une seule fois, quel que soit le côté qui ferme */
  onClose(listener: (reason: string) => void): void;
  close(): void;
}
