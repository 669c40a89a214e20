import WebSocket from "ws";

import { TransportError } from "@patchdrop/auth";
import type { DuplexTransport } from "@patchdrop/sync/transport";

function frameBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Peer protocol frames over an open WebSocket, usable on either end. Text
 * frames are ignored. Sending on a socket that is no longer open fails with a
 * retriable TransportError rather than being queued.
 */
export function createWebSocketTransport(ws: WebSocket): DuplexTransport<Uint8Array> {
  const handlers = new Set<(bytes: Uint8Array) => void>();
  ws.on("message", (data, isBinary) => {
    if (!isBinary) return;
    const bytes = frameBytes(data);
    for (const handler of handlers) handler(bytes);
  });

  return {
    send(bytes) {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new TransportError(`websocket is not open (ready state ${ws.readyState})`));
      }
      return new Promise<void>((resolve, reject) => {
        ws.send(bytes, { binary: true }, (err) => {
          if (err) reject(new TransportError(`websocket send failed: ${err.message}`, { cause: err }));
          else resolve();
        });
      });
    },
    onMessage(handler) {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
  };
}

/** Opens a client socket; a failed handshake is a retriable TransportError. */
export async function connectWebSocket(url: string, opts: { handshakeTimeoutMs?: number } = {}): Promise<WebSocket> {
  const ws = new WebSocket(url, { handshakeTimeout: opts.handshakeTimeoutMs ?? 10_000 });
  try {
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });
  } catch (err) {
    throw new TransportError(`could not connect to ${url}`, { url, cause: err });
  }
  return ws;
}
