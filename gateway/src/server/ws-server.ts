import type { AddressInfo } from "node:net";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { Config } from "@marketlens/shared";
import { createLogger, errorMessage } from "../utils/logger.js";
import { extractCredential } from "./auth.js";
import type { ClientTransport } from "./connection.js";
import type { Gateway } from "./gateway.js";

export type WsServerOptions = Config["server"];

export type WsServerHandle = {
  readonly port: number;
  close(): Promise<void>;
};

const log = createLogger("ws-server");

export function createTransport(socket: WebSocket): ClientTransport {
  return {
    send: (frame) =>
      new Promise<void>((resolve, reject) => {
        socket.send(frame, (err) => (err ? reject(err) : resolve()));
      }),
    close: (code, reason) => socket.close(code, reason),
  };
}

export function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/** Bind the gateway to a WebSocket listener and ping peers on the heartbeat interval. */
export function startWsServer(gateway: Gateway, options: WsServerOptions): Promise<WsServerHandle> {
  const wss = new WebSocketServer({ host: options.host, port: options.port, path: options.path });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on("connection", (socket, req) => {
    alive.set(socket, true);
    socket.on("pong", () => alive.set(socket, true));

    const credential = extractCredential(req.url, req.headers.authorization);
    // Frames received while authenticating wait for accept() to settle.
    const ready = gateway.accept(createTransport(socket), credential);

    socket.on("message", (data) => {
      void ready.then((conn) => gateway.handleFrame(conn, rawToString(data)));
    });
    socket.on("close", () => {
      void ready.then((conn) => gateway.disconnect(conn));
    });
    socket.on("error", (err) => {
      log.warn("Socket error", { error: errorMessage(err) });
    });
  });

  const heartbeat = setInterval(() => {
    for (const socket of wss.clients) {
      if (alive.get(socket) === false) {
        log.debug("Terminating unresponsive peer");
        socket.terminate();
        continue;
      }
      alive.set(socket, false);
      socket.ping();
    }
  }, options.heartbeatIntervalMs);
  // Don't block process exit
  heartbeat.unref();

  const close = async (): Promise<void> => {
    clearInterval(heartbeat);
    await gateway.shutdown();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return new Promise<WsServerHandle>((resolve, reject) => {
    wss.once("error", (err) => {
      clearInterval(heartbeat);
      reject(err);
    });
    wss.once("listening", () => {
      const address: AddressInfo | string | null = wss.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      log.info("Listening", { host: options.host, port, path: options.path });
      resolve({ port, close });
    });
  });
}
