import http, { IncomingMessage } from "http";
import WebSocket, { WebSocketServer } from "ws";
import { InvalidParameterError } from "./errors";
import {
  MessageFormatError,
  parseClientMessage,
  type ServerMessage,
} from "./messages";
import { SignalSession } from "./signalSession";

/** The part of a WebSocket a session talks back through. */
export interface SignalPeer {
  send(data: string): void;
  close(): void;
}

export interface SignalSocket {
  ws: SignalPeer;
  host: string | null;
  session: SignalSession;
  messageCount: number;
}

function send(ws: SignalPeer, message: ServerMessage): void {
  ws.send(JSON.stringify(message));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handles one raw frame for a connection. Rejected messages are answered
 * with an `error` event and leave the session usable.
 */
export function handleSocketMessage(
  connection: SignalSocket,
  data: WebSocket.RawData
): void {
  connection.messageCount++;

  if (!(data instanceof Buffer)) {
    console.error("Received unexpected message type from client");
    return;
  }

  try {
    const message = parseClientMessage(data.toString("utf8"));

    if (message.event === "stop") {
      console.log("Signal stream stopped");
      connection.ws.close();
      return;
    }

    send(connection.ws, connection.session.handle(message));
  } catch (error) {
    if (
      error instanceof InvalidParameterError ||
      error instanceof MessageFormatError
    ) {
      console.error(
        `Rejected message #${connection.messageCount}: ${error.message}`
      );
    } else {
      console.error("Error processing signal message:", error);
    }
    send(connection.ws, { event: "error", message: describeError(error) });
  }
}

export function createSignalWss(): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on("connection", (ws: WebSocket, request: IncomingMessage) => {
    console.log("Signal WebSocket connected");

    const connection: SignalSocket = {
      ws,
      host: request.headers.host || null,
      session: new SignalSession(),
      messageCount: 0,
    };

    ws.on("message", (data: WebSocket.RawData) => {
      handleSocketMessage(connection, data);
    });

    ws.on("error", (error) => {
      console.error("WebSocket error:", error);
    });

    ws.on("close", (code, reason) => {
      console.log(
        `WebSocket from ${connection.host ?? "unknown host"} closed with code ${code}, reason: ${reason.toString()}`
      );
    });
  });

  return wss;
}

/** Routes HTTP upgrades on `streamPath` to the signal stream; others are dropped. */
export function attachSignalStream(
  server: http.Server,
  wss: WebSocketServer,
  streamPath: string
): void {
  server.on("upgrade", (request: IncomingMessage, socket, head: Buffer) => {
    const pathname = new URL(
      request.url ?? "/",
      `http://${request.headers.host ?? "localhost"}`
    ).pathname;

    console.log(`Upgrade request received for path: ${pathname}`);

    if (pathname !== streamPath) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });
}
