import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import { AnyMockEvent } from "../../shared/src/contracts";
import { internalError, MockApiDispatcher } from "./dispatcher";
import { ListenError, MockApiError } from "./errors";
import { MockEventBus } from "./events";
import { Logger, LogLevel } from "./logger";
import { MockRegistry } from "./registry";
import { DispatchResult, MockApiConfig } from "./types";

const MAX_BODY_BYTES = 1_000_000;
const REQUEST_TIMEOUT_MS = 20_000;
const EVENTS_PATH = "/events";

/**
 * HTTP listener for the mock runner-registration API.
 *
 * Responsibilities:
 * - read each request and hand it to the dispatcher,
 * - write the JSON response and close the connection,
 * - log one line per handled request,
 * - fan registry events out to `/events` websocket subscribers.
 */
export class MockApiServer {
  private server: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private unsubscribeEvents: (() => void) | null = null;
  private requestSeq = 0;
  private readonly dispatcher: MockApiDispatcher;

  public constructor(
    private readonly config: MockApiConfig,
    registry: MockRegistry,
    private readonly logger: Logger,
    events: MockEventBus = new MockEventBus(),
  ) {
    this.dispatcher = new MockApiDispatcher(registry, {
      authEnabled: config.authEnabled,
      events,
    });
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((request, response) => {
      this.handleRequest(request, response).catch((error: unknown) => {
        this.logger.error(`Unhandled request failure: ${String(error)}`);
        if (!response.headersSent) {
          this.writeResult(response, internalError(error));
        }
      });
    });
    server.requestTimeout = REQUEST_TIMEOUT_MS;

    const wsServer = new WebSocketServer({ noServer: true });
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wsServer, request, socket, head);
    });

    try {
      await new Promise<void>((resolvePromise, rejectPromise) => {
        server.once("error", rejectPromise);
        server.listen(this.config.port, this.config.bindHost, () => {
          server.off("error", rejectPromise);
          resolvePromise();
        });
      });
    } catch (error) {
      wsServer.close();
      throw new ListenError(
        errorCode(error),
        `Could not listen on ${this.config.bindHost}:${this.config.port}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    server.on("error", (error) => {
      this.logger.error(`Listener error: ${String(error)}`);
    });

    this.server = server;
    this.wsServer = wsServer;
    this.unsubscribeEvents = this.dispatcher.eventBus.subscribe((event) => {
      this.broadcast(event);
    });

    const mode = this.config.authEnabled ? "token-format" : "disabled";
    this.logger.info(`Mock runner API listening on http://${this.config.bindHost}:${this.port()} (auth=${mode})`);
  }

  /**
   * Stops accepting connections and resolves once in-flight requests have been answered.
   */
  public async stop(): Promise<void> {
    if (this.unsubscribeEvents) {
      this.unsubscribeEvents();
      this.unsubscribeEvents = null;
    }

    if (this.wsServer) {
      const wsServer = this.wsServer;
      this.wsServer = null;
      wsServer.clients.forEach((socket) => {
        socket.terminate();
      });
      wsServer.close();
    }

    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = null;

    await new Promise<void>((resolvePromise, rejectPromise) => {
      server.close((error) => {
        if (error) {
          rejectPromise(error);
          return;
        }
        resolvePromise();
      });
    });

    this.logger.info("Mock runner API stopped.");
  }

  public isListening(): boolean {
    return this.server !== null;
  }

  /**
   * Bound port, or the configured one before `start()`.
   */
  public port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.port;
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const requestId = this.nextRequestId();
    const method = request.method ?? "GET";
    const path = request.url ?? "/";

    this.logger.debug(`[${requestId}] ${method} ${path}`);

    let result: DispatchResult;
    try {
      const body = await this.readBody(request);
      result = this.dispatcher.dispatch({
        method,
        path,
        authorization: headerValue(request.headers.authorization),
        body,
      });
    } catch (error) {
      result = this.dispatcher.fail(error);
    }

    this.writeResult(response, result);
    this.logOutcome(requestId, method, path, result);
  }

  private handleUpgrade(wsServer: WebSocketServer, request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = (request.url ?? "/").split("?")[0];
    if (pathname !== EVENTS_PATH || this.wsServer !== wsServer) {
      socket.destroy();
      return;
    }

    wsServer.handleUpgrade(request, socket, head, (client) => {
      this.logger.debug(`Event subscriber connected (${wsServer.clients.size} total).`);
      client.on("error", (error) => {
        this.logger.warn(`Event subscriber error: ${String(error)}`);
      });
    });
  }

  private broadcast(event: AnyMockEvent): void {
    if (!this.wsServer) {
      return;
    }

    const payload = JSON.stringify(event);
    this.wsServer.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  private async readBody(request: IncomingMessage): Promise<string> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of request) {
      const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      totalBytes += piece.length;

      if (totalBytes > MAX_BODY_BYTES) {
        throw new MockApiError("PAYLOAD_TOO_LARGE", "Request body exceeded limit.");
      }

      chunks.push(piece);
    }

    return Buffer.concat(chunks).toString("utf8");
  }

  private writeResult(response: ServerResponse, result: DispatchResult): void {
    response.statusCode = result.statusCode;
    for (const [name, value] of Object.entries(result.headers)) {
      response.setHeader(name, value);
    }
    response.setHeader("content-length", String(Buffer.byteLength(result.body)));
    response.setHeader("connection", "close");
    response.end(result.body);
  }

  private logOutcome(requestId: string, method: string, path: string, result: DispatchResult): void {
    const bytes = Buffer.byteLength(result.body);
    this.logger.log(
      levelForStatus(result.statusCode),
      `[${requestId}] ${method} ${path} -> ${result.statusCode} (${bytes} bytes)`,
    );
  }

  private nextRequestId(): string {
    this.requestSeq += 1;
    return `req-${this.requestSeq}`;
  }
}

export function levelForStatus(statusCode: number): LogLevel {
  if (statusCode >= 500) {
    return "ERROR";
  }
  if (statusCode >= 400 && statusCode !== 404) {
    return "WARN";
  }
  return "INFO";
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function headerValue(value: string | string[] | undefined): string | null {
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value ?? null;
}
