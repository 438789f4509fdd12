import WebSocket from "ws";
import { AnyMockEvent, MockEventType } from "../../shared/src/contracts";
import { parseMockEvent } from "./responses";

interface PendingWaiter {
  type: MockEventType | null;
  resolve: (event: AnyMockEvent) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Subscription to the mock API's `/events` feed.
 *
 * Events arriving while nobody waits are buffered, so a test can trigger a mutation
 * first and await its event afterwards.
 */
export class MockEventStream {
  private readonly buffered: AnyMockEvent[] = [];
  private readonly waiters: PendingWaiter[] = [];
  private closed = false;

  private constructor(private readonly socket: WebSocket) {
    socket.on("message", (data) => {
      this.onMessage(data);
    });
    socket.on("close", () => {
      this.closed = true;
      this.rejectAll(new Error("Event stream closed."));
    });
    socket.on("error", (error) => {
      this.rejectAll(error);
    });
  }

  public static async connect(baseUrl: string, timeoutMs = 2_500): Promise<MockEventStream> {
    const url = `${baseUrl.replace(/^http/, "ws").replace(/\/+$/, "")}/events`;
    const socket = new WebSocket(url, { perMessageDeflate: false, handshakeTimeout: timeoutMs });

    await new Promise<void>((resolvePromise, rejectPromise) => {
      const onOpen = (): void => {
        socket.off("error", onError);
        resolvePromise();
      };
      const onError = (error: Error): void => {
        socket.off("open", onOpen);
        rejectPromise(error);
      };
      socket.once("open", onOpen);
      socket.once("error", onError);
    });

    return new MockEventStream(socket);
  }

  /**
   * Resolves with the next event (of `type`, when given). Non-matching buffered events are skipped.
   */
  public async next(type: MockEventType | null = null, timeoutMs = 2_500): Promise<AnyMockEvent> {
    const index = this.buffered.findIndex((event) => type === null || event.type === type);
    if (index >= 0) {
      const [event] = this.buffered.splice(0, index + 1).slice(-1);
      if (event) {
        return event;
      }
    }

    if (this.closed) {
      throw new Error("Event stream closed.");
    }

    return await new Promise<AnyMockEvent>((resolvePromise, rejectPromise) => {
      const waiter: PendingWaiter = {
        type,
        resolve: resolvePromise,
        reject: rejectPromise,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          rejectPromise(new Error(`Timed out waiting for ${type ?? "any"} event after ${timeoutMs} ms.`));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  public async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolvePromise) => {
      this.socket.once("close", () => resolvePromise());
      this.socket.close();
    });
  }

  private onMessage(data: WebSocket.RawData): void {
    let event: AnyMockEvent;
    try {
      event = parseMockEvent(JSON.parse(rawDataToString(data)));
    } catch (error) {
      this.rejectAll(new Error(`Malformed event frame: ${String(error)}`));
      return;
    }

    const waiter = this.waiters.find((candidate) => candidate.type === null || candidate.type === event.type);
    if (!waiter) {
      this.buffered.push(event);
      return;
    }

    this.removeWaiter(waiter);
    waiter.resolve(event);
  }

  private removeWaiter(waiter: PendingWaiter): void {
    clearTimeout(waiter.timer);
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }

  private rejectAll(error: Error): void {
    for (const waiter of [...this.waiters]) {
      this.removeWaiter(waiter);
      waiter.reject(error);
    }
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}
