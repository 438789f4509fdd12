import { EventEmitter } from "events";
import { AnyMockEvent, MockEvent, MockEventDataMap, MockEventType } from "../../shared/src/contracts";

type MockEventListener = (event: AnyMockEvent) => void;

/**
 * Sequenced feed of registry mutations, fanned out to `/events` websocket clients.
 */
export class MockEventBus {
  private readonly emitter = new EventEmitter();
  private seq = 0;

  public publish<T extends MockEventType>(type: T, data: MockEventDataMap[T]): MockEvent<T> {
    this.seq += 1;

    const event: MockEvent<T> = {
      v: 1,
      seq: this.seq,
      ts: new Date().toISOString(),
      type,
      data,
    };

    this.emitter.emit("event", event);
    return event;
  }

  public subscribe(listener: MockEventListener): () => void {
    this.emitter.on("event", listener);
    return () => {
      this.emitter.off("event", listener);
    };
  }
}
