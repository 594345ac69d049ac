import type { DomainEvent } from '../../domain/events/DomainEvents.js';
import type { LogSink } from '../../domain/ports/LogSink.js';
import type { EventBus } from '../../application/EventBus.js';
import { describeEvent } from './describeEvent.js';

/** Route every event of `bus` to `sink`. Returns a function that detaches the sink. */
export function attachLogSink(bus: Pick<EventBus, 'onAny' | 'offAny'>, sink: LogSink): () => void {
  const handler = (event: DomainEvent): void => {
    const { level, message } = describeEvent(event);
    sink.write(level, message);
  };
  bus.onAny(handler);
  return () => {
    bus.offAny(handler);
  };
}
