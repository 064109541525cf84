/**
 * In-memory event trees: a recording of the events describing one value.
 *
 * EventRecorder is a Sink that records what it is told; EventSource is a
 * Source that replays a recording. Together they are the reference format
 * backend, and event trees are plain data, so they load from JSON.
 *
 * @example
 * ```typescript
 * const recorder = new EventRecorder();
 * serialize(t.array(t.int32), [1, 2], recorder);
 * recorder.event;
 * // { kind: "array", elements: [{ kind: "numeric", text: "1" }, { kind: "numeric", text: "2" }] }
 *
 * deserialize(t.array(t.int32), new EventSource(recorder.event)); // [1, 2]
 * ```
 */

import { z } from "zod";
import { DeserializeError, MissingValueError, ValueAlreadyResolvedError } from "./errors";
import type {
  ArrayReader,
  FieldSink,
  FragmentReader,
  ObjectReader,
  Sink,
  Source,
  ValueReader,
} from "./types";

export type Event =
  | { kind: "null" }
  | { kind: "boolean"; value: boolean }
  | { kind: "numeric"; text: string }
  | { kind: "string"; text: string }
  | { kind: "fragments"; chunks: string[] }
  | { kind: "array"; elements: Event[] }
  | { kind: "object"; fields: EventField[] };

export interface EventField {
  name: Event;
  value: Event;
}

const eventSchema: z.ZodType<Event> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("null") }),
    z.object({ kind: z.literal("boolean"), value: z.boolean() }),
    z.object({ kind: z.literal("numeric"), text: z.string() }),
    z.object({ kind: z.literal("string"), text: z.string() }),
    z.object({ kind: z.literal("fragments"), chunks: z.array(z.string()) }),
    z.object({ kind: z.literal("array"), elements: z.array(eventSchema) }),
    z.object({
      kind: z.literal("object"),
      fields: z.array(z.object({ name: eventSchema, value: eventSchema })),
    }),
  ])
);

/**
 * Checks whether unknown data is a well-formed event tree.
 */
export function isEvent(data: unknown): data is Event {
  return eventSchema.safeParse(data).success;
}

/**
 * Validates unknown data as an event tree.
 * @throws DeserializeError describing every problem found
 */
export function parseEvent(data: unknown): Event {
  const result = eventSchema.safeParse(data);
  if (!result.success) {
    throw new DeserializeError(`Invalid event tree:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Records every event it receives. As the sink of one value it holds a
 * single event, read through `event`.
 */
export class EventRecorder implements Sink {
  private readonly recorded: Event[] = [];

  /**
   * Returns every recorded event, in order.
   */
  get events(): readonly Event[] {
    return this.recorded;
  }

  /**
   * Returns the single recorded event.
   * @throws MissingValueError if nothing was recorded
   * @throws ValueAlreadyResolvedError if more than one event was recorded
   */
  get event(): Event {
    const [first, ...rest] = this.recorded;
    if (!first) {
      throw new MissingValueError("event");
    }
    if (rest.length > 0) {
      throw new ValueAlreadyResolvedError("event");
    }
    return first;
  }

  handleNull(): void {
    this.recorded.push({ kind: "null" });
  }

  handleBoolean(value: boolean): void {
    this.recorded.push({ kind: "boolean", value });
  }

  handleNumeric(text: string): void {
    this.recorded.push({ kind: "numeric", text });
  }

  handleString(text: string): void {
    this.recorded.push({ kind: "string", text });
  }

  handleStringFragments(reader: FragmentReader): void {
    const chunks: string[] = [];
    reader({ handleStringFragment: (chunk) => chunks.push(chunk) });
    this.recorded.push({ kind: "fragments", chunks });
  }

  handleArray(reader: ArrayReader): void {
    const elements = new EventRecorder();
    reader(elements);
    this.recorded.push({ kind: "array", elements: [...elements.events] });
  }

  handleObject(reader: ObjectReader): void {
    const fields: EventField[] = [];
    reader({
      handleField: (nameReader, valueReader) => {
        fields.push({ name: recordOne(nameReader), value: recordOne(valueReader) });
      },
    });
    this.recorded.push({ kind: "object", fields });
  }
}

function recordOne(reader: ValueReader): Event {
  const recorder = new EventRecorder();
  reader(recorder);
  return recorder.event;
}

/**
 * Replays an event tree into a sink.
 */
export class EventSource implements Source {
  constructor(private readonly root: Event) {}

  read(sink: Sink): void {
    replay(this.root, sink);
  }
}

/**
 * Fires the handler matching an event, replaying children on demand.
 */
export function replay(event: Event, sink: Sink): void {
  switch (event.kind) {
    case "null":
      sink.handleNull();
      break;
    case "boolean":
      sink.handleBoolean(event.value);
      break;
    case "numeric":
      sink.handleNumeric(event.text);
      break;
    case "string":
      sink.handleString(event.text);
      break;
    case "fragments":
      sink.handleStringFragments((fragments) => {
        for (const chunk of event.chunks) {
          fragments.handleStringFragment(chunk);
        }
      });
      break;
    case "array":
      sink.handleArray((elements) => {
        for (const element of event.elements) {
          replay(element, elements);
        }
      });
      break;
    case "object":
      sink.handleObject((fields: FieldSink) => {
        for (const field of event.fields) {
          fields.handleField(
            (nameSink) => replay(field.name, nameSink),
            (valueSink) => replay(field.value, valueSink)
          );
        }
      });
      break;
    default: {
      const unreachable: never = event;
      throw new DeserializeError(`Unknown event ${JSON.stringify(unreachable)}`);
    }
  }
}
