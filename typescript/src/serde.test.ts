import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { ConfigurationError, UnknownFieldError, UnsupportedTypeError } from './errors';
import { EventRecorder, type Event } from './events';
import { Registry } from './registry';
import { t, Type, type TypeVisitor } from './schema';
import { clone, deserialize, fromEvents, Serde, serialize, toEvents } from './serde';
import type { Strategy } from './strategies';

class Address {
  street = '';
  city = '';
}

class Person {
  name = '';
  age = 0;
  email: string | null = null;
  address = new Address();
  tags: string[] = [];
}

const AddressType = t.class(Address, { street: t.string, city: t.string });
const PersonType = t.class(Person, {
  name: t.string,
  age: t.uint8,
  email: t.nullable(t.string),
  address: AddressType,
  tags: t.array(t.string),
});

function person(fields: Partial<Person>): Person {
  return Object.assign(new Person(), fields);
}

function captureLogs(level: pino.Level): { lines: string[]; serde: Serde } {
  const lines: string[] = [];
  const logger = pino({ level }, { write: (line: string) => lines.push(line) });
  return { lines, serde: new Serde({ logger, registry: new Registry(logger) }) };
}

describe('Serde', () => {
  const serde = new Serde({ logLevel: 'silent' });

  it('round-trips a record', () => {
    const ann = person({
      name: 'Ann',
      age: 30,
      address: Object.assign(new Address(), { street: '1 Main St', city: 'Springfield' }),
      tags: ['admin'],
    });
    const built = serde.fromEvents(PersonType, serde.toEvents(PersonType, ann));
    expect(built).toBeInstanceOf(Person);
    expect(built.address).toBeInstanceOf(Address);
    expect(built).toEqual(ann);
  });

  it('re-serializes built values to the same events', () => {
    const event: Event = {
      kind: 'object',
      fields: [
        { name: { kind: 'string', text: 'b' }, value: { kind: 'numeric', text: '2' } },
        { name: { kind: 'string', text: 'a' }, value: { kind: 'numeric', text: '1' } },
      ],
    };
    const type = t.dict(t.int32);
    expect(serde.toEvents(type, serde.fromEvents(type, event))).toEqual(event);
  });

  it('keeps defaults for fields missing from the input', () => {
    const event: Event = {
      kind: 'object',
      fields: [{ name: { kind: 'string', text: 'name' }, value: { kind: 'string', text: 'Bo' } }],
    };
    expect(serde.fromEvents(PersonType, event)).toEqual(person({ name: 'Bo' }));
  });

  it('rejects an undeclared field with its path', () => {
    const event: Event = {
      kind: 'object',
      fields: [
        { name: { kind: 'string', text: 'name' }, value: { kind: 'string', text: 'Bo' } },
        {
          name: { kind: 'string', text: 'address' },
          value: {
            kind: 'object',
            fields: [{ name: { kind: 'string', text: 'zip' }, value: { kind: 'numeric', text: '1' } }],
          },
        },
      ],
    };
    expect(() => serde.fromEvents(PersonType, event)).toThrow(UnknownFieldError);
    expect(() => serde.fromEvents(PersonType, event)).toThrow(
      'Unknown field "zip" in Address at $.address'
    );
  });

  it('clones without sharing structure', () => {
    const ann = person({ name: 'Ann', tags: ['a', 'b'] });
    const copy = serde.clone(PersonType, ann);
    expect(copy).toEqual(ann);
    expect(copy).not.toBe(ann);
    expect(copy.tags).not.toBe(ann.tags);
    expect(copy.address).not.toBe(ann.address);
  });

  it('clones maps with non-string keys', () => {
    const type = t.map(t.int64, t.nullable(t.float64));
    const value = new Map<bigint, number | null>([
      [1n, 0.5],
      [-2n, null],
    ]);
    expect(serde.clone(type, value)).toEqual(value);
  });

  it('drives any sink', () => {
    const recorder = new EventRecorder();
    serde.serialize(t.array(t.boolean), [true], recorder);
    expect(recorder.events).toEqual([
      { kind: 'array', elements: [{ kind: 'boolean', value: true }] },
    ]);
  });

  it('reads from any source', () => {
    const value = serde.deserialize(t.string, {
      read: (sink) =>
        sink.handleStringFragments((fragments) => {
          fragments.handleStringFragment('He');
          fragments.handleStringFragment('llo');
        }),
    });
    expect(value).toBe('Hello');
  });

  it('resolves references against its registry', () => {
    interface Chain {
      value: number;
      next: Chain | null;
    }
    const registry = new Registry(pino({ level: 'silent' }));
    const ChainType = t.record<Chain>('Chain', () => ({ value: 0, next: null }), {
      value: t.int32,
      next: t.nullable(t.ref<Chain>('Chain')),
    });
    registry.register(ChainType);
    const local = new Serde({ registry, logLevel: 'silent' });

    const chain: Chain = { value: 1, next: { value: 2, next: { value: 3, next: null } } };
    expect(local.clone(ChainType, chain)).toEqual(chain);
    expect(() => serde.compile(ChainType)).toThrow(UnsupportedTypeError);
  });

  it('rejects invalid options', () => {
    const options = JSON.parse('{"logLevel":"everything"}');
    expect(() => new Serde(options)).toThrow(ConfigurationError);
  });

  it('logs failed calls at debug', () => {
    const { lines, serde: logged } = captureLogs('debug');
    expect(() => logged.fromEvents(t.int32, { kind: 'null' })).toThrow();

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0]);
    expect(record).toMatchObject({ level: 20, type: 'int32', msg: 'deserialize failed' });
    expect(record.err.message).toBe('Cannot parse int32 from null');
  });

  it('logs a failed clone once', () => {
    const { lines, serde: logged } = captureLogs('debug');
    expect(() => logged.clone(t.array(t.uint8), [1, 256])).toThrow(
      'Cannot serialize 256 as uint8 at $[1]'
    );

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ type: 'uint8[]', msg: 'deserialize failed' });
  });

  it('stays quiet above debug', () => {
    const { lines, serde: quiet } = captureLogs('info');
    expect(() => quiet.toEvents(t.uint8, -1)).toThrow('Cannot serialize -1 as uint8');
    expect(lines).toEqual([]);
  });
});

describe('module functions', () => {
  it('convert through events with the default options', () => {
    const event = toEvents(t.array(t.int16), [1, -2]);
    expect(event).toEqual({
      kind: 'array',
      elements: [
        { kind: 'numeric', text: '1' },
        { kind: 'numeric', text: '-2' },
      ],
    });
    expect(fromEvents(t.array(t.int16), event)).toEqual([1, -2]);
  });

  it('clone values', () => {
    expect(clone(t.dict(t.string), { a: 'x' })).toEqual({ a: 'x' });
  });

  it('serialize and deserialize with per-call options', () => {
    const recorder = new EventRecorder();
    serialize(t.float32, 0.1, recorder, { logLevel: 'silent' });
    expect(recorder.event).toEqual({ kind: 'numeric', text: '0.1' });
    expect(deserialize(t.float32, { read: (sink) => sink.handleNumeric('0.1') })).toBe(
      Math.fround(0.1)
    );
  });

  it('reject a top-level source that delivers nothing', () => {
    expect(() => deserialize(t.boolean, { read: () => undefined })).toThrow(
      'No value was read for boolean'
    );
  });

  it('reject unsupported descriptors before walking', () => {
    class OpaqueType extends Type<symbol> {
      readonly kind = 'opaque';
      readonly name = 'Opaque';

      accept(visitor: TypeVisitor): Strategy<symbol> {
        return visitor.unsupported(this);
      }
    }
    const recorder = new EventRecorder();
    expect(() => serialize(new OpaqueType(), Symbol('x'), recorder)).toThrow(
      'No serialization strategy for type Opaque'
    );
    expect(recorder.events).toEqual([]);
  });
});
