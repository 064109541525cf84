import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConversionError,
  DeserializeError,
  InvalidValueError,
  MissingValueError,
  PathError,
  SerializeError,
  StructwalkError,
  TypeMismatchError,
  TypeNotRegisteredError,
  UnknownFieldError,
  UnsupportedTypeError,
  ValueAlreadyResolvedError,
} from './errors';

describe('error hierarchy', () => {
  it('roots every error at StructwalkError', () => {
    const errors = [
      new InvalidValueError('int32', 1.5),
      new TypeMismatchError('int32', 'string'),
      new ConversionError('int32', 'abc'),
      new UnknownFieldError('Person', 'bogus'),
      new MissingValueError('int32'),
      new ValueAlreadyResolvedError('int32'),
      new UnsupportedTypeError('Widget'),
      new TypeNotRegisteredError('Node'),
      new ConfigurationError('bad'),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(StructwalkError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('splits serialize and deserialize failures', () => {
    expect(new InvalidValueError('int32', 1.5)).toBeInstanceOf(SerializeError);
    expect(new ConversionError('int32', 'abc')).toBeInstanceOf(TypeMismatchError);
    expect(new ConversionError('int32', 'abc')).toBeInstanceOf(DeserializeError);
    expect(new UnknownFieldError('Person', 'bogus')).toBeInstanceOf(DeserializeError);
    expect(new TypeNotRegisteredError('Node')).toBeInstanceOf(UnsupportedTypeError);
  });

  it('sets the error name', () => {
    expect(new ConversionError('int32', 'abc').name).toBe('ConversionError');
    expect(new TypeNotRegisteredError('Node').name).toBe('TypeNotRegisteredError');
  });
});

describe('PathError', () => {
  it('defaults to the root path without a suffix', () => {
    const error = new PathError('boom');
    expect(error.path).toBe('$');
    expect(error.message).toBe('boom');
  });

  it('appends a nested path to the message', () => {
    const error = new PathError('boom', '$.items[2]');
    expect(error.path).toBe('$.items[2]');
    expect(error.message).toBe('boom at $.items[2]');
  });
});

describe('messages', () => {
  it('names the type and the event kind', () => {
    expect(new TypeMismatchError('int32', 'null').message).toBe('Cannot parse int32 from null');
  });

  it('quotes the offending numeric text', () => {
    const error = new ConversionError('uint8', '256', '$.age');
    expect(error.message).toBe('Cannot parse uint8 from numeric "256" at $.age');
    expect(error.text).toBe('256');
    expect(error.eventKind).toBe('numeric');
  });

  it('names the unknown field and the record', () => {
    const error = new UnknownFieldError('Person', 'bogus');
    expect(error.message).toBe('Unknown field "bogus" in Person');
    expect(error.field).toBe('bogus');
  });

  it('describes invalid values by literal or category', () => {
    expect(new InvalidValueError('int32', 1.5).message).toBe('Cannot serialize 1.5 as int32');
    expect(new InvalidValueError('int32', 'x').message).toBe('Cannot serialize "x" as int32');
    expect(new InvalidValueError('int8', 5n).message).toBe('Cannot serialize 5n as int8');
    expect(new InvalidValueError('string', null).message).toBe('Cannot serialize null as string');
    expect(new InvalidValueError('string', [1]).message).toBe('Cannot serialize array as string');
    expect(new InvalidValueError('string', {}).message).toBe('Cannot serialize object as string');
  });

  it('reports unregistered types', () => {
    const error = new TypeNotRegisteredError('Node');
    expect(error.message).toBe('Type not registered: Node');
    expect(error.typeName).toBe('Node');
  });

  it('reports missing and repeated values', () => {
    expect(new MissingValueError('int32').message).toBe('No value was read for int32');
    expect(new ValueAlreadyResolvedError('int32', '$[0]').message).toBe(
      'Value of type int32 was already resolved at $[0]'
    );
  });

  it('reports unsupported types', () => {
    expect(new UnsupportedTypeError('Widget').message).toBe(
      'No serialization strategy for type Widget'
    );
  });
});
