import { fromBase64, fromBinary, toBase64, toBinary, toJsonString } from '../../core/Binary';

describe('Binary encoding', () => {
  it('should encode with a deterministic key order', () => {
    const sut = toBinary({ b: 1, a: { d: [2, 1], c: 'x' } });

    expect(sut.toString('utf8')).toEqual('{"a":{"c":"x","d":[2,1]},"b":1}');
  });

  it('should encode nested binaries as base64', () => {
    const sut = toBinary({ buffer: Buffer.from('hi'), bytes: Uint8Array.from([1, 2, 3]), list: [Buffer.from('a')] });

    expect(sut.toString('utf8')).toEqual('{"buffer":"aGk=","bytes":"AQID","list":["YQ=="]}');
  });

  it('should encode bigints as numbers', () => {
    expect(toBinary({ amount: BigInt(10) }).toString('utf8')).toEqual('{"amount":10}');
  });

  it('should refuse values without a JSON representation', () => {
    expect(() => toBinary(undefined)).toThrow('Value of type undefined cannot be encoded');
  });

  it('should decode JSON payload', () => {
    expect(fromBinary(Buffer.from('{"a":[1,2],"b":null}'))).toEqual({ a: [1, 2], b: null });
  });

  it('should decode only the viewed part of a buffer', () => {
    const sut = Buffer.from('xx{"a":1}').subarray(2);

    expect(fromBinary(sut)).toEqual({ a: 1 });
  });

  it('should fail on malformed payload', () => {
    expect(() => fromBinary(Buffer.from('nope'))).toThrow(/^Invalid JSON payload: /);
    expect(() => fromBinary(new Uint8Array())).toThrow(/^Invalid JSON payload: /);
  });

  it('should fail on invalid UTF-8', () => {
    const sut = Buffer.concat([Buffer.from('{"name":"a'), Buffer.from([0xff, 0xfe]), Buffer.from('"}')]);

    expect(() => fromBinary(sut)).toThrow(/^Invalid JSON payload: /);
  });

  it('should convert base64', () => {
    expect(toBase64(Buffer.from('contract'))).toEqual('Y29udHJhY3Q=');
    expect(fromBase64('Y29udHJhY3Q=').toString('utf8')).toEqual('contract');
  });

  it('should render diagnostics for any value', () => {
    expect(toJsonString({ z: 1, a: Buffer.from('hi') })).toEqual('{"a":"aGk=","z":1}');
    expect(toJsonString(undefined)).toEqual('undefined');
  });
});
