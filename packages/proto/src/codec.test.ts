import { describe, expect, it } from 'vitest';
import { decodeIngressLog, decodeMessage, encodeMessage, ProtocolError } from './codec.js';
import type { IngressLog, Message } from './types.js';

const log: IngressLog = {
  event_id: '01HZX3J8Q8W1Y7ZJ5N4D2C6B9A',
  date: '2024-06-01T12:00:00.000Z',
  remote_addr: '127.0.0.1',
  method: 'POST',
  host: 'localhost:9797',
  path: 'hooks/github',
  query: { ref: 'main' },
  headers: { 'content-type': 'application/json' },
  body: 'eyJvayI6dHJ1ZX0=',
};

describe('encodeMessage / decodeMessage', () => {
  it('decodes a fetch request', () => {
    const message: Message = {
      type: 'request',
      request: {
        id: 7,
        payload: {
          type: 'fetch_ingress_logs',
          request: { direction: 'descending', limit: 5, cursor: { kind: 'before', key: 'k1' } },
        },
      },
    };

    expect(decodeMessage(encodeMessage(message))).toEqual(message);
  });

  it('decodes an error response', () => {
    const text = '{"type":"response","response":{"request_id":3,"payload":{"type":"error","message":"boom"}}}';

    expect(decodeMessage(text)).toEqual({
      type: 'response',
      response: { request_id: 3, payload: { type: 'error', message: 'boom' } },
    });
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeMessage('{not json')).toThrow(ProtocolError);
  });

  it('reports the path of an out-of-range limit', () => {
    const text = JSON.stringify({
      type: 'request',
      request: {
        id: 1,
        payload: {
          type: 'fetch_ingress_logs',
          request: { direction: 'ascending', limit: 0, cursor: { kind: 'none' } },
        },
      },
    });

    try {
      decodeMessage(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      if (error instanceof ProtocolError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^request\.payload\.request\.limit: /);
      }
    }
  });

  it('rejects an unknown message type', () => {
    expect(() => decodeMessage('{"type":"ping"}')).toThrow(/Invalid message/);
  });

  it('rejects a negative request id', () => {
    const text = '{"type":"response","response":{"request_id":-1,"payload":{"type":"error","message":"x"}}}';
    expect(() => decodeMessage(text)).toThrow(ProtocolError);
  });
});

describe('decodeIngressLog', () => {
  it('accepts a stored log', () => {
    expect(decodeIngressLog(JSON.parse(JSON.stringify(log)))).toEqual(log);
  });

  it('rejects a log without a date', () => {
    const { date: _date, ...withoutDate } = log;
    expect(() => decodeIngressLog(withoutDate)).toThrow('Invalid ingress log: date: Required');
  });
});
