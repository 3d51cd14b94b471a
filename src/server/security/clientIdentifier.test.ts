import { describe, it, expect } from 'vitest';
import type { Request } from 'express';
import { Socket } from 'net';
import { getClientIp } from './clientIdentifier.js';

function fakeRequest(headers: Request['headers'], remoteAddress?: string): Pick<Request, 'headers' | 'socket'> {
  const socket = new Socket();
  Object.defineProperty(socket, 'remoteAddress', { value: remoteAddress });
  return { headers, socket };
}

describe('getClientIp', () => {
  it('uses the first X-Forwarded-For hop', () => {
    const req = fakeRequest({ 'x-forwarded-for': ' 203.0.113.7 , 10.0.0.1', 'x-real-ip': '198.51.100.2' }, '127.0.0.1');
    expect(getClientIp(req)).toBe('203.0.113.7');
  });

  it('falls back to X-Real-IP', () => {
    const req = fakeRequest({ 'x-real-ip': '198.51.100.2' }, '127.0.0.1');
    expect(getClientIp(req)).toBe('198.51.100.2');
  });

  it('falls back to the socket peer address', () => {
    expect(getClientIp(fakeRequest({}, '127.0.0.1'))).toBe('127.0.0.1');
  });

  it('returns "unknown" when nothing identifies the client', () => {
    expect(getClientIp(fakeRequest({}))).toBe('unknown');
  });
});
