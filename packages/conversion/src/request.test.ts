import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '@mediaconv/core';
import { parseConversionRequest } from './request.js';

describe('parseConversionRequest', () => {
  it('fills in defaults and freezes the request', () => {
    const request = parseConversionRequest({ sourcePath: '/media/clip.mov', target: 'mp4' });

    expect(request).toEqual({
      sourcePath: '/media/clip.mov',
      target: 'mp4',
      compress: false,
      qualityLevel: 'high',
    });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('keeps a declared content type', () => {
    const request = parseConversionRequest({
      sourcePath: '/media/voice.bin',
      declaredContentType: 'audio/mpeg',
      target: 'm4a',
      compress: true,
      qualityLevel: 'low',
    });

    expect(request.declaredContentType).toBe('audio/mpeg');
    expect(request.qualityLevel).toBe('low');
  });

  it('rejects an unsupported target', () => {
    expect(() => parseConversionRequest({ sourcePath: '/media/clip.mov', target: 'mkv' }))
      .toThrow(InvalidRequestError);
  });

  it('names the offending field', () => {
    expect(() => parseConversionRequest({ sourcePath: '', target: 'mp4' }))
      .toThrow('Invalid conversion request (sourcePath): sourcePath is required');
  });

  it('rejects something that is not an object', () => {
    expect(() => parseConversionRequest('clip.mov')).toThrow(
      /^Invalid conversion request \(request\): /
    );
  });
});
