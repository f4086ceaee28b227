import { describe, it, expect } from 'vitest';
import { FFmpegProgressParser } from './progressParser.js';

describe('FFmpegProgressParser', () => {
  it('stays at zero until the duration is known', () => {
    const parser = new FFmpegProgressParser();
    parser.parseProgressData('out_time_us=5000000\nprogress=continue\n');

    expect(parser.fraction).toBe(0);
  });

  it('reads the duration from stderr split across chunks', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrData('Input #0, mov,mp4,m4a, from \'clip.mov\':\n  Dura');
    parser.parseStderrData('tion: 00:00:10.00, start: 0.000000, bitrate: 1200 kb/s\n');
    parser.parseProgressData('out_time_us=2500000\n');

    expect(parser.fraction).toBe(0.25);
  });

  it('handles progress lines split across chunks', () => {
    const parser = new FFmpegProgressParser(8000);
    parser.parseProgressData('frame=10\nout_time_');
    expect(parser.fraction).toBe(0);

    parser.parseProgressData('ms=2000000\nprogress=continue\n');
    expect(parser.fraction).toBe(0.25);
  });

  it('never moves backwards', () => {
    const parser = new FFmpegProgressParser(10000);
    parser.parseProgressData('out_time_us=6000000\nout_time_us=4000000\n');

    expect(parser.fraction).toBe(0.6);
  });

  it('ignores the N/A placeholder', () => {
    const parser = new FFmpegProgressParser(10000);
    parser.parseProgressData('out_time_us=N/A\n');

    expect(parser.fraction).toBe(0);
  });

  it('caps at one and reports the end marker', () => {
    const parser = new FFmpegProgressParser(1000);
    parser.parseProgressData('out_time_us=1500000\n');
    expect(parser.fraction).toBe(1);
    expect(parser.isEnded).toBe(false);

    parser.parseProgressData('progress=end\n');
    expect(parser.isEnded).toBe(true);
  });
});
