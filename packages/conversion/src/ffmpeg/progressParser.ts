/**
 * Progress Parser
 * 
 * Turns ffmpeg `-progress pipe:1` output into a completed fraction.
 * The total duration comes from the `Duration:` line ffmpeg prints on
 * stderr while probing the input.
 */

import { parseTimecode } from '@mediaconv/utils';

const DURATION_PATTERN = /Duration:\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/;

export class FFmpegProgressParser {
  private durationMs: number;
  private timeMs = 0;
  private ended = false;

  // Partial lines carried between chunks
  private progressBuffer = '';
  private stderrBuffer = '';

  constructor(durationMs: number = 0) {
    this.durationMs = durationMs;
  }

  get fraction(): number {
    if (this.ended) return 1;
    if (this.durationMs <= 0) return 0;
    return Math.min(1, this.timeMs / this.durationMs);
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Parse progress data from ffmpeg -progress pipe:1
   */
  parseProgressData(data: string): void {
    this.progressBuffer += data;

    const lines = this.progressBuffer.split('\n');
    this.progressBuffer = lines.pop() ?? '';

    for (const line of lines) {
      this.parseProgressLine(line.trim());
    }
  }

  /**
   * Look for the input duration in stderr output
   */
  parseStderrData(data: string): void {
    if (this.durationMs > 0) return;

    this.stderrBuffer += data;
    const lines = this.stderrBuffer.split('\n');
    this.stderrBuffer = lines.pop() ?? '';

    for (const line of lines) {
      const match = line.match(DURATION_PATTERN);
      if (match?.[1]) {
        this.durationMs = parseTimecode(match[1]);
        this.stderrBuffer = '';
        return;
      }
    }
  }

  private parseProgressLine(line: string): void {
    const match = line.match(/^(\w+)=(.+)$/);
    if (!match) return;

    const [, key, value] = match;

    switch (key) {
      // Both keys carry microseconds
      case 'out_time_us':
      case 'out_time_ms': {
        const micros = parseInt(value ?? '0', 10);
        if (Number.isFinite(micros) && micros >= 0) {
          this.timeMs = Math.max(this.timeMs, micros / 1000);
        }
        break;
      }
      case 'progress':
        if (value === 'end') {
          this.ended = true;
        }
        break;
    }
  }
}
