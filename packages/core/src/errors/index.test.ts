import { describe, it, expect } from 'vitest';
import {
  ConversionError,
  ExportFailedError,
  ExternalExitNonzeroError,
  NoCompatiblePresetError,
  SpawnError,
} from './index.js';

describe('conversion errors', () => {
  it('carry a code and stay instances of the base class', () => {
    const error = new NoCompatiblePresetError('m4a', ['m4a']);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error.code).toBe('NO_COMPATIBLE_PRESET');
    expect(error.name).toBe('NoCompatiblePresetError');
    expect(error.message).toBe('No compatible export preset available for M4A. Try a different format.');
    expect(error.details).toEqual({ fileType: 'm4a', presets: ['m4a'] });
  });

  it('keeps the exit code of a failed external run', () => {
    const error = new ExternalExitNonzeroError('ffmpeg', 69, 'Invalid data found when processing input');

    expect(error.exitCode).toBe(69);
    expect(error.message).toBe('ffmpeg conversion failed with code 69.');
  });

  it('passes the export failure reason through', () => {
    const cause = new Error('Cannot Decode');
    const error = new ExportFailedError(cause);

    expect(error.message).toBe('Cannot Decode');
    expect(error.cause).toBe(cause);
  });

  it('falls back to a generic message when the export gave no reason', () => {
    expect(new ExportFailedError(null).message).toBe('Unknown conversion error.');
  });

  it('describes spawn failures', () => {
    const error = new SpawnError('/opt/ffmpeg', new Error('EACCES'));

    expect(error.message).toBe('/opt/ffmpeg failed to start: EACCES');
    expect(error.code).toBe('SPAWN_ERROR');
  });
});
