import {
  concatFrames,
  decodePcm16Base64,
  encodePcm16Base64,
  encodeWav,
  floatToPcm16,
  rms,
} from '../audio';

describe('audio helpers', () => {
  it('computes RMS energy', () => {
    expect(rms(new Float32Array([1, -1]))).toBe(1);
    expect(rms(new Float32Array(0))).toBe(0);
  });

  it('clips and scales float samples to PCM16', () => {
    expect(Array.from(floatToPcm16(new Float32Array([2, -2, 0])))).toEqual([32767, -32767, 0]);
  });

  it('decodes little-endian base64 PCM16', () => {
    expect(Array.from(decodePcm16Base64('AEA='))).toEqual([0.5]);
    expect(encodePcm16Base64(new Float32Array([0.5]))).toBe('AEA=');
  });

  it('concatenates frames in order', () => {
    const joined = concatFrames([new Float32Array([0.25]), new Float32Array([0.5, 0.75])]);
    expect(Array.from(joined)).toEqual([0.25, 0.5, 0.75]);
  });

  it('writes a mono 16-bit WAV header', () => {
    const wav = encodeWav(new Float32Array([0, 0.5]), 16_000);

    expect(wav).toHaveLength(48);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt32LE(24)).toBe(16_000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.readUInt32LE(40)).toBe(4);
    expect(wav.readInt16LE(46)).toBe(16384);
  });
});
