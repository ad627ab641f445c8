import { describe, expect, it } from 'vitest';

import { createResampleState, resample } from './audio-resampler.util';

function sine(length: number, rate: number, freq: number, amplitude: number): Int16Array {
  return Int16Array.from({ length }, (_, i) => Math.round(Math.sin((2 * Math.PI * freq * i) / rate) * amplitude));
}

describe('resample', () => {
  it.each([
    [160, 8000, 16000, 320],
    [320, 16000, 24000, 480],
    [240, 24000, 8000, 80],
    [100, 24000, 16000, 67],
    [7, 8000, 22050, 19],
  ])('turns %i samples at %iHz into round(n * to / from) at %iHz', (length, from, to, expected) => {
    const { samples } = resample(sine(length, from, 400, 8000), from, to);
    expect(samples).toHaveLength(expected);
  });

  it('downsamples 240 samples at 24kHz to exactly 80 at 8kHz', () => {
    expect(resample(new Int16Array(240), 24000, 8000).samples).toHaveLength(80);
  });

  it('passes audio and state through untouched when rates match', () => {
    const input = Int16Array.of(1, 2, 3);
    const state = createResampleState();
    const result = resample(input, 16000, 16000, state);
    expect(result.samples).toBe(input);
    expect(result.state).toBe(state);
  });

  it('interpolates across chunk boundaries using the carried state', () => {
    const first = resample(Int16Array.of(0, 100), 8000, 16000);
    const threaded = resample(Int16Array.of(200, 300), 8000, 16000, first.state);
    const cold = resample(Int16Array.of(200, 300), 8000, 16000);

    expect(Array.from(first.samples)).toEqual([0, 0, 50, 100]);
    expect(Array.from(threaded.samples)).toEqual([150, 200, 250, 300]);
    expect(Array.from(cold.samples)).toEqual([200, 200, 250, 300]);
  });

  it('produces the same stream in chunks as in one call', () => {
    const signal = sine(160, 8000, 400, 12000);
    const whole = resample(signal, 8000, 16000).samples;

    let state = createResampleState();
    const parts: number[] = [];
    for (const [start, end] of [[0, 37], [37, 87], [87, 160]]) {
      const result = resample(signal.subarray(start, end), 8000, 16000, state);
      state = result.state;
      parts.push(...result.samples);
    }

    expect(parts).toEqual(Array.from(whole));
  });

  it.each([
    [24000, 8000],
    [24000, 16000],
  ])('joins uneven chunks from %iHz to %iHz without a seam', (from, to) => {
    const ramp = Int16Array.from({ length: 12 }, (_, i) => i * 100);
    const whole = resample(ramp, from, to).samples;

    const first = resample(ramp.subarray(0, 5), from, to, createResampleState());
    const second = resample(ramp.subarray(5), from, to, first.state);

    expect([...first.samples, ...second.samples]).toEqual(Array.from(whole));
  });

  it('holds back a position whose right neighbour is in the next chunk', () => {
    const head = Int16Array.of(0, 100, 200, 300, 400);

    expect(Array.from(resample(head, 24000, 8000).samples)).toEqual([200, 400]);

    const streamed = resample(head, 24000, 8000, createResampleState());
    expect(Array.from(streamed.samples)).toEqual([200]);

    const next = resample(Int16Array.of(500, 600, 700, 800, 900, 1000, 1100), 24000, 8000, streamed.state);
    expect(Array.from(next.samples)).toEqual([500, 800, 1100]);
  });

  it('keeps its counters bounded over a long stream', () => {
    let state = createResampleState();
    for (let i = 0; i < 1000; i++) {
      state = resample(new Int16Array(240), 24000, 8000, state).state;
    }
    expect(state.consumed).toBe(0);
    expect(state.emitted).toBe(0);
  });

  it('stays within the 16-bit range', () => {
    const { samples } = resample(Int16Array.of(32767, -32768, 32767), 8000, 24000);
    expect(Math.max(...samples)).toBe(32767);
    expect(Math.min(...samples)).toBe(-32768);
  });

  it('returns nothing for empty input', () => {
    const state = resample(Int16Array.of(5, 6), 8000, 16000).state;
    const result = resample(new Int16Array(0), 8000, 16000, state);
    expect(result.samples).toHaveLength(0);
    expect(result.state.lastSample).toBe(6);
  });

  it('rejects non-positive rates', () => {
    expect(() => resample(new Int16Array(4), 0, 8000)).toThrow(RangeError);
    expect(() => resample(new Int16Array(4), 8000, 1.5)).toThrow(RangeError);
  });
});
