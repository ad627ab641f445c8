import { describe, expect, it } from 'vitest';

import { FrameBuffer } from './frame-buffer.util';

describe('FrameBuffer', () => {
  it('holds audio until 300ms at 16kHz has accumulated', () => {
    const frames = new FrameBuffer(9600);
    const packet = Buffer.alloc(640, 1); // 20ms at 16kHz

    for (let i = 0; i < 14; i++) {
      frames.push(packet);
      expect(frames.drain()).toBeNull();
    }

    frames.push(packet);
    const frame = frames.drain();
    expect(frame).toHaveLength(9600);
    expect(frames.drain()).toBeNull();
    expect(frames.size).toBe(0);
  });

  it('drains once per crossing and keeps the remainder', () => {
    const frames = new FrameBuffer(10);
    frames.push(Buffer.from([0, 1, 2, 3, 4, 5]));
    expect(frames.drain()).toBeNull();

    frames.push(Buffer.from([6, 7, 8, 9, 10, 11]));
    expect(Array.from(frames.drain() ?? [])).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(frames.size).toBe(2);
    expect(frames.drain()).toBeNull();

    frames.push(Buffer.from([12, 13, 14, 15, 16, 17, 18, 19]));
    expect(Array.from(frames.drain() ?? [])).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18, 19]);
  });

  it('emits several frames from one large push, one per drain', () => {
    const frames = new FrameBuffer(4);
    frames.push(Buffer.alloc(10));
    expect(frames.drain()).toHaveLength(4);
    expect(frames.drain()).toHaveLength(4);
    expect(frames.drain()).toBeNull();
    expect(frames.size).toBe(2);
  });

  it('does not alias the caller buffer', () => {
    const frames = new FrameBuffer(2);
    const input = Buffer.from([1, 2]);
    frames.push(input);
    input[0] = 9;
    expect(Array.from(frames.drain() ?? [])).toEqual([1, 2]);
  });

  it('clears buffered audio', () => {
    const frames = new FrameBuffer(4);
    frames.push(Buffer.alloc(2));
    frames.clear();
    expect(frames.size).toBe(0);
  });

  it('rejects odd or non-positive thresholds', () => {
    expect(() => new FrameBuffer(0)).toThrow(RangeError);
    expect(() => new FrameBuffer(9)).toThrow(RangeError);
  });
});
