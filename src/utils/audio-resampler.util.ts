/**
 * Streaming sample-rate conversion for PCM16 audio.
 * Linear interpolation; the position in the stream is carried in an explicit
 * state value so consecutive chunks join without a discontinuity.
 */

/**
 * Carry-over between calls for one direction of one stream.
 * `consumed`/`emitted` are input/output sample counts, reduced modulo the
 * rate-pair period so they stay small over long calls.
 */
export interface ResampleState {
  readonly consumed: number;
  readonly emitted: number;
  readonly lastSample: number | null;
}

export interface ResampleResult {
  samples: Int16Array;
  state: ResampleState;
}

export function createResampleState(): ResampleState {
  return { consumed: 0, emitted: 0, lastSample: null };
}

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function clamp16(value: number): number {
  return Math.max(-32768, Math.min(32767, value));
}

function assertRate(name: string, rate: number): void {
  if (!Number.isInteger(rate) || rate <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${rate}`);
  }
}

/**
 * Resample `samples` from `fromRate` to `toRate`.
 *
 * Output sample j of the stream sits at input position
 * `(j + 1) * fromRate / toRate - 1`; position -1 is the last sample of the
 * previous chunk.
 *
 * Without `state` this is a one-off conversion of a complete buffer and yields
 * exactly `round(samples.length * toRate / fromRate)` samples; a final
 * position past the end holds the last sample. With `state` the call is one
 * chunk of a stream: only positions whose neighbours have both arrived are
 * emitted, the rest come out of the next call, so chunked output matches
 * converting the whole stream at once.
 */
export function resample(
  samples: Int16Array,
  fromRate: number,
  toRate: number,
  state?: ResampleState,
): ResampleResult {
  assertRate('fromRate', fromRate);
  assertRate('toRate', toRate);
  const current = state ?? createResampleState();
  if (fromRate === toRate) return { samples, state: current };

  const length = samples.length;
  const total = current.consumed + length;
  const target = Math.max(
    current.emitted,
    state ? Math.floor((total * toRate) / fromRate) : Math.round((total * toRate) / fromRate),
  );
  const count = target - current.emitted;
  const output = new Int16Array(count);

  if (count > 0) {
    const prev = current.lastSample ?? samples[0];
    const at = (index: number): number => {
      if (index < 0) return prev;
      return samples[Math.min(index, length - 1)];
    };

    for (let i = 0; i < count; i++) {
      const numerator = (current.emitted + i + 1) * fromRate;
      const index = Math.floor(numerator / toRate) - 1 - current.consumed;
      const frac = (numerator % toRate) / toRate;
      const s0 = at(index);
      const s1 = at(index + 1);
      output[i] = clamp16(Math.round(s0 + frac * (s1 - s0)));
    }
  }

  // Drop whole periods so the counters never grow without bound
  const divisor = gcd(fromRate, toRate);
  const periodIn = fromRate / divisor;
  const periodOut = toRate / divisor;
  const periods = Math.min(Math.floor(total / periodIn), Math.floor(target / periodOut));

  return {
    samples: output,
    state: {
      consumed: total - periods * periodIn,
      emitted: target - periods * periodOut,
      lastSample: length > 0 ? samples[length - 1] : current.lastSample,
    },
  };
}
