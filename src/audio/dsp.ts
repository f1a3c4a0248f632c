// Pure float transforms for reference preprocessing. Inputs are never mutated.

export function dbToAmplitude(db: number): number {
  return Math.pow(10, db / 20);
}

export function durationMs(sampleCount: number, sampleRateHz: number): number {
  if (sampleRateHz <= 0) return 0;
  return (sampleCount / sampleRateHz) * 1000;
}

export function downmixToMono(channels: Float32Array[]): Float32Array {
  if (channels.length === 0) {
    return new Float32Array(0);
  }
  if (channels.length === 1) {
    return Float32Array.from(channels[0]);
  }

  const length = Math.min(...channels.map((channel) => channel.length));
  const mono = new Float32Array(length);
  for (let i = 0; i < length; i += 1) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[i];
    }
    mono[i] = sum / channels.length;
  }
  return mono;
}

export function resampleLinear(
  samples: Float32Array,
  inputSampleRateHz: number,
  outputSampleRateHz: number,
): Float32Array {
  if (samples.length === 0) return new Float32Array(0);
  if (inputSampleRateHz <= 0 || outputSampleRateHz <= 0) return Float32Array.from(samples);
  if (inputSampleRateHz === outputSampleRateHz) return Float32Array.from(samples);

  const outputLength = Math.max(
    1,
    Math.round(samples.length * (outputSampleRateHz / inputSampleRateHz)),
  );
  const output = new Float32Array(outputLength);

  const ratio = inputSampleRateHz / outputSampleRateHz;
  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), samples.length - 1);
    const nextIndex = Math.min(index + 1, samples.length - 1);
    const frac = position - index;
    const s0 = samples[index];
    const s1 = samples[nextIndex];
    output[i] = s0 + (s1 - s0) * frac;
  }

  return output;
}

function frameRms(samples: Float32Array, start: number, end: number): number {
  if (end <= start) return 0;
  let sumSquares = 0;
  for (let i = start; i < end; i += 1) {
    sumSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumSquares / (end - start));
}

/**
 * Drops whole frames from both ends while their RMS stays below the threshold.
 * Returns an empty array when every frame is below it.
 */
export function trimSilence(
  samples: Float32Array,
  sampleRateHz: number,
  thresholdAmplitude: number,
  frameMs: number,
): Float32Array {
  const frameSize = Math.max(1, Math.round((sampleRateHz * frameMs) / 1000));
  const frameCount = Math.ceil(samples.length / frameSize);

  let firstLoud = -1;
  let lastLoud = -1;
  for (let frame = 0; frame < frameCount; frame += 1) {
    const start = frame * frameSize;
    const end = Math.min(samples.length, start + frameSize);
    if (frameRms(samples, start, end) >= thresholdAmplitude) {
      if (firstLoud < 0) firstLoud = frame;
      lastLoud = frame;
    }
  }

  if (firstLoud < 0) {
    return new Float32Array(0);
  }

  return samples.slice(firstLoud * frameSize, Math.min(samples.length, (lastLoud + 1) * frameSize));
}

export function peakAmplitude(samples: Float32Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i += 1) {
    const abs = Math.abs(samples[i]);
    if (abs > peak) peak = abs;
  }
  return peak;
}

export function normalizePeak(samples: Float32Array, targetPeak: number): Float32Array {
  const peak = peakAmplitude(samples);
  if (peak === 0) {
    return Float32Array.from(samples);
  }
  const gain = targetPeak / peak;
  const output = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i += 1) {
    output[i] = samples[i] * gain;
  }
  return output;
}

export function truncate(samples: Float32Array, maxSamples: number): Float32Array {
  if (samples.length <= maxSamples) return samples;
  return samples.slice(0, Math.max(0, Math.floor(maxSamples)));
}
