const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface DecodedAudio {
  /** One planar buffer per channel, samples in [-1, 1]. */
  channels: Float32Array[];
  sampleRateHz: number;
}

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
  dataOffset: number;
  dataBytes: number;
}

export function looksLikeWav(buf: Buffer): boolean {
  if (buf.length < 12) return false;
  return buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';
}

export function parseWavFormat(buffer: Buffer): WavFormat {
  if (!looksLikeWav(buffer)) {
    throw new Error('invalid_riff_header');
  }

  let offset = 12;
  let audioFormat: number | null = null;
  let channels: number | null = null;
  let sampleRateHz: number | null = null;
  let bitsPerSample: number | null = null;
  let dataOffset: number | null = null;
  let dataBytes: number | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkStart + 16 > buffer.length) {
        throw new Error('fmt_chunk_truncated');
      }
      audioFormat = buffer.readUInt16LE(chunkStart);
      channels = buffer.readUInt16LE(chunkStart + 2);
      sampleRateHz = buffer.readUInt32LE(chunkStart + 4);
      bitsPerSample = buffer.readUInt16LE(chunkStart + 14);
      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 40 && chunkStart + 26 <= buffer.length) {
        // First two bytes of the sub-format GUID carry the real format tag.
        audioFormat = buffer.readUInt16LE(chunkStart + 24);
      }
    } else if (chunkId === 'data') {
      dataOffset = chunkStart;
      // Streamed WAVs (ffmpeg to a pipe) leave the size unset; clamp to what arrived.
      dataBytes = Math.min(chunkSize, buffer.length - chunkStart);
      break;
    }

    const paddedSize = chunkSize + (chunkSize % 2);
    const nextOffset = chunkStart + paddedSize;
    if (nextOffset <= offset) {
      break;
    }
    offset = nextOffset;
  }

  if (audioFormat === null || channels === null || sampleRateHz === null || bitsPerSample === null) {
    throw new Error('missing_fmt_chunk');
  }
  if (dataOffset === null || dataBytes === null) {
    throw new Error('missing_data_chunk');
  }
  if (channels <= 0 || sampleRateHz <= 0 || bitsPerSample <= 0) {
    throw new Error('invalid_format_values');
  }

  return { audioFormat, channels, sampleRateHz, bitsPerSample, dataOffset, dataBytes };
}

type SampleReader = (buffer: Buffer, offset: number) => number;

function sampleReader(format: WavFormat): SampleReader {
  if (format.audioFormat === WAVE_FORMAT_PCM) {
    switch (format.bitsPerSample) {
      case 8:
        return (buf, off) => (buf.readUInt8(off) - 128) / 128;
      case 16:
        return (buf, off) => buf.readInt16LE(off) / 32768;
      case 24:
        return (buf, off) => buf.readIntLE(off, 3) / 8388608;
      case 32:
        return (buf, off) => buf.readInt32LE(off) / 2147483648;
      default:
        break;
    }
  } else if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    if (format.bitsPerSample === 32) return (buf, off) => buf.readFloatLE(off);
    if (format.bitsPerSample === 64) return (buf, off) => buf.readDoubleLE(off);
  }
  throw new Error(`unsupported_wav_encoding format=${format.audioFormat} bits=${format.bitsPerSample}`);
}

export function decodeWav(buffer: Buffer): DecodedAudio {
  const format = parseWavFormat(buffer);
  const read = sampleReader(format);

  const bytesPerSample = format.bitsPerSample / 8;
  const bytesPerFrame = bytesPerSample * format.channels;
  const frameCount = Math.floor(format.dataBytes / bytesPerFrame);
  if (frameCount <= 0) {
    throw new Error('empty_data_chunk');
  }

  const channels: Float32Array[] = [];
  for (let ch = 0; ch < format.channels; ch += 1) {
    channels.push(new Float32Array(frameCount));
  }

  for (let i = 0; i < frameCount; i += 1) {
    const frameOffset = format.dataOffset + i * bytesPerFrame;
    for (let ch = 0; ch < format.channels; ch += 1) {
      const value = read(buffer, frameOffset + ch * bytesPerSample);
      channels[ch][i] = Number.isFinite(value) ? value : 0;
    }
  }

  return { channels, sampleRateHz: format.sampleRateHz };
}

function wavHeader(pcmDataBytes: number, sampleRate: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

export function floatToInt16(sample: number): number {
  const clamped = sample > 1 ? 1 : sample < -1 ? -1 : sample;
  return clamped < 0 ? Math.round(clamped * 32768) : Math.round(clamped * 32767);
}

export function encodeWavPcm16(samples: Float32Array, sampleRateHz: number): Buffer {
  const pcmBuffer = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    pcmBuffer.writeInt16LE(floatToInt16(samples[i]), i * 2);
  }
  const header = wavHeader(pcmBuffer.length, sampleRateHz, 1);
  return Buffer.concat([header, pcmBuffer]);
}
