/**
 * Minimal PCM WAV codec for the noise injector (8/16/24/32-bit integer PCM).
 */

export interface PcmAudio {
  samples: Float64Array; // interleaved, in [-1, 1]
  sampleRate: number;
  channels: number;
}

export function decodeWav(buffer: Buffer): PcmAudio {
  // Parse RIFF header
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('Not a valid WAV file (missing RIFF header)');
  }
  if (buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a valid WAV file (missing WAVE header)');
  }

  let offset = 12;
  let fmtFound = false;
  let audioFormat = 1;
  let sampleRate = 0;
  let channels = 1;
  let bitsPerSample = 16;
  let dataBuffer: Buffer | null = null;

  while (offset <= buffer.length - 8) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ') {
      audioFormat = buffer.readUInt16LE(offset);
      channels = buffer.readUInt16LE(offset + 2);
      sampleRate = buffer.readUInt32LE(offset + 4);
      bitsPerSample = buffer.readUInt16LE(offset + 14);
      fmtFound = true;
    } else if (chunkId === 'data') {
      dataBuffer = buffer.subarray(offset, Math.min(offset + chunkSize, buffer.length));
    }
    offset += chunkSize;
    // Align to 2-byte boundary
    if (chunkSize % 2 !== 0) offset++;
  }

  if (!fmtFound || !dataBuffer) {
    throw new Error('Invalid WAV: missing fmt or data chunk');
  }
  // 0xFFFE is WAVE_FORMAT_EXTENSIBLE, which sox writes for >2 channels or >16 bits.
  if (audioFormat !== 1 && audioFormat !== 0xfffe) {
    throw new Error(`Unsupported WAV encoding (format tag ${audioFormat})`);
  }
  if (![8, 16, 24, 32].includes(bitsPerSample) || channels < 1) {
    throw new Error(`Unsupported WAV layout (${bitsPerSample}-bit, ${channels} channels)`);
  }

  const bytesPerSample = bitsPerSample / 8;
  const total = Math.floor(dataBuffer.length / bytesPerSample);
  const samples = new Float64Array(total);

  for (let i = 0; i < total; i++) {
    const pos = i * bytesPerSample;
    if (bitsPerSample === 8) {
      samples[i] = dataBuffer[pos] / 128.0 - 1.0;
    } else if (bitsPerSample === 16) {
      samples[i] = dataBuffer.readInt16LE(pos) / 32768.0;
    } else if (bitsPerSample === 24) {
      samples[i] = dataBuffer.readIntLE(pos, 3) / 8388608.0;
    } else {
      samples[i] = dataBuffer.readInt32LE(pos) / 2147483648.0;
    }
  }

  return { samples, sampleRate, channels };
}

/** Encode as 16-bit PCM; values outside [-1, 1] are clipped. */
export function encodeWav16(audio: PcmAudio): Buffer {
  const dataSize = audio.samples.length * 2;
  const out = Buffer.alloc(44 + dataSize);

  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(36 + dataSize, 4);
  out.write('WAVE', 8, 'ascii');
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(1, 20);
  out.writeUInt16LE(audio.channels, 22);
  out.writeUInt32LE(audio.sampleRate, 24);
  out.writeUInt32LE(audio.sampleRate * audio.channels * 2, 28);
  out.writeUInt16LE(audio.channels * 2, 32);
  out.writeUInt16LE(16, 34);
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < audio.samples.length; i++) {
    const s = Math.max(-1, Math.min(1, audio.samples[i]));
    out.writeInt16LE(Math.round(s < 0 ? s * 32768 : s * 32767), 44 + i * 2);
  }
  return out;
}
