export const AUDIO_SAMPLE_RATE = 16000;
export const BYTES_PER_SAMPLE = 2; // s16le mono
export const WAV_HEADER_BYTES = 44;

export interface FrameEnergy {
  peak: number;
  rms: number;
}

/** Byte count of `ms` of audio, always a whole number of samples. */
export const msToBytes = (ms: number): number =>
  Math.max(0, Math.floor((AUDIO_SAMPLE_RATE * ms) / 1000)) * BYTES_PER_SAMPLE;

export const bytesToMs = (bytes: number): number =>
  (bytes / (BYTES_PER_SAMPLE * AUDIO_SAMPLE_RATE)) * 1000;

export const measureFrame = (pcm: Buffer): FrameEnergy => {
  let peak = 0;
  let sumSquares = 0;
  let count = 0;

  for (let offset = 0; offset + 1 < pcm.length; offset += BYTES_PER_SAMPLE) {
    const sample = pcm.readInt16LE(offset);
    const abs = Math.abs(sample);
    if (abs > peak) {
      peak = abs;
    }
    sumSquares += sample * sample;
    count += 1;
  }

  return {
    peak,
    rms: count > 0 ? Math.round(Math.sqrt(sumSquares / count)) : 0
  };
};

export const wavHeader = (pcmDataBytes: number, sampleRate = AUDIO_SAMPLE_RATE): Buffer => {
  const numChannels = 1;
  const blockAlign = numChannels * BYTES_PER_SAMPLE;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
};

export const encodeWav = (pcm: Buffer): Buffer => Buffer.concat([wavHeader(pcm.length), pcm]);

/**
 * Returns the PCM payload of a 16-bit mono WAV file. Walks the RIFF chunk list
 * because ffmpeg may write a LIST chunk before `data`.
 */
export const decodeWavPcm = (wav: Buffer): Buffer => {
  if (wav.length < 12 || wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a RIFF/WAVE file');
  }

  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString('ascii', offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (id === 'fmt ') {
      const channels = wav.readUInt16LE(bodyStart + 2);
      const bitsPerSample = wav.readUInt16LE(bodyStart + 14);
      if (channels !== 1 || bitsPerSample !== 16) {
        throw new Error(`Unsupported WAV layout: ${channels} channel(s), ${bitsPerSample}-bit`);
      }
    }

    if (id === 'data') {
      const end = Math.min(wav.length, bodyStart + size);
      return wav.subarray(bodyStart, end - ((end - bodyStart) % BYTES_PER_SAMPLE));
    }

    offset = bodyStart + size + (size % 2);
  }

  throw new Error('WAV file has no data chunk');
};
