/**
 * PCM helpers shared by capture, transcription and playback.
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Divisor for normalizing 16-bit signed PCM to -1.0..1.0 range */
const PCM_16BIT_MAX = 32768.0;

/** Number of bytes per 16-bit sample */
export const BYTES_PER_SAMPLE = 2;

/** Size of the WAV file header in bytes */
const WAV_HEADER_SIZE = 44;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Convert 16-bit signed little-endian PCM to Float32 samples.
 * A trailing odd byte is ignored.
 *
 * @param buffer - Raw PCM bytes
 * @returns Samples normalized to -1.0..1.0
 */
export function bufferToFloat32(buffer: Buffer): Float32Array {
  const sampleCount = Math.floor(buffer.length / BYTES_PER_SAMPLE);
  const float32 = new Float32Array(sampleCount);

  for (let i = 0; i < sampleCount; i++) {
    float32[i] = buffer.readInt16LE(i * BYTES_PER_SAMPLE) / PCM_16BIT_MAX;
  }

  return float32;
}

/**
 * Concatenate Float32Array chunks into one array.
 *
 * @param chunks - Audio chunks in order
 * @returns A single array (the chunk itself when there is only one)
 */
export function concatenateChunks(chunks: readonly Float32Array[]): Float32Array {
  if (chunks.length === 0) return new Float32Array(0);
  if (chunks.length === 1) return chunks[0];

  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Float32Array(totalLength);

  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }

  return result;
}

/**
 * Encode Float32 samples as a 16-bit mono WAV file.
 *
 * @param samples - Samples normalized to -1.0..1.0
 * @param sampleRate - Sample rate written into the header
 * @returns WAV file bytes
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataSize = samples.length * BYTES_PER_SAMPLE;
  const buffer = Buffer.alloc(WAV_HEADER_SIZE + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(WAV_HEADER_SIZE + dataSize - 8, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16); // PCM sub-chunk size
  buffer.writeUInt16LE(1, 20); // PCM format
  buffer.writeUInt16LE(1, 22); // mono
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28);
  buffer.writeUInt16LE(BYTES_PER_SAMPLE, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);

  let offset = WAV_HEADER_SIZE;
  for (const sample of samples) {
    const clamped = Math.max(-1, Math.min(1, sample));
    buffer.writeInt16LE(Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff), offset);
    offset += BYTES_PER_SAMPLE;
  }

  return buffer;
}

/** Duration of a chunk in milliseconds */
export function durationMs(sampleCount: number, sampleRate: number): number {
  return (sampleCount / sampleRate) * 1000;
}
