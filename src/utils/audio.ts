import type { SynthesizedAudio } from '../providers/tts/interface.js';

/**
 * Format every provider's audio is played back as
 */
export const AUDIO_MIME_TYPE = 'audio/wav';

/**
 * Canonical base64 form of provider audio. Raw bytes are encoded; base64
 * from the provider is passed through unchanged.
 */
export function toBase64Audio(audio: SynthesizedAudio): string {
  switch (audio.encoding) {
    case 'raw':
      return audio.bytes.toString('base64');
    case 'base64':
      return audio.data;
  }
}

/**
 * Decode stored audio for playback
 */
export function decodeAudio(audioBase64: string): Buffer {
  return Buffer.from(audioBase64, 'base64');
}
