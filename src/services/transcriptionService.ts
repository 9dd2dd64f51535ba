import { createOpenAI } from '@ai-sdk/openai';
import { experimental_transcribe as transcribe } from 'ai';

const TRANSCRIPTION_MODEL = 'gpt-4o-transcribe';
const AUDIO_MIME_TYPES = ['application/ogg', 'video/mp4'];

export type Transcriber = (audio: Uint8Array) => Promise<string>;

export function isAudioAttachment(contentType: string | null | undefined, isVoiceMessage = false): boolean {
  if (isVoiceMessage) return true;
  const mime = (contentType ?? '').toLowerCase().split(';')[0].trim();
  return mime.startsWith('audio/') || AUDIO_MIME_TYPES.includes(mime);
}

export function createTranscriber(apiKey: string | undefined): Transcriber {
  const openai = createOpenAI({ apiKey });
  return async (audio) => {
    if (!apiKey) {
      throw new Error('Transcription is not configured (missing OPENAI_API_KEY)');
    }
    const result = await transcribe({
      model: openai.transcription(TRANSCRIPTION_MODEL),
      audio,
    });
    return result.text.trim();
  };
}

export async function downloadAudio(url: string, fetchImpl: typeof fetch = fetch): Promise<Uint8Array> {
  const response = await fetchImpl(url, { signal: AbortSignal.timeout(120_000) });
  if (!response.ok) {
    throw new Error(`Audio download failed: ${response.status} ${response.statusText}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}
