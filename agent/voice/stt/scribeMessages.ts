/**
 * Wire messages of the ElevenLabs realtime speech-to-text socket.
 *
 * Outgoing messages are plain JSON objects. Incoming frames are validated
 * into the `ServerMessage` union; anything else becomes `unknown`.
 */

export interface InputAudioChunk {
  message_type: 'input_audio_chunk';
  audio_base_64: string;
  commit: boolean;
  sample_rate: number;
}

export const PROTOCOL_ERROR_TYPES = [
  'error',
  'auth_error',
  'quota_exceeded',
  'rate_limited',
  'commit_throttled',
  'transcriber_error',
  'unaccepted_terms',
  'input_error',
  'queue_overflow',
  'resource_exhausted',
  'session_time_limit_exceeded',
  'chunk_size_exceeded',
  'insufficient_audio_activity',
] as const;

export type ProtocolErrorType = (typeof PROTOCOL_ERROR_TYPES)[number];

export type ServerMessage =
  | { kind: 'session_started'; sessionId: string | null }
  | { kind: 'partial'; text: string }
  | { kind: 'committed'; text: string; languageCode: string | null }
  | { kind: 'error'; errorType: ProtocolErrorType; message: string }
  | { kind: 'unknown'; messageType: string | null };

export function encodeAudioChunk(audio: Buffer, sampleRate: number): string {
  const message: InputAudioChunk = {
    message_type: 'input_audio_chunk',
    audio_base_64: audio.toString('base64'),
    commit: false,
    sample_rate: sampleRate,
  };
  return JSON.stringify(message);
}

export function encodeCommit(sampleRate: number): string {
  const message: InputAudioChunk = {
    message_type: 'input_audio_chunk',
    audio_base_64: '',
    commit: true,
    sample_rate: sampleRate,
  };
  return JSON.stringify(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

function isProtocolErrorType(value: string): value is ProtocolErrorType {
  return PROTOCOL_ERROR_TYPES.some((type) => type === value);
}

/**
 * Parses one text frame. Throws a SyntaxError on malformed JSON.
 */
export function parseServerMessage(raw: string): ServerMessage {
  const data: unknown = JSON.parse(raw);
  if (!isRecord(data)) {
    return { kind: 'unknown', messageType: null };
  }

  const messageType = stringField(data, 'message_type');
  switch (messageType) {
    case 'session_started':
      return { kind: 'session_started', sessionId: stringField(data, 'session_id') };
    case 'partial_transcript':
      return { kind: 'partial', text: stringField(data, 'text') ?? '' };
    case 'committed_transcript':
    case 'committed_transcript_with_timestamps':
      return {
        kind: 'committed',
        text: stringField(data, 'text') ?? '',
        languageCode: stringField(data, 'language_code'),
      };
    default:
      if (messageType && isProtocolErrorType(messageType)) {
        return {
          kind: 'error',
          errorType: messageType,
          message: stringField(data, 'error') ?? stringField(data, 'message') ?? messageType,
        };
      }
      return { kind: 'unknown', messageType };
  }
}
