import {
  encodeAudioChunk,
  encodeCommit,
  parseServerMessage,
} from '../../agent/voice/stt/scribeMessages';

describe('scribe wire messages', () => {
  describe('encoding', () => {
    it('wraps audio as a base64 input chunk', () => {
      const json = encodeAudioChunk(Buffer.from([1, 2, 3, 4]), 16000);
      expect(JSON.parse(json)).toEqual({
        message_type: 'input_audio_chunk',
        audio_base_64: 'AQIDBA==',
        commit: false,
        sample_rate: 16000,
      });
    });

    it('commits with an empty chunk', () => {
      expect(JSON.parse(encodeCommit(16000))).toEqual({
        message_type: 'input_audio_chunk',
        audio_base_64: '',
        commit: true,
        sample_rate: 16000,
      });
    });
  });

  describe('parseServerMessage', () => {
    it('reads session_started', () => {
      expect(parseServerMessage('{"message_type":"session_started","session_id":"abc"}')).toEqual({
        kind: 'session_started',
        sessionId: 'abc',
      });
    });

    it('reads partial transcripts', () => {
      expect(parseServerMessage('{"message_type":"partial_transcript","text":"hel"}')).toEqual({
        kind: 'partial',
        text: 'hel',
      });
    });

    it('treats both committed variants the same', () => {
      const plain = parseServerMessage('{"message_type":"committed_transcript","text":"hello"}');
      const timed = parseServerMessage(
        '{"message_type":"committed_transcript_with_timestamps","text":"hello","language_code":"en","words":[]}',
      );
      expect(plain).toEqual({ kind: 'committed', text: 'hello', languageCode: null });
      expect(timed).toEqual({ kind: 'committed', text: 'hello', languageCode: 'en' });
    });

    it('defaults missing text to empty', () => {
      expect(parseServerMessage('{"message_type":"partial_transcript"}')).toEqual({
        kind: 'partial',
        text: '',
      });
    });

    it('reads protocol errors', () => {
      expect(parseServerMessage('{"message_type":"auth_error","error":"invalid key"}')).toEqual({
        kind: 'error',
        errorType: 'auth_error',
        message: 'invalid key',
      });
      expect(parseServerMessage('{"message_type":"rate_limited"}')).toEqual({
        kind: 'error',
        errorType: 'rate_limited',
        message: 'rate_limited',
      });
    });

    it('marks anything else as unknown', () => {
      expect(parseServerMessage('{"message_type":"something_new"}')).toEqual({
        kind: 'unknown',
        messageType: 'something_new',
      });
      expect(parseServerMessage('[1,2]')).toEqual({ kind: 'unknown', messageType: null });
    });

    it('throws on malformed JSON', () => {
      expect(() => parseServerMessage('not json')).toThrow(SyntaxError);
    });
  });
});
