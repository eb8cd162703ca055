import { expect } from 'chai';
import { MessageDecoder, encodeMessage, MAX_CONTENT_LENGTH } from '../src/wireCodec';
import { FramingError } from '../src/errors';

const frame = (body: string): Buffer =>
  Buffer.from(`Content-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`);

describe('wireCodec', () => {
  describe('encodeMessage', () => {
    it('prefixes the JSON body with its Content-Length header', () => {
      const encoded = encodeMessage({ seq: 1, type: 'request', command: 'threads' });
      expect(encoded.toString('utf8')).to.equal(
        'Content-Length: 46\r\n\r\n{"seq":1,"type":"request","command":"threads"}',
      );
    });

    it('counts bytes, not characters', () => {
      const encoded = encodeMessage({ text: 'é' });
      expect(encoded.toString('utf8')).to.equal(
        'Content-Length: 13\r\n\r\n{"text":"é"}',
      );
    });
  });

  describe('MessageDecoder', () => {
    it('decodes what encodeMessage produced', () => {
      const message = { seq: 7, type: 'event', event: 'output', body: { output: 'héllo\n' } };
      const frames = new MessageDecoder().push(encodeMessage(message));
      expect(frames).to.deep.equal([{ kind: 'message', message }]);
    });

    it('reassembles a frame delivered one byte at a time', () => {
      const decoder = new MessageDecoder();
      const bytes = frame('{"seq":1,"type":"event","event":"initialized"}');
      const frames = [];
      for (let i = 0; i < bytes.length; i++) {
        frames.push(...decoder.push(bytes.subarray(i, i + 1)));
      }
      expect(frames).to.have.length(1);
      expect(frames[0]).to.deep.equal({
        kind: 'message',
        message: { seq: 1, type: 'event', event: 'initialized' },
      });
      expect(decoder.bufferedBytes).to.equal(0);
    });

    it('returns every complete frame of a chunk and keeps the remainder', () => {
      const decoder = new MessageDecoder();
      const first = frame('{"seq":1,"type":"event","event":"a"}');
      const second = frame('{"seq":2,"type":"event","event":"b"}');
      const chunk = Buffer.concat([first, second.subarray(0, 10)]);

      const frames = decoder.push(chunk);
      expect(frames).to.have.length(1);
      expect(decoder.bufferedBytes).to.equal(10);

      const rest = decoder.push(second.subarray(10));
      expect(rest).to.deep.equal([
        { kind: 'message', message: { seq: 2, type: 'event', event: 'b' } },
      ]);
    });

    it('matches the header name case-insensitively and ignores other headers', () => {
      const body = '{"seq":3,"type":"event","event":"x"}';
      const raw = Buffer.from(
        `Content-Type: application/json\r\ncontent-length: ${body.length}\r\n\r\n${body}`,
      );
      const frames = new MessageDecoder().push(raw);
      expect(frames).to.deep.equal([
        { kind: 'message', message: { seq: 3, type: 'event', event: 'x' } },
      ]);
    });

    it('throws FramingError when the header has no Content-Length', () => {
      const decoder = new MessageDecoder();
      expect(() => decoder.push(Buffer.from('Content-Type: json\r\n\r\n{}'))).to.throw(
        FramingError,
        'Missing Content-Length header.',
      );
    });

    it('throws FramingError on a non-numeric Content-Length', () => {
      expect(() =>
        new MessageDecoder().push(Buffer.from('Content-Length: abc\r\n\r\n')),
      ).to.throw(FramingError, 'Invalid Content-Length: abc');
      expect(() =>
        new MessageDecoder().push(Buffer.from('Content-Length: -1\r\n\r\n')),
      ).to.throw(FramingError, 'Invalid Content-Length: -1');
    });

    it('throws FramingError when Content-Length exceeds the maximum', () => {
      const length = MAX_CONTENT_LENGTH + 1;
      expect(() =>
        new MessageDecoder().push(Buffer.from(`Content-Length: ${length}\r\n\r\n`)),
      ).to.throw(FramingError, `Content-Length ${length} exceeds maximum`);
    });

    it('throws FramingError when no header terminator shows up', () => {
      const garbage = Buffer.alloc(9000, 'a');
      expect(() => new MessageDecoder().push(garbage)).to.throw(
        FramingError,
        'No header terminator within 8192 bytes.',
      );
    });

    it('reports an unparseable body as malformed and keeps decoding', () => {
      const decoder = new MessageDecoder();
      const frames = decoder.push(
        Buffer.concat([
          frame('{not json'),
          frame('{"seq":4,"type":"event","event":"y"}'),
        ]),
      );
      expect(frames).to.have.length(2);
      const [bad, good] = frames;
      expect(bad.kind).to.equal('malformed');
      if (bad.kind === 'malformed') {
        expect(bad.raw).to.equal('{not json');
        expect(bad.error.message).to.match(/^Error parsing DAP message JSON: /);
      }
      expect(good).to.deep.equal({
        kind: 'message',
        message: { seq: 4, type: 'event', event: 'y' },
      });
    });

    it('reports a body without a string type as malformed', () => {
      const [decoded] = new MessageDecoder().push(frame('{"seq":1,"type":5}'));
      expect(decoded.kind).to.equal('malformed');
      if (decoded.kind === 'malformed') {
        expect(decoded.error.message).to.equal(
          'Received malformed DAP message: missing or invalid type.',
        );
      }
    });

    it('handles an empty body as malformed rather than waiting forever', () => {
      const [decoded] = new MessageDecoder().push(
        Buffer.from('Content-Length: 0\r\n\r\n'),
      );
      expect(decoded.kind).to.equal('malformed');
    });
  });
});
