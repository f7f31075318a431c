import {
  CALLBACK_DATA_LIMIT,
  decodeDownload,
  encodeDownload,
  encodeLyricsDownload,
  encodeLyricsLookup,
  fitCallbackData,
  LYRICS_CALLBACK_PATTERN,
} from '../services/callbackData';

describe('callbackData', () => {
  it('should encode a download selection with format, index and id', () => {
    expect(encodeDownload({ format: 'audio', index: 3, expectedId: 'kJQP7kiw5Fk' })).toBe('dl:a:3:kJQP7kiw5Fk');
    expect(encodeDownload({ format: 'video', index: 0, expectedId: 'a-b_c' })).toBe('dl:v:0:a-b_c');
  });

  it('should decode what it encoded', () => {
    expect(decodeDownload('dl:v:7:a-b_c')).toEqual({ format: 'video', index: 7, expectedId: 'a-b_c' });
  });

  it.each(['dl:x:1:abc', 'dl:a::abc', 'dl:a:1:', 'download_mp3_1', 'dl:a:-1:abc'])(
    'should reject malformed data %s',
    (data) => {
      expect(decodeDownload(data)).toBeNull();
    },
  );

  it('should keep short lyrics queries untouched', () => {
    expect(encodeLyricsLookup('  Shape of You ')).toBe('lyr:Shape of You');
    expect(encodeLyricsDownload('Shape of You Ed Sheeran')).toBe('lyrdl:Shape of You Ed Sheeran');
  });

  it('should cut long values to the callback limit', () => {
    const data = encodeLyricsLookup('x'.repeat(100));
    expect(data).toBe(`lyr:${'x'.repeat(60)}`);
    expect(Buffer.byteLength(data, 'utf8')).toBe(CALLBACK_DATA_LIMIT);
  });

  it('should never split a multi-byte character', () => {
    // "é" takes two bytes: 4 bytes of prefix leave room for 30 of them
    const data = fitCallbackData('lyr:', 'é'.repeat(40));
    expect(data).toBe(`lyr:${'é'.repeat(30)}`);
    expect(Buffer.byteLength(data, 'utf8')).toBe(64);
  });

  it('should extract the query from lyrics callback data', () => {
    expect(LYRICS_CALLBACK_PATTERN.exec('lyr:Bohemian Rhapsody')?.[1]).toBe('Bohemian Rhapsody');
  });
});
