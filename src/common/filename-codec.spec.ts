import { decodeFilenameToUrl, encodeUrlToFilename } from './filename-codec';

describe('filename codec', () => {
  it('encodes without padding', () => {
    expect(encodeUrlToFilename('https://example.com')).toBe('aHR0cHM6Ly9leGFtcGxlLmNvbQ');
  });

  it('uses the URL-safe alphabet', () => {
    expect(encodeUrlToFilename('~~~???')).toBe('fn5-Pz8_');
  });

  it('decodes names produced by the encoder', () => {
    expect(decodeFilenameToUrl('aHR0cHM6Ly9leGFtcGxlLmNvbQ')).toBe('https://example.com');
    expect(decodeFilenameToUrl('fn5-Pz8_')).toBe('~~~???');
  });
});
