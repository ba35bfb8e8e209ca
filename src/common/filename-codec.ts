// URL-safe base64 without padding, so every URL maps to one flat file name.
export function encodeUrlToFilename(url: string): string {
  return Buffer.from(url, 'utf8').toString('base64url');
}

export function decodeFilenameToUrl(encoded: string): string {
  return Buffer.from(encoded, 'base64url').toString('utf8');
}
