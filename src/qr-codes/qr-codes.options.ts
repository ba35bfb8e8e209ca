export const QR_CODE_OPTIONS = 'QR_CODE_OPTIONS';

export interface QrCodeOptions {
  /** Absolute directory the PNG files are written to. */
  directory: string;
  fillColor: string;
  backColor: string;
  /** Public base URL, without a trailing slash. */
  baseUrl: string;
  downloadFolder: string;
}
