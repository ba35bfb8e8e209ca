import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleInit,
} from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as QRCode from 'qrcode';
import { decodeFilenameToUrl, encodeUrlToFilename } from '../common/filename-codec';
import { Link, generateLinks } from '../common/links';
import { CreateQrCodeDto } from './dto/create-qr-code.dto';
import { QrCodeResponseDto } from './dto/qr-code-response.dto';
import { QR_CODE_OPTIONS, QrCodeOptions } from './qr-codes.options';

const EXTENSION = '.png';
const MAX_FILENAME_BYTES = 255;

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.includes(error.code)
  );
}

@Injectable()
export class QrCodesService implements OnModuleInit {
  private readonly logger = new Logger(QrCodesService.name);

  constructor(@Inject(QR_CODE_OPTIONS) private readonly options: QrCodeOptions) { }

  async onModuleInit() {
    await fs.mkdir(this.options.directory, { recursive: true });
  }

  async create({ url, size }: CreateQrCodeDto): Promise<QrCodeResponseDto> {
    this.logger.log(`Creating QR code for URL: ${url}`);

    const filename = `${encodeUrlToFilename(url)}${EXTENSION}`;
    if (Buffer.byteLength(filename) > MAX_FILENAME_BYTES) {
      throw new BadRequestException('URL is too long to be stored as a QR code');
    }

    const downloadUrl = this.downloadUrlFor(filename);
    const links = generateLinks('create', filename, this.options.baseUrl, downloadUrl);

    if (await this.isFile(path.join(this.options.directory, filename))) {
      throw this.alreadyExists(links);
    }

    const image = await this.render(url, size);
    try {
      // wx: a concurrent request for the same URL must not overwrite the file
      await fs.writeFile(path.join(this.options.directory, filename), image, { flag: 'wx' });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw this.alreadyExists(links);
      }
      throw error;
    }

    return {
      message: 'QR code created successfully.',
      qr_code_url: downloadUrl,
      links,
    };
  }

  async list(): Promise<QrCodeResponseDto[]> {
    this.logger.log('Listing all QR codes');

    const entries = await fs.readdir(this.options.directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(EXTENSION))
      .map((entry) => entry.name)
      .sort()
      .map((filename) => ({
        message: 'QR code available',
        qr_code_url: decodeFilenameToUrl(filename.slice(0, -EXTENSION.length)),
        links: generateLinks(
          'list',
          filename,
          this.options.baseUrl,
          this.downloadUrlFor(filename),
        ),
      }));
  }

  /**
   * Absolute path of a stored image. Names that are not a plain file inside
   * the QR directory are reported as missing.
   */
  async findPath(filename: string): Promise<string> {
    const file = this.resolve(filename);
    if (file === undefined || !(await this.isFile(file))) {
      throw new NotFoundException('QR code not found');
    }
    return file;
  }

  async remove(filename: string): Promise<void> {
    this.logger.log(`Deleting QR code: ${filename}`);

    const file = await this.findPath(filename);
    try {
      await fs.unlink(file);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new NotFoundException('QR code not found');
      }
      throw error;
    }
  }

  private resolve(filename: string): string | undefined {
    if (
      filename === '' ||
      filename === '.' ||
      filename === '..' ||
      filename.includes('\0') ||
      path.basename(filename) !== filename
    ) {
      return undefined;
    }
    return path.join(this.options.directory, filename);
  }

  private async isFile(file: string): Promise<boolean> {
    try {
      return (await fs.stat(file)).isFile();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENAMETOOLONG')) {
        return false;
      }
      throw error;
    }
  }

  private async render(url: string, size: number): Promise<Buffer> {
    // The requested size is a floor: grow the symbol until the URL fits.
    const { version } = QRCode.create(url, { errorCorrectionLevel: 'M' });

    return QRCode.toBuffer(url, {
      type: 'png',
      version: Math.max(size, version),
      errorCorrectionLevel: 'M',
      margin: 5,
      scale: 10,
      color: {
        dark: this.options.fillColor,
        light: this.options.backColor,
      },
    });
  }

  private downloadUrlFor(filename: string): string {
    return `${this.options.baseUrl}/${this.options.downloadFolder}/${filename}`;
  }

  private alreadyExists(links: Link[]): ConflictException {
    return new ConflictException({ message: 'QR code already exists.', links });
  }
}
