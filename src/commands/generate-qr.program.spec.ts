import { CommanderError } from 'commander';
import { promises as fs } from 'fs';
import { createGenerateQrProgram } from './generate-qr.program';

const EXAMPLE_FILE = 'aHR0cHM6Ly9leGFtcGxlLmNvbQ.png';

describe('generate-qr', () => {
  const directory = process.env.QR_CODE_DIR ?? '';
  let printed: string[];
  let errors: string[];

  function run(...args: string[]) {
    const program = createGenerateQrProgram((line) => printed.push(line))
      .exitOverride()
      .configureOutput({
        writeOut: (text) => printed.push(text),
        writeErr: (text) => errors.push(text),
      });
    return program.parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    printed = [];
    errors = [];
  });

  afterAll(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('prints the download URL of the new image', async () => {
    await run('https://example.com', '--size', '2');

    expect(printed).toEqual([`http://localhost:80/downloads/${EXAMPLE_FILE}`]);
    expect(errors).toEqual([]);
    await expect(fs.readdir(directory)).resolves.toEqual([EXAMPLE_FILE]);
  });

  it('exits with 1 when the image already exists', async () => {
    const attempt = run('https://example.com');

    await expect(attempt).rejects.toBeInstanceOf(CommanderError);
    await expect(attempt).rejects.toMatchObject({ exitCode: 1 });
    expect(errors).toEqual(['QR code already exists for https://example.com\n']);
    expect(printed).toEqual([]);
  });

  it('exits with 1 on an invalid URL', async () => {
    await expect(run('not a url')).rejects.toMatchObject({ exitCode: 1 });

    expect(errors).toEqual(['url must be a URL address\n']);
    await expect(fs.readdir(directory)).resolves.toEqual([EXAMPLE_FILE]);
  });
});
