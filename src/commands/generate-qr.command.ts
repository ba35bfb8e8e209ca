#!/usr/bin/env node
import 'reflect-metadata';
import { createGenerateQrProgram } from './generate-qr.program';

createGenerateQrProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Error generating QR code:', error);
    process.exit(1);
  });
