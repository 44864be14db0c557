#!/usr/bin/env node
/**
 * pdfvec CLI entry point
 */

import { createProgram, readGlobalOptions } from './program.js';
import { closeAllDbs } from '../database/index.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

async function main(): Promise<void> {
  const program = createProgram();
  const errorOptions = () => readGlobalOptions(program);

  // Errors raised outside the command's promise chain
  const globalHandler = createGlobalErrorHandler(errorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    closeAllDbs();
    handleError(error, errorOptions());
  }
  closeAllDbs();
}

void main();
