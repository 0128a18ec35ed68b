/**
 * Jest Test Setup
 * Quiet logger and monochrome output for every test file
 */

import chalk from 'chalk';
import { configureLogger, LogLevel } from '../src/lib/error-handler';

process.env.NODE_ENV = 'test';

chalk.level = 0;

configureLogger({
  level: LogLevel.ERROR,
  enableConsole: false,
  enableFile: false
});

jest.setTimeout(30000);
